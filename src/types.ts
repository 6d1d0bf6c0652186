import { z } from "zod";
import {
  measurementSchema,
  oauthTokenSchema,
  storedSessionSchema,
  vehicleOverviewSchema,
  vehiclePictureSchema,
  vehicleSummarySchema,
} from "./schemas";

export interface HttpRequestConfig {
  headers?: Record<string, string>;
  timeout?: number;
  maxRedirects?: number;
  validateStatus?: (status: number) => boolean;
}

export interface RequestResponse {
  status?: number;
  statusText?: string;
  headers?: Record<string, unknown>;
  data?: unknown;
}

export interface HttpClient {
  post(
    url: string,
    data: unknown,
    config: HttpRequestConfig,
  ): Promise<RequestResponse>;
  get(url: string, config: HttpRequestConfig): Promise<RequestResponse>;
}

export interface PorscheConnectConfig {
  email: string;
  password: string;
  // Where tokens are cached between runs; no caching when omitted
  sessionFile?: string;
  token?: OAuthToken;
  captcha?: Captcha;
  leewaySeconds?: number; // default 60
  loginResumeDelayMs?: number; // default 2500
  checkRequestStatus?: boolean; // default true
  requestPollingIntervalSeconds?: number; // default 2
  requestPollingTimeoutSeconds?: number; // default 90
  // Rate limit / 429 handling configuration (optional)
  max429Retries?: number; // default 3
  initial429DelayMs?: number; // default 1000
  backoffFactor?: number; // default 2
  jitterMs?: number; // default 250
  max429DelayMs?: number; // default 30000
  retryOn429ForPost?: boolean; // default false; only GET retried by default
  debug?: boolean;
}

export interface PorscheAuthConfig {
  email: string;
  password: string;
  captcha?: Captcha;
  leewaySeconds?: number;
  loginResumeDelayMs?: number;
  debug?: boolean;
}

export type OAuthToken = z.infer<typeof oauthTokenSchema>;

export type StoredSession = z.infer<typeof storedSessionSchema>;

/**
 * Answer to a login captcha. `state` and `codeVerifier` come from the
 * {@link CaptchaRequiredError} that asked for it.
 */
export interface Captcha {
  code: string;
  state: string;
  codeVerifier?: string;
}

export enum CommandResponseStatus {
  success = "success",
  failure = "failure",
  inProgress = "inProgress",
}

export interface Result {
  status: string;
  response?: RequestResponse;
  message?: string;
}

export enum PorscheApiCommand {
  Lock = "LOCK",
  Unlock = "UNLOCK",
  ClimatiserStart = "REMOTE_CLIMATIZER_START",
  ClimatiserStop = "REMOTE_CLIMATIZER_STOP",
  DirectChargingStart = "DIRECT_CHARGING_START",
  DirectChargingStop = "DIRECT_CHARGING_STOP",
  HonkFlash = "HONK_FLASH",
  ChargingProfilesEdit = "CHARGING_PROFILES_EDIT",
}

export enum HonkFlashMode {
  Flash = "FLASH",
  HonkAndFlash = "HONK_AND_FLASH",
}

export interface ClimateZones {
  frontLeft: boolean;
  frontRight: boolean;
  rearLeft: boolean;
  rearRight: boolean;
}

export interface ClimatiseOptions {
  // Cabin target in Celsius; defaults to 20
  targetTemperature?: number;
  climateZones?: Partial<ClimateZones>;
  withoutHVPower?: boolean;
}

export interface ChargingProfileOptions {
  profileId?: number;
  minimumChargeLevel?: number;
  profileActive?: boolean;
}

// Vendor profile record; `minSoc` and `active` are the fields we edit
export interface ChargingProfile {
  id: number;
  [key: string]: unknown;
}

export type VehicleData = Record<string, unknown>;

export type VehicleSummary = z.infer<typeof vehicleSummarySchema>;
export type Measurement = z.infer<typeof measurementSchema>;
export type VehicleOverview = z.infer<typeof vehicleOverviewSchema>;
export type VehiclePicture = z.infer<typeof vehiclePictureSchema>;

export interface VehicleLocation {
  latitude: number | null;
  longitude: number | null;
  heading: number | null;
}

export type DoorAndLidState = "Open" | "Closed";
