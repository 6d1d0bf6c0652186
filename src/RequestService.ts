import Request, { RequestMethod } from "./Request";
import RequestResult from "./RequestResult";
import RequestError from "./RequestError";
import TokenStore from "./TokenStore";
import { PorscheAuth } from "./auth/PorscheAuth";
import { PorscheError, reasonForStatus } from "./errors";
import { getObject, getString } from "./json";
import {
  vehicleListSchema,
  vehicleOverviewSchema,
  vehiclePictureListSchema,
} from "./schemas";
import {
  Captcha,
  CommandResponseStatus,
  HttpClient,
  OAuthToken,
  PorscheConnectConfig,
  RequestResponse,
  Result,
  VehicleOverview,
  VehiclePicture,
  VehicleSummary,
} from "./types";
import porscheAppConfig from "./porscheAppConfig.json";
import axios from "axios";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";

class RequestService {
  private config: PorscheConnectConfig;
  private auth: PorscheAuth;
  private tokenStore?: TokenStore;
  private authToken?: OAuthToken;
  private checkRequestStatus: boolean;
  private requestPollingTimeoutSeconds: number;
  private requestPollingIntervalSeconds: number;

  constructor(
    config: PorscheConnectConfig,
    private client: HttpClient,
    auth?: PorscheAuth,
    tokenStore?: TokenStore,
  ) {
    this.config = config;
    this.auth = auth ?? new PorscheAuth(config);
    this.tokenStore =
      tokenStore ??
      (config.sessionFile
        ? new TokenStore(config.sessionFile, config.email)
        : undefined);
    this.authToken = config.token ?? this.tokenStore?.load();

    this.checkRequestStatus = config.checkRequestStatus ?? true;
    this.requestPollingTimeoutSeconds =
      config.requestPollingTimeoutSeconds ?? porscheAppConfig.timeoutSeconds;
    this.requestPollingIntervalSeconds =
      config.requestPollingIntervalSeconds ?? 2;
  }

  setAuthToken(authToken: OAuthToken) {
    this.authToken = authToken;

    return this;
  }

  setRequestPollingTimeoutSeconds(seconds: number) {
    this.requestPollingTimeoutSeconds = seconds;

    return this;
  }

  setRequestPollingIntervalSeconds(seconds: number) {
    this.requestPollingIntervalSeconds = seconds;

    return this;
  }

  setCheckRequestStatus(checkStatus: boolean) {
    this.checkRequestStatus = checkStatus;

    return this;
  }

  setCaptcha(captcha: Captcha) {
    this.auth.setCaptcha(captcha);

    return this;
  }

  async getVehicles(): Promise<VehicleSummary[]> {
    const result = await this.sendRequest(this.getVehicleRequest(""));

    return this.parseResponse(vehicleListSchema, result, "vehicle list");
  }

  async getStoredOverview(vin: string): Promise<VehicleOverview> {
    const query = this.getQuery("mf", porscheAppConfig.measurements);
    const result = await this.sendRequest(
      this.getVehicleRequest(`/${vin}?${query}`),
    );

    return this.parseResponse(vehicleOverviewSchema, result, "overview");
  }

  async getCurrentOverview(vin: string): Promise<VehicleOverview> {
    const query = this.getQuery("mf", porscheAppConfig.measurements);
    const result = await this.sendRequest(
      this.getVehicleRequest(`/${vin}?${query}&wakeUpJob=${uuidv4()}`),
    );

    return this.parseResponse(vehicleOverviewSchema, result, "overview");
  }

  async getCapabilities(vin: string): Promise<VehicleOverview> {
    const query = [
      this.getQuery("mf", porscheAppConfig.measurements),
      this.getQuery("cf", porscheAppConfig.commands),
    ].join("&");
    const result = await this.sendRequest(
      this.getVehicleRequest(`/${vin}?${query}`),
    );

    return this.parseResponse(vehicleOverviewSchema, result, "capabilities");
  }

  async getTripStatistics(vin: string): Promise<VehicleOverview> {
    const query = this.getQuery("mf", porscheAppConfig.tripStatistics);
    const result = await this.sendRequest(
      this.getVehicleRequest(`/${vin}?${query}`),
    );

    return this.parseResponse(vehicleOverviewSchema, result, "trip statistics");
  }

  async getPictures(vin: string): Promise<VehiclePicture[]> {
    const result = await this.sendRequest(
      this.getVehicleRequest(`/${vin}/pictures`),
    );

    return this.parseResponse(vehiclePictureListSchema, result, "pictures");
  }

  async sendCommand(vin: string, key: string, payload: unknown): Promise<Result> {
    const request = new Request(this.getApiUrlForPath(`/${vin}/commands`))
      .setMethod(RequestMethod.Post)
      .setBody({ key, payload });

    return this.sendRequest(request);
  }

  async getAuthToken(): Promise<OAuthToken> {
    const token = await this.auth.ensureValidToken(this.authToken);

    if (token !== this.authToken) {
      this.authToken = token;
      this.tokenStore?.save(token);
    }

    return token;
  }

  private getApiUrlForPath(path: string): string {
    return `${porscheAppConfig.serviceUrl}/connect/v1/vehicles${path}`;
  }

  private getVehicleRequest(path: string): Request {
    return new Request(this.getApiUrlForPath(path))
      .setMethod(RequestMethod.Get)
      .setCheckRequestStatus(false);
  }

  private getQuery(name: string, keys: string[]): string {
    return keys.map((key) => `${name}=${encodeURIComponent(key)}`).join("&");
  }

  private parseResponse<T extends z.ZodTypeAny>(
    schema: T,
    result: Result,
    what: string,
  ): z.infer<T> {
    const parsed = schema.safeParse(result.response?.data);
    if (!parsed.success) {
      throw new PorscheError(`Unexpected ${what} response`);
    }
    return parsed.data;
  }

  private async getHeaders(): Promise<Record<string, string>> {
    const authToken = await this.getAuthToken();

    return {
      Accept: "application/json",
      "Content-Type": "application/json",
      "User-Agent": porscheAppConfig.userAgent,
      "X-Client-ID": porscheAppConfig.xClientId,
      Authorization: `Bearer ${authToken.access_token}`,
    };
  }

  private async sendRequest(request: Request): Promise<Result> {
    const max429Retries = this.config.max429Retries ?? 3;
    const retryPost = this.config.retryOn429ForPost ?? false;
    const baseDelay = this.config.initial429DelayMs ?? 1000;
    const backoff = this.config.backoffFactor ?? 2;
    const jitter = this.config.jitterMs ?? 250;
    const maxDelay = this.config.max429DelayMs ?? 30000;

    let attempt = 0;

    while (true) {
      try {
        const response = await this.makeClientRequest(request);
        const { data } = response;

        const checkRequestStatus =
          request.getCheckRequestStatus() ?? this.checkRequestStatus;

        const commandStatus = getObject(data, "status");
        // Poll responses may omit the id the request already carries
        const commandId =
          getString(commandStatus, "id") ?? request.getCommandId();

        if (checkRequestStatus && commandStatus && commandId) {
          const status = this.mapCommandStatus(
            getString(commandStatus, "result"),
          );

          if (status === CommandResponseStatus.failure) {
            throw new RequestError("Command Failure")
              .setResponse(response)
              .setRequest(request);
          }

          if (status === CommandResponseStatus.inProgress) {
            const startedAt = request.getStartedAt() ?? Date.now();

            if (
              Date.now() >=
              startedAt + this.requestPollingTimeoutSeconds * 1000
            ) {
              throw new RequestError("Command Timeout")
                .setResponse(response)
                .setRequest(request);
            }

            // Only the initial POST is logged, not every poll
            if (request.getMethod() === RequestMethod.Post) {
              console.log("info: Command accepted; polling for completion", {
                commandId,
                result: getString(commandStatus, "result"),
              });
            }

            await this.checkRequestPause();

            const pollUrl =
              request.getMethod() === RequestMethod.Post
                ? `${request.getUrl()}/${commandId}`
                : request.getUrl();
            const pollReq = new Request(pollUrl)
              .setMethod(RequestMethod.Get)
              .setCheckRequestStatus(checkRequestStatus)
              .setCommandId(commandId)
              .setStartedAt(startedAt);

            return this.sendRequest(pollReq);
          }

          return new RequestResult(status).setResponse(response).getResult();
        }

        return new RequestResult(CommandResponseStatus.success)
          .setResponse(response)
          .getResult();
      } catch (error) {
        // RequestError and the auth errors are already in their final shape
        if (error instanceof PorscheError) {
          throw error;
        }

        const errorResponse = this.getErrorResponse(error);
        const status = errorResponse?.status;
        const method = request.getMethod();

        if (
          status === 429 &&
          (method === RequestMethod.Get || retryPost) &&
          attempt < max429Retries
        ) {
          attempt++;
          // Determine delay: prefer Retry-After header if present
          let delayMs = baseDelay * Math.pow(backoff, attempt - 1);
          const retryAfter =
            errorResponse?.headers?.["retry-after"] ??
            errorResponse?.headers?.["Retry-After"];
          const parsed = this.parseRetryAfter(retryAfter);
          if (parsed !== null) {
            delayMs = parsed;
          }
          delayMs =
            Math.min(delayMs, maxDelay) + Math.floor(Math.random() * jitter);

          console.warn("[throttle] 429 received; scheduling retry", {
            url: request.getUrl().split("?")[0],
            method,
            attempt,
            maxRetries: max429Retries,
            usedRetryAfter: parsed !== null,
            delayMs,
          });

          await this.delay(delayMs);
          continue;
        }

        if (status === 429) {
          console.warn("[throttle] 429 received; not retrying", {
            url: request.getUrl().split("?")[0],
            method,
            attempt,
            maxRetries: max429Retries,
            reason:
              method === RequestMethod.Get || retryPost
                ? "max-retries-exceeded"
                : "post-retry-disabled",
          });
        }

        if (errorResponse && status !== undefined) {
          const statusText = errorResponse.statusText || reasonForStatus(status);
          throw new RequestError(
            `Request Failed with status ${status} - ${statusText}`,
            status,
          )
            .setResponse({ status, data: errorResponse.data })
            .setRequest(request);
        }

        if (axios.isAxiosError(error) && error.request) {
          throw new RequestError("No response").setRequest(request);
        }

        throw new RequestError(
          error instanceof Error ? error.message : String(error),
        ).setRequest(request);
      }
    }
  }

  // Axios errors and plain `{ response: { status } }` shapes both count
  private getErrorResponse(error: unknown): RequestResponse | undefined {
    if (axios.isAxiosError(error)) {
      return error.response;
    }

    const response = getObject(error, "response");
    if (!response) return undefined;

    const rawStatus = response.status;
    const status =
      typeof rawStatus === "number"
        ? rawStatus
        : typeof rawStatus === "string"
          ? Number(rawStatus)
          : undefined;

    return {
      status: status !== undefined && Number.isFinite(status) ? status : undefined,
      statusText: getString(response, "statusText"),
      headers: getObject(response, "headers"),
      data: response.data,
    };
  }

  private async makeClientRequest(request: Request): Promise<RequestResponse> {
    const requestOptions = {
      headers: await this.getHeaders(),
      timeout: porscheAppConfig.timeoutSeconds * 1000,
    };

    if (this.config.debug) {
      console.log(`${request.getMethod()} ${request.getUrl().split("?")[0]}`);
    }

    const response =
      request.getMethod() === RequestMethod.Post
        ? await this.client.post(
            request.getUrl(),
            request.getBody(),
            requestOptions,
          )
        : await this.client.get(request.getUrl(), requestOptions);

    return { status: response.status, data: response.data };
  }

  // Parses Retry-After header which can be seconds (number) or http-date.
  private parseRetryAfter(retryAfter: unknown): number | null {
    if (retryAfter === undefined || retryAfter === null || retryAfter === "") {
      return null;
    }
    if (typeof retryAfter === "number") {
      return retryAfter * 1000;
    }
    if (typeof retryAfter !== "string") {
      return null;
    }
    const asNum = Number(retryAfter);
    if (!Number.isNaN(asNum)) {
      return asNum * 1000;
    }
    const ts = new Date(retryAfter).getTime();
    if (!Number.isNaN(ts)) {
      const diff = ts - Date.now();
      return diff > 0 ? diff : 0;
    }
    return null;
  }

  private delay(ms: number) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private checkRequestPause() {
    return new Promise((resolve) =>
      setTimeout(resolve, this.requestPollingIntervalSeconds * 1000),
    );
  }

  private mapCommandStatus(result?: string): CommandResponseStatus {
    const s = (result ?? "").toUpperCase();
    if (s === "PERFORMED") {
      return CommandResponseStatus.success;
    }
    if (s === "ERROR" || s === "FAIL" || s === "FAILED") {
      return CommandResponseStatus.failure;
    }
    return CommandResponseStatus.inProgress;
  }
}

export default RequestService;
