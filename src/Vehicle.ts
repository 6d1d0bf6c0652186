import RemoteServices from "./RemoteServices";
import RequestService from "./RequestService";
import {
  getBoolean,
  getNumber,
  getObject,
  getString,
  isJsonObject,
  JsonObject,
} from "./json";
import {
  ChargingProfile,
  DoorAndLidState,
  VehicleData,
  VehicleLocation,
  VehicleOverview,
  VehicleSummary,
} from "./types";

const BASE_DATA = [
  "vin",
  "modelName",
  "customName",
  "modelType",
  "systemInfo",
  "timestamp",
] as const;

// bar, either direction
const TIRE_PRESSURE_TOLERANCE = 0.2;

const DEFAULT_MIN_SOC = 80;

/**
 * A vehicle of the account. `getData()` holds the summary from the vehicle
 * list, overlaid with the value of every enabled measurement from the most
 * recent overview.
 */
class Vehicle {
  readonly remoteServices: RemoteServices;
  private data: VehicleData;
  private capabilities?: VehicleOverview;
  private tripStatistics?: VehicleOverview;
  private pictureLocations: Record<string, string> = {};

  constructor(
    private requestService: RequestService,
    summary: VehicleSummary,
    overview?: VehicleOverview,
  ) {
    this.data = { ...summary };
    this.remoteServices = new RemoteServices(this, requestService);

    if (overview) {
      this.updateVehicleData(overview);
    }
  }

  getData(): VehicleData {
    return this.data;
  }

  async getStoredOverview(): Promise<VehicleData> {
    const overview = await this.requestService.getStoredOverview(this.vin);
    this.updateVehicleData(overview);

    return this.data;
  }

  async getCurrentOverview(): Promise<VehicleData> {
    const overview = await this.requestService.getCurrentOverview(this.vin);
    this.updateVehicleData(overview);

    return this.data;
  }

  async getCapabilities(): Promise<VehicleOverview> {
    this.capabilities = await this.requestService.getCapabilities(this.vin);

    return this.capabilities;
  }

  async getTripStatistics(): Promise<VehicleOverview> {
    this.tripStatistics = await this.requestService.getTripStatistics(this.vin);

    return this.tripStatistics;
  }

  async getPictureLocations(): Promise<Record<string, string>> {
    const pictures = await this.requestService.getPictures(this.vin);
    for (const picture of pictures) {
      this.pictureLocations[picture.view] = picture.url;
    }

    return this.pictureLocations;
  }

  getCachedCapabilities(): VehicleOverview | undefined {
    return this.capabilities;
  }

  getCachedTripStatistics(): VehicleOverview | undefined {
    return this.tripStatistics;
  }

  get vin(): string {
    return getString(this.data, "vin") ?? "";
  }

  get modelName(): string | undefined {
    return getString(this.data, "modelName");
  }

  get name(): string | undefined {
    return getString(this.data, "name");
  }

  get modelYear(): string | undefined {
    const year = getObject(this.data, "modelType")?.year;
    return typeof year === "string" || typeof year === "number"
      ? String(year)
      : undefined;
  }

  get engine(): string | undefined {
    return getString(getObject(this.data, "modelType"), "engine");
  }

  get connected(): boolean | undefined {
    return getBoolean(this.data, "connect");
  }

  get hasRemoteServices(): boolean {
    return (
      getBoolean(this.measurement("REMOTE_ACCESS_AUTHORIZATION"), "isEnabled") ===
      true
    );
  }

  get hasElectricDrivetrain(): boolean {
    return this.engine === "BEV" || this.engine === "PHEV";
  }

  get hasIceDrivetrain(): boolean {
    return this.engine === "PHEV" || this.engine === "COMBUSTION";
  }

  /**
   * High voltage battery level of a BEV in percent. Anything with a
   * combustion engine, plug-in hybrids included, reports 0.
   */
  get mainBatteryLevel(): number {
    if (this.hasIceDrivetrain) return 0;
    return getNumber(this.measurement("BATTERY_LEVEL"), "percent") ?? 0;
  }

  get hasRemoteClimatisation(): boolean {
    return "CLIMATIZER_STATE" in this.data;
  }

  get hasDirectCharge(): boolean {
    const chargingState = this.measurement("BATTERY_CHARGING_STATE");
    return chargingState !== undefined && "directChargingState" in chargingState;
  }

  get directChargeOn(): boolean {
    return (
      getString(this.measurement("BATTERY_CHARGING_STATE"), "directChargingState") ===
      "ENABLED_ON"
    );
  }

  get privacyMode(): boolean | undefined {
    return getBoolean(this.measurement("GLOBAL_PRIVACY_MODE"), "isEnabled");
  }

  get remoteClimatiseOn(): boolean | undefined {
    return getBoolean(this.measurement("CLIMATIZER_STATE"), "isOn");
  }

  get vehicleLocked(): boolean {
    return getBoolean(this.measurement("LOCK_STATE_VEHICLE"), "isLocked") === true;
  }

  get vehicleClosed(): boolean {
    return Object.values(this.doorsAndLids).every((state) => state === "Closed");
  }

  get doorsAndLids(): Record<string, DoorAndLidState> {
    const result: Record<string, DoorAndLidState> = {};
    for (const [key, value] of Object.entries(this.data)) {
      if (!key.startsWith("OPEN_STATE_")) continue;
      result[key] = getBoolean(value, "isOpen") === true ? "Open" : "Closed";
    }
    return result;
  }

  get tirePressures(): JsonObject | undefined {
    return this.measurement("TIRE_PRESSURE");
  }

  get hasTirePressureMonitoring(): boolean {
    return this.tirePressures !== undefined;
  }

  /** True when every tire is within 0.2 bar of its target pressure. */
  get tirePressureStatus(): boolean | undefined {
    const pressures = this.tirePressures;
    if (!pressures) return undefined;

    return Object.entries(pressures)
      .filter(([key]) => key.endsWith("Tire"))
      .map(([, tire]) => Math.abs(getNumber(tire, "differenceBar") ?? 0))
      .every((difference) => difference <= TIRE_PRESSURE_TOLERANCE);
  }

  get chargingProfiles(): ChargingProfile[] {
    return this.readChargingProfiles(this.data);
  }

  get activeChargingProfileId(): number | undefined {
    return getNumber(this.measurement("BATTERY_CHARGING_STATE"), "activeProfileId");
  }

  /** Target state of charge of the active charging profile. */
  get chargingTarget(): number | undefined {
    return this.findChargingTarget(this.data);
  }

  get locationUpdatedAt(): Date | undefined {
    const lastModified = getString(this.measurement("GPS_LOCATION"), "lastModified");
    if (!lastModified) return undefined;
    const date = new Date(lastModified);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }

  get location(): VehicleLocation {
    const gps = this.measurement("GPS_LOCATION");
    const position = getString(gps, "location");
    const heading = getNumber(gps, "direction") ?? null;

    if (position && /^[-.0-9]+,[-.0-9]+/.test(position)) {
      const [latitude, longitude] = position.split(",").map(Number);
      return { latitude, longitude, heading };
    }
    return { latitude: null, longitude: null, heading };
  }

  // Mirrors an accepted profile edit locally so later reads agree with the vehicle
  setChargingProfiles(profiles: ChargingProfile[]) {
    this.data["CHARGING_PROFILES"] = {
      ...this.measurement("CHARGING_PROFILES"),
      list: profiles,
    };

    return this;
  }

  private measurement(key: string): JsonObject | undefined {
    return getObject(this.data, key);
  }

  private readChargingProfiles(data: VehicleData): ChargingProfile[] {
    const list = getObject(data, "CHARGING_PROFILES")?.list;
    if (!Array.isArray(list)) return [];

    const profiles: ChargingProfile[] = [];
    for (const item of list) {
      const id = getNumber(item, "id");
      if (isJsonObject(item) && id !== undefined) {
        profiles.push({ ...item, id });
      }
    }
    return profiles;
  }

  private findChargingTarget(data: VehicleData): number | undefined {
    const activeId = getNumber(
      getObject(data, "BATTERY_CHARGING_STATE"),
      "activeProfileId",
    );
    if (activeId === undefined) return undefined;

    const active = this.readChargingProfiles(data).find(
      (profile) => profile.id === activeId,
    );
    return getNumber(active, "minSoc");
  }

  private updateVehicleData(status: VehicleOverview) {
    const baseData: VehicleData = {};
    for (const key of BASE_DATA) {
      if (status[key] !== undefined) {
        baseData[key] = status[key];
      }
    }
    baseData.customName = status.customName ?? "";
    baseData.name = status.customName || status.modelName;
    if (status.connect !== undefined) {
      baseData.connect = status.connect;
    }

    const measurementData: VehicleData = {};
    for (const measurement of status.measurements ?? []) {
      if (!measurement.status.isEnabled || !measurement.value) continue;
      measurementData[measurement.key] = { ...measurement.value };
    }

    const chargingState = getObject(measurementData, "BATTERY_CHARGING_STATE");
    if (chargingState) {
      // km/min from the backend, km/h for consumers
      const rate = getNumber(chargingState, "chargingRate");
      chargingState.chargingRate = rate === undefined ? 0 : rate * 60;
      if (!("chargingPower" in chargingState)) {
        chargingState.chargingPower = 0;
      }
    }

    this.data = { ...this.data, ...baseData, ...measurementData };

    // The backend's own minSoC lags behind profile edits, so it is derived here
    const chargingSummary = getObject(this.data, "CHARGING_SUMMARY");
    if (chargingSummary && "CHARGING_SUMMARY" in measurementData) {
      chargingSummary.minSoC =
        getString(chargingSummary, "mode") === "DIRECT"
          ? 100
          : (this.findChargingTarget(this.data) ?? DEFAULT_MIN_SOC);
    }
  }
}

export default Vehicle;
