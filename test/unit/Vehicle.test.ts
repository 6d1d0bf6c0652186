import { instance, mock, verify, when } from "ts-mockito";

import RequestService from "../../src/RequestService";
import Vehicle from "../../src/Vehicle";
import { Measurement, VehicleOverview } from "../../src/types";
import { storedOverview, testVin, vehicleSummary } from "./testData";

function withMeasurement(
  overview: VehicleOverview,
  key: string,
  value: Record<string, unknown> | undefined,
): VehicleOverview {
  const measurements: Measurement[] = (overview.measurements ?? []).filter(
    (measurement) => measurement.key !== key,
  );
  if (value) {
    measurements.push({ key, status: { isEnabled: true }, value });
  }
  return { ...overview, measurements };
}

describe("Vehicle", () => {
  let requestService: RequestService;
  let vehicle: Vehicle;

  beforeEach(() => {
    requestService = mock(RequestService);
    vehicle = new Vehicle(instance(requestService), vehicleSummary, storedOverview());
  });

  test("merges base data and enabled measurements", () => {
    const data = vehicle.getData();

    expect(data).toMatchObject({
      vin: testVin,
      modelName: "Taycan 4S",
      customName: "Blue",
      name: "Blue",
      timestamp: "2024-05-02T08:30:00Z",
      BATTERY_LEVEL: { percent: 76 },
    });
    expect(data).not.toHaveProperty("FUEL_LEVEL");
    expect(data).not.toHaveProperty("measurements");
  });

  test("converts the charging rate to km/h", () => {
    expect(vehicle.getData().BATTERY_CHARGING_STATE).toEqual({
      activeProfileId: 4,
      chargingRate: 150,
      chargingPower: 0,
      directChargingState: "ENABLED_OFF",
    });
  });

  test("takes minSoC from the active charging profile", () => {
    expect(vehicle.getData().CHARGING_SUMMARY).toEqual({
      mode: "TIMER",
      minSoC: 40,
    });
    expect(vehicle.chargingTarget).toEqual(40);
  });

  test("uses 100 percent minSoC for direct charging", () => {
    const overview = withMeasurement(storedOverview(), "CHARGING_SUMMARY", {
      mode: "DIRECT",
    });

    const direct = new Vehicle(instance(requestService), vehicleSummary, overview);

    expect(direct.getData().CHARGING_SUMMARY).toEqual({
      mode: "DIRECT",
      minSoC: 100,
    });
  });

  test("falls back to 80 percent minSoC without a profile", () => {
    let overview = withMeasurement(storedOverview(), "CHARGING_PROFILES", undefined);
    overview = withMeasurement(overview, "BATTERY_CHARGING_STATE", undefined);

    const plain = new Vehicle(instance(requestService), vehicleSummary, overview);

    expect(plain.getData().CHARGING_SUMMARY).toEqual({ mode: "TIMER", minSoC: 80 });
    expect(plain.chargingTarget).toBeUndefined();
  });

  test("names the vehicle after its model without a custom name", () => {
    const unnamed = new Vehicle(instance(requestService), vehicleSummary, {
      ...storedOverview(),
      customName: undefined,
    });

    expect(unnamed.getData().customName).toEqual("");
    expect(unnamed.name).toEqual("Taycan 4S");
  });

  test("accessors", () => {
    expect(vehicle.vin).toEqual(testVin);
    expect(vehicle.modelName).toEqual("Taycan 4S");
    expect(vehicle.modelYear).toEqual("2023");
    expect(vehicle.connected).toBe(true);
    expect(vehicle.hasRemoteServices).toBe(true);
    expect(vehicle.hasElectricDrivetrain).toBe(true);
    expect(vehicle.hasIceDrivetrain).toBe(false);
    expect(vehicle.mainBatteryLevel).toEqual(76);
    expect(vehicle.hasRemoteClimatisation).toBe(true);
    expect(vehicle.hasDirectCharge).toBe(true);
    expect(vehicle.directChargeOn).toBe(false);
    expect(vehicle.privacyMode).toBe(false);
    expect(vehicle.remoteClimatiseOn).toBe(false);
    expect(vehicle.vehicleLocked).toBe(true);
    expect(vehicle.hasTirePressureMonitoring).toBe(true);
    expect(vehicle.activeChargingProfileId).toEqual(4);
  });

  test("doors and lids", () => {
    expect(vehicle.doorsAndLids).toEqual({
      OPEN_STATE_DOOR_FRONT_LEFT: "Closed",
      OPEN_STATE_LID_FRONT: "Open",
    });
    expect(vehicle.vehicleClosed).toBe(false);
  });

  test("tire pressure within tolerance", () => {
    expect(vehicle.tirePressureStatus).toBe(true);
  });

  test("tire pressure out of tolerance", () => {
    const overview = withMeasurement(storedOverview(), "TIRE_PRESSURE", {
      frontLeftTire: { differenceBar: 0 },
      rearRightTire: { differenceBar: -0.3 },
    });

    const lowTire = new Vehicle(instance(requestService), vehicleSummary, overview);

    expect(lowTire.tirePressureStatus).toBe(false);
  });

  test("location", () => {
    expect(vehicle.location).toEqual({
      latitude: 48.834,
      longitude: 9.152,
      heading: 270,
    });
    expect(vehicle.locationUpdatedAt).toEqual(new Date("2024-05-02T08:29:00Z"));
  });

  test("location without a fix", () => {
    const overview = withMeasurement(storedOverview(), "GPS_LOCATION", {
      location: "unknown",
    });

    const lost = new Vehicle(instance(requestService), vehicleSummary, overview);

    expect(lost.location).toEqual({ latitude: null, longitude: null, heading: null });
    expect(lost.locationUpdatedAt).toBeUndefined();
  });

  test("plug-in hybrids have no main battery level", () => {
    const hybrid = new Vehicle(instance(requestService), vehicleSummary, {
      ...storedOverview(),
      modelType: { year: 2021, engine: "PHEV" },
    });

    expect(hybrid.hasIceDrivetrain).toBe(true);
    expect(hybrid.mainBatteryLevel).toEqual(0);
    expect(hybrid.modelYear).toEqual("2021");
  });

  test("combustion vehicles have no main battery level", () => {
    const combustion = new Vehicle(instance(requestService), vehicleSummary, {
      ...storedOverview(),
      modelType: { year: "2020", engine: "COMBUSTION" },
    });

    expect(combustion.mainBatteryLevel).toEqual(0);
  });

  test("getStoredOverview refreshes the data", async () => {
    const overview = withMeasurement(storedOverview(), "BATTERY_LEVEL", {
      percent: 80,
    });
    when(requestService.getStoredOverview(testVin)).thenResolve(overview);

    const data = await vehicle.getStoredOverview();

    expect(data.BATTERY_LEVEL).toEqual({ percent: 80 });
    expect(vehicle.mainBatteryLevel).toEqual(80);
    verify(requestService.getStoredOverview(testVin)).once();
  });

  test("getCurrentOverview refreshes the data", async () => {
    when(requestService.getCurrentOverview(testVin)).thenResolve({
      ...storedOverview(),
      connect: false,
    });

    await vehicle.getCurrentOverview();

    expect(vehicle.connected).toBe(false);
  });

  test("getCapabilities", async () => {
    const capabilities = { ...storedOverview(), commands: [{ key: "LOCK" }] };
    when(requestService.getCapabilities(testVin)).thenResolve(capabilities);

    expect(await vehicle.getCapabilities()).toEqual(capabilities);
    expect(vehicle.getCachedCapabilities()).toEqual(capabilities);
  });

  test("getTripStatistics", async () => {
    const statistics = { vin: testVin, measurements: [] };
    when(requestService.getTripStatistics(testVin)).thenResolve(statistics);

    expect(await vehicle.getTripStatistics()).toEqual(statistics);
    expect(vehicle.getCachedTripStatistics()).toEqual(statistics);
  });

  test("getPictureLocations", async () => {
    when(requestService.getPictures(testVin)).thenResolve([
      { view: "front", url: "https://pictures.example.com/front.png" },
      { view: "side", url: "https://pictures.example.com/side.png" },
    ]);

    expect(await vehicle.getPictureLocations()).toEqual({
      front: "https://pictures.example.com/front.png",
      side: "https://pictures.example.com/side.png",
    });
  });
});
