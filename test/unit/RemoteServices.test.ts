import { anything, capture, instance, mock, verify, when } from "ts-mockito";

import RequestService from "../../src/RequestService";
import Vehicle from "../../src/Vehicle";
import { CommandResponseStatus, PorscheApiCommand } from "../../src/types";
import { storedOverview, testVin, vehicleSummary } from "./testData";

describe("RemoteServices", () => {
  let requestService: RequestService;
  let vehicle: Vehicle;

  beforeEach(() => {
    requestService = mock(RequestService);
    when(requestService.sendCommand(anything(), anything(), anything())).thenResolve({
      status: CommandResponseStatus.success,
    });
    vehicle = new Vehicle(instance(requestService), vehicleSummary, storedOverview());
  });

  const lastCommand = () => capture(requestService.sendCommand).last();

  test("lockVehicle", async () => {
    const result = await vehicle.remoteServices.lockVehicle();

    expect(result.status).toEqual(CommandResponseStatus.success);
    expect(lastCommand()).toEqual([testVin, PorscheApiCommand.Lock, {}]);
  });

  test("unlockVehicle", async () => {
    await vehicle.remoteServices.unlockVehicle("1234");

    expect(lastCommand()).toEqual([testVin, "UNLOCK", { spin: "1234" }]);
  });

  test("unlockVehicle requires a PIN", async () => {
    await expect(vehicle.remoteServices.unlockVehicle("")).rejects.toThrow(
      "A PIN is required to unlock the vehicle",
    );
    verify(requestService.sendCommand(anything(), anything(), anything())).never();
  });

  test("climatiseOn with defaults", async () => {
    await vehicle.remoteServices.climatiseOn();

    expect(lastCommand()).toEqual([
      testVin,
      "REMOTE_CLIMATIZER_START",
      {
        climateZonesEnabled: {
          frontLeft: false,
          frontRight: false,
          rearLeft: false,
          rearRight: false,
        },
        targetTemperature: 293.15,
        climatisationWithoutHVpower: false,
      },
    ]);
  });

  test("climatiseOn with options", async () => {
    await vehicle.remoteServices.climatiseOn({
      targetTemperature: 22.5,
      climateZones: { frontLeft: true },
      withoutHVPower: true,
    });

    expect(lastCommand()[2]).toEqual({
      climateZonesEnabled: {
        frontLeft: true,
        frontRight: false,
        rearLeft: false,
        rearRight: false,
      },
      targetTemperature: 295.65,
      climatisationWithoutHVpower: true,
    });
  });

  test("climatiseOff", async () => {
    await vehicle.remoteServices.climatiseOff();

    expect(lastCommand()).toEqual([testVin, "REMOTE_CLIMATIZER_STOP", {}]);
  });

  test("directChargeOn", async () => {
    await vehicle.remoteServices.directChargeOn();

    expect(lastCommand()).toEqual([testVin, "DIRECT_CHARGING_START", {}]);
  });

  test("directChargeOff", async () => {
    await vehicle.remoteServices.directChargeOff();

    expect(lastCommand()).toEqual([testVin, "DIRECT_CHARGING_STOP", {}]);
  });

  test("flashIndicators", async () => {
    await vehicle.remoteServices.flashIndicators();

    expect(lastCommand()).toEqual([testVin, "HONK_FLASH", { mode: "FLASH" }]);
  });

  test("honkAndFlashIndicators", async () => {
    await vehicle.remoteServices.honkAndFlashIndicators();

    expect(lastCommand()).toEqual([
      testVin,
      "HONK_FLASH",
      { mode: "HONK_AND_FLASH" },
    ]);
  });

  test("updateChargingProfile edits the active profile", async () => {
    await vehicle.remoteServices.updateChargingProfile({
      minimumChargeLevel: 90.7,
    });

    expect(lastCommand()).toEqual([
      testVin,
      "CHARGING_PROFILES_EDIT",
      {
        list: [
          { id: 4, name: "Home", active: true, minSoc: 90 },
          { id: 5, name: "Work", active: false, minSoc: 60 },
        ],
      },
    ]);
    expect(vehicle.chargingTarget).toEqual(90);
  });

  test("updateChargingProfile clamps the charge level", async () => {
    await vehicle.remoteServices.updateChargingProfile({
      profileId: 5,
      minimumChargeLevel: 10,
      profileActive: true,
    });

    expect(lastCommand()[2]).toEqual({
      list: [
        { id: 4, name: "Home", active: true, minSoc: 40 },
        { id: 5, name: "Work", active: true, minSoc: 25 },
      ],
    });
  });

  test("updateChargingProfile rejects an unknown profile", async () => {
    await expect(
      vehicle.remoteServices.updateChargingProfile({ profileId: 9 }),
    ).rejects.toThrow("Charging profile 9 not found");
  });
});
