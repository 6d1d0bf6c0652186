import Vehicle from "../Vehicle";

export interface VehicleCommandOptions {
  pin?: string;
  profileid?: number;
  chargelevel?: number;
  profileactive?: boolean;
  temperature?: number;
}

export interface VehicleCommand {
  description: string;
  run(vehicle: Vehicle, options: VehicleCommandOptions): Promise<unknown>;
}

export const vehicleCommands: Record<string, VehicleCommand> = {
  battery: {
    description: "Prints the main battery level (BEV)",
    run: async (vehicle) => {
      await vehicle.getStoredOverview();
      return vehicle.mainBatteryLevel;
    },
  },
  capabilities: {
    description: "Get vehicle capabilities",
    run: (vehicle) => vehicle.getCapabilities(),
  },
  chargingprofile: {
    description: "Update parameters in configured charging profile",
    run: async (vehicle, options) => {
      await vehicle.getStoredOverview();
      const result = await vehicle.remoteServices.updateChargingProfile({
        profileId: options.profileid,
        minimumChargeLevel: options.chargelevel,
        profileActive: options.profileactive,
      });
      return result.status;
    },
  },
  climatise_off: {
    description: "Stop remote climatisation",
    run: async (vehicle) => (await vehicle.remoteServices.climatiseOff()).status,
  },
  climatise_on: {
    description: "Start remote climatisation",
    run: async (vehicle, options) =>
      (
        await vehicle.remoteServices.climatiseOn({
          targetTemperature: options.temperature,
        })
      ).status,
  },
  connected: {
    description: "Check if vehicle is on-line",
    run: async (vehicle) => {
      await vehicle.getCurrentOverview();
      return vehicle.connected;
    },
  },
  currentoverview: {
    description: "Poll vehicle for current overview",
    run: (vehicle) => vehicle.getCurrentOverview(),
  },
  direct_charge_off: {
    description: "Disable direct charging",
    run: async (vehicle) => (await vehicle.remoteServices.directChargeOff()).status,
  },
  direct_charge_on: {
    description: "Enable direct charging",
    run: async (vehicle) => (await vehicle.remoteServices.directChargeOn()).status,
  },
  doors_and_lids: {
    description: "List status of all doors and lids",
    run: async (vehicle) => {
      await vehicle.getStoredOverview();
      return vehicle.doorsAndLids;
    },
  },
  flash_indicators: {
    description: "Flash indicators",
    run: async (vehicle) => (await vehicle.remoteServices.flashIndicators()).status,
  },
  honk_and_flash: {
    description: "Flash indicators and sound the horn",
    run: async (vehicle) =>
      (await vehicle.remoteServices.honkAndFlashIndicators()).status,
  },
  location: {
    description: "Show location of vehicle",
    run: async (vehicle) => {
      await vehicle.getStoredOverview();
      return vehicle.location;
    },
  },
  lock_vehicle: {
    description: "Lock vehicle",
    run: async (vehicle) => (await vehicle.remoteServices.lockVehicle()).status,
  },
  pictures: {
    description: "Get vehicle pictures url",
    run: (vehicle) => vehicle.getPictureLocations(),
  },
  storedoverview: {
    description: "Get stored overview for vehicle",
    run: (vehicle) => vehicle.getStoredOverview(),
  },
  tire_status: {
    description: "Check if tire pressure are ok",
    run: async (vehicle) => {
      await vehicle.getStoredOverview();
      return vehicle.tirePressureStatus;
    },
  },
  tire_pressures: {
    description: "Get tire pressure readings",
    run: async (vehicle) => {
      await vehicle.getStoredOverview();
      return vehicle.tirePressures;
    },
  },
  trip_statistics: {
    description: "Get trip statistics from backend",
    run: (vehicle) => vehicle.getTripStatistics(),
  },
  unlock_vehicle: {
    description: "Unlock vehicle",
    run: async (vehicle, options) =>
      (await vehicle.remoteServices.unlockVehicle(options.pin ?? "")).status,
  },
  vehicle_closed: {
    description: "Check if all doors and lids are closed",
    run: async (vehicle) => {
      await vehicle.getStoredOverview();
      return vehicle.vehicleClosed;
    },
  },
};
