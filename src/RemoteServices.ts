import type Vehicle from "./Vehicle";
import RequestService from "./RequestService";
import { PorscheError } from "./errors";
import {
  ChargingProfileOptions,
  ClimateZones,
  ClimatiseOptions,
  CommandResponseStatus,
  HonkFlashMode,
  PorscheApiCommand,
  Result,
} from "./types";

const DEFAULT_TARGET_TEMPERATURE = 20;

const MIN_CHARGE_LEVEL = 25;
const MAX_CHARGE_LEVEL = 100;

function celsiusToKelvin(celsius: number): number {
  return Math.round((celsius + 273.15) * 100) / 100;
}

/** Remote commands for a single vehicle. */
class RemoteServices {
  constructor(
    private vehicle: Vehicle,
    private requestService: RequestService,
  ) {}

  async lockVehicle(): Promise<Result> {
    return this.sendCommand(PorscheApiCommand.Lock, {});
  }

  async unlockVehicle(pin: string): Promise<Result> {
    if (!pin) {
      throw new PorscheError("A PIN is required to unlock the vehicle");
    }

    return this.sendCommand(PorscheApiCommand.Unlock, { spin: pin });
  }

  async climatiseOn(options: ClimatiseOptions = {}): Promise<Result> {
    const climateZonesEnabled: ClimateZones = {
      frontLeft: false,
      frontRight: false,
      rearLeft: false,
      rearRight: false,
      ...options.climateZones,
    };

    return this.sendCommand(PorscheApiCommand.ClimatiserStart, {
      climateZonesEnabled,
      targetTemperature: celsiusToKelvin(
        options.targetTemperature ?? DEFAULT_TARGET_TEMPERATURE,
      ),
      climatisationWithoutHVpower: options.withoutHVPower ?? false,
    });
  }

  async climatiseOff(): Promise<Result> {
    return this.sendCommand(PorscheApiCommand.ClimatiserStop, {});
  }

  async directChargeOn(): Promise<Result> {
    return this.sendCommand(PorscheApiCommand.DirectChargingStart, {});
  }

  async directChargeOff(): Promise<Result> {
    return this.sendCommand(PorscheApiCommand.DirectChargingStop, {});
  }

  async flashIndicators(): Promise<Result> {
    return this.sendCommand(PorscheApiCommand.HonkFlash, {
      mode: HonkFlashMode.Flash,
    });
  }

  async honkAndFlashIndicators(): Promise<Result> {
    return this.sendCommand(PorscheApiCommand.HonkFlash, {
      mode: HonkFlashMode.HonkAndFlash,
    });
  }

  /**
   * Edits one charging profile, the active one unless `profileId` is given.
   * The charge level is clamped to 25..100 percent.
   */
  async updateChargingProfile(
    options: ChargingProfileOptions = {},
  ): Promise<Result> {
    const profileId = options.profileId ?? this.vehicle.activeChargingProfileId;
    if (profileId === undefined) {
      throw new PorscheError("No active charging profile");
    }

    const profiles = this.vehicle.chargingProfiles;
    if (!profiles.some((profile) => profile.id === profileId)) {
      throw new PorscheError(`Charging profile ${profileId} not found`);
    }

    const list = profiles.map((profile) => {
      if (profile.id !== profileId) return profile;

      const updated = { ...profile };
      if (options.minimumChargeLevel !== undefined) {
        updated.minSoc = Math.min(
          Math.max(Math.trunc(options.minimumChargeLevel), MIN_CHARGE_LEVEL),
          MAX_CHARGE_LEVEL,
        );
      }
      if (options.profileActive !== undefined) {
        updated.active = options.profileActive;
      }
      return updated;
    });

    const result = await this.sendCommand(
      PorscheApiCommand.ChargingProfilesEdit,
      { list },
    );
    if (result.status === CommandResponseStatus.success) {
      this.vehicle.setChargingProfiles(list);
    }
    return result;
  }

  private sendCommand(
    command: PorscheApiCommand,
    payload: Record<string, unknown>,
  ): Promise<Result> {
    return this.requestService.sendCommand(this.vehicle.vin, command, payload);
  }
}

export default RemoteServices;
