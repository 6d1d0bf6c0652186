import RequestService from "./RequestService";
import Vehicle from "./Vehicle";
import { OAuthToken } from "./types";

class Account {
  private vehicles: Vehicle[] = [];

  constructor(private requestService: RequestService) {}

  /** Lists the account's vehicles once; `forceInit` rebuilds the list. */
  async getVehicles(forceInit = false): Promise<Vehicle[]> {
    if (this.vehicles.length === 0 || forceInit) {
      await this.initVehicles();
    }

    return this.vehicles;
  }

  async getVehicle(vin: string): Promise<Vehicle | undefined> {
    const vehicles = await this.getVehicles();
    const wanted = vin.toUpperCase();

    return vehicles.find((vehicle) => vehicle.vin.toUpperCase() === wanted);
  }

  getToken(): Promise<OAuthToken> {
    return this.requestService.getAuthToken();
  }

  private async initVehicles() {
    const summaries = await this.requestService.getVehicles();
    const vehicles: Vehicle[] = [];

    for (const summary of summaries) {
      const overview = await this.requestService.getStoredOverview(summary.vin);
      vehicles.push(new Vehicle(this.requestService, summary, overview));
    }

    this.vehicles = vehicles;
  }
}

export default Account;
