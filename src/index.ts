import axios from "axios";

import Account from "./Account";
import RequestService from "./RequestService";
import Vehicle from "./Vehicle";

import { Captcha, OAuthToken, PorscheConnectConfig } from "./types";

class PorscheConnect {
  private account: Account;

  constructor(private requestService: RequestService) {
    this.account = new Account(requestService);
  }

  static create(config: PorscheConnectConfig): PorscheConnect {
    const requestService = new RequestService(config, axios);

    return new PorscheConnect(requestService);
  }

  async getToken(): Promise<OAuthToken> {
    return this.account.getToken();
  }

  async getVehicles(forceInit?: boolean): Promise<Vehicle[]> {
    return this.account.getVehicles(forceInit);
  }

  async getVehicle(vin: string): Promise<Vehicle | undefined> {
    return this.account.getVehicle(vin);
  }

  setCaptcha(captcha: Captcha) {
    this.requestService.setCaptcha(captcha);
  }

  setCheckRequestStatus(checkStatus: boolean) {
    this.requestService.setCheckRequestStatus(checkStatus);
  }
}

export default PorscheConnect;
export { default as Account } from "./Account";
export { default as Vehicle } from "./Vehicle";
export { default as RemoteServices } from "./RemoteServices";
export { default as RequestService } from "./RequestService";
export { default as RequestError } from "./RequestError";
export { default as TokenStore } from "./TokenStore";
export { PorscheAuth } from "./auth/PorscheAuth";
export * from "./errors";
export * from "./types";
