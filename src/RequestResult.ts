import { RequestResponse, Result } from "./types";

class RequestResult {
  private response?: RequestResponse;

  constructor(private status: string) {}

  setResponse(response: RequestResponse) {
    this.response = response;

    return this;
  }

  getResult(): Result {
    const result: Result = { status: this.status };

    if (this.response) {
      result.response = this.response;
    }

    return result;
  }
}

export default RequestResult;
