import Request from "./Request";
import { PorscheError } from "./errors";
import { RequestResponse } from "./types";

class RequestError extends PorscheError {
  private request?: Request;
  private response?: RequestResponse;

  constructor(message = "", code?: number) {
    super(message, code);
    this.name = "RequestError";
  }

  setRequest(request: Request) {
    this.request = request;

    return this;
  }

  getRequest(): Request | undefined {
    return this.request;
  }

  setResponse(response: RequestResponse) {
    this.response = response;

    return this;
  }

  getResponse(): RequestResponse | undefined {
    return this.response;
  }
}

export default RequestError;
