export enum RequestMethod {
  Get = "GET",
  Post = "POST",
}

class Request {
  private method: RequestMethod = RequestMethod.Post;
  private body?: unknown;
  private checkRequestStatus?: boolean;
  // id of the remote command a poll request reads the status of
  private commandId?: string;
  // epoch ms when the remote command was first accepted; carried across polls
  private startedAt?: number;

  constructor(private url: string) {}

  getUrl(): string {
    return this.url;
  }

  setMethod(method: RequestMethod) {
    this.method = method;

    return this;
  }

  getMethod(): RequestMethod {
    return this.method;
  }

  setBody(body: unknown) {
    this.body = body;

    return this;
  }

  getBody(): unknown {
    return this.body;
  }

  setCheckRequestStatus(checkStatus: boolean) {
    this.checkRequestStatus = checkStatus;

    return this;
  }

  getCheckRequestStatus(): boolean | undefined {
    return this.checkRequestStatus;
  }

  setCommandId(commandId: string) {
    this.commandId = commandId;

    return this;
  }

  getCommandId(): string | undefined {
    return this.commandId;
  }

  setStartedAt(timestamp: number) {
    this.startedAt = timestamp;

    return this;
  }

  getStartedAt(): number | undefined {
    return this.startedAt;
  }
}

export default Request;
