const STATUS_REASONS: Record<number, string> = {
  401: "UNAUTHORIZED",
  404: "NOT_FOUND",
  405: "MOBILE_ACCESS_DISABLED",
  408: "VEHICLE_UNAVAILABLE",
  423: "ACCOUNT_LOCKED",
  429: "TOO_MANY_REQUESTS",
  500: "SERVER_ERROR",
  503: "SERVICE_MAINTENANCE",
  504: "UPSTREAM_TIMEOUT",
};

/** Maps an HTTP status from the Porsche backend to its reason code. */
export function reasonForStatus(status: number): string {
  const known = STATUS_REASONS[status];
  if (known) return known;
  return status > 299 ? `UNKNOWN_ERROR_${status}` : "";
}

export class PorscheError extends Error {
  constructor(
    message: string,
    readonly code?: number,
  ) {
    super(message);
    this.name = "PorscheError";
  }

  get reason(): string {
    return this.code === undefined ? this.message : reasonForStatus(this.code);
  }

  static fromStatus(status: number): PorscheError {
    return new PorscheError(reasonForStatus(status), status);
  }
}

export class WrongCredentialsError extends PorscheError {
  constructor(message = "Wrong credentials") {
    super(message);
    this.name = "WrongCredentialsError";
  }
}

export class IncompleteCredentialsError extends PorscheError {
  constructor(message = "E-mail and password are required") {
    super(message);
    this.name = "IncompleteCredentialsError";
  }
}

/**
 * The identity server wants a captcha solved before it accepts the e-mail.
 * Resume the login by passing `{ code, state, codeVerifier }` back as the
 * client's captcha.
 */
export class CaptchaRequiredError extends PorscheError {
  constructor(
    readonly captcha: string,
    readonly state: string,
    readonly codeVerifier?: string,
  ) {
    super("Captcha required");
    this.name = "CaptchaRequiredError";
  }
}
