export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type PortErrorCode =
  | "timeout"
  | "network"
  | "rate_limited"
  | "auth_failed"
  | "http_error"
  | "empty_response";

const TRANSIENT_CODES: ReadonlySet<PortErrorCode> = new Set(["timeout", "network", "rate_limited"]);

export class PortError extends Error {
  constructor(
    readonly code: PortErrorCode,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "PortError";
  }

  get transient(): boolean {
    if (TRANSIENT_CODES.has(this.code)) {
      return true;
    }
    return this.code === "http_error" && typeof this.status === "number" && this.status >= 500;
  }
}
