/** Missing or invalid settings. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

/** A manual trigger or registry call named a host that is not configured. */
export class UnknownHostError extends Error {
  constructor(readonly host: string) {
    super(`host not found: ${host}`);
    this.name = "UnknownHostError";
  }
}

/** Delivery of an alert or report could not be confirmed. */
export class NotificationError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "NotificationError";
  }
}
