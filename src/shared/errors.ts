export type BridgeErrorCode =
  | "CONNECT_FAILURE"
  | "INVALID_ADDRESS"
  | "DRIVER_ERROR"
  | "CONNECTION_LOST"
  | "LAST_ERROR"
  | "COMMAND_FAILED"
  | "NOT_CONNECTED"
  | "CONVERSION_ERROR"
  | "CONFIG_ERROR";

/** Base class for every error the bridge reports. Failure reactions receive one of these. */
export class BridgeError extends Error {
  constructor(
    readonly code: BridgeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

/** The driver could not establish a connection (unreachable host, auth or handshake error). */
export class ConnectFailureError extends BridgeError {
  constructor(message: string) {
    super("CONNECT_FAILURE", message);
    this.name = "ConnectFailureError";
  }
}

/** A `host[:port]` string that cannot be parsed. */
export class AddressError extends BridgeError {
  constructor(readonly address: string, reason: string) {
    super("INVALID_ADDRESS", `Invalid address "${address}": ${reason}`);
    this.name = "AddressError";
  }
}

/** Thrown by drivers; anything else a driver throws is wrapped into one of these. */
export class DriverError extends BridgeError {
  constructor(message: string) {
    super("DRIVER_ERROR", message);
    this.name = "DriverError";
  }
}

export class ConnectionLostError extends BridgeError {
  constructor(message: string) {
    super("CONNECTION_LOST", message);
    this.name = "ConnectionLostError";
  }
}

/** A write went through but the driver's last-error status was non-empty. */
export class LastErrorReported extends BridgeError {
  constructor(message: string) {
    super("LAST_ERROR", message);
    this.name = "LastErrorReported";
  }
}

export class CommandFailedError extends BridgeError {
  constructor(message: string) {
    super("COMMAND_FAILED", message);
    this.name = "CommandFailedError";
  }
}

export class NotConnectedError extends BridgeError {
  constructor(message = "Not connected to a database server") {
    super("NOT_CONNECTED", message);
    this.name = "NotConnectedError";
  }
}

/** Strict-mode conversion failure; `path` locates the offending element, e.g. `tags[2]`. */
export class ConversionError extends BridgeError {
  constructor(readonly path: string, reason: string) {
    super("CONVERSION_ERROR", path ? `${reason} at ${path}` : reason);
    this.name = "ConversionError";
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

export function toBridgeError(err: unknown): BridgeError {
  if (err instanceof BridgeError) return err;
  return new DriverError(errorMessage(err));
}
