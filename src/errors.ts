export class PushError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PushError";
    this.code = code;
  }
}

// ── Domain errors ──

/** The client has been closed; no further sends are accepted. */
export class NotRunningError extends PushError {
  constructor(message = "client is not running", options?: ErrorOptions) {
    super(message, "NOT_RUNNING", options);
    this.name = "NotRunningError";
  }
}

/** Client key material is missing, unreadable, or does not parse. */
export class CertificateError extends PushError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CERTIFICATE", options);
    this.name = "CertificateError";
  }
}

/** Dial or TLS handshake with the gateway failed. */
export class ConnectError extends PushError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONNECT", options);
    this.name = "ConnectError";
  }
}

/** Socket write failed or did not complete before its deadline. */
export class WriteError extends PushError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "WRITE", options);
    this.name = "WriteError";
  }
}

/** The gateway stream ended or errored while a frame was being read. */
export class ConnectionClosedError extends PushError {
  constructor(message = "connection closed", options?: ErrorOptions) {
    super(message, "CLOSED", options);
    this.name = "ConnectionClosedError";
  }
}

export class SerializationError extends PushError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SERIALIZATION", options);
    this.name = "SerializationError";
  }
}

export class ConfigError extends PushError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to PushError (preserves cause chain). */
export function toPushError(value: unknown): PushError {
  if (value instanceof PushError) return value;
  if (value instanceof Error) return new PushError(value.message, "UNKNOWN", { cause: value });
  return new PushError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
