export class RelayError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RelayError";
    this.code = code;
  }
}

// ── Inbound pipeline ──

export class UnauthenticatedError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "UNAUTHENTICATED", options);
    this.name = "UnauthenticatedError";
  }
}

export class MalformedPayloadError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "MALFORMED_PAYLOAD", options);
    this.name = "MalformedPayloadError";
  }
}

export class DuplicateEventError extends RelayError {
  readonly fingerprint: string;

  constructor(fingerprint: string) {
    super(`Duplicate event ${fingerprint}`, "DUPLICATE_EVENT");
    this.name = "DuplicateEventError";
    this.fingerprint = fingerprint;
  }
}

export class UnresolvedIdentityError extends RelayError {
  constructor(platform: string, userId: string, wantedPlatform: string) {
    super(
      `No unique ${wantedPlatform} identity linked to ${platform}:${userId}`,
      "UNRESOLVED_IDENTITY",
    );
    this.name = "UnresolvedIdentityError";
  }
}

export class TranslationNoopError extends RelayError {
  constructor(kind: string) {
    super(`No mapping for event kind ${kind}`, "TRANSLATION_NOOP");
    this.name = "TranslationNoopError";
  }
}

// ── Console ──

export class ConsoleUnavailableError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONSOLE_UNAVAILABLE", options);
    this.name = "ConsoleUnavailableError";
  }
}

export class ConsoleAuthRejectedError extends RelayError {
  constructor(message = "Console rejected the configured password", options?: ErrorOptions) {
    super(message, "CONSOLE_AUTH_REJECTED", options);
    this.name = "ConsoleAuthRejectedError";
  }
}

// ── Log source ──

export class LogSourceMissingError extends RelayError {
  constructor(path: string, options?: ErrorOptions) {
    super(`Log file ${path} does not exist yet`, "LOG_SOURCE_MISSING", options);
    this.name = "LogSourceMissingError";
  }
}

export class LogRotatedError extends RelayError {
  constructor(path: string, reason: "rotated" | "truncated") {
    super(`Log file ${path} was ${reason}`, "LOG_ROTATED");
    this.name = "LogRotatedError";
  }
}

// ── Outbound / process ──

export class DeliveryError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "DELIVERY", options);
    this.name = "DeliveryError";
  }
}

export class ConfigError extends RelayError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join("\n  ")}` : message, "CONFIG", options);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to RelayError (preserves cause chain). */
export function toRelayError(value: unknown): RelayError {
  if (value instanceof RelayError) return value;
  if (value instanceof Error) return new RelayError(value.message, "UNKNOWN", { cause: value });
  return new RelayError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
