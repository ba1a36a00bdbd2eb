/**
 * OAuth2 Error Types
 *
 * Error class hierarchy for device authorization operations.
 */

/**
 * Caller-actionable error kinds.
 */
export type OAuth2ErrorKind =
  | "transport"
  | "protocol"
  | "other"
  | "validation"
  | "configuration"
  | "polling";

/**
 * Base OAuth2 error class.
 */
export class OAuth2Error extends Error {
  public readonly kind: OAuth2ErrorKind;
  public readonly code: string;

  constructor(
    message: string,
    kind: OAuth2ErrorKind,
    code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "OAuth2Error";
    this.kind = kind;
    this.code = code;
    Object.setPrototypeOf(this, OAuth2Error.prototype);
  }
}

/**
 * Configuration error - invalid setup or parameters.
 */
export class ConfigurationError extends OAuth2Error {
  constructor(
    message: string,
    code: "InvalidConfig" | "MissingRequired" | "InvalidEndpoint" | "FileUnreadable" = "InvalidConfig",
    options?: { cause?: unknown }
  ) {
    super(message, "configuration", `Configuration.${code}`, options);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Network/transport error: the exchange with the server did not complete,
 * or completed with a success status and a body that cannot be decoded.
 */
export class TransportError extends OAuth2Error {
  constructor(
    message: string,
    code:
      | "ConnectionFailed"
      | "Timeout"
      | "DnsResolutionFailed"
      | "TlsError"
      | "UnexpectedRedirect"
      | "ResponseTooLarge"
      | "InvalidResponse",
    options?: { cause?: unknown }
  ) {
    super(message, "transport", `Transport.${code}`, options);
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Well-formed OAuth error body returned by the server (RFC 6749 Section 5.2).
 */
export class ProtocolError extends OAuth2Error {
  public readonly errorCode: string;
  public readonly errorDescription?: string;
  public readonly errorUri?: string;
  public readonly status: number;

  constructor(
    status: number,
    errorCode: string,
    options?: { errorDescription?: string; errorUri?: string }
  ) {
    const detail = options?.errorDescription || errorCode;
    super(`Server returned error response: ${detail}`, "protocol", `Protocol.${errorCode}`);
    this.name = "ProtocolError";
    this.status = status;
    this.errorCode = errorCode;
    this.errorDescription = options?.errorDescription;
    this.errorUri = options?.errorUri;
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

/**
 * Non-success response whose body is absent or not an OAuth error.
 */
export class OtherError extends OAuth2Error {
  public readonly status: number;
  public readonly detail: string;

  constructor(status: number, detail: string) {
    super(`Other error: ${detail}`, "other", "Other.UnexpectedResponse");
    this.name = "OtherError";
    this.status = status;
    this.detail = detail;
    Object.setPrototypeOf(this, OtherError.prototype);
  }
}

/**
 * Reasons an introspected identity is refused.
 */
export type ValidationErrorCode =
  | "InactiveToken"
  | "TokenExpired"
  | "MissingClaim"
  | "AudienceMismatch"
  | "InsufficientScope"
  | "IdentityMismatch";

/**
 * Post-introspection identity check failure.
 */
export class ValidationError extends OAuth2Error {
  public readonly remoteUsername?: string;
  public readonly reason: ValidationErrorCode;

  constructor(
    message: string,
    code: ValidationErrorCode,
    options?: { remoteUsername?: string }
  ) {
    super(message, "validation", `Validation.${code}`);
    this.name = "ValidationError";
    this.reason = code;
    this.remoteUsername = options?.remoteUsername;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Polling lifecycle error.
 */
export class PollingError extends OAuth2Error {
  constructor(message: string, code: "TimedOut" | "DeviceCodeReused") {
    super(message, "polling", `Polling.${code}`);
    this.name = "PollingError";
    Object.setPrototypeOf(this, PollingError.prototype);
  }
}

/**
 * Check if an unknown value is an OAuth2Error.
 */
export function isOAuth2Error(error: unknown): error is OAuth2Error {
  return error instanceof OAuth2Error;
}

/**
 * Get a generic, secret-free message suitable for the end user.
 *
 * Protocol detail stays in the operator log; the user only learns
 * whether to retry or to contact an administrator.
 */
export function getUserMessage(error: OAuth2Error): string {
  switch (error.kind) {
    case "configuration":
      return "Authentication is not configured correctly. Please contact your administrator.";
    case "transport":
    case "other":
      return "The authentication service could not be reached. Please try again later.";
    case "polling":
      return "Authentication was not completed in time. Please try again.";
    case "protocol":
    case "validation":
      return "Authentication failed.";
  }
}
