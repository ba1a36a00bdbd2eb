/**
 * OAuth2 Token Types
 *
 * Token-related type definitions following RFC 6749.
 */

const REDACTED = "[REDACTED]";

/**
 * Secret string wrapper to prevent accidental exposure.
 *
 * Every rendering path (string coercion, JSON, `util.inspect`) yields
 * `[REDACTED]`; only {@link SecretString.expose} returns the raw value.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Expose the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  /**
   * Returns redacted string for logging/debugging.
   */
  toString(): string {
    return REDACTED;
  }

  /**
   * Returns redacted string for JSON serialization.
   */
  toJSON(): string {
    return REDACTED;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return REDACTED;
  }
}

/**
 * Token response from the token endpoint (RFC 6749 Section 5.1).
 */
export interface TokenResponse {
  /** The access token issued by the authorization server */
  readonly accessToken: SecretString;
  /** The type of the token (typically "Bearer") */
  readonly tokenType: string;
  /** Lifetime in seconds of the access token */
  readonly expiresIn?: number;
  /** Refresh token, if the server issued one. Never used for renewal. */
  readonly refreshToken?: SecretString;
  /** Scope of the access token */
  readonly scope?: string;
}

/**
 * Split a space-delimited scope string.
 */
export function parseScopes(scope: string | undefined): string[] {
  if (!scope) {
    return [];
  }
  return scope.split(" ").filter((s) => s.length > 0);
}
