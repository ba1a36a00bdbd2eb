/**
 * OAuth2 Token Introspection Types
 *
 * Types for token introspection (RFC 7662).
 */

/**
 * Token introspection request parameters.
 */
export interface IntrospectionParams {
  /** Token to introspect */
  token: string;
  /** Hint about token type */
  tokenTypeHint?: "access_token" | "refresh_token";
}

/**
 * Token introspection response (RFC 7662 Section 2.2).
 *
 * The authorization server's view of a token is authoritative: a
 * well-formed token may still have been revoked.
 */
export interface IntrospectionResponse {
  /** Whether the token is active */
  readonly active: boolean;
  /** Scopes associated with the token */
  readonly scope?: string;
  /** Client identifier */
  readonly clientId?: string;
  /** Human-readable username */
  readonly username?: string;
  /** Token type */
  readonly tokenType?: string;
  /** Expiration timestamp (Unix epoch) */
  readonly exp?: number;
  /** Issue timestamp (Unix epoch) */
  readonly iat?: number;
  /** Not before timestamp (Unix epoch) */
  readonly nbf?: number;
  /** Subject identifier */
  readonly sub?: string;
  /** Audience */
  readonly aud?: string | string[];
  /** Issuer */
  readonly iss?: string;
  /** JWT ID */
  readonly jti?: string;
  /** Additional fields */
  readonly extra?: Record<string, unknown>;
}

/**
 * Check if introspected token is valid at `nowMs`.
 */
export function isTokenActive(
  response: IntrospectionResponse,
  nowMs: number = Date.now()
): boolean {
  if (!response.active) {
    return false;
  }
  if (response.exp !== undefined) {
    const now = Math.floor(nowMs / 1000);
    if (response.exp <= now) {
      return false;
    }
  }
  return true;
}

/**
 * Audience claim as a list.
 */
export function audiencesOf(response: IntrospectionResponse): string[] {
  if (response.aud === undefined) {
    return [];
  }
  return Array.isArray(response.aud) ? response.aud : [response.aud];
}
