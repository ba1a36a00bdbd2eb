/**
 * Device Authorization Client Configuration Types
 */

import type { SecretString } from "./token";

/**
 * Client authentication method.
 */
export type ClientAuthMethod = "client_secret_basic" | "client_secret_post" | "none";

/**
 * Claim of the introspection response carrying the remote identity.
 *
 * `username_or_sub` prefers `username` and falls back to `sub`.
 */
export type IdentityClaim = "username" | "sub" | "username_or_sub";

/**
 * Statically configured authorization server endpoints.
 */
export interface ProviderConfig {
  /** Device authorization endpoint URL */
  readonly deviceAuthorizationEndpoint: string;
  /** Token endpoint URL */
  readonly tokenEndpoint: string;
  /** Token introspection endpoint URL */
  readonly introspectionEndpoint: string;
}

/**
 * Client credentials.
 */
export interface ClientCredentials {
  /** Client identifier */
  readonly clientId: string;
  /** Client secret (for confidential clients) */
  readonly clientSecret?: SecretString;
  /** Authentication method */
  readonly authMethod: ClientAuthMethod;
}

/**
 * Options for binding the remote identity to the local account.
 */
export interface IdentityConfig {
  /** Claim holding the remote username */
  readonly claim: IdentityClaim;
  /** Audience the token must carry, if set */
  readonly requiredAudience?: string;
  /** Scopes the token must carry */
  readonly requiredScopes: readonly string[];
  /** Domain suffixes stripped from the remote username before comparison */
  readonly stripDomains: readonly string[];
  /** Remote username -> local account names allowed in addition to equality */
  readonly aliases: Readonly<Record<string, readonly string[]>>;
  /** Compare names case-insensitively */
  readonly caseInsensitive: boolean;
}

/**
 * Device authorization client configuration.
 *
 * Built once per authentication attempt and never mutated afterwards.
 */
export interface DeviceAuthConfig {
  /** Provider endpoints */
  readonly provider: ProviderConfig;
  /** Client credentials */
  readonly credentials: ClientCredentials;
  /** Scopes to request */
  readonly scopes: readonly string[];
  /** Upper bound on polling wall-clock time, in seconds */
  readonly pollingTimeoutSeconds: number;
  /** Per-request HTTP timeout in milliseconds */
  readonly requestTimeoutMs: number;
  /** Poll interval used when the server advertises none, in seconds */
  readonly defaultIntervalSeconds: number;
  /** Interval increase applied on `slow_down`, in seconds */
  readonly slowDownIncrementSeconds: number;
  /** Device code lifetime assumed when the server omits `expires_in` */
  readonly defaultDeviceCodeLifetimeSeconds: number;
  /** Identity binding options */
  readonly identity: IdentityConfig;
  /** Render a QR code of the verification URI in the user prompt */
  readonly qrEnabled: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
  /** RFC 8628 Section 3.5 default polling interval */
  intervalSeconds: 5,
  /** RFC 8628 Section 3.5 `slow_down` increment */
  slowDownIncrementSeconds: 5,
  pollingTimeoutSeconds: 300,
  requestTimeoutMs: 30000,
  deviceCodeLifetimeSeconds: 1800,
  authMethod: "client_secret_post",
  identityClaim: "username",
  qrEnabled: false,
} as const;
