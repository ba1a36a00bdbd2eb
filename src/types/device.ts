/**
 * OAuth2 Device Authorization Types
 *
 * Types for device authorization flow (RFC 8628).
 */

import type { OAuth2Error, PollingError, ProtocolError } from "../error";
import type { SecretString, TokenResponse } from "./token";

/**
 * Grant type sent to the token endpoint while polling.
 */
export const DEVICE_CODE_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:device_code";

/**
 * Device authorization request parameters.
 */
export interface DeviceCodeParams {
  /** Requested scopes (overrides the configured scopes) */
  scopes?: string[];
}

/**
 * Device authorization response (RFC 8628 Section 3.2).
 *
 * Immutable once received and consumed exactly once by the poller.
 */
export interface DeviceAuthorizationResponse {
  /** Device verification code, the server-held correlation key */
  readonly deviceCode: SecretString;
  /** User verification code to display */
  readonly userCode: string;
  /** Verification URI for user to visit */
  readonly verificationUri: string;
  /** Optional complete URI with user_code embedded */
  readonly verificationUriComplete?: string;
  /** Lifetime of device_code in seconds */
  readonly expiresIn: number;
  /** Minimum polling interval in seconds */
  readonly interval: number;
  /** When the response arrived (epoch milliseconds); `expiresIn` counts from here */
  readonly receivedAt: number;
}

/**
 * Outcome of a single token-endpoint poll.
 */
export type DeviceTokenResult =
  | { status: "success"; tokens: TokenResponse }
  | { status: "pending" }
  | { status: "slow_down"; interval?: number }
  | { status: "expired"; error: ProtocolError }
  | { status: "access_denied"; error: ProtocolError };

/**
 * States of the device grant state machine.
 */
export type DeviceGrantState =
  | "init"
  | "awaiting_device_code"
  | "polling"
  | "succeeded"
  | "denied"
  | "expired"
  | "timed_out"
  | "transport_error";

/**
 * Terminal states of the device grant state machine.
 */
export type TerminalDeviceGrantState = Exclude<
  DeviceGrantState,
  "init" | "awaiting_device_code" | "polling"
>;

/**
 * Bookkeeping shared by every terminal result.
 */
export interface PollingSummary {
  /** Number of token-endpoint requests issued */
  readonly polls: number;
  /** Interval (seconds) in force before each sleep, in order */
  readonly intervals: readonly number[];
}

/**
 * Final result of polling a device code.
 */
export type DeviceGrantResult = PollingSummary &
  (
    | { readonly state: "succeeded"; readonly tokens: TokenResponse }
    | { readonly state: "denied"; readonly error: ProtocolError }
    | { readonly state: "expired"; readonly error: ProtocolError }
    | { readonly state: "timed_out"; readonly error: PollingError }
    | { readonly state: "transport_error"; readonly error: OAuth2Error }
  );

/**
 * Check if device authorization succeeded.
 */
export function isDeviceGrantSuccess(
  result: DeviceGrantResult
): result is Extract<DeviceGrantResult, { state: "succeeded" }> {
  return result.state === "succeeded";
}
