/**
 * Device Authorization Flow
 *
 * RFC 8628 - OAuth 2.0 Device Authorization Grant.
 *
 * State machine:
 *
 *   init -> awaiting_device_code -> polling -> succeeded
 *                                           -> denied
 *                                           -> expired
 *                                           -> timed_out
 *                                           -> transport_error
 *
 * Only `authorization_pending` and `slow_down` keep the machine in
 * `polling`; every other outcome is terminal and reported, never retried.
 */

import { z } from "zod";
import {
  DEVICE_CODE_GRANT_TYPE,
  DeviceAuthConfig,
  DeviceAuthorizationResponse,
  DeviceCodeParams,
  DeviceGrantResult,
  DeviceTokenResult,
  SecretString,
  TokenResponse,
} from "../types";
import {
  ConfigurationError,
  PollingError,
  TransportError,
  asOAuth2Error,
  createErrorFromResponse,
  optionalMember,
  parseErrorResponse,
  toProtocolError,
  tryParseJson,
} from "../error";
import { HttpResponse, HttpTransport } from "../core/transport";
import { Clock, systemClock } from "../core/clock";
import { applyClientAuthentication, formHeaders } from "../core/client-auth";
import { Logger, noOpLogger } from "../telemetry/logging";

const numericSeconds = z.union([
  z.number().nonnegative(),
  z.string().regex(/^\d+$/).transform(Number),
]);

const deviceAuthorizationSchema = z.object({
  device_code: z.string().min(1),
  user_code: z.string().min(1),
  verification_uri: optionalMember(z.string().min(1)),
  // Some providers still use the draft spelling
  verification_url: optionalMember(z.string().min(1)),
  verification_uri_complete: optionalMember(z.string().min(1)),
  expires_in: optionalMember(numericSeconds),
  interval: optionalMember(numericSeconds).catch(undefined),
});

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: optionalMember(z.string()),
  expires_in: optionalMember(numericSeconds),
  refresh_token: optionalMember(z.string()),
  scope: optionalMember(z.string()),
});

/**
 * Options for {@link DeviceAuthorizationFlow.awaitAuthorization}.
 */
export interface AwaitAuthorizationOptions {
  /** Overrides the configured polling timeout */
  timeoutSeconds?: number;
}

/**
 * Polling state threaded through each iteration.
 */
export interface PollingState {
  /** Interval to sleep before the next request, in seconds */
  readonly intervalSeconds: number;
  /** Absolute deadline (epoch milliseconds) */
  readonly deadline: number;
  /** Token-endpoint requests issued so far */
  readonly polls: number;
  /** Interval in force before each sleep so far */
  readonly intervals: readonly number[];
}

/**
 * Result of applying one poll outcome to the polling state.
 */
export type PollingStep =
  | { readonly kind: "continue"; readonly state: PollingState }
  | { readonly kind: "done"; readonly result: DeviceGrantResult };

/**
 * Create the initial polling state for a device code.
 *
 * The deadline is `timeoutSeconds` from `startMs`, capped by the device
 * code's expiry counted from when it was received.
 */
export function initialPollingState(
  response: DeviceAuthorizationResponse,
  startMs: number,
  timeoutSeconds: number,
  defaultIntervalSeconds: number
): PollingState {
  return {
    intervalSeconds: response.interval > 0 ? response.interval : defaultIntervalSeconds,
    deadline: Math.min(
      startMs + timeoutSeconds * 1000,
      response.receivedAt + response.expiresIn * 1000
    ),
    polls: 0,
    intervals: [],
  };
}

/**
 * Apply a single poll outcome to the polling state.
 */
export function advancePolling(
  state: PollingState,
  outcome: DeviceTokenResult,
  slowDownIncrementSeconds: number
): PollingStep {
  const summary = { polls: state.polls, intervals: state.intervals };

  switch (outcome.status) {
    case "success":
      return { kind: "done", result: { ...summary, state: "succeeded", tokens: outcome.tokens } };

    case "pending":
      return { kind: "continue", state };

    case "slow_down": {
      const increased = state.intervalSeconds + slowDownIncrementSeconds;
      const intervalSeconds = Math.max(increased, outcome.interval ?? 0);
      return { kind: "continue", state: { ...state, intervalSeconds } };
    }

    case "expired":
      return { kind: "done", result: { ...summary, state: "expired", error: outcome.error } };

    case "access_denied":
      return { kind: "done", result: { ...summary, state: "denied", error: outcome.error } };
  }
}

/**
 * Device Authorization Flow interface.
 */
export interface DeviceAuthorizationFlow {
  /**
   * Request device and user codes.
   *
   * Rejects with the classified error on any transport or decode failure.
   */
  requestDeviceCode(params?: DeviceCodeParams): Promise<DeviceAuthorizationResponse>;

  /**
   * Issue one token-endpoint request for a device code.
   */
  pollToken(deviceCode: SecretString): Promise<DeviceTokenResult>;

  /**
   * Poll until success, a terminal error, or the deadline.
   *
   * Resolves with a terminal result for every protocol or transport outcome.
   * Rejects with a ConfigurationError for a timeout that is not a positive
   * finite number, and with a PollingError for a device code polled before.
   */
  awaitAuthorization(
    response: DeviceAuthorizationResponse,
    options?: AwaitAuthorizationOptions
  ): Promise<DeviceGrantResult>;
}

/**
 * Device Authorization Flow implementation.
 */
export class DeviceAuthorizationFlowImpl implements DeviceAuthorizationFlow {
  private config: DeviceAuthConfig;
  private transport: HttpTransport;
  private clock: Clock;
  private logger: Logger;
  private consumed = new WeakSet<DeviceAuthorizationResponse>();

  constructor(
    config: DeviceAuthConfig,
    transport: HttpTransport,
    options?: { clock?: Clock; logger?: Logger }
  ) {
    this.config = config;
    this.transport = transport;
    this.clock = options?.clock ?? systemClock;
    this.logger = (options?.logger ?? noOpLogger).child({ flow: "device_code" });
  }

  async requestDeviceCode(params?: DeviceCodeParams): Promise<DeviceAuthorizationResponse> {
    const body = new URLSearchParams();
    const headers = formHeaders();
    applyClientAuthentication(this.config.credentials, body, headers);

    const scopes = params?.scopes ?? this.config.scopes;
    if (scopes.length > 0) {
      body.set("scope", scopes.join(" "));
    }

    const url = this.config.provider.deviceAuthorizationEndpoint;
    this.logger.debug("Requesting device code", { step: "device_code", url, scopes: scopes.join(" ") });

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: "POST",
        url,
        headers,
        body: body.toString(),
        timeout: this.config.requestTimeoutMs,
      });
    } catch (error) {
      throw asOAuth2Error(
        error,
        (cause) => new TransportError("Device authorization request failed", "ConnectionFailed", { cause })
      );
    }

    if (!isSuccessStatus(response.status)) {
      throw createErrorFromResponse(response.status, response.body);
    }

    const deviceAuthorization = this.parseDeviceAuthorizationResponse(response.body);
    this.logger.debug("Device code received", {
      step: "device_code",
      deviceCode: deviceAuthorization.deviceCode,
      userCode: deviceAuthorization.userCode,
      verificationUri: deviceAuthorization.verificationUri,
      expiresIn: deviceAuthorization.expiresIn,
      interval: deviceAuthorization.interval,
    });
    return deviceAuthorization;
  }

  async pollToken(deviceCode: SecretString): Promise<DeviceTokenResult> {
    const body = new URLSearchParams();
    body.set("grant_type", DEVICE_CODE_GRANT_TYPE);
    body.set("device_code", deviceCode.expose());
    const headers = formHeaders();
    applyClientAuthentication(this.config.credentials, body, headers);

    const response = await this.transport.send({
      method: "POST",
      url: this.config.provider.tokenEndpoint,
      headers,
      body: body.toString(),
      timeout: this.config.requestTimeoutMs,
    });

    // Success
    if (isSuccessStatus(response.status)) {
      return { status: "success", tokens: this.parseTokenResponse(response.body) };
    }

    // Check for error response
    const errorResponse = parseErrorResponse(response.body);
    if (!errorResponse) {
      throw createErrorFromResponse(response.status, response.body);
    }

    switch (errorResponse.error) {
      case "authorization_pending":
        return { status: "pending" };
      case "slow_down":
        return { status: "slow_down", interval: errorResponse.interval };
      case "expired_token":
        return { status: "expired", error: toProtocolError(response.status, errorResponse) };
      case "access_denied":
        return { status: "access_denied", error: toProtocolError(response.status, errorResponse) };
      default:
        throw toProtocolError(response.status, errorResponse);
    }
  }

  async awaitAuthorization(
    response: DeviceAuthorizationResponse,
    options?: AwaitAuthorizationOptions
  ): Promise<DeviceGrantResult> {
    const timeoutSeconds = options?.timeoutSeconds ?? this.config.pollingTimeoutSeconds;
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new ConfigurationError(
        `Polling timeout must be a positive number of seconds, got ${timeoutSeconds}`,
        "InvalidConfig"
      );
    }

    if (this.consumed.has(response)) {
      throw new PollingError("Device code has already been polled", "DeviceCodeReused");
    }
    this.consumed.add(response);

    let state = initialPollingState(
      response,
      this.clock.now(),
      timeoutSeconds,
      this.config.defaultIntervalSeconds
    );
    this.logger.debug("Polling token endpoint", {
      step: "polling",
      intervalSeconds: state.intervalSeconds,
      timeoutSeconds,
    });

    while (true) {
      if (this.clock.now() >= state.deadline) {
        return this.timedOut(state, timeoutSeconds);
      }

      state = { ...state, intervals: [...state.intervals, state.intervalSeconds] };
      await this.clock.sleep(Math.min(state.intervalSeconds * 1000, state.deadline - this.clock.now()));

      if (this.clock.now() >= state.deadline) {
        return this.timedOut(state, timeoutSeconds);
      }

      let outcome: DeviceTokenResult;
      try {
        state = { ...state, polls: state.polls + 1 };
        outcome = await this.pollToken(response.deviceCode);
      } catch (error) {
        const failure = asOAuth2Error(
          error,
          (cause) => new TransportError("Token request failed", "ConnectionFailed", { cause })
        );
        return this.finish({
          polls: state.polls,
          intervals: state.intervals,
          state: "transport_error",
          error: failure,
        });
      }

      const step = advancePolling(state, outcome, this.config.slowDownIncrementSeconds);
      if (step.kind === "done") {
        return this.finish(step.result);
      }

      if (step.state.intervalSeconds !== state.intervalSeconds) {
        this.logger.debug("Server requested slow down", {
          step: "polling",
          intervalSeconds: step.state.intervalSeconds,
        });
      }
      state = step.state;
    }
  }

  private timedOut(state: PollingState, timeoutSeconds: number): DeviceGrantResult {
    return this.finish({
      polls: state.polls,
      intervals: state.intervals,
      state: "timed_out",
      error: new PollingError(
        `Device authorization was not completed within ${timeoutSeconds} seconds`,
        "TimedOut"
      ),
    });
  }

  private finish(result: DeviceGrantResult): DeviceGrantResult {
    if (result.state === "succeeded") {
      this.logger.debug("Device authorization succeeded", {
        step: result.state,
        polls: result.polls,
        tokens: result.tokens,
      });
    } else {
      this.logger.debug("Device authorization ended", {
        step: result.state,
        polls: result.polls,
        errorCode: result.error.code,
        errorKind: result.error.kind,
      });
    }
    return result;
  }

  private parseDeviceAuthorizationResponse(body: string): DeviceAuthorizationResponse {
    const parsed = deviceAuthorizationSchema.safeParse(tryParseJson(body));
    if (!parsed.success) {
      throw new TransportError("Invalid device authorization response", "InvalidResponse", {
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    const verificationUri = data.verification_uri ?? data.verification_url;
    if (!verificationUri) {
      throw new TransportError(
        "Invalid device authorization response: missing verification_uri",
        "InvalidResponse"
      );
    }

    return {
      deviceCode: new SecretString(data.device_code),
      receivedAt: this.clock.now(),
      userCode: data.user_code,
      verificationUri,
      verificationUriComplete: data.verification_uri_complete,
      expiresIn: data.expires_in ?? this.config.defaultDeviceCodeLifetimeSeconds,
      interval: data.interval !== undefined && data.interval > 0
        ? data.interval
        : this.config.defaultIntervalSeconds,
    };
  }

  private parseTokenResponse(body: string): TokenResponse {
    const parsed = tokenResponseSchema.safeParse(tryParseJson(body));
    if (!parsed.success) {
      throw new TransportError("Invalid token response", "InvalidResponse", {
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    return {
      accessToken: new SecretString(data.access_token),
      tokenType: data.token_type ?? "Bearer",
      expiresIn: data.expires_in,
      refreshToken: data.refresh_token !== undefined ? new SecretString(data.refresh_token) : undefined,
      scope: data.scope,
    };
  }
}

/**
 * Whether a status code carries a success payload.
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
