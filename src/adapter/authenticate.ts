/**
 * Authentication Adapter
 *
 * One login attempt for a local account: device code, user prompt,
 * polling, introspection and identity validation. Every failure maps to a
 * decision; nothing is thrown to the caller.
 */

import {
  DeviceAuthConfig,
  DeviceAuthorizationResponse,
  DeviceGrantResult,
  IntrospectionResponse,
  isDeviceGrantSuccess,
} from "../types";
import {
  ConfigurationError,
  OAuth2Error,
  TransportError,
  asOAuth2Error,
  formatErrorChain,
} from "../error";
import { HttpTransport } from "../core/transport";
import { Clock } from "../core/clock";
import { Logger, noOpLogger } from "../telemetry/logging";
import { DeviceAuthClient, clientBuilder } from "../client";
import { IdentityBindingRule, validationErrorFor } from "../validation";
import { Conversation } from "../prompt/conversation";
import { QrRenderer, renderUserPrompt } from "../prompt/user-prompt";

/**
 * Decision handed back to the host authentication stack.
 */
export type AuthenticationDecision = "success" | "auth_err" | "system_err";

/**
 * Outcome of one login attempt.
 */
export interface AuthenticationOutcome {
  readonly decision: AuthenticationDecision;
  /** Remote identity accepted for the login, or refused by validation */
  readonly remoteUsername?: string;
  /** Why the attempt failed */
  readonly failure?: OAuth2Error;
}

/**
 * Options for {@link authenticate}.
 */
export interface AuthenticateOptions {
  /** Local account being authenticated */
  user: string;
  /** Client configuration, or a loader for it */
  config: DeviceAuthConfig | (() => Promise<DeviceAuthConfig>);
  /** Channel to the person logging in */
  conversation: Conversation;
  logger?: Logger;
  transport?: HttpTransport;
  clock?: Clock;
  qrRenderer?: QrRenderer;
  bindingRule?: IdentityBindingRule;
}

/**
 * Authenticate a local account through the device authorization grant.
 */
export async function authenticate(options: AuthenticateOptions): Promise<AuthenticationOutcome> {
  const logger = options.logger ?? noOpLogger;
  const { user } = options;

  let config: DeviceAuthConfig;
  try {
    config = typeof options.config === "function" ? await options.config() : options.config;
  } catch (error) {
    return fail(logger, "system_err", "Failed to parse config file", error, (cause) =>
      new ConfigurationError("Configuration could not be loaded", "InvalidConfig", { cause })
    );
  }

  logger.info(`Trying to authenticate user: ${user}`, { user });

  let client: DeviceAuthClient;
  try {
    const builder = clientBuilder().config(config).logger(logger);
    if (options.transport) builder.transport(options.transport);
    if (options.clock) builder.clock(options.clock);
    if (options.bindingRule) builder.bindingRule(options.bindingRule);
    client = builder.build();
  } catch (error) {
    return fail(logger, "system_err", "Failed to build OAuth client", error, (cause) =>
      new ConfigurationError("Client could not be built", "InvalidConfig", { cause })
    );
  }

  const flow = client.deviceAuthorization();

  let deviceCode: DeviceAuthorizationResponse;
  try {
    deviceCode = await flow.requestDeviceCode();
  } catch (error) {
    return fail(logger, "auth_err", "Failed to receive device code response", error, wrapTransport);
  }
  logger.debug("Device code response", {
    deviceCode: deviceCode.deviceCode,
    userCode: deviceCode.userCode,
    verificationUri: deviceCode.verificationUri,
    expiresIn: deviceCode.expiresIn,
    interval: deviceCode.interval,
  });

  try {
    if (config.qrEnabled) {
      logger.debug("Generate QR code...");
    }
    const text = await renderUserPrompt(deviceCode, {
      qr: config.qrEnabled,
      qrRenderer: options.qrRenderer,
    });
    await options.conversation.prompt(text);
  } catch (error) {
    return fail(logger, "system_err", "Failed to prompt user", error, wrapTransport);
  }

  let result: DeviceGrantResult;
  try {
    result = await flow.awaitAuthorization(deviceCode);
  } catch (error) {
    return fail(logger, "auth_err", "Failed to receive user token", error, wrapTransport);
  }
  if (!isDeviceGrantSuccess(result)) {
    return fail(logger, "auth_err", "Failed to receive user token", result.error, wrapTransport);
  }
  logger.debug("Token response", {
    tokenType: result.tokens.tokenType,
    expiresIn: result.tokens.expiresIn,
    accessToken: result.tokens.accessToken,
    polls: result.polls,
  });

  let introspection: IntrospectionResponse;
  try {
    introspection = await client.introspection().introspect({
      token: result.tokens.accessToken.expose(),
      tokenTypeHint: "access_token",
    });
  } catch (error) {
    return fail(logger, "auth_err", "Failed to introspect user token", error, wrapTransport);
  }

  const validation = client.validator().validate(introspection, user);
  if (validation.valid) {
    logger.info(
      `Authentication successful for remote user: ${validation.remoteUsername} -> local user: ${user}`,
      { user, remoteUser: validation.remoteUsername }
    );
    return { decision: "success", remoteUsername: validation.remoteUsername };
  }

  const failure = validationErrorFor(validation);
  logger.warn(`Login failed for user: ${user}`, {
    user,
    remoteUser: validation.remoteUsername,
    errorCode: failure.code,
    errorKind: failure.kind,
  });
  return { decision: "auth_err", remoteUsername: validation.remoteUsername, failure };
}

function wrapTransport(cause: unknown): OAuth2Error {
  return new TransportError("Unexpected failure", "ConnectionFailed", { cause });
}

function fail(
  logger: Logger,
  decision: Exclude<AuthenticationDecision, "success">,
  context: string,
  error: unknown,
  wrap: (cause: unknown) => OAuth2Error
): AuthenticationOutcome {
  const failure = asOAuth2Error(error, wrap);
  logger.error(formatErrorChain(context, failure), {
    errorCode: failure.code,
    errorKind: failure.kind,
  });
  return { decision, failure };
}
