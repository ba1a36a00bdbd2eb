/**
 * Device Authorization Client Builder
 *
 * Fluent builders for client configuration and the client itself.
 */

import { z } from "zod";
import {
  ClientAuthMethod,
  DEFAULT_CONFIG,
  DeviceAuthConfig,
  IdentityClaim,
  ProviderConfig,
  SecretString,
} from "../types";
import { ConfigurationError } from "../error";
import { HttpTransport, FetchHttpTransport } from "../core/transport";
import { Clock } from "../core/clock";
import { Logger } from "../telemetry/logging";
import { IdentityBindingRule } from "../validation/rules";
import { DeviceAuthClient, DeviceAuthClientImpl } from "./device-auth-client";

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "must be an http(s) URL" });

const configSchema = z.object({
  provider: z.object({
    deviceAuthorizationEndpoint: httpUrl,
    tokenEndpoint: httpUrl,
    introspectionEndpoint: httpUrl,
  }),
  clientId: z.string().min(1),
  scopes: z.array(z.string().min(1)),
  pollingTimeoutSeconds: z.number().positive(),
  requestTimeoutMs: z.number().int().positive(),
  defaultIntervalSeconds: z.number().positive(),
  slowDownIncrementSeconds: z.number().positive(),
  defaultDeviceCodeLifetimeSeconds: z.number().positive(),
});

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const issue = error.issues[0];
  const path = issue ? issue.path.join(".") : "";
  const message = issue ? issue.message : "invalid value";
  const code = path.startsWith("provider.") ? "InvalidEndpoint" : "InvalidConfig";
  return new ConfigurationError(`Invalid configuration: ${path}: ${message}`, code, {
    cause: error,
  });
}

/**
 * Device authorization configuration builder.
 */
export class DeviceAuthConfigBuilder {
  private _provider?: ProviderConfig;
  private _clientId?: string;
  private _clientSecret?: SecretString;
  private _authMethod?: ClientAuthMethod;
  private _scopes: string[] = [];
  private _pollingTimeoutSeconds?: number;
  private _requestTimeoutMs?: number;
  private _defaultIntervalSeconds?: number;
  private _slowDownIncrementSeconds?: number;
  private _defaultDeviceCodeLifetimeSeconds?: number;
  private _identityClaim?: IdentityClaim;
  private _requiredAudience?: string;
  private _requiredScopes: string[] = [];
  private _stripDomains: string[] = [];
  private _aliases: Record<string, string[]> = {};
  private _caseInsensitive = false;
  private _qrEnabled?: boolean;

  /**
   * Set provider endpoints.
   */
  provider(provider: ProviderConfig): this {
    this._provider = provider;
    return this;
  }

  /**
   * Set client ID.
   */
  clientId(clientId: string): this {
    this._clientId = clientId;
    return this;
  }

  /**
   * Set client secret.
   */
  clientSecret(clientSecret: string | SecretString): this {
    this._clientSecret =
      clientSecret instanceof SecretString ? clientSecret : new SecretString(clientSecret);
    return this;
  }

  /**
   * Set client authentication method.
   */
  authMethod(method: ClientAuthMethod): this {
    this._authMethod = method;
    return this;
  }

  /**
   * Set requested scopes.
   */
  scopes(scopes: readonly string[]): this {
    this._scopes = [...scopes];
    return this;
  }

  /**
   * Set the polling timeout in seconds.
   */
  pollingTimeout(seconds: number): this {
    this._pollingTimeoutSeconds = seconds;
    return this;
  }

  /**
   * Set per-request timeout in milliseconds.
   */
  requestTimeout(ms: number): this {
    this._requestTimeoutMs = ms;
    return this;
  }

  /**
   * Set the poll interval used when the server advertises none.
   */
  defaultInterval(seconds: number): this {
    this._defaultIntervalSeconds = seconds;
    return this;
  }

  /**
   * Set the `slow_down` interval increment.
   */
  slowDownIncrement(seconds: number): this {
    this._slowDownIncrementSeconds = seconds;
    return this;
  }

  /**
   * Set the device code lifetime assumed when the server omits one.
   */
  defaultDeviceCodeLifetime(seconds: number): this {
    this._defaultDeviceCodeLifetimeSeconds = seconds;
    return this;
  }

  /**
   * Set the claim carrying the remote username.
   */
  identityClaim(claim: IdentityClaim): this {
    this._identityClaim = claim;
    return this;
  }

  /**
   * Require an audience on the introspected token.
   */
  requiredAudience(audience: string): this {
    this._requiredAudience = audience;
    return this;
  }

  /**
   * Require scopes on the introspected token.
   */
  requiredScopes(scopes: readonly string[]): this {
    this._requiredScopes = [...scopes];
    return this;
  }

  /**
   * Strip these domains from remote usernames before comparison.
   */
  stripDomains(domains: readonly string[]): this {
    this._stripDomains = [...domains];
    return this;
  }

  /**
   * Allow a remote user to log in as additional local accounts.
   */
  alias(remoteUsername: string, localUsers: readonly string[]): this {
    this._aliases[remoteUsername] = [...localUsers];
    return this;
  }

  /**
   * Compare usernames case-insensitively.
   */
  caseInsensitive(enabled: boolean = true): this {
    this._caseInsensitive = enabled;
    return this;
  }

  /**
   * Render a QR code in the user prompt.
   */
  qrEnabled(enabled: boolean = true): this {
    this._qrEnabled = enabled;
    return this;
  }

  /**
   * Build and validate configuration.
   */
  build(): DeviceAuthConfig {
    if (!this._provider) {
      throw new ConfigurationError("Provider configuration is required", "MissingRequired");
    }
    if (!this._clientId) {
      throw new ConfigurationError("Client ID is required", "MissingRequired");
    }

    const parsed = configSchema.safeParse({
      provider: this._provider,
      clientId: this._clientId,
      scopes: this._scopes,
      pollingTimeoutSeconds: this._pollingTimeoutSeconds ?? DEFAULT_CONFIG.pollingTimeoutSeconds,
      requestTimeoutMs: this._requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
      defaultIntervalSeconds: this._defaultIntervalSeconds ?? DEFAULT_CONFIG.intervalSeconds,
      slowDownIncrementSeconds:
        this._slowDownIncrementSeconds ?? DEFAULT_CONFIG.slowDownIncrementSeconds,
      defaultDeviceCodeLifetimeSeconds:
        this._defaultDeviceCodeLifetimeSeconds ?? DEFAULT_CONFIG.deviceCodeLifetimeSeconds,
    });
    if (!parsed.success) {
      throw toConfigurationError(parsed.error);
    }

    const data = parsed.data;
    return Object.freeze({
      provider: Object.freeze({ ...data.provider }),
      credentials: Object.freeze({
        clientId: data.clientId,
        clientSecret: this._clientSecret,
        authMethod: this._authMethod ?? DEFAULT_CONFIG.authMethod,
      }),
      scopes: Object.freeze(data.scopes),
      pollingTimeoutSeconds: data.pollingTimeoutSeconds,
      requestTimeoutMs: data.requestTimeoutMs,
      defaultIntervalSeconds: data.defaultIntervalSeconds,
      slowDownIncrementSeconds: data.slowDownIncrementSeconds,
      defaultDeviceCodeLifetimeSeconds: data.defaultDeviceCodeLifetimeSeconds,
      identity: Object.freeze({
        claim: this._identityClaim ?? DEFAULT_CONFIG.identityClaim,
        requiredAudience: this._requiredAudience,
        requiredScopes: Object.freeze([...this._requiredScopes]),
        stripDomains: Object.freeze([...this._stripDomains]),
        aliases: Object.freeze({ ...this._aliases }),
        caseInsensitive: this._caseInsensitive,
      }),
      qrEnabled: this._qrEnabled ?? DEFAULT_CONFIG.qrEnabled,
    });
  }
}

/**
 * Device authorization client builder with dependency injection.
 */
export class DeviceAuthClientBuilder {
  private _config?: DeviceAuthConfig;
  private _transport?: HttpTransport;
  private _clock?: Clock;
  private _logger?: Logger;
  private _bindingRule?: IdentityBindingRule;

  /**
   * Set configuration.
   */
  config(config: DeviceAuthConfig): this {
    this._config = config;
    return this;
  }

  /**
   * Set custom HTTP transport.
   */
  transport(transport: HttpTransport): this {
    this._transport = transport;
    return this;
  }

  /**
   * Set custom clock.
   */
  clock(clock: Clock): this {
    this._clock = clock;
    return this;
  }

  /**
   * Set logger.
   */
  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Replace the identity binding rule derived from configuration.
   */
  bindingRule(rule: IdentityBindingRule): this {
    this._bindingRule = rule;
    return this;
  }

  /**
   * Build the client.
   */
  build(): DeviceAuthClient {
    if (!this._config) {
      throw new ConfigurationError("Configuration is required", "MissingRequired");
    }

    const transport =
      this._transport ?? new FetchHttpTransport({ timeout: this._config.requestTimeoutMs });

    return new DeviceAuthClientImpl(this._config, transport, {
      clock: this._clock,
      logger: this._logger,
      bindingRule: this._bindingRule,
    });
  }
}

/**
 * Create a new configuration builder.
 */
export function configBuilder(): DeviceAuthConfigBuilder {
  return new DeviceAuthConfigBuilder();
}

/**
 * Create a new client builder.
 */
export function clientBuilder(): DeviceAuthClientBuilder {
  return new DeviceAuthClientBuilder();
}
