/**
 * Device Authorization Client
 *
 * Facade over the device grant engine, token introspection and identity
 * validation, sharing one configuration and transport.
 */

import { DeviceAuthConfig } from "../types";
import { HttpTransport } from "../core/transport";
import { Clock, systemClock } from "../core/clock";
import { Logger, noOpLogger } from "../telemetry/logging";
import { DeviceAuthorizationFlow, DeviceAuthorizationFlowImpl } from "../flows/device";
import { TokenIntrospection, TokenIntrospectionImpl } from "../token/introspection";
import { IdentityValidator, IdentityValidatorImpl } from "../validation/identity";
import { IdentityBindingRule } from "../validation/rules";

/**
 * Device authorization client interface.
 */
export interface DeviceAuthClient {
  /**
   * Get device authorization flow handler.
   */
  deviceAuthorization(): DeviceAuthorizationFlow;

  /**
   * Get token introspection handler.
   */
  introspection(): TokenIntrospection;

  /**
   * Get identity validator.
   */
  validator(): IdentityValidator;

  /**
   * Get configuration.
   */
  config(): DeviceAuthConfig;
}

/**
 * Device authorization client with lazy service initialization.
 */
export class DeviceAuthClientImpl implements DeviceAuthClient {
  private _config: DeviceAuthConfig;
  private _transport: HttpTransport;
  private _clock: Clock;
  private _logger: Logger;
  private _bindingRule?: IdentityBindingRule;

  // Lazy-initialized services
  private _deviceAuthorizationFlow?: DeviceAuthorizationFlow;
  private _tokenIntrospection?: TokenIntrospection;
  private _identityValidator?: IdentityValidator;

  constructor(
    config: DeviceAuthConfig,
    transport: HttpTransport,
    options?: { clock?: Clock; logger?: Logger; bindingRule?: IdentityBindingRule }
  ) {
    this._config = config;
    this._transport = transport;
    this._clock = options?.clock ?? systemClock;
    this._logger = (options?.logger ?? noOpLogger).child({ clientId: config.credentials.clientId });
    this._bindingRule = options?.bindingRule;
  }

  deviceAuthorization(): DeviceAuthorizationFlow {
    if (!this._deviceAuthorizationFlow) {
      this._deviceAuthorizationFlow = new DeviceAuthorizationFlowImpl(
        this._config,
        this._transport,
        { clock: this._clock, logger: this._logger }
      );
    }
    return this._deviceAuthorizationFlow;
  }

  introspection(): TokenIntrospection {
    if (!this._tokenIntrospection) {
      this._tokenIntrospection = new TokenIntrospectionImpl(this._config, this._transport, {
        logger: this._logger,
      });
    }
    return this._tokenIntrospection;
  }

  validator(): IdentityValidator {
    if (!this._identityValidator) {
      this._identityValidator = new IdentityValidatorImpl(this._config.identity, {
        rule: this._bindingRule,
        clock: this._clock,
        logger: this._logger,
      });
    }
    return this._identityValidator;
  }

  config(): DeviceAuthConfig {
    return this._config;
  }
}
