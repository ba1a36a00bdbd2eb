/**
 * Identity Validator
 *
 * Decides whether an introspected token may log in as a local account.
 */

import {
  IdentityClaim,
  IdentityConfig,
  IntrospectionResponse,
  audiencesOf,
  isTokenActive,
  parseScopes,
} from "../types";
import { ValidationError, ValidationErrorCode } from "../error";
import { Clock, systemClock } from "../core/clock";
import { Logger, noOpLogger } from "../telemetry/logging";
import { IdentityBindingRule, ruleFromIdentityConfig } from "./rules";

/**
 * Outcome of identity validation.
 */
export type ValidationResult =
  | { readonly valid: true; readonly remoteUsername: string }
  | {
      readonly valid: false;
      readonly remoteUsername?: string;
      readonly reason: ValidationErrorCode;
      readonly message: string;
    };

/**
 * Failed validation outcome.
 */
export type ValidationFailure = Extract<ValidationResult, { valid: false }>;

/**
 * Read the remote username from an introspection response.
 *
 * Empty strings count as absent.
 */
export function remoteUsernameOf(
  introspection: IntrospectionResponse,
  claim: IdentityClaim
): string | undefined {
  const present = (value: string | undefined): string | undefined =>
    value !== undefined && value.length > 0 ? value : undefined;

  switch (claim) {
    case "username":
      return present(introspection.username);
    case "sub":
      return present(introspection.sub);
    case "username_or_sub":
      return present(introspection.username) ?? present(introspection.sub);
  }
}

/**
 * Convert a failed result to a ValidationError.
 */
export function validationErrorFor(result: ValidationFailure): ValidationError {
  return new ValidationError(result.message, result.reason, {
    remoteUsername: result.remoteUsername,
  });
}

/**
 * Identity validator interface (for dependency injection).
 */
export interface IdentityValidator {
  /**
   * Validate an introspection response against the local account.
   */
  validate(introspection: IntrospectionResponse, localUser: string): ValidationResult;
}

/**
 * Identity validator implementation.
 */
export class IdentityValidatorImpl implements IdentityValidator {
  private identity: IdentityConfig;
  private rule: IdentityBindingRule;
  private clock: Clock;
  private logger: Logger;

  constructor(
    identity: IdentityConfig,
    options?: { rule?: IdentityBindingRule; clock?: Clock; logger?: Logger }
  ) {
    this.identity = identity;
    this.rule = options?.rule ?? ruleFromIdentityConfig(identity);
    this.clock = options?.clock ?? systemClock;
    this.logger = (options?.logger ?? noOpLogger).child({ step: "validation" });
  }

  validate(introspection: IntrospectionResponse, localUser: string): ValidationResult {
    const result = this.check(introspection, localUser);
    if (result.valid) {
      this.logger.debug("Identity accepted", {
        user: localUser,
        remoteUser: result.remoteUsername,
        rule: this.rule.description,
      });
    } else {
      this.logger.debug("Identity rejected", {
        user: localUser,
        remoteUser: result.remoteUsername,
        errorCode: result.reason,
      });
    }
    return result;
  }

  private check(introspection: IntrospectionResponse, localUser: string): ValidationResult {
    if (!introspection.active) {
      return fail("InactiveToken", "Token is not active");
    }

    if (!isTokenActive(introspection, this.clock.now())) {
      return fail("TokenExpired", "Token has expired");
    }

    const claim = this.identity.claim;
    const remoteUsername = remoteUsernameOf(introspection, claim);
    if (remoteUsername === undefined) {
      return fail("MissingClaim", `Introspection response has no ${claim} claim`);
    }

    const audience = this.identity.requiredAudience;
    if (audience !== undefined && !audiencesOf(introspection).includes(audience)) {
      return fail("AudienceMismatch", `Token audience does not include ${audience}`, remoteUsername);
    }

    const granted = parseScopes(introspection.scope);
    const missing = this.identity.requiredScopes.filter((s) => !granted.includes(s));
    if (missing.length > 0) {
      return fail("InsufficientScope", `Token is missing scopes: ${missing.join(" ")}`, remoteUsername);
    }

    if (!this.rule.matches(remoteUsername, localUser)) {
      return fail(
        "IdentityMismatch",
        `Remote user ${remoteUsername} may not log in as ${localUser}`,
        remoteUsername
      );
    }

    return { valid: true, remoteUsername };
  }
}

function fail(
  reason: ValidationErrorCode,
  message: string,
  remoteUsername?: string
): ValidationFailure {
  return { valid: false, reason, message, remoteUsername };
}
