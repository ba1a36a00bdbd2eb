/**
 * Identity Binding Rules
 *
 * Decide whether a remote username may log in as a local account. Rules
 * compose: wrappers transform the remote name or widen the match and then
 * defer to an inner rule.
 */

import type { IdentityConfig } from "../types";

/**
 * Binding rule between a remote identity and a local account.
 */
export interface IdentityBindingRule {
  /** Short description for logs */
  readonly description: string;

  /**
   * Whether `remoteUsername` may authenticate as `localUser`.
   */
  matches(remoteUsername: string, localUser: string): boolean;
}

/**
 * Remote and local names must be identical.
 */
export const exactMatch: IdentityBindingRule = {
  description: "exact",
  matches(remoteUsername: string, localUser: string): boolean {
    return remoteUsername === localUser;
  },
};

/**
 * Remote and local names must be equal ignoring case.
 */
export const caseInsensitiveMatch: IdentityBindingRule = {
  description: "case-insensitive",
  matches(remoteUsername: string, localUser: string): boolean {
    return remoteUsername.toLowerCase() === localUser.toLowerCase();
  },
};

/**
 * Remove an `@domain` suffix before comparing.
 *
 * With no `domains`, any suffix after the last `@` is removed. Otherwise
 * only the listed domains are (compared case-insensitively), and names
 * from other domains are compared unchanged.
 */
export function stripDomainSuffix(
  domains: readonly string[] = [],
  inner: IdentityBindingRule = exactMatch
): IdentityBindingRule {
  const suffixes = domains.map((d) => `@${d.replace(/^@/, "").toLowerCase()}`);

  const strip = (name: string): string => {
    if (suffixes.length === 0) {
      const at = name.lastIndexOf("@");
      return at > 0 ? name.slice(0, at) : name;
    }
    const lower = name.toLowerCase();
    const suffix = suffixes.find((s) => lower.endsWith(s) && lower.length > s.length);
    return suffix ? name.slice(0, name.length - suffix.length) : name;
  };

  return {
    description: `strip-domain(${domains.join(",") || "*"}) > ${inner.description}`,
    matches(remoteUsername: string, localUser: string): boolean {
      return inner.matches(strip(remoteUsername), localUser);
    },
  };
}

/**
 * Allow explicitly mapped local accounts in addition to `inner`.
 */
export function aliasMap(
  aliases: Readonly<Record<string, readonly string[]>>,
  inner: IdentityBindingRule = exactMatch
): IdentityBindingRule {
  const table = new Map(Object.entries(aliases));
  return {
    description: `alias(${table.size}) | ${inner.description}`,
    matches(remoteUsername: string, localUser: string): boolean {
      if (inner.matches(remoteUsername, localUser)) {
        return true;
      }
      return table.get(remoteUsername)?.includes(localUser) ?? false;
    },
  };
}

/**
 * Accept when any of `rules` accepts.
 */
export function anyOf(...rules: IdentityBindingRule[]): IdentityBindingRule {
  return {
    description: rules.map((r) => r.description).join(" | ") || "none",
    matches(remoteUsername: string, localUser: string): boolean {
      return rules.some((r) => r.matches(remoteUsername, localUser));
    },
  };
}

/**
 * Build the binding rule described by identity configuration.
 */
export function ruleFromIdentityConfig(identity: IdentityConfig): IdentityBindingRule {
  let rule = identity.caseInsensitive ? caseInsensitiveMatch : exactMatch;

  if (identity.stripDomains.length > 0) {
    rule = stripDomainSuffix(identity.stripDomains, rule);
  }

  if (Object.keys(identity.aliases).length > 0) {
    rule = aliasMap(identity.aliases, rule);
  }

  return rule;
}
