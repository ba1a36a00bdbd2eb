/**
 * Configuration File
 *
 * Loads the JSON configuration read by the PAM entry point.
 *
 * @example
 * {
 *   "client_id": "pam-login",
 *   "client_secret": "test-secret",
 *   "scope": "openid profile",
 *   "oauth_device_url": "https://idp.example.com/oauth2/device",
 *   "oauth_token_url": "https://idp.example.com/oauth2/token",
 *   "oauth_token_introspect_url": "https://idp.example.com/oauth2/introspect",
 *   "qr_enabled": true
 * }
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DeviceAuthConfig } from "../types";
import { ConfigurationError, OAuth2Error } from "../error";
import { DeviceAuthConfigBuilder } from "../client/builder";

/**
 * Location read when no path is given.
 */
export const DEFAULT_CONFIG_PATH = "/etc/pam_oauth2_device/config.json";

const identitySchema = z
  .object({
    claim: z.enum(["username", "sub", "username_or_sub"]).optional(),
    required_audience: z.string().min(1).optional(),
    required_scopes: z.array(z.string().min(1)).optional(),
    strip_domains: z.array(z.string().min(1)).optional(),
    aliases: z.record(z.array(z.string().min(1))).optional(),
    case_insensitive: z.boolean().optional(),
  })
  .strict();

/**
 * Schema of the configuration file.
 */
export const configFileSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().optional(),
    client_auth_method: z.enum(["client_secret_basic", "client_secret_post", "none"]).optional(),
    scope: z.union([z.string(), z.array(z.string().min(1))]).optional(),
    oauth_device_url: z.string(),
    oauth_token_url: z.string(),
    oauth_token_introspect_url: z.string(),
    /** Polling timeout in seconds */
    timeout: z.number().optional(),
    request_timeout_ms: z.number().optional(),
    default_interval: z.number().optional(),
    slow_down_increment: z.number().optional(),
    device_code_lifetime: z.number().optional(),
    qr_enabled: z.boolean().optional(),
    identity: identitySchema.optional(),
  })
  .strict();

/**
 * Decoded configuration file.
 */
export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Convert a decoded configuration file to client configuration.
 */
export function toDeviceAuthConfig(file: ConfigFile): DeviceAuthConfig {
  const builder = new DeviceAuthConfigBuilder()
    .provider({
      deviceAuthorizationEndpoint: file.oauth_device_url,
      tokenEndpoint: file.oauth_token_url,
      introspectionEndpoint: file.oauth_token_introspect_url,
    })
    .clientId(file.client_id);

  if (file.client_secret !== undefined) builder.clientSecret(file.client_secret);
  if (file.client_auth_method !== undefined) builder.authMethod(file.client_auth_method);
  if (file.scope !== undefined) {
    builder.scopes(typeof file.scope === "string" ? file.scope.split(/\s+/).filter(Boolean) : file.scope);
  }
  if (file.timeout !== undefined) builder.pollingTimeout(file.timeout);
  if (file.request_timeout_ms !== undefined) builder.requestTimeout(file.request_timeout_ms);
  if (file.default_interval !== undefined) builder.defaultInterval(file.default_interval);
  if (file.slow_down_increment !== undefined) builder.slowDownIncrement(file.slow_down_increment);
  if (file.device_code_lifetime !== undefined) {
    builder.defaultDeviceCodeLifetime(file.device_code_lifetime);
  }
  if (file.qr_enabled !== undefined) builder.qrEnabled(file.qr_enabled);

  const identity = file.identity;
  if (identity) {
    if (identity.claim !== undefined) builder.identityClaim(identity.claim);
    if (identity.required_audience !== undefined) builder.requiredAudience(identity.required_audience);
    if (identity.required_scopes !== undefined) builder.requiredScopes(identity.required_scopes);
    if (identity.strip_domains !== undefined) builder.stripDomains(identity.strip_domains);
    if (identity.case_insensitive !== undefined) builder.caseInsensitive(identity.case_insensitive);
    for (const [remote, locals] of Object.entries(identity.aliases ?? {})) {
      builder.alias(remote, locals);
    }
  }

  return builder.build();
}

/**
 * Parse configuration file contents. `path` is used in error messages only.
 */
export function parseConfigFile(contents: string, path: string): DeviceAuthConfig {
  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, "InvalidConfig", {
      cause: error,
    });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    const message = issue ? issue.message : "invalid value";
    throw new ConfigurationError(`Invalid config file ${path}: ${where}${message}`, "InvalidConfig", {
      cause: parsed.error,
    });
  }

  try {
    return toDeviceAuthConfig(parsed.data);
  } catch (error) {
    if (error instanceof OAuth2Error) {
      throw new ConfigurationError(`Invalid config file ${path}: ${error.message}`, "InvalidConfig", {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Read and parse a configuration file.
 */
export async function loadConfigFile(path: string = DEFAULT_CONFIG_PATH): Promise<DeviceAuthConfig> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}`, "FileUnreadable", { cause: error });
  }
  return parseConfigFile(contents, path);
}
