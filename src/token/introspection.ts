/**
 * Token Introspection
 *
 * RFC 7662 - OAuth 2.0 Token Introspection.
 */

import { z } from "zod";
import {
  DeviceAuthConfig,
  IntrospectionParams,
  IntrospectionResponse,
} from "../types";
import {
  OAuth2Error,
  TransportError,
  createErrorFromResponse,
  optionalMember,
  tryParseJson,
} from "../error";
import { HttpResponse, HttpTransport } from "../core/transport";
import { applyClientAuthentication, formHeaders } from "../core/client-auth";
import { Logger, noOpLogger } from "../telemetry/logging";

const introspectionSchema = z
  .object({
    active: z.boolean().default(false),
    scope: optionalMember(z.string()),
    client_id: optionalMember(z.string()),
    username: optionalMember(z.string()),
    token_type: optionalMember(z.string()),
    exp: optionalMember(z.number()),
    iat: optionalMember(z.number()),
    nbf: optionalMember(z.number()),
    sub: optionalMember(z.string()),
    aud: optionalMember(z.union([z.string(), z.array(z.string())])),
    iss: optionalMember(z.string()),
    jti: optionalMember(z.string()),
  })
  .passthrough();

const STANDARD_FIELDS = new Set([
  "active", "scope", "client_id", "username", "token_type",
  "exp", "iat", "nbf", "sub", "aud", "iss", "jti",
]);

/**
 * Token introspection interface (for dependency injection).
 */
export interface TokenIntrospection {
  /**
   * Introspect a token.
   */
  introspect(params: IntrospectionParams): Promise<IntrospectionResponse>;
}

/**
 * Token introspection implementation.
 */
export class TokenIntrospectionImpl implements TokenIntrospection {
  private config: DeviceAuthConfig;
  private transport: HttpTransport;
  private logger: Logger;

  constructor(config: DeviceAuthConfig, transport: HttpTransport, options?: { logger?: Logger }) {
    this.config = config;
    this.transport = transport;
    this.logger = (options?.logger ?? noOpLogger).child({ step: "introspection" });
  }

  async introspect(params: IntrospectionParams): Promise<IntrospectionResponse> {
    const body = new URLSearchParams();
    body.set("token", params.token);

    if (params.tokenTypeHint) {
      body.set("token_type_hint", params.tokenTypeHint);
    }

    const headers = formHeaders();
    applyClientAuthentication(this.config.credentials, body, headers);

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: "POST",
        url: this.config.provider.introspectionEndpoint,
        headers,
        body: body.toString(),
        timeout: this.config.requestTimeoutMs,
      });
    } catch (error) {
      if (error instanceof OAuth2Error) {
        throw error;
      }
      throw new TransportError("Introspection request failed", "ConnectionFailed", { cause: error });
    }

    if (response.status !== 200) {
      throw createErrorFromResponse(response.status, response.body);
    }

    const introspection = this.parseIntrospectionResponse(response.body);
    this.logger.debug("Introspection response received", {
      active: introspection.active,
      username: introspection.username,
      sub: introspection.sub,
      scope: introspection.scope,
    });
    return introspection;
  }

  private parseIntrospectionResponse(body: string): IntrospectionResponse {
    const parsed = introspectionSchema.safeParse(tryParseJson(body));
    if (!parsed.success) {
      throw new TransportError("Invalid introspection response", "InvalidResponse", {
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (!STANDARD_FIELDS.has(key)) {
        extra[key] = value;
      }
    }

    return {
      active: data.active,
      scope: data.scope,
      clientId: data.client_id,
      username: data.username,
      tokenType: data.token_type,
      exp: data.exp,
      iat: data.iat,
      nbf: data.nbf,
      sub: data.sub,
      aud: data.aud,
      iss: data.iss,
      jti: data.jti,
      extra: Object.keys(extra).length > 0 ? extra : undefined,
    };
  }
}
