/**
 * OAuth2 Error Mapping
 *
 * Decode HTTP error responses into the error taxonomy.
 */

import { z } from "zod";
import { OAuth2Error, OtherError, ProtocolError } from "./types";

/**
 * OAuth2 error response from provider.
 */
export interface OAuth2ErrorResponse {
  error: string;
  error_description?: string;
  error_uri?: string;
  /** RFC 8628 servers may advertise a new interval alongside `slow_down` */
  interval?: number;
}

/**
 * Optional response member; JSON `null` decodes the same as an absent member.
 */
export function optionalMember<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

const errorResponseSchema = z.object({
  error: z.string().min(1),
  error_description: optionalMember(z.string()),
  error_uri: optionalMember(z.string()),
  // An unusable interval decodes as absent
  interval: optionalMember(z.number().positive()).catch(undefined),
});

/**
 * Parse JSON without throwing.
 */
export function tryParseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Parse error from HTTP response body.
 */
export function parseErrorResponse(body: string): OAuth2ErrorResponse | null {
  const result = errorResponseSchema.safeParse(tryParseJson(body));
  return result.success ? result.data : null;
}

/**
 * Build a ProtocolError from a decoded error body.
 */
export function toProtocolError(status: number, response: OAuth2ErrorResponse): ProtocolError {
  return new ProtocolError(status, response.error, {
    errorDescription: response.error_description,
    errorUri: response.error_uri,
  });
}

/**
 * Create error from a non-success HTTP response.
 *
 * A decodable OAuth error body yields a ProtocolError; anything else
 * (empty body, HTML, JSON without `error`) yields an OtherError.
 */
export function createErrorFromResponse(status: number, body: string): ProtocolError | OtherError {
  const errorResponse = parseErrorResponse(body);

  if (errorResponse) {
    return toProtocolError(status, errorResponse);
  }

  if (body.trim().length === 0) {
    return new OtherError(status, "Server returned empty error response");
  }

  return new OtherError(status, `Server returned unparseable error response (HTTP ${status})`);
}

/**
 * Render an error and its `cause` chain for the operator log.
 *
 * @example
 * formatErrorChain("Failed to receive user token", err)
 * // "Failed to receive user token\n    caused by: Server returned error response: access_denied"
 */
export function formatErrorChain(context: string, error: unknown): string {
  const lines = [context];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      lines.push(`    caused by: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(`    caused by: ${String(current)}`);
      current = undefined;
    }
  }

  return lines.join("\n");
}

/**
 * Wrap an unknown thrown value, keeping OAuth2Errors as they are.
 */
export function asOAuth2Error(
  error: unknown,
  wrap: (cause: unknown) => OAuth2Error
): OAuth2Error {
  return error instanceof OAuth2Error ? error : wrap(error);
}
