/**
 * Client Authentication
 *
 * Applies the configured client authentication method to a form request.
 */

import type { ClientCredentials } from "../types";

/**
 * Headers sent with every form-encoded request.
 */
export function formHeaders(): Record<string, string> {
  return {
    "content-type": "application/x-www-form-urlencoded",
    accept: "application/json",
  };
}

/**
 * Add client authentication to a form body and its headers.
 *
 * `client_id` always travels in the body; the secret goes either in an
 * HTTP Basic header or in the body depending on `authMethod`.
 */
export function applyClientAuthentication(
  credentials: ClientCredentials,
  body: URLSearchParams,
  headers: Record<string, string>
): void {
  body.set("client_id", credentials.clientId);

  const secret = credentials.clientSecret;
  if (!secret || credentials.authMethod === "none") {
    return;
  }

  if (credentials.authMethod === "client_secret_basic") {
    // RFC 6749 Section 2.3.1: both parts are form-urlencoded before encoding
    const encoded = Buffer.from(
      `${encodeURIComponent(credentials.clientId)}:${encodeURIComponent(secret.expose())}`
    ).toString("base64");
    headers["authorization"] = `Basic ${encoded}`;
  } else {
    body.set("client_secret", secret.expose());
  }
}
