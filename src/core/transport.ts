/**
 * HTTP Transport
 *
 * HTTP client interface and implementations for authorization server
 * requests. No retries happen at this layer.
 */

import { OAuth2Error, TransportError } from "../error";

/**
 * HTTP request definition.
 */
export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
}

/**
 * HTTP response definition.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP transport interface (for dependency injection).
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   *
   * Resolves with any HTTP status; rejects with a TransportError when the
   * exchange itself fails.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

type FetchFn = typeof globalThis.fetch;

/**
 * Default fetch-based HTTP transport.
 */
export class FetchHttpTransport implements HttpTransport {
  private defaultTimeout: number;
  private maxResponseSize: number;
  private fetchFn: FetchFn;

  constructor(options?: { timeout?: number; maxResponseSize?: number; fetch?: FetchFn }) {
    this.defaultTimeout = options?.timeout ?? 30000;
    this.maxResponseSize = options?.maxResponseSize ?? 1048576; // 1MB
    this.fetchFn = options?.fetch ?? globalThis.fetch;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        redirect: "manual", // Don't follow redirects for OAuth2
      });

      // Check for unexpected redirect
      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get("location");
        throw new TransportError(
          `Unexpected redirect to ${location ?? "unknown location"}`,
          "UnexpectedRedirect"
        );
      }

      // Read body with size limit
      const body = await this.readBody(response);

      // Convert headers to plain object
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      throw classifyFetchError(error, timeout);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readBody(response: Response): Promise<string> {
    const contentLength = response.headers.get("content-length");
    if (contentLength && parseInt(contentLength, 10) > this.maxResponseSize) {
      throw new TransportError(
        `Response too large: ${contentLength} bytes`,
        "ResponseTooLarge"
      );
    }

    const reader = response.body?.getReader();
    if (!reader) {
      return "";
    }

    const chunks: Uint8Array[] = [];
    let totalSize = 0;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalSize += value.length;
      if (totalSize > this.maxResponseSize) {
        await reader.cancel();
        throw new TransportError(
          `Response too large: ${totalSize} bytes`,
          "ResponseTooLarge"
        );
      }

      chunks.push(value);
    }

    return Buffer.concat(chunks).toString("utf8");
  }
}

/**
 * Map a fetch rejection to a TransportError.
 */
export function classifyFetchError(error: unknown, timeout: number): OAuth2Error {
  if (error instanceof OAuth2Error) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return new TransportError(`Request timeout after ${timeout}ms`, "Timeout", { cause: error });
    }

    // undici reports the socket-level reason on `cause`
    const detail = `${error.message} ${error.cause instanceof Error ? error.cause.message : ""}`.toLowerCase();
    if (detail.includes("enotfound") || detail.includes("dns")) {
      return new TransportError(`DNS resolution failed: ${error.message}`, "DnsResolutionFailed", { cause: error });
    }
    if (detail.includes("econnrefused") || detail.includes("econnreset")) {
      return new TransportError(`Connection failed: ${error.message}`, "ConnectionFailed", { cause: error });
    }
    if (detail.includes("certificate") || detail.includes("ssl") || detail.includes("tls")) {
      return new TransportError(`TLS error: ${error.message}`, "TlsError", { cause: error });
    }

    return new TransportError(error.message, "ConnectionFailed", { cause: error });
  }

  return new TransportError(String(error), "ConnectionFailed");
}

/**
 * Mock HTTP transport for testing.
 */
export class MockHttpTransport implements HttpTransport {
  private responses: Array<HttpResponse | Error> = [];
  private requestHistory: HttpRequest[] = [];
  private defaultResponse?: HttpResponse;

  /**
   * Queue a response to return.
   */
  queueResponse(response: HttpResponse): this {
    this.responses.push(response);
    return this;
  }

  /**
   * Set default response when queue is empty.
   */
  setDefaultResponse(response: HttpResponse): this {
    this.defaultResponse = response;
    return this;
  }

  /**
   * Queue a JSON response.
   */
  queueJsonResponse(status: number, body: unknown): this {
    return this.queueResponse(jsonResponse(status, body));
  }

  /**
   * Queue a response with a raw (possibly empty) body.
   */
  queueRawResponse(status: number, body: string): this {
    return this.queueResponse({
      status,
      statusText: "",
      headers: {},
      body,
    });
  }

  /**
   * Queue an OAuth error response.
   */
  queueErrorResponse(status: number, error: string, description?: string): this {
    return this.queueJsonResponse(status, {
      error,
      error_description: description,
    });
  }

  /**
   * Queue a transport-level failure.
   */
  queueFailure(error: Error): this {
    this.responses.push(error);
    return this;
  }

  /**
   * Get request history.
   */
  getRequests(): HttpRequest[] {
    return [...this.requestHistory];
  }

  /**
   * Get requests sent to a URL.
   */
  getRequestsTo(url: string): HttpRequest[] {
    return this.requestHistory.filter((r) => r.url === url);
  }

  /**
   * Get last request.
   */
  getLastRequest(): HttpRequest | undefined {
    return this.requestHistory[this.requestHistory.length - 1];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requestHistory.push(request);

    const next = this.responses.shift() ?? this.defaultResponse;
    if (!next) {
      throw new Error(`No mock response available for ${request.method} ${request.url}`);
    }
    if (next instanceof Error) {
      throw next;
    }

    return next;
  }
}

/**
 * Build a JSON HttpResponse.
 */
export function jsonResponse(status: number, body: unknown): HttpResponse {
  return {
    status,
    statusText: status === 200 ? "OK" : "Error",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

/**
 * Create production HTTP transport.
 */
export function createTransport(timeout?: number): HttpTransport {
  return new FetchHttpTransport({ timeout });
}

/**
 * Create mock HTTP transport for testing.
 */
export function createMockTransport(): MockHttpTransport {
  return new MockHttpTransport();
}
