/**
 * Tests for the authentication adapter.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { authenticate, AuthenticateOptions } from "../adapter/authenticate";
import { MockHttpTransport } from "../core/transport";
import { MockClock } from "../core/clock";
import { InMemoryLogger } from "../telemetry/logging";
import { MockConversation } from "../prompt/conversation";
import { ConfigurationError } from "../error";
import { DeviceAuthConfigBuilder } from "../client/builder";
import { DEVICE_CODE_BODY, ENDPOINTS, PROMPT_TEXT, TOKEN_BODY, testConfig } from "./fixtures";

const NOW_MS = 1_700_000_000_000;

describe("authenticate", () => {
  let transport: MockHttpTransport;
  let clock: MockClock;
  let logger: InMemoryLogger;
  let conversation: MockConversation;

  beforeEach(() => {
    transport = new MockHttpTransport();
    clock = new MockClock(NOW_MS);
    logger = new InMemoryLogger();
    conversation = new MockConversation();
  });

  function run(
    user: string,
    configure?: (builder: DeviceAuthConfigBuilder) => void,
    overrides?: Partial<AuthenticateOptions>
  ) {
    return authenticate({
      user,
      config: testConfig(configure),
      conversation,
      logger,
      transport,
      clock,
      ...overrides,
    });
  }

  function queueGrant(introspection: Record<string, unknown>): void {
    transport
      .queueJsonResponse(200, DEVICE_CODE_BODY)
      .queueJsonResponse(200, TOKEN_BODY)
      .queueJsonResponse(200, introspection);
  }

  function errorLines(): string[] {
    return logger.getMessages("error");
  }

  describe("success", () => {
    it("should accept a matching remote user", async () => {
      queueGrant({ active: true, username: "alice" });

      const outcome = await run("alice");

      expect(outcome).toEqual({ decision: "success", remoteUsername: "alice" });
      expect(logger.getMessages("info")).toEqual([
        "Trying to authenticate user: alice",
        "Authentication successful for remote user: alice -> local user: alice",
      ]);
    });

    it("should call the device, token and introspection endpoints in order", async () => {
      queueGrant({ active: true, username: "alice" });

      await run("alice");

      expect(transport.getRequests().map((r) => r.url)).toEqual([
        ENDPOINTS.deviceAuthorizationEndpoint,
        ENDPOINTS.tokenEndpoint,
        ENDPOINTS.introspectionEndpoint,
      ]);
      expect(transport.getLastRequest()?.body).toBe(
        "token=mocking_access_token&token_type_hint=access_token&client_id=test-client&client_secret=test-secret"
      );
      expect(clock.getSleeps()).toEqual([5000]);
    });

    it("should show the prompt once", async () => {
      queueGrant({ active: true, username: "alice" });

      await run("alice");

      expect(conversation.getPrompts()).toEqual([PROMPT_TEXT]);
    });

    it("should include a QR code when enabled", async () => {
      queueGrant({ active: true, username: "alice" });
      const qrRenderer = vi.fn(async (data: string) => `QR(${data})`);

      await run("alice", (b) => b.qrEnabled(), { qrRenderer });

      expect(qrRenderer).toHaveBeenCalledWith("https://idp.test/device?user_code=ABCD-EFGH");
      expect(conversation.getPrompts()[0]).toContain("\n\nQR(https://idp.test/device?user_code=ABCD-EFGH)\n\n");
      expect(logger.getMessages("debug")).toContain("Generate QR code...");
    });

    it("should load configuration through a loader", async () => {
      queueGrant({ active: true, username: "alice" });

      const outcome = await run("alice", undefined, { config: async () => testConfig() });

      expect(outcome.decision).toBe("success");
    });

    it("should keep the access token out of the log", async () => {
      queueGrant({ active: true, username: "alice" });

      await run("alice");

      const entry = logger.getLogs().find((l) => l.message === "Token response");
      expect(JSON.stringify(entry?.context)).toBe(
        '{"tokenType":"bearer","expiresIn":86400,"accessToken":"[REDACTED]","polls":1}'
      );
    });
  });

  describe("validation failures", () => {
    it("should refuse a different remote user", async () => {
      queueGrant({ active: true, username: "bob" });

      const outcome = await run("alice");

      expect(outcome.decision).toBe("auth_err");
      expect(outcome.remoteUsername).toBe("bob");
      expect(outcome.failure?.code).toBe("Validation.IdentityMismatch");
      expect(logger.getMessages("warn")).toEqual(["Login failed for user: alice"]);
      expect(logger.getMessages("info")).toEqual(["Trying to authenticate user: alice"]);
    });

    it("should refuse an inactive token", async () => {
      queueGrant({ active: false });

      const outcome = await run("alice");

      expect(outcome.decision).toBe("auth_err");
      expect(outcome.failure?.code).toBe("Validation.InactiveToken");
    });
  });

  describe("protocol failures", () => {
    it("should report a denied authorization", async () => {
      transport.queueJsonResponse(200, DEVICE_CODE_BODY).queueErrorResponse(403, "access_denied");

      const outcome = await run("alice");

      expect(outcome.decision).toBe("auth_err");
      expect(errorLines()).toEqual([
        "Failed to receive user token\n    caused by: Server returned error response: access_denied",
      ]);
      expect(transport.getRequestsTo(ENDPOINTS.introspectionEndpoint)).toHaveLength(0);
      expect(logger.getMessages("warn")).toEqual([]);
    });

    it("should report an empty token endpoint response", async () => {
      transport.queueJsonResponse(200, DEVICE_CODE_BODY).queueRawResponse(101, "");

      const outcome = await run("alice");

      expect(outcome.decision).toBe("auth_err");
      expect(errorLines()).toEqual([
        "Failed to receive user token\n    caused by: Other error: Server returned empty error response",
      ]);
    });

    it("should stop when the device code request fails", async () => {
      transport.queueRawResponse(500, "");

      const outcome = await run("alice");

      expect(outcome.decision).toBe("auth_err");
      expect(errorLines()).toEqual([
        "Failed to receive device code response\n    caused by: Other error: Server returned empty error response",
      ]);
      expect(conversation.getPrompts()).toEqual([]);
    });

    it("should report a polling timeout", async () => {
      transport.queueJsonResponse(200, DEVICE_CODE_BODY);

      const outcome = await run("alice", (b) => b.pollingTimeout(4));

      expect(outcome.decision).toBe("auth_err");
      expect(outcome.failure?.code).toBe("Polling.TimedOut");
      expect(clock.getSleeps()).toEqual([4000]);
      expect(transport.getRequestsTo(ENDPOINTS.tokenEndpoint)).toHaveLength(0);
    });

    it("should report an introspection failure", async () => {
      transport
        .queueJsonResponse(200, DEVICE_CODE_BODY)
        .queueJsonResponse(200, TOKEN_BODY)
        .queueErrorResponse(401, "invalid_client");

      const outcome = await run("alice");

      expect(outcome.decision).toBe("auth_err");
      expect(errorLines()).toEqual([
        "Failed to introspect user token\n    caused by: Server returned error response: invalid_client",
      ]);
    });
  });

  describe("system failures", () => {
    it("should report a configuration that cannot be loaded", async () => {
      const config = async () => {
        throw new ConfigurationError("Cannot read config file /nope", "FileUnreadable");
      };

      const outcome = await run("alice", undefined, { config });

      expect(outcome.decision).toBe("system_err");
      expect(errorLines()).toEqual(["Failed to parse config file\n    caused by: Cannot read config file /nope"]);
      expect(transport.getRequests()).toEqual([]);
    });

    it("should wrap loader failures that are not configuration errors", async () => {
      const config = async () => {
        throw new Error("disk on fire");
      };

      const outcome = await run("alice", undefined, { config });

      expect(outcome.failure).toBeInstanceOf(ConfigurationError);
      expect(errorLines()).toEqual([
        "Failed to parse config file\n    caused by: Configuration could not be loaded\n    caused by: disk on fire",
      ]);
    });

    it("should report a conversation failure", async () => {
      transport.queueJsonResponse(200, DEVICE_CODE_BODY);
      conversation.failWith(new Error("conversation closed"));

      const outcome = await run("alice");

      expect(outcome.decision).toBe("system_err");
      expect(errorLines()).toEqual([
        "Failed to prompt user\n    caused by: Unexpected failure\n    caused by: conversation closed",
      ]);
      expect(transport.getRequestsTo(ENDPOINTS.tokenEndpoint)).toHaveLength(0);
    });
  });
});
