/**
 * Tests for the command line entry point.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  CliOptions,
  DEFAULT_LOG_PATH,
  EXIT_AUTH_ERROR,
  EXIT_SUCCESS,
  EXIT_SYSTEM_ERROR,
  parsePamArgs,
  runCli,
} from "../cli";
import { MockHttpTransport } from "../core/transport";
import { MockClock } from "../core/clock";
import { InMemoryLogger } from "../telemetry/logging";
import { MockConversation } from "../prompt/conversation";
import { DEVICE_CODE_BODY, ENDPOINTS, TOKEN_BODY } from "./fixtures";

const CONFIG_FILE = {
  client_id: "test-client",
  client_secret: "test-secret",
  oauth_device_url: ENDPOINTS.deviceAuthorizationEndpoint,
  oauth_token_url: ENDPOINTS.tokenEndpoint,
  oauth_token_introspect_url: ENDPOINTS.introspectionEndpoint,
};

describe("parsePamArgs", () => {
  it("should split key=value arguments at the first equals sign", () => {
    const settings = parsePamArgs(["config=/etc/a.json", "log_level=debug", "opt=a=b", "flag"]);

    expect([...settings]).toEqual([
      ["config", "/etc/a.json"],
      ["log_level", "debug"],
      ["opt", "a=b"],
      ["flag", ""],
    ]);
  });

  it("should keep the last value of a repeated key", () => {
    expect(parsePamArgs(["logs=/a", "logs=/b"]).get("logs")).toBe("/b");
  });
});

describe("runCli", () => {
  let dir: string;
  let transport: MockHttpTransport;
  let logger: InMemoryLogger;
  let conversation: MockConversation;
  let out: string[];
  let err: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pam-oauth2-device-"));
    transport = new MockHttpTransport();
    logger = new InMemoryLogger();
    conversation = new MockConversation();
    out = [];
    err = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function options(env: NodeJS.ProcessEnv, overrides?: Partial<CliOptions>): CliOptions {
    return {
      env,
      logger,
      transport,
      conversation,
      clock: new MockClock(1_700_000_000_000),
      output: {
        writeOut: (str) => out.push(str),
        writeErr: (str) => err.push(str),
      },
      ...overrides,
    };
  }

  async function writeConfig(contents: object = CONFIG_FILE): Promise<string> {
    const path = join(dir, "config.json");
    await writeFile(path, JSON.stringify(contents));
    return path;
  }

  it("should log to the default path unless told otherwise", () => {
    expect(DEFAULT_LOG_PATH).toBe("/tmp/pam_oauth2_device.log");
  });

  it("should authenticate the PAM user", async () => {
    const path = await writeConfig();
    transport
      .queueJsonResponse(200, DEVICE_CODE_BODY)
      .queueJsonResponse(200, TOKEN_BODY)
      .queueJsonResponse(200, { active: true, username: "alice" });

    const code = await runCli([`config=${path}`], options({ PAM_TYPE: "auth", PAM_USER: "alice" }));

    expect(code).toBe(EXIT_SUCCESS);
    expect(out).toEqual([]);
    expect(logger.getMessages("info")).toEqual([
      "Trying to authenticate user: alice",
      "Authentication successful for remote user: alice -> local user: alice",
    ]);
  });

  it("should prefer --user and --config over PAM settings", async () => {
    const path = await writeConfig();
    transport
      .queueJsonResponse(200, DEVICE_CODE_BODY)
      .queueJsonResponse(200, TOKEN_BODY)
      .queueJsonResponse(200, { active: true, username: "bob" });

    const code = await runCli(
      ["--user", "bob", "--config", path, "config=/nonexistent/config.json"],
      options({ PAM_USER: "alice" })
    );

    expect(code).toBe(EXIT_SUCCESS);
  });

  it("should exit with an authentication error for another remote user", async () => {
    const path = await writeConfig();
    transport
      .queueJsonResponse(200, DEVICE_CODE_BODY)
      .queueJsonResponse(200, TOKEN_BODY)
      .queueJsonResponse(200, { active: true, username: "bob" });

    const code = await runCli([`config=${path}`], options({ PAM_USER: "alice" }));

    expect(code).toBe(EXIT_AUTH_ERROR);
    expect(logger.getMessages("warn")).toEqual(["Login failed for user: alice"]);
    expect(out).toEqual(["Authentication failed.\n"]);
  });

  it("should exit with a system error for a missing configuration file", async () => {
    const path = join(dir, "missing.json");

    const code = await runCli([`config=${path}`], options({ PAM_USER: "alice" }));

    expect(code).toBe(EXIT_SYSTEM_ERROR);
    expect(logger.getMessages("error")[0]).toMatch(
      /^Failed to parse config file\n {4}caused by: Cannot read config file /
    );
    expect(transport.getRequests()).toEqual([]);
    expect(out).toEqual([
      "Authentication is not configured correctly. Please contact your administrator.\n",
    ]);
  });

  it("should succeed without checks outside the auth stage", async () => {
    const code = await runCli([], options({ PAM_TYPE: "account", PAM_USER: "alice" }));

    expect(code).toBe(EXIT_SUCCESS);
    expect(logger.getLogs()).toEqual([]);
  });

  it("should exit with a system error without a user", async () => {
    const code = await runCli([], options({}));

    expect(code).toBe(EXIT_SYSTEM_ERROR);
    expect(logger.getMessages("error")).toEqual(["No user to authenticate, set PAM_USER or --user"]);
  });

  it("should exit with a system error for an unknown option", async () => {
    const code = await runCli(["--bogus"], options({ PAM_USER: "alice" }));

    expect(code).toBe(EXIT_SYSTEM_ERROR);
    expect(err.join("")).toContain("unknown option '--bogus'");
  });

  it("should print help and exit successfully", async () => {
    const code = await runCli(["--help"], options({}));

    expect(code).toBe(EXIT_SUCCESS);
    expect(out.join("")).toContain("Usage: pam-oauth2-device [options] [settings...]");
  });

  it("should write the log file named by the logs setting", async () => {
    const logPath = join(dir, "logs", "auth.log");
    const configPath = join(dir, "missing.json");

    const code = await runCli(
      [`config=${configPath}`, `logs=${logPath}`, "log_level=warn"],
      options({ PAM_USER: "alice" }, { logger: undefined })
    );

    expect(code).toBe(EXIT_SYSTEM_ERROR);
    const lines = (await readFile(logPath, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 50, name: "pam-oauth2-device" });
  });
});
