/**
 * Tests for logging.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  ConsoleLogger,
  InMemoryLogger,
  createFileLogger,
  createPinoLogger,
  noOpLogger,
  parseLogLevel,
  type LogLevelSetting,
} from "../telemetry/logging";
import { SecretString } from "../types";

function capture(level: LogLevelSetting): { lines: Record<string, unknown>[]; logger: ReturnType<typeof createPinoLogger> } {
  const lines: Record<string, unknown>[] = [];
  const logger = createPinoLogger({
    level,
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  });
  return { lines, logger };
}

describe("parseLogLevel", () => {
  it("should accept known levels in any case", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("WARN")).toBe("warn");
    expect(parseLogLevel("none")).toBe("none");
  });

  it("should fall back to info", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});

describe("PinoLogger", () => {
  it("should write the message and context", () => {
    const { lines, logger } = capture("info");

    logger.info("Trying to authenticate user: alice", { user: "alice" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "Trying to authenticate user: alice",
      user: "alice",
    });
  });

  it("should filter below the configured level", () => {
    const { lines, logger } = capture("warn");

    logger.info("hidden");
    logger.warn("shown");

    expect(lines.map((line) => line.msg)).toEqual(["shown"]);
  });

  it("should write nothing at level none", () => {
    const { lines, logger } = capture("none");

    logger.error("hidden");

    expect(lines).toEqual([]);
  });

  it("should redact secret members", () => {
    const { lines, logger } = capture("info");

    logger.info("Token response", { token: "mocking_access_token", body: { client_secret: "test-secret" } });

    expect(lines[0]).toMatchObject({ token: "[REDACTED]", body: { client_secret: "[REDACTED]" } });
  });

  it("should redact secret strings", () => {
    const { lines, logger } = capture("info");

    logger.info("Token response", { accessToken: new SecretString("mocking_access_token") });

    expect(lines[0]).toMatchObject({ accessToken: "[REDACTED]" });
  });

  it("should carry child bindings", () => {
    const { lines, logger } = capture("debug");

    logger.child({ step: "polling" }).debug("Polling token endpoint", { attempt: 1 });

    expect(lines[0]).toMatchObject({ level: 20, step: "polling", attempt: 1 });
  });
});

describe("createFileLogger", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("should append JSON lines to the file, creating its directory", async () => {
    dir = await mkdtemp(join(tmpdir(), "pam-oauth2-device-"));
    const path = join(dir, "logs", "auth.log");

    const logger = createFileLogger({ path, level: "info" });
    logger.info("Trying to authenticate user: alice");
    logger.debug("hidden");

    const lines = (await readFile(path, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      name: "pam-oauth2-device",
      msg: "Trying to authenticate user: alice",
    });
  });
});

describe("InMemoryLogger", () => {
  it("should share entries with its children", () => {
    const logger = new InMemoryLogger({ user: "alice" });

    logger.info("parent");
    logger.child({ step: "polling" }).warn("child");

    expect(logger.getMessages()).toEqual(["parent", "child"]);
    expect(logger.getMessages("warn")).toEqual(["child"]);
    expect(logger.getLogs()[1].context).toEqual({ user: "alice", step: "polling" });
  });

  it("should clear entries", () => {
    const logger = new InMemoryLogger();

    logger.info("one");
    logger.clear();

    expect(logger.getLogs()).toEqual([]);
  });
});

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should print level, message and context", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    new ConsoleLogger().info("hi", { a: 1 });

    expect(info).toHaveBeenCalledWith('[INFO] hi {"a":1}');
  });

  it("should skip levels below the minimum", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    new ConsoleLogger({ minLevel: "info" }).debug("hidden");

    expect(debug).not.toHaveBeenCalled();
  });
});

describe("noOpLogger", () => {
  it("should return itself as child", () => {
    expect(noOpLogger.child({ step: "x" })).toBe(noOpLogger);
  });
});
