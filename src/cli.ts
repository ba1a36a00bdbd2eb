/**
 * Command Line
 *
 * Entry point for `pam_exec.so`:
 *
 *   auth required pam_exec.so stdout /usr/local/bin/pam-oauth2-device config=/etc/pam_oauth2_device/config.json
 *
 * Settings come from flags or from PAM module style `key=value` arguments,
 * flags taking precedence.
 */

import { Command, CommanderError } from "commander";
import { formatErrorChain, getUserMessage } from "./error";
import { HttpTransport } from "./core/transport";
import { Clock } from "./core/clock";
import { Logger, createFileLogger, parseLogLevel } from "./telemetry/logging";
import { DEFAULT_CONFIG_PATH, loadConfigFile } from "./config/file";
import { Conversation, createTerminalConversation } from "./prompt/conversation";
import { QrRenderer } from "./prompt/user-prompt";
import { AuthenticationDecision, authenticate } from "./adapter/authenticate";

/**
 * Log file used when none is configured.
 */
export const DEFAULT_LOG_PATH = "/tmp/pam_oauth2_device.log";

export const EXIT_SUCCESS = 0;
export const EXIT_AUTH_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;

const EXIT_CODES: Record<AuthenticationDecision, number> = {
  success: EXIT_SUCCESS,
  auth_err: EXIT_AUTH_ERROR,
  system_err: EXIT_SYSTEM_ERROR,
};

type CliFlags = {
  config?: string;
  logs?: string;
  logLevel?: string;
  user?: string;
};

/**
 * Collaborators replaced in tests.
 */
export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  conversation?: Conversation;
  logger?: Logger;
  transport?: HttpTransport;
  clock?: Clock;
  qrRenderer?: QrRenderer;
  output?: {
    writeOut(str: string): void;
    writeErr(str: string): void;
  };
}

/**
 * Split `key=value` arguments. A bare `key` maps to an empty string.
 */
export function parsePamArgs(args: readonly string[]): Map<string, string> {
  const settings = new Map<string, string>();
  for (const arg of args) {
    const at = arg.indexOf("=");
    if (at < 0) {
      settings.set(arg, "");
    } else {
      settings.set(arg.slice(0, at), arg.slice(at + 1));
    }
  }
  return settings;
}

function createProgram(): Command {
  return new Command()
    .name("pam-oauth2-device")
    .description("Authenticate a local user with the OAuth 2.0 device authorization grant")
    .argument("[settings...]", "PAM module style key=value settings (config, logs, log_level)")
    .option("-c, --config <path>", "configuration file")
    .option("-l, --logs <path>", "log file")
    .option("--log-level <level>", "trace, debug, info, warn, error or none")
    .option("-u, --user <name>", "local user, defaults to PAM_USER")
    .exitOverride();
}

/**
 * Run the command line and resolve with the process exit code.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const writeOut = options.output?.writeOut ?? ((str: string) => process.stdout.write(str));
  const writeErr = options.output?.writeErr ?? ((str: string) => process.stderr.write(str));

  const program = createProgram();
  if (options.output) {
    program.configureOutput(options.output);
  }

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_SYSTEM_ERROR;
    }
    throw error;
  }

  // setcred and acct_mgmt have nothing to check
  if (env.PAM_TYPE !== undefined && env.PAM_TYPE !== "auth") {
    return EXIT_SUCCESS;
  }

  const flags = program.opts<CliFlags>();
  const settings = parsePamArgs(program.args);
  const configPath = flags.config ?? settings.get("config") ?? DEFAULT_CONFIG_PATH;
  const logPath = flags.logs ?? settings.get("logs") ?? DEFAULT_LOG_PATH;
  const level = parseLogLevel(flags.logLevel ?? settings.get("log_level"));

  let logger: Logger;
  if (options.logger) {
    logger = options.logger;
  } else {
    try {
      logger = createFileLogger({ path: logPath, level });
    } catch (error) {
      writeErr(`${formatErrorChain("Failed to initialize logging", error)}\n`);
      return EXIT_SYSTEM_ERROR;
    }
  }

  const user = flags.user ?? env.PAM_USER;
  if (!user) {
    logger.error("No user to authenticate, set PAM_USER or --user");
    return EXIT_SYSTEM_ERROR;
  }

  const outcome = await authenticate({
    user,
    config: () => loadConfigFile(configPath),
    conversation: options.conversation ?? createTerminalConversation(),
    logger,
    transport: options.transport,
    clock: options.clock,
    qrRenderer: options.qrRenderer,
  });

  // pam_exec relays stdout to the person logging in; details stay in the log
  if (outcome.failure) {
    writeOut(`${getUserMessage(outcome.failure)}\n`);
  }

  return EXIT_CODES[outcome.decision];
}
