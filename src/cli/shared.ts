import type { Argv } from "yargs";
import type { CommandContext, CommandResult } from "../commands/context.js";
import { loadRuntimeConfig, type GlobalCliArgs } from "../config.js";
import { CommandError, EXIT_CODES, invalidInput } from "../errors.js";
import { TmuxOptionStore } from "../session/option-store.js";
import { TmuxCliExecutor } from "../tmux/cli-executor.js";
import { systemClock } from "../util/clock.js";
import { createLogger, type Logger } from "../util/file-logger.js";
import { processIO, type CommandIO } from "../util/io.js";
import { reportOutcome, runCommand } from "./run-command.js";

export const sessionOption = {
  alias: "s",
  type: "string",
  demandOption: true,
  describe: "Session name"
} as const;

export const optionalSessionOption = {
  alias: "s",
  type: "string",
  describe: "Session name (defaults to the session asking for help)"
} as const;

export const withGlobalOptions = <T>(argv: Argv<T>) =>
  argv
    .option("socket-name", {
      alias: "L",
      type: "string",
      describe: "tmux socket name (tmux -L)"
    })
    .option("socket-path", {
      alias: "S",
      type: "string",
      describe: "tmux socket path (tmux -S)"
    })
    .option("debug-log", {
      type: "string",
      describe: "Append debug logs to a file"
    });

export const withStartOptions = <T>(argv: Argv<T>) =>
  argv
    .option("session", sessionOption)
    .option("cols", { alias: "x", type: "number", describe: "Width in columns" })
    .option("rows", { alias: "y", type: "number", describe: "Height in rows" })
    .option("cwd", { alias: "c", type: "string", describe: "Working directory" })
    .option("env", {
      alias: "e",
      type: "string",
      array: true,
      describe: "Environment entry KEY=VALUE (repeatable)"
    })
    .option("shell", { type: "string", describe: "Shell to run instead of the default" })
    .option("locked", { alias: "l", type: "boolean", default: false, describe: "Lock for human use" })
    .option("size", {
      type: "boolean",
      default: true,
      describe: "Apply the default size; --no-size lets tmux choose"
    });

export const withKillOptions = <T>(argv: Argv<T>) =>
  argv
    .option("session", { alias: "s", type: "string", describe: "Session name" })
    .option("all", { alias: "a", type: "boolean", default: false, describe: "Kill every session" })
    .option("force", { alias: "f", type: "boolean", default: false, describe: "Kill even if attached" });

export const buildCommandContext = (
  args: GlobalCliArgs,
  scope: string,
  io: CommandIO = processIO
): CommandContext => {
  const config = loadRuntimeConfig(args);
  const logger = createLogger(config.debugLog, scope);
  const tmux = new TmuxCliExecutor({
    socketName: config.socketName,
    socketPath: config.socketPath,
    tmuxBinary: config.tmuxBinary,
    timeoutMs: config.tmuxTimeoutMs,
    traceTmux: config.traceTmux,
    logger
  });
  return {
    tmux,
    store: new TmuxOptionStore(tmux),
    clock: systemClock,
    config,
    io,
    logger
  };
};

/** Runs one command handler and records its exit code on the process. */
export const createDispatcher = (scope: string, io: CommandIO = processIO) => {
  return async (
    args: GlobalCliArgs,
    command: string,
    handler: (ctx: CommandContext) => Promise<CommandResult>
  ): Promise<void> => {
    const state: { logger?: Logger } = {};
    const outcome = await runCommand(async () => {
      const ctx = buildCommandContext(args, scope, io);
      state.logger = ctx.logger;
      ctx.logger.log("[command]", command);
      return handler(ctx);
    });
    if (!outcome.ok) {
      state.logger?.error(`[${command}] ${outcome.error.kind}:`, outcome.error.message);
    }
    process.exitCode = reportOutcome(outcome, io);
  };
};

export const failHandler = (message: string | undefined, error: Error | undefined): never => {
  throw error ?? invalidInput(message ?? "Invalid arguments");
};

/** Errors that escape the parser are argument errors unless they say otherwise. */
export const reportUsageError = (error: unknown, io: CommandIO = processIO): number => {
  if (error instanceof CommandError) {
    io.err(`Error: ${error.message}`);
    return error.exitCode;
  }
  io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
  return EXIT_CODES["invalid-input"];
};
