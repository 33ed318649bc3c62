import type { RuntimeConfig } from "../config.js";
import { invalidInput, runtimeFailure } from "../errors.js";
import { HandoffCoordinator } from "../handoff/coordinator.js";
import { ensureCommandAllowed } from "../session/lock-state.js";
import type { SessionKeyValueStore } from "../session/option-store.js";
import type { TmuxGateway } from "../tmux/types.js";
import type { TransferContext } from "../transfer/session.js";
import type { Clock } from "../util/clock.js";
import type { Logger } from "../util/file-logger.js";
import type { CommandIO } from "../util/io.js";

export interface CommandContext {
  tmux: TmuxGateway;
  store: SessionKeyValueStore;
  clock: Clock;
  config: RuntimeConfig;
  io: CommandIO;
  logger: Logger;
}

/** A command's own exit code; undefined means success. */
export type CommandResult = number | void;

export const requireSession = async (ctx: CommandContext, session: string): Promise<void> => {
  if (session === "") {
    throw invalidInput("Session name must not be empty");
  }
  if (!(await ctx.tmux.hasSession(session))) {
    throw runtimeFailure(`Session '${session}' does not exist`);
  }
};

/** Existence first, then the lock, both before the command touches the pane. */
export const guardSession = async (
  ctx: CommandContext,
  session: string,
  command: string
): Promise<void> => {
  await requireSession(ctx, session);
  await ensureCommandAllowed(ctx.store, session, command);
};

export const timeoutToMs = (seconds: number, flag = "Timeout"): number => {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw invalidInput(`${flag} must be non-negative, got ${seconds}`);
  }
  return Math.round(seconds * 1000);
};

export const requirePositiveInt = (value: number | undefined, flag: string): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw invalidInput(`${flag} must be a positive integer, got ${value}`);
  }
  return value;
};

export const createCoordinator = (ctx: CommandContext): HandoffCoordinator =>
  new HandoffCoordinator({
    tmux: ctx.tmux,
    store: ctx.store,
    clock: ctx.clock,
    pollIntervalMs: ctx.config.pollIntervalMs,
    logger: ctx.logger
  });

export const createTransferContext = (ctx: CommandContext, verbose: boolean): TransferContext => ({
  tmux: ctx.tmux,
  store: ctx.store,
  clock: ctx.clock,
  pollIntervalMs: ctx.config.pollIntervalMs,
  logger: ctx.logger,
  note: (message) => {
    ctx.logger.log("[transfer]", message);
    if (verbose) {
      ctx.io.err(message);
    }
  }
});
