import { invalidInput, runtimeFailure, timedOut, type CommandError } from "../errors.js";
import { PromptDetector } from "../detect/prompt-detector.js";
import { pollUntil } from "../detect/poll.js";
import { ensureCommandAllowed } from "../session/lock-state.js";
import type { SessionKeyValueStore } from "../session/option-store.js";
import type { PaneSnapshot, TmuxGateway } from "../tmux/types.js";
import type { Clock } from "../util/clock.js";
import type { Logger } from "../util/file-logger.js";
import { MarkerDetector, type MarkerKind, type MarkerLine, type MarkerSighting } from "./markers.js";

export const MIN_TRANSFER_COLS = 40;
const PROMPT_CHECK_MS = 1_000;

export interface TransferContext {
  tmux: TmuxGateway;
  store: SessionKeyValueStore;
  clock: Clock;
  pollIntervalMs: number;
  logger: Logger;
  /** Progress lines shown under --verbose. */
  note: (message: string) => void;
}

export const waitForPrompt = async (
  ctx: TransferContext,
  session: string,
  timeoutMs = PROMPT_CHECK_MS
): Promise<PaneSnapshot> => {
  let last: PaneSnapshot | undefined;
  const outcome = await pollUntil(
    async () => {
      last = await ctx.tmux.snapshot(session);
      return last;
    },
    new PromptDetector(),
    { timeoutMs, intervalMs: ctx.pollIntervalMs, clock: ctx.clock }
  );
  if (outcome.status === "timeout" || !last) {
    throw invalidInput(`Session '${session}' is not at a prompt; transfers need an idle shell`);
  }
  return last;
};

/** Everything that must hold before the first keystroke of a transfer is sent. */
export const prepareTransfer = async (
  ctx: TransferContext,
  session: string,
  command: "upload" | "download"
): Promise<PaneSnapshot> => {
  if (!(await ctx.tmux.hasSession(session))) {
    throw runtimeFailure(`Session '${session}' does not exist`);
  }
  await ensureCommandAllowed(ctx.store, session, command);

  const snapshot = await ctx.tmux.snapshot(session);
  if (snapshot.mode === "alternate") {
    throw invalidInput(`Session '${session}' is in the alternate screen; ${command} needs a shell prompt`);
  }
  if (snapshot.cols < MIN_TRANSFER_COLS) {
    throw invalidInput(
      `Terminal too narrow for ${command}: ${snapshot.cols} columns, need at least ${MIN_TRANSFER_COLS}`
    );
  }
  return waitForPrompt(ctx, session);
};

export const typeLine = async (ctx: TransferContext, session: string, line: string): Promise<void> => {
  await ctx.tmux.sendText(session, line);
  await ctx.tmux.sendKeys(session, ["Enter"]);
};

// Leading space keeps the line out of shell history.
const CLEAR_SCREEN_LINE = " printf '\\033[H\\033[2J'";

/**
 * Wipes the helper command and marker lines once the helper has exited: the
 * shell clears the screen, then tmux drops the scrollback. A session that
 * does not come back to its prompt is left alone.
 */
export const restoreScreen = async (ctx: TransferContext, session: string): Promise<void> => {
  const promptBack = async (): Promise<boolean> => {
    const outcome = await pollUntil(() => ctx.tmux.snapshot(session), new PromptDetector(), {
      timeoutMs: PROMPT_CHECK_MS,
      intervalMs: ctx.pollIntervalMs,
      clock: ctx.clock
    });
    return outcome.status === "detected";
  };

  if (!(await promptBack())) {
    ctx.logger.error("[transfer] prompt did not return; screen left as is:", session);
    ctx.note("Screen not cleaned: the session did not return to its prompt");
    return;
  }
  await typeLine(ctx, session, CLEAR_SCREEN_LINE);
  if (!(await promptBack())) {
    ctx.logger.error("[transfer] prompt did not return after clearing:", session);
    return;
  }
  await ctx.tmux.clearHistory(session);
};

export const waitForMarker = async (
  ctx: TransferContext,
  session: string,
  tag: string,
  kinds: readonly MarkerKind[],
  timeoutMs: number,
  accept?: (marker: MarkerLine) => boolean
): Promise<MarkerSighting> => {
  const outcome = await pollUntil(
    () => ctx.tmux.snapshot(session),
    new MarkerDetector(tag, new Set(kinds), accept),
    { timeoutMs: Math.max(0, timeoutMs), intervalMs: ctx.pollIntervalMs, clock: ctx.clock }
  );
  if (outcome.status === "timeout") {
    throw timedOut(`Timeout waiting for remote helper (${kinds.join("/")})`);
  }
  return outcome.value;
};

/** Maps the helper's refusal markers onto error kinds. */
export const failureForMarker = (marker: MarkerLine, remotePath: string): CommandError => {
  switch (marker.kind) {
    case "EXISTS":
      return invalidInput(`Remote file already exists: ${remotePath} (use --force to overwrite)`);
    case "NOWRITE":
      return invalidInput(
        `Remote destination is not writable: ${remotePath}${marker.detail ? ` (${marker.detail})` : ""}`
      );
    case "NOFILE":
      return invalidInput(`Remote file not found: ${remotePath}`);
    case "NOPY":
      return runtimeFailure("Python 3 is not available in the session");
    case "HASH":
      return runtimeFailure(
        `Integrity check failed on the remote side${marker.detail ? `: ${marker.detail}` : ""}; nothing was written`
      );
    default:
      return runtimeFailure(`Remote helper failed: ${marker.detail || marker.kind}`);
  }
};
