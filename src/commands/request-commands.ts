import { DEFAULT_REQUEST_MESSAGE } from "../handoff/coordinator.js";
import { formatSeconds } from "../util/clock.js";
import {
  createCoordinator,
  guardSession,
  timeoutToMs,
  type CommandContext,
  type CommandResult
} from "./context.js";

export const request = async (
  ctx: CommandContext,
  session: string,
  message: string | undefined
): Promise<void> => {
  await guardSession(ctx, session, "request");
  const text = message?.trim() || DEFAULT_REQUEST_MESSAGE;
  await createCoordinator(ctx).create(session, text);
  ctx.io.out(`Request created for session '${session}': ${text}`);
};

/** Exit 0 only while a request is pending, so shells can branch on it. */
export const requestStatus = async (ctx: CommandContext, session: string): Promise<CommandResult> => {
  await guardSession(ctx, session, "request-status");
  const state = await createCoordinator(ctx).status(session);
  switch (state.state) {
    case "pending":
      ctx.io.out(`pending: ${state.record.message}`);
      return 0;
    case "completed":
      ctx.io.out("completed");
      return 1;
    case "none":
      ctx.io.out("none");
      return 1;
  }
};

export const requestCancel = async (ctx: CommandContext, session: string): Promise<void> => {
  await guardSession(ctx, session, "request-cancel");
  await createCoordinator(ctx).cancel(session);
  ctx.io.out(`Request cancelled for session '${session}'`);
};

export const requestWait = async (
  ctx: CommandContext,
  session: string,
  timeout: number
): Promise<void> => {
  const timeoutMs = timeoutToMs(timeout);
  await guardSession(ctx, session, "request-wait");
  const result = await createCoordinator(ctx).wait(session, timeoutMs);
  ctx.io.out(`Request completed (${formatSeconds(result.elapsedMs)})`);
  if (result.response !== undefined && result.response !== "") {
    ctx.io.out(`Response: ${result.response}`);
  }
};
