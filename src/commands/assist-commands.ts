import { invalidInput, runtimeFailure } from "../errors.js";
import { RequestBoard } from "../handoff/request-board.js";
import { RequestStore, type RequestRecord } from "../handoff/request-record.js";
import { isLocked, setLocked } from "../session/lock-state.js";
import { createCoordinator, requireSession, type CommandContext } from "./context.js";

export interface DoneArgs {
  session?: string;
  message?: string;
  positional?: string;
}

export interface AttachArgs {
  session?: string;
  readOnly: boolean;
}

const pendingSessions = async (ctx: CommandContext): Promise<string[]> => {
  const requests = new RequestStore(ctx.store);
  const pending: string[] = [];
  for (const session of await ctx.tmux.listSessions()) {
    const record = await requests.read(session.name);
    if (record?.status === "pending") {
      pending.push(session.name);
    }
  }
  return pending;
};

/**
 * Picks the session the human means when -s is left out: the one asking for
 * help, otherwise the only session there is.
 */
export const resolveHumanSession = async (
  ctx: CommandContext,
  session: string | undefined
): Promise<string> => {
  if (session !== undefined) {
    await requireSession(ctx, session);
    return session;
  }
  const pending = await pendingSessions(ctx);
  if (pending.length === 1) {
    return pending[0];
  }
  if (pending.length > 1) {
    throw invalidInput(`Several sessions have pending requests (${pending.join(", ")}); use -s`);
  }
  const sessions = await ctx.tmux.listSessions();
  if (sessions.length === 1) {
    return sessions[0].name;
  }
  if (sessions.length === 0) {
    throw runtimeFailure("No sessions");
  }
  throw invalidInput("Several sessions exist; use -s to pick one");
};

const describeRequest = (record: RequestRecord | null): string => {
  if (!record) {
    return "";
  }
  return record.status === "pending" ? ` [REQUEST: ${record.message}]` : " [DONE]";
};

export const listForHuman = async (ctx: CommandContext): Promise<void> => {
  const sessions = [...(await ctx.tmux.listSessions())].sort((a, b) => a.name.localeCompare(b.name));
  if (sessions.length === 0) {
    ctx.io.out("No sessions");
    return;
  }
  const requests = new RequestStore(ctx.store);
  for (const session of sessions) {
    const locked = await isLocked(ctx.store, session.name);
    const record = await requests.read(session.name);
    const attached = session.attachedClients > 0 ? ` (attached: ${session.attachedClients})` : "";
    ctx.io.out(`${session.name}${locked ? " [LOCKED]" : ""}${describeRequest(record)}${attached}`);
  }
};

export const done = async (ctx: CommandContext, args: DoneArgs): Promise<void> => {
  if (args.message !== undefined && args.positional !== undefined) {
    throw invalidInput("Give the response either with -m or as an argument, not both");
  }
  const session = await resolveHumanSession(ctx, args.session);
  const response = args.message ?? args.positional;
  const record = await createCoordinator(ctx).complete(session, response);
  if (!record) {
    ctx.io.out(`No pending request for session '${session}'`);
    return;
  }
  ctx.io.out(`Marked request done for session '${session}'`);
};

export const lock = async (ctx: CommandContext, session: string): Promise<void> => {
  await requireSession(ctx, session);
  const changed = await setLocked(ctx.store, session, true);
  ctx.io.out(changed ? `Locked session '${session}'` : `Session '${session}' is already locked`);
};

export const unlock = async (ctx: CommandContext, session: string): Promise<void> => {
  await requireSession(ctx, session);
  const changed = await setLocked(ctx.store, session, false);
  ctx.io.out(changed ? `Unlocked session '${session}'` : `Session '${session}' is not locked`);
};

export const detach = async (ctx: CommandContext, sessionArg: string | undefined): Promise<void> => {
  const session = await resolveHumanSession(ctx, sessionArg);
  const summary = (await ctx.tmux.listSessions()).find((candidate) => candidate.name === session);
  if (!summary || summary.attachedClients === 0) {
    ctx.io.out(`No clients attached to session '${session}'`);
    return;
  }
  await ctx.tmux.detachClients(session);
  ctx.io.out(`Detached ${summary.attachedClients} client(s) from session '${session}'`);
};

/** Leaving while the request is still pending tells a waiting agent the human is gone. */
export const attach = async (ctx: CommandContext, args: AttachArgs): Promise<void> => {
  const session = await resolveHumanSession(ctx, args.session);
  await ctx.tmux.attach(session, { readOnly: args.readOnly });
  if (!(await ctx.tmux.hasSession(session))) {
    return;
  }
  if (await createCoordinator(ctx).markDetachedIfPending(session)) {
    ctx.io.out(
      `Request for session '${session}' is still pending; run 'termhand-assist done' once it is handled`
    );
  }
};

/** Hands a live board to an interactive view; the view owns the terminal until the human quits. */
export const watch = async (
  ctx: CommandContext,
  view: (board: RequestBoard) => Promise<void>
): Promise<void> => {
  if (!ctx.io.stdinIsTTY) {
    throw invalidInput("watch needs an interactive terminal");
  }
  const board = new RequestBoard(ctx.tmux, ctx.store, createCoordinator(ctx), ctx.config.pollIntervalMs);
  board.on("error", (error: Error) => {
    ctx.logger.error("[watch] refresh failed:", error.message);
  });
  await view(board);
};
