import { invalidInput, runtimeFailure } from "../errors.js";
import { promptCandidate } from "../detect/prompt-detector.js";
import { killAllSessions } from "../session/bulk-guard.js";
import { ensureCommandAllowed, isLocked, setLocked } from "../session/lock-state.js";
import { parseEnvAssignments } from "../util/env.js";
import { isDirectory, isExecutable } from "../util/files.js";
import {
  createCoordinator,
  guardSession,
  requirePositiveInt,
  requireSession,
  type CommandContext
} from "./context.js";

export type Side = "agent" | "human";

export interface StartArgs {
  session: string;
  cols?: number;
  rows?: number;
  cwd?: string;
  env: string[];
  shell?: string;
  locked: boolean;
  /** Leave the size to tmux instead of the configured default. */
  noSize: boolean;
}

export interface KillArgs {
  session?: string;
  all: boolean;
  force: boolean;
}

export interface ResizeArgs {
  session: string;
  cols?: number;
  rows?: number;
}

// tmux itself rewrites these in session names.
export const normalizeSessionName = (name: string): string => name.replace(/[.:]/g, "_");

export const start = async (ctx: CommandContext, args: StartArgs): Promise<void> => {
  const session = normalizeSessionName(args.session.trim());
  if (session === "") {
    throw invalidInput("Session name must not be empty");
  }
  if (args.noSize && (args.cols !== undefined || args.rows !== undefined)) {
    throw invalidInput("--no-size cannot be combined with -x/--cols or -y/--rows");
  }
  const cols = requirePositiveInt(args.cols, "--cols");
  const rows = requirePositiveInt(args.rows, "--rows");
  if (args.cwd !== undefined && !(await isDirectory(args.cwd))) {
    throw invalidInput(`Working directory does not exist: ${args.cwd}`);
  }
  if (args.shell !== undefined && !(await isExecutable(args.shell))) {
    throw invalidInput(`Shell is not executable: ${args.shell}`);
  }
  const env = parseEnvAssignments(args.env);

  if (await ctx.tmux.hasSession(session)) {
    throw invalidInput(`Session '${session}' already exists`);
  }

  const size = args.noSize
    ? undefined
    : { cols: cols ?? ctx.config.defaultSize.cols, rows: rows ?? ctx.config.defaultSize.rows };
  await ctx.tmux.createSession({
    name: session,
    cols: size?.cols,
    rows: size?.rows,
    cwd: args.cwd,
    env,
    shell: args.shell
  });
  if (args.locked) {
    await setLocked(ctx.store, session, true);
  }
  ctx.logger.log("[start]", session, size ? `${size.cols}x${size.rows}` : "tmux default size");

  const sizeLabel = size ? ` (${size.cols}x${size.rows})` : "";
  ctx.io.out(`Created session '${session}'${sizeLabel}${args.locked ? " [LOCKED]" : ""}`);
};

export const kill = async (ctx: CommandContext, args: KillArgs, side: Side): Promise<void> => {
  if (args.all && args.session !== undefined) {
    throw invalidInput("Cannot use --all with --session");
  }
  if (!args.all && args.session === undefined) {
    throw invalidInput("Either --session or --all is required");
  }

  if (args.session === undefined) {
    const killed = await killAllSessions(
      ctx.tmux,
      ctx.store,
      { force: args.force, ignoreLocks: side === "human" },
      ctx.logger
    );
    if (killed.length === 0) {
      ctx.io.out("No sessions to kill");
      return;
    }
    for (const name of killed) {
      ctx.io.out(`Killed session '${name}'`);
    }
    return;
  }

  const session = args.session;
  await requireSession(ctx, session);
  // --force is the agent's cleanup path and also overrides the lock for one named session.
  if (side === "agent" && !args.force) {
    await ensureCommandAllowed(ctx.store, session, "kill");
  }
  const summary = (await ctx.tmux.listSessions()).find((candidate) => candidate.name === session);
  const attached = summary?.attachedClients ?? 0;
  if (attached > 0 && !args.force) {
    throw runtimeFailure(
      `Session '${session}' has ${attached} attached client(s); use --force to kill it anyway`
    );
  }
  await ctx.tmux.killSession(session);
  ctx.io.out(`Killed session '${session}'`);
};

export const list = async (ctx: CommandContext): Promise<void> => {
  const sessions = [...(await ctx.tmux.listSessions())].sort((a, b) => a.name.localeCompare(b.name));
  for (const session of sessions) {
    const locked = await isLocked(ctx.store, session.name);
    ctx.io.out(`${session.name}${locked ? " [LOCKED]" : ""}`);
  }
};

export const status = async (ctx: CommandContext, session: string): Promise<void> => {
  await requireSession(ctx, session);
  const snapshot = await ctx.tmux.snapshot(session);
  const pane = await ctx.tmux.describePane(session);
  const summary = (await ctx.tmux.listSessions()).find((candidate) => candidate.name === session);
  const locked = await isLocked(ctx.store, session);
  const request = await createCoordinator(ctx).status(session);

  const attached =
    snapshot.attachedClients > 0 ? `yes (${snapshot.attachedClients} client(s))` : "no";
  const requestLabel =
    request.state === "pending" ? `pending: ${request.record.message}` : request.state;

  ctx.io.out(`Session: ${session}`);
  ctx.io.out(`State: ${promptCandidate(snapshot) ? "at prompt" : "busy"}`);
  ctx.io.out(`Command: ${pane.currentCommand} (pid ${pane.pid})`);
  ctx.io.out(`Directory: ${pane.currentPath}`);
  ctx.io.out(`Size: ${snapshot.cols}x${snapshot.rows}`);
  ctx.io.out(`Cursor: ${snapshot.cursor.x},${snapshot.cursor.y}`);
  ctx.io.out(`Screen: ${snapshot.mode}`);
  ctx.io.out(`Attached: ${attached}`);
  ctx.io.out(`Locked: ${locked ? "yes" : "no"}`);
  ctx.io.out(`Logging: ${pane.piping ? "yes" : "no"}`);
  ctx.io.out(`Request: ${requestLabel}`);
  if (summary) {
    ctx.io.out(`Created: ${new Date(summary.createdAt * 1000).toISOString()}`);
  }
};

export const resize = async (ctx: CommandContext, args: ResizeArgs): Promise<void> => {
  if (args.cols === undefined && args.rows === undefined) {
    throw invalidInput("Must specify -x/--cols and/or -y/--rows");
  }
  const cols = requirePositiveInt(args.cols, "--cols");
  const rows = requirePositiveInt(args.rows, "--rows");
  await guardSession(ctx, args.session, "resize");
  await ctx.tmux.resizeWindow(args.session, cols, rows);
  const snapshot = await ctx.tmux.snapshot(args.session);
  ctx.io.out(`Resized session '${args.session}' to ${snapshot.cols}x${snapshot.rows}`);
};
