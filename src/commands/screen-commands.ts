import path from "node:path";
import { invalidInput } from "../errors.js";
import { isDirectory } from "../util/files.js";
import { shellQuote } from "../util/shell-quote.js";
import { guardSession, requirePositiveInt, type CommandContext } from "./context.js";

export interface CaptureArgs {
  session: string;
  scrollback?: number;
  tail?: number;
  noTrim: boolean;
  raw: boolean;
  force: boolean;
}

export interface PipeLogArgs {
  session: string;
  file: string;
  raw: boolean;
}

const STRIP_ESCAPES =
  "perl -pe 'BEGIN { $| = 1 } s/\\e\\[[0-9;?]*[A-Za-z]//g; s/\\e\\][^\\a]*\\a//g; s/\\r//g'";

const trimCapture = (lines: string[]): string[] => {
  const trimmed = lines.map((line) => line.trimEnd());
  while (trimmed.length > 0 && trimmed[trimmed.length - 1] === "") {
    trimmed.pop();
  }
  return trimmed;
};

export const capture = async (ctx: CommandContext, args: CaptureArgs): Promise<void> => {
  if (args.scrollback !== undefined && args.tail !== undefined) {
    throw invalidInput("--scrollback and --tail are mutually exclusive");
  }
  const scrollback = requirePositiveInt(args.scrollback, "--scrollback");
  const tail = requirePositiveInt(args.tail, "--tail");
  await guardSession(ctx, args.session, "capture");

  if (scrollback !== undefined && !args.force) {
    const snapshot = await ctx.tmux.snapshot(args.session);
    if (snapshot.mode === "alternate") {
      throw invalidInput(
        `Session '${args.session}' is in the alternate screen; scrollback belongs to the screen underneath (use --force)`
      );
    }
  }

  const raw = await ctx.tmux.capturePane(args.session, {
    scrollback,
    escapes: args.raw,
    joinWrapped: scrollback !== undefined
  });
  let lines = raw.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  if (!args.noTrim) {
    lines = trimCapture(lines);
  }
  const limit = scrollback ?? tail;
  if (limit !== undefined) {
    lines = lines.slice(-limit);
  }
  for (const line of lines) {
    ctx.io.out(line);
  }
};

export const scroll = async (ctx: CommandContext, session: string, lines: number): Promise<void> => {
  if (!Number.isInteger(lines) || lines === 0) {
    throw invalidInput("Scroll amount must be a non-zero integer");
  }
  await guardSession(ctx, session, "scroll");
  await ctx.tmux.scroll(session, lines);
  ctx.io.out(`Scrolled ${lines < 0 ? "up" : "down"} ${Math.abs(lines)} lines`);
};

export const pipeLog = async (ctx: CommandContext, args: PipeLogArgs): Promise<void> => {
  const file = path.resolve(args.file);
  if (!(await isDirectory(path.dirname(file)))) {
    throw invalidInput(`Parent directory does not exist: ${path.dirname(file)}`);
  }
  await guardSession(ctx, args.session, "pipe-log");
  const pane = await ctx.tmux.describePane(args.session);
  if (pane.piping) {
    throw invalidInput(`Session '${args.session}' is already piping output; run unpipe first`);
  }
  const sink = `>> ${shellQuote(file)}`;
  await ctx.tmux.pipePane(args.session, args.raw ? `cat ${sink}` : `${STRIP_ESCAPES} ${sink}`);
  ctx.io.out(`Piping output to ${file} (${args.raw ? "raw" : "clean"})`);
};

export const unpipe = async (ctx: CommandContext, session: string): Promise<void> => {
  await guardSession(ctx, session, "unpipe");
  await ctx.tmux.stopPipe(session);
  ctx.io.out(`Stopped piping output for session '${session}'`);
};
