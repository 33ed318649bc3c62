import { invalidInput, timedOut } from "../errors.js";
import { pollUntil } from "../detect/poll.js";
import { PromptDetector } from "../detect/prompt-detector.js";
import { formatSeconds } from "../util/clock.js";
import { guardSession, timeoutToMs, type CommandContext } from "./context.js";

export interface RunArgs {
  session: string;
  command: string;
  wait: boolean;
  timeout: number;
}

export interface SendTextArgs {
  session: string;
  text: string;
  enter: boolean;
}

export interface SendKeyArgs {
  session: string;
  keys: string[];
}

export const run = async (ctx: CommandContext, args: RunArgs): Promise<void> => {
  const timeoutMs = timeoutToMs(args.timeout);
  await guardSession(ctx, args.session, "run");
  await ctx.tmux.sendText(args.session, args.command);
  await ctx.tmux.sendKeys(args.session, ["Enter"]);
  if (!args.wait) {
    return;
  }
  const outcome = await pollUntil(() => ctx.tmux.snapshot(args.session), new PromptDetector(), {
    timeoutMs,
    intervalMs: ctx.config.pollIntervalMs,
    clock: ctx.clock
  });
  if (outcome.status === "timeout") {
    throw timedOut(`Timeout: prompt not detected after ${formatSeconds(timeoutMs)}`);
  }
};

export const sendText = async (ctx: CommandContext, args: SendTextArgs): Promise<void> => {
  await guardSession(ctx, args.session, "send-text");
  await ctx.tmux.sendText(args.session, args.text);
  if (args.enter) {
    await ctx.tmux.sendKeys(args.session, ["Enter"]);
  }
};

export const sendKey = async (ctx: CommandContext, args: SendKeyArgs): Promise<void> => {
  if (args.keys.length === 0) {
    throw invalidInput("At least one key is required");
  }
  await guardSession(ctx, args.session, "send-key");
  await ctx.tmux.sendKeys(args.session, args.keys);
};

/** Each line of piped stdin is typed and followed by Enter. */
export const sendStdin = async (ctx: CommandContext, session: string): Promise<void> => {
  if (ctx.io.stdinIsTTY) {
    throw invalidInput("stdin is a terminal; pipe the content into send-stdin");
  }
  await guardSession(ctx, session, "send-stdin");
  const data = await ctx.io.readStdin();
  const lines = data.toString("utf8").split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  for (const line of lines) {
    await ctx.tmux.sendText(session, line.replace(/\r$/, ""));
    await ctx.tmux.sendKeys(session, ["Enter"]);
  }
  ctx.io.out(
    `Sent ${lines.length} ${lines.length === 1 ? "line" : "lines"} (${data.length} bytes) to session '${session}'`
  );
};
