import { timedOut } from "../errors.js";
import { IdleDetector, validateIdleWait } from "../detect/idle-detector.js";
import { PatternDetector, validatePatterns } from "../detect/pattern-detector.js";
import { pollUntil } from "../detect/poll.js";
import { PromptDetector } from "../detect/prompt-detector.js";
import { formatSeconds } from "../util/clock.js";
import { guardSession, timeoutToMs, type CommandContext } from "./context.js";

export interface WaitArgs {
  session: string;
  timeout: number;
}

export interface WaitIdleArgs extends WaitArgs {
  idle: number;
}

export interface WaitForArgs extends WaitArgs {
  patterns: string[];
  ignoreCase: boolean;
  printMatch: boolean;
  context?: number;
}

export const waitForPrompt = async (ctx: CommandContext, args: WaitArgs): Promise<void> => {
  const timeoutMs = timeoutToMs(args.timeout);
  await guardSession(ctx, args.session, "wait");
  const outcome = await pollUntil(() => ctx.tmux.snapshot(args.session), new PromptDetector(), {
    timeoutMs,
    intervalMs: ctx.config.pollIntervalMs,
    clock: ctx.clock
  });
  if (outcome.status === "timeout") {
    throw timedOut(`Timeout: prompt not detected after ${formatSeconds(timeoutMs)}`);
  }
  ctx.io.out(`Prompt detected: ${outcome.value.line}`);
};

export const waitIdle = async (ctx: CommandContext, args: WaitIdleArgs): Promise<void> => {
  const timeoutMs = timeoutToMs(args.timeout);
  validateIdleWait(args.idle, args.timeout);
  await guardSession(ctx, args.session, "wait-idle");
  const outcome = await pollUntil(
    () => ctx.tmux.snapshot(args.session),
    new IdleDetector(Math.round(args.idle * 1000)),
    { timeoutMs, intervalMs: ctx.config.pollIntervalMs, clock: ctx.clock }
  );
  if (outcome.status === "timeout") {
    throw timedOut(`Timeout: output still changing after ${formatSeconds(timeoutMs)}`);
  }
  ctx.io.out(`Idle for ${args.idle.toFixed(1)}s`);
};

export const waitForPattern = async (ctx: CommandContext, args: WaitForArgs): Promise<void> => {
  const timeoutMs = timeoutToMs(args.timeout);
  const contextLines = args.context ?? 0;
  validatePatterns(args.patterns, contextLines);
  await guardSession(ctx, args.session, "wait-for");
  const outcome = await pollUntil(
    () => ctx.tmux.snapshot(args.session),
    new PatternDetector(args.patterns, { ignoreCase: args.ignoreCase, contextLines }),
    { timeoutMs, intervalMs: ctx.config.pollIntervalMs, clock: ctx.clock }
  );
  if (outcome.status === "timeout") {
    throw timedOut(`Timeout: pattern not detected after ${formatSeconds(timeoutMs)}`);
  }
  ctx.io.out(`Pattern detected: ${outcome.value.pattern}`);
  if (args.printMatch || args.context !== undefined) {
    for (const line of outcome.value.context) {
      ctx.io.out(line.trimEnd());
    }
  }
};
