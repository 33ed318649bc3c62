#!/usr/bin/env node
import process from "node:process";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { run, sendKey, sendStdin, sendText } from "../commands/input-commands.js";
import { request, requestCancel, requestStatus, requestWait } from "../commands/request-commands.js";
import { capture, pipeLog, scroll, unpipe } from "../commands/screen-commands.js";
import { kill, list, resize, start, status } from "../commands/session-commands.js";
import {
  DEFAULT_TRANSFER_TIMEOUT_SECONDS,
  download,
  upload
} from "../commands/transfer-commands.js";
import { waitForPattern, waitForPrompt, waitIdle } from "../commands/wait-commands.js";
import { DEFAULT_IDLE_SECONDS } from "../detect/idle-detector.js";
import { processIO } from "../util/io.js";
import { expandCommandPrefix } from "./abbreviate.js";
import {
  createDispatcher,
  failHandler,
  reportUsageError,
  sessionOption,
  withGlobalOptions,
  withKillOptions,
  withStartOptions
} from "./shared.js";

const DEFAULT_WAIT_SECONDS = 10;

const AGENT_COMMANDS = [
  "start",
  "kill",
  "list",
  "status",
  "run",
  "send-text",
  "send-key",
  "send-stdin",
  "capture",
  "scroll",
  "resize",
  "pipe-log",
  "unpipe",
  "wait",
  "wait-idle",
  "wait-for",
  "request",
  "request-status",
  "request-cancel",
  "request-wait",
  "upload",
  "download"
] as const;

const timeoutOption = (fallback: number) =>
  ({
    alias: "t",
    type: "number",
    default: fallback,
    describe: "Timeout in seconds"
  }) as const;

const dispatch = createDispatcher("termhand");

const parseCliArgs = async (argv: string[]): Promise<void> => {
  await withGlobalOptions(yargs(argv))
    .scriptName("termhand")
    .usage("$0 <command> [options]\n\nDrive terminal programs inside tmux sessions.")
    .command(
      "start",
      "Create a detached session",
      (cmd) => withStartOptions(cmd),
      (args) =>
        dispatch(args, "start", (ctx) =>
          start(ctx, {
            session: args.session,
            cols: args.cols,
            rows: args.rows,
            cwd: args.cwd,
            env: args.env ?? [],
            shell: args.shell,
            locked: args.locked,
            noSize: !args.size
          })
        )
    )
    .command(
      "kill",
      "Kill one session or, after checking every one of them, all sessions",
      (cmd) => withKillOptions(cmd),
      (args) =>
        dispatch(args, "kill", (ctx) =>
          kill(ctx, { session: args.session, all: args.all, force: args.force }, "agent")
        )
    )
    .command("list", "List sessions", (cmd) => cmd, (args) => dispatch(args, "list", (ctx) => list(ctx)))
    .command(
      "status",
      "Show session details",
      (cmd) => cmd.option("session", sessionOption),
      (args) => dispatch(args, "status", (ctx) => status(ctx, args.session))
    )
    .command(
      "run <command>",
      "Type a command and press Enter",
      (cmd) =>
        cmd
          .positional("command", { type: "string", demandOption: true })
          .option("session", sessionOption)
          .option("wait", { alias: "w", type: "boolean", default: false, describe: "Wait for the prompt" })
          .option("timeout", timeoutOption(DEFAULT_WAIT_SECONDS)),
      (args) =>
        dispatch(args, "run", (ctx) =>
          run(ctx, {
            session: args.session,
            command: args.command,
            wait: args.wait,
            timeout: args.timeout
          })
        )
    )
    .command(
      "send-text <text>",
      "Type literal text",
      (cmd) =>
        cmd
          .positional("text", { type: "string", demandOption: true })
          .option("session", sessionOption)
          .option("enter", { alias: "e", type: "boolean", default: false, describe: "Press Enter after" }),
      (args) =>
        dispatch(args, "send-text", (ctx) =>
          sendText(ctx, { session: args.session, text: args.text, enter: args.enter })
        )
    )
    .command(
      "send-key <keys..>",
      "Send named keys such as Enter, C-c or Up",
      (cmd) =>
        cmd
          .positional("keys", { type: "string", array: true, demandOption: true })
          .option("session", sessionOption),
      (args) => dispatch(args, "send-key", (ctx) => sendKey(ctx, { session: args.session, keys: args.keys }))
    )
    .command(
      "send-stdin",
      "Type piped stdin line by line",
      (cmd) => cmd.option("session", sessionOption),
      (args) => dispatch(args, "send-stdin", (ctx) => sendStdin(ctx, args.session))
    )
    .command(
      "capture",
      "Print the screen",
      (cmd) =>
        cmd
          .option("session", sessionOption)
          .option("scrollback", { alias: "n", type: "number", describe: "Include N lines of history" })
          .option("tail", { type: "number", describe: "Only the last N lines" })
          .option("no-trim", { type: "boolean", default: false, describe: "Keep trailing whitespace" })
          .option("raw", { alias: "r", type: "boolean", default: false, describe: "Keep escape sequences" })
          .option("force", { type: "boolean", default: false, describe: "Allow scrollback in the alternate screen" }),
      (args) =>
        dispatch(args, "capture", (ctx) =>
          capture(ctx, {
            session: args.session,
            scrollback: args.scrollback,
            tail: args.tail,
            noTrim: args.noTrim,
            raw: args.raw,
            force: args.force
          })
        )
    )
    .command(
      "scroll <lines>",
      "Scroll the view; negative scrolls up",
      (cmd) =>
        cmd
          .positional("lines", { type: "number", demandOption: true })
          .option("session", sessionOption),
      (args) => dispatch(args, "scroll", (ctx) => scroll(ctx, args.session, args.lines))
    )
    .command(
      "resize",
      "Resize the session window",
      (cmd) =>
        cmd
          .option("session", sessionOption)
          .option("cols", { alias: "x", type: "number", describe: "Width in columns" })
          .option("rows", { alias: "y", type: "number", describe: "Height in rows" }),
      (args) =>
        dispatch(args, "resize", (ctx) =>
          resize(ctx, { session: args.session, cols: args.cols, rows: args.rows })
        )
    )
    .command(
      "pipe-log <file>",
      "Append the session's output to a file",
      (cmd) =>
        cmd
          .positional("file", { type: "string", demandOption: true })
          .option("session", sessionOption)
          .option("raw", { alias: "r", type: "boolean", default: false, describe: "Keep escape sequences" }),
      (args) =>
        dispatch(args, "pipe-log", (ctx) =>
          pipeLog(ctx, { session: args.session, file: args.file, raw: args.raw })
        )
    )
    .command(
      "unpipe",
      "Stop pipe-log",
      (cmd) => cmd.option("session", sessionOption),
      (args) => dispatch(args, "unpipe", (ctx) => unpipe(ctx, args.session))
    )
    .command(
      "wait",
      "Wait until the session shows a stable prompt",
      (cmd) => cmd.option("session", sessionOption).option("timeout", timeoutOption(DEFAULT_WAIT_SECONDS)),
      (args) =>
        dispatch(args, "wait", (ctx) => waitForPrompt(ctx, { session: args.session, timeout: args.timeout }))
    )
    .command(
      "wait-idle",
      "Wait until the screen stops changing",
      (cmd) =>
        cmd
          .option("session", sessionOption)
          .option("idle", {
            alias: "i",
            type: "number",
            default: DEFAULT_IDLE_SECONDS,
            describe: "Seconds without change"
          })
          .option("timeout", timeoutOption(DEFAULT_WAIT_SECONDS)),
      (args) =>
        dispatch(args, "wait-idle", (ctx) =>
          waitIdle(ctx, { session: args.session, idle: args.idle, timeout: args.timeout })
        )
    )
    .command(
      "wait-for <patterns..>",
      "Wait until any of the strings appears on screen",
      (cmd) =>
        cmd
          .positional("patterns", { type: "string", array: true, demandOption: true })
          .option("session", sessionOption)
          .option("ignore-case", { alias: "i", type: "boolean", default: false, describe: "Case-insensitive" })
          .option("print-match", { alias: "p", type: "boolean", default: false, describe: "Print the matching line" })
          .option("context", { alias: "C", type: "number", describe: "Lines of context around the match" })
          .option("timeout", timeoutOption(DEFAULT_WAIT_SECONDS)),
      (args) =>
        dispatch(args, "wait-for", (ctx) =>
          waitForPattern(ctx, {
            session: args.session,
            patterns: args.patterns,
            ignoreCase: args.ignoreCase,
            printMatch: args.printMatch,
            context: args.context,
            timeout: args.timeout
          })
        )
    )
    .command(
      "request",
      "Ask a human for help",
      (cmd) =>
        cmd
          .option("session", sessionOption)
          .option("message", { alias: "m", type: "string", describe: "What the human should do" }),
      (args) => dispatch(args, "request", (ctx) => request(ctx, args.session, args.message))
    )
    .command(
      "request-status",
      "Exit 0 if a request is pending",
      (cmd) => cmd.option("session", sessionOption),
      (args) => dispatch(args, "request-status", (ctx) => requestStatus(ctx, args.session))
    )
    .command(
      "request-cancel",
      "Withdraw the pending request",
      (cmd) => cmd.option("session", sessionOption),
      (args) => dispatch(args, "request-cancel", (ctx) => requestCancel(ctx, args.session))
    )
    .command(
      "request-wait",
      "Block until the human marks the request done",
      (cmd) => cmd.option("session", sessionOption).option("timeout", timeoutOption(300)),
      (args) => dispatch(args, "request-wait", (ctx) => requestWait(ctx, args.session, args.timeout))
    )
    .command(
      "upload <local> [remote]",
      "Copy a local file (or - for stdin) into the session's machine",
      (cmd) =>
        cmd
          .positional("local", { type: "string", demandOption: true })
          .positional("remote", { type: "string" })
          .option("session", sessionOption)
          .option("force", { alias: "f", type: "boolean", default: false, describe: "Overwrite" })
          .option("verbose", { alias: "v", type: "boolean", default: false, describe: "Report progress" })
          .option("timeout", timeoutOption(DEFAULT_TRANSFER_TIMEOUT_SECONDS)),
      (args) =>
        dispatch(args, "upload", (ctx) =>
          upload(ctx, {
            session: args.session,
            local: args.local,
            remote: args.remote,
            force: args.force,
            verbose: args.verbose,
            timeout: args.timeout
          })
        )
    )
    .command(
      "download <remote> [local]",
      "Copy a file from the session's machine (local - for stdout)",
      (cmd) =>
        cmd
          .positional("remote", { type: "string", demandOption: true })
          .positional("local", { type: "string" })
          .option("session", sessionOption)
          .option("force", { alias: "f", type: "boolean", default: false, describe: "Overwrite" })
          .option("verbose", { alias: "v", type: "boolean", default: false, describe: "Report progress" })
          .option("timeout", timeoutOption(DEFAULT_TRANSFER_TIMEOUT_SECONDS)),
      (args) =>
        dispatch(args, "download", (ctx) =>
          download(ctx, {
            session: args.session,
            remote: args.remote,
            local: args.local,
            force: args.force,
            verbose: args.verbose,
            timeout: args.timeout
          })
        )
    )
    .demandCommand(1, "A command is required")
    .strict()
    .fail(failHandler)
    .help()
    .parseAsync();
};

const main = async (): Promise<void> => {
  try {
    await parseCliArgs(expandCommandPrefix(hideBin(process.argv), AGENT_COMMANDS));
  } catch (error) {
    process.exitCode = reportUsageError(error, processIO);
  }
};

void main();
