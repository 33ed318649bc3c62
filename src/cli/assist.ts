#!/usr/bin/env node
import process from "node:process";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { attach, detach, done, listForHuman, lock, unlock, watch } from "../commands/assist-commands.js";
import { kill, start } from "../commands/session-commands.js";
import { runRequestTui } from "../tui/request-tui.js";
import { processIO } from "../util/io.js";
import { expandCommandPrefix } from "./abbreviate.js";
import {
  createDispatcher,
  failHandler,
  optionalSessionOption,
  reportUsageError,
  sessionOption,
  withGlobalOptions,
  withKillOptions,
  withStartOptions
} from "./shared.js";

const ASSIST_COMMANDS = [
  "list",
  "attach",
  "detach",
  "done",
  "lock",
  "unlock",
  "start",
  "kill",
  "watch"
] as const;

const dispatch = createDispatcher("termhand-assist");

const parseCliArgs = async (argv: string[]): Promise<void> => {
  await withGlobalOptions(yargs(argv))
    .scriptName("termhand-assist")
    .usage("$0 <command> [options]\n\nAnswer help requests and take over sessions.")
    .command("list", "List sessions with their locks and requests", (cmd) => cmd, (args) =>
      dispatch(args, "list", (ctx) => listForHuman(ctx))
    )
    .command(
      "attach",
      "Attach to a session",
      (cmd) =>
        cmd
          .option("session", optionalSessionOption)
          .option("read-only", { alias: "r", type: "boolean", default: false, describe: "Watch without typing" }),
      (args) =>
        dispatch(args, "attach", (ctx) => attach(ctx, { session: args.session, readOnly: args.readOnly }))
    )
    .command(
      "detach",
      "Detach every client from a session",
      (cmd) => cmd.option("session", optionalSessionOption),
      (args) => dispatch(args, "detach", (ctx) => detach(ctx, args.session))
    )
    .command(
      "done [response]",
      "Mark the pending request as handled",
      (cmd) =>
        cmd
          .positional("response", { type: "string", describe: "Reply for the agent" })
          .option("session", optionalSessionOption)
          .option("message", { alias: "m", type: "string", describe: "Reply for the agent" }),
      (args) =>
        dispatch(args, "done", (ctx) =>
          done(ctx, { session: args.session, message: args.message, positional: args.response })
        )
    )
    .command(
      "lock",
      "Reserve a session for human use",
      (cmd) => cmd.option("session", sessionOption),
      (args) => dispatch(args, "lock", (ctx) => lock(ctx, args.session))
    )
    .command(
      "unlock",
      "Hand a session back to the agent",
      (cmd) => cmd.option("session", sessionOption),
      (args) => dispatch(args, "unlock", (ctx) => unlock(ctx, args.session))
    )
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
      "Kill sessions, locked ones included",
      (cmd) => withKillOptions(cmd),
      (args) =>
        dispatch(args, "kill", (ctx) =>
          kill(ctx, { session: args.session, all: args.all, force: args.force }, "human")
        )
    )
    .command("watch", "Interactive board of sessions and requests", (cmd) => cmd, (args) =>
      dispatch(args, "watch", (ctx) => watch(ctx, runRequestTui))
    )
    .demandCommand(1, "A command is required")
    .strict()
    .fail(failHandler)
    .help()
    .parseAsync();
};

const main = async (): Promise<void> => {
  try {
    await parseCliArgs(expandCommandPrefix(hideBin(process.argv), ASSIST_COMMANDS));
  } catch (error) {
    process.exitCode = reportUsageError(error, processIO);
  }
};

void main();
