import type { CommandResult } from "../commands/context.js";
import { exitCodeFor, toCommandError, type Outcome } from "../errors.js";
import type { CommandIO } from "../util/io.js";

/** The one place where thrown errors become outcomes. */
export const runCommand = async (handler: () => Promise<CommandResult>): Promise<Outcome> => {
  try {
    const exitCode = await handler();
    return { ok: true, exitCode: exitCode ?? 0 };
  } catch (error) {
    return { ok: false, error: toCommandError(error) };
  }
};

export const reportOutcome = (outcome: Outcome, io: CommandIO): number => {
  if (!outcome.ok) {
    io.err(`Error: ${outcome.error.message}`);
  }
  return exitCodeFor(outcome);
};
