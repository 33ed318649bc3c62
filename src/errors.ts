export type ErrorKind =
  | "invalid-input"
  | "runtime"
  | "timeout"
  | "human-detached"
  | "locked"
  | "missing-binary";

export const EXIT_CODES: Record<ErrorKind, number> = {
  runtime: 1,
  "invalid-input": 2,
  timeout: 3,
  "human-detached": 4,
  locked: 5,
  "missing-binary": 127
};

export class CommandError extends Error {
  public constructor(
    public readonly kind: ErrorKind,
    message: string
  ) {
    super(message);
    this.name = "CommandError";
  }

  public get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

export const invalidInput = (message: string): CommandError =>
  new CommandError("invalid-input", message);

export const runtimeFailure = (message: string): CommandError =>
  new CommandError("runtime", message);

export const timedOut = (message: string): CommandError => new CommandError("timeout", message);

export const humanDetached = (message: string): CommandError =>
  new CommandError("human-detached", message);

export const sessionLocked = (message: string): CommandError =>
  new CommandError("locked", message);

export const missingBinary = (message: string): CommandError =>
  new CommandError("missing-binary", message);

/**
 * Result of one command invocation. Commands throw {@link CommandError};
 * the CLI boundary folds that into an outcome and from there into an exit code.
 */
export type Outcome =
  | { ok: true; exitCode: number }
  | { ok: false; error: CommandError };

export const toCommandError = (error: unknown): CommandError => {
  if (error instanceof CommandError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return runtimeFailure(message);
};

export const exitCodeFor = (outcome: Outcome): number =>
  outcome.ok ? outcome.exitCode : outcome.error.exitCode;
