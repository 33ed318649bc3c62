import { invalidInput } from "./errors.js";

export interface TerminalSize {
  cols: number;
  rows: number;
}

export interface RuntimeConfig {
  socketName?: string;
  socketPath?: string;
  tmuxBinary: string;
  tmuxTimeoutMs: number;
  /** Size given to `start` when the caller passes no -x/-y. */
  defaultSize: TerminalSize;
  pollIntervalMs: number;
  traceTmux: boolean;
  debugLog?: string;
}

export interface GlobalCliArgs {
  socketName?: string;
  socketPath?: string;
  debugLog?: string;
}

export const DEFAULT_SIZE: TerminalSize = { cols: 80, rows: 24 };
export const DEFAULT_POLL_INTERVAL_MS = 150;

const readPositiveInt = (
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number => {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw invalidInput(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
};

export const loadRuntimeConfig = (
  args: GlobalCliArgs,
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig => {
  const socketName = args.socketName ?? (env.TERMHAND_SOCKET_NAME || undefined);
  const socketPath = args.socketPath ?? (env.TERMHAND_SOCKET_PATH || undefined);
  if (socketName && socketPath) {
    throw invalidInput("--socket-name and --socket-path are mutually exclusive");
  }

  const pollIntervalMs = readPositiveInt(env, "TERMHAND_POLL_MS", DEFAULT_POLL_INTERVAL_MS);
  if (pollIntervalMs < 100 || pollIntervalMs > 250) {
    throw invalidInput("TERMHAND_POLL_MS must be between 100 and 250");
  }

  return {
    socketName,
    socketPath,
    tmuxBinary: env.TERMHAND_TMUX_BIN || "tmux",
    tmuxTimeoutMs: readPositiveInt(env, "TERMHAND_TMUX_TIMEOUT_MS", 5_000),
    defaultSize: {
      cols: readPositiveInt(env, "TERMHAND_DEFAULT_COLS", DEFAULT_SIZE.cols),
      rows: readPositiveInt(env, "TERMHAND_DEFAULT_ROWS", DEFAULT_SIZE.rows)
    },
    pollIntervalMs,
    traceTmux: env.TERMHAND_TRACE_TMUX === "1",
    debugLog: args.debugLog ?? (env.TERMHAND_DEBUG_LOG || undefined)
  };
};
