import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";
import { CommandError, missingBinary, runtimeFailure } from "../errors.js";
import { withoutTmuxEnv } from "../util/env.js";
import type { Logger } from "../util/file-logger.js";
import { parsePaneDetails, parsePaneHeader, parseScreenRows, parseSessions } from "./parser.js";
import type {
  AttachOptions,
  CaptureOptions,
  CreateSessionSpec,
  PaneDetails,
  PaneSnapshot,
  SessionSummary,
  TmuxGateway
} from "./types.js";

const execFileAsync = promisify(execFile);

const SESSION_FMT =
  "#{session_name}\t#{session_attached}\t#{session_created}\t#{window_width}\t#{window_height}";
const PANE_HEADER_FMT =
  "#{cursor_x}\t#{cursor_y}\t#{alternate_on}\t#{pane_width}\t#{pane_height}\t#{session_attached}";
const PANE_DETAILS_FMT = "#{pane_pid}\t#{pane_current_command}\t#{pane_pipe}\t#{pane_current_path}";

interface TmuxCliExecutorOptions {
  socketName?: string;
  socketPath?: string;
  tmuxBinary?: string;
  timeoutMs?: number;
  traceTmux?: boolean;
  logger?: Logger;
}

const isNoServerRunningError = (message: string): boolean =>
  /no server running|failed to connect to server|error connecting to .*no such file or directory/i.test(
    message
  );

const isMissingBinaryError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

// `=name` matches a session exactly; a bare name would also prefix-match.
const sessionTarget = (name: string): string => `=${name}`;
const paneTarget = (name: string): string => `=${name}:`;

// tmux reads a trailing `;` as a command separator and drops it; `\;` stays literal.
const escapeTrailingSemicolon = (text: string): string =>
  text.endsWith(";") ? `${text.slice(0, -1)}\\;` : text;

export class TmuxCliExecutor implements TmuxGateway {
  private readonly tmuxBinary: string;
  private readonly tmuxArgsPrefix: string[];
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly traceTmux: boolean;

  public constructor(options: TmuxCliExecutorOptions = {}) {
    if (options.socketName && options.socketPath) {
      throw new Error("tmux socketName and socketPath are mutually exclusive");
    }

    this.tmuxBinary = options.tmuxBinary ?? "tmux";
    // -u: tmux swaps the tab separators in formats for `_` under a non-UTF-8 locale.
    this.tmuxArgsPrefix = [
      "-u",
      ...(options.socketPath ? ["-S", options.socketPath] : options.socketName ? ["-L", options.socketName] : [])
    ];
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.logger = options.logger;
    this.traceTmux = options.traceTmux ?? false;
  }

  private async runTmux(args: string[]): Promise<string> {
    const finalArgs = [...this.tmuxArgsPrefix, ...args];
    try {
      if (this.traceTmux) {
        this.logger?.log("[tmux]", this.tmuxBinary, finalArgs.join(" "));
      }
      const { stdout } = await execFileAsync(this.tmuxBinary, finalArgs, {
        timeout: this.timeoutMs,
        env: withoutTmuxEnv(process.env),
        maxBuffer: 64 * 1024 * 1024
      });
      return stdout;
    } catch (error) {
      if (isMissingBinaryError(error)) {
        throw missingBinary(`tmux not found: ${this.tmuxBinary}`);
      }
      const serialized = error instanceof Error ? error.message : String(error);
      this.logger?.error("[tmux] failed:", finalArgs.join(" "), serialized);
      throw runtimeFailure(
        `tmux command failed: ${this.tmuxBinary} ${finalArgs.join(" ")} => ${serialized.trim()}`
      );
    }
  }

  private async runTmuxMaybeNoServer(args: string[]): Promise<string | null> {
    try {
      return await this.runTmux(args);
    } catch (error) {
      if (error instanceof CommandError && error.kind === "runtime" && isNoServerRunningError(error.message)) {
        return null;
      }
      throw error;
    }
  }

  public async listSessions(): Promise<SessionSummary[]> {
    const output = await this.runTmuxMaybeNoServer(["list-sessions", "-F", SESSION_FMT]);
    if (!output) {
      return [];
    }
    return parseSessions(output);
  }

  public async hasSession(name: string): Promise<boolean> {
    try {
      await this.runTmux(["has-session", "-t", sessionTarget(name)]);
      return true;
    } catch (error) {
      if (error instanceof CommandError && error.kind === "missing-binary") {
        throw error;
      }
      return false;
    }
  }

  public async createSession(spec: CreateSessionSpec): Promise<void> {
    const args = ["new-session", "-d", "-s", spec.name];
    if (spec.cols !== undefined) {
      args.push("-x", String(spec.cols));
    }
    if (spec.rows !== undefined) {
      args.push("-y", String(spec.rows));
    }
    if (spec.cwd) {
      args.push("-c", spec.cwd);
    }
    for (const [key, value] of Object.entries(spec.env)) {
      args.push("-e", `${key}=${value}`);
    }
    if (spec.shell) {
      args.push(spec.shell);
    }
    await this.runTmux(args);
    if (spec.cols !== undefined || spec.rows !== undefined) {
      // Keep the requested size when a client with another size attaches later.
      await this.runTmux(["set-option", "-w", "-t", paneTarget(spec.name), "window-size", "manual"]);
    }
  }

  public async killSession(name: string): Promise<void> {
    await this.runTmux(["kill-session", "-t", sessionTarget(name)]);
  }

  public async resizeWindow(name: string, cols?: number, rows?: number): Promise<void> {
    const args = ["resize-window", "-t", paneTarget(name)];
    if (cols !== undefined) {
      args.push("-x", String(cols));
    }
    if (rows !== undefined) {
      args.push("-y", String(rows));
    }
    await this.runTmux(args);
  }

  public async snapshot(name: string): Promise<PaneSnapshot> {
    const header = parsePaneHeader(
      await this.runTmux(["display-message", "-p", "-t", paneTarget(name), PANE_HEADER_FMT])
    );
    const screen = await this.runTmux(["capture-pane", "-p", "-t", paneTarget(name)]);
    return {
      lines: parseScreenRows(screen, header.rows),
      cursor: { x: header.cursorX, y: header.cursorY },
      mode: header.mode,
      cols: header.cols,
      rows: header.rows,
      attachedClients: header.attachedClients
    };
  }

  public async capturePane(name: string, options: CaptureOptions = {}): Promise<string> {
    const args = ["capture-pane", "-p", "-t", paneTarget(name)];
    if (options.scrollback !== undefined) {
      args.push("-S", `-${options.scrollback}`);
    }
    if (options.escapes) {
      args.push("-e");
    }
    if (options.joinWrapped) {
      args.push("-J");
    }
    return this.runTmux(args);
  }

  public async describePane(name: string): Promise<PaneDetails> {
    return parsePaneDetails(
      await this.runTmux(["display-message", "-p", "-t", paneTarget(name), PANE_DETAILS_FMT])
    );
  }

  public async sendText(name: string, text: string): Promise<void> {
    if (text === "") {
      return;
    }
    await this.runTmux(["send-keys", "-t", paneTarget(name), "-l", "--", escapeTrailingSemicolon(text)]);
  }

  public async sendKeys(name: string, keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    await this.runTmux(["send-keys", "-t", paneTarget(name), ...keys]);
  }

  public async getOption(name: string, key: string): Promise<string | null> {
    const value = (await this.runTmux(["show-options", "-qv", "-t", sessionTarget(name), key])).replace(
      /\n$/,
      ""
    );
    return value === "" ? null : value;
  }

  public async setOption(name: string, key: string, value: string): Promise<void> {
    await this.runTmux(["set-option", "-t", sessionTarget(name), key, value]);
  }

  public async unsetOption(name: string, key: string): Promise<void> {
    await this.runTmux(["set-option", "-u", "-t", sessionTarget(name), key]);
  }

  public async pipePane(name: string, shellCommand: string): Promise<void> {
    await this.runTmux(["pipe-pane", "-t", paneTarget(name), shellCommand]);
  }

  public async stopPipe(name: string): Promise<void> {
    await this.runTmux(["pipe-pane", "-t", paneTarget(name)]);
  }

  public async scroll(name: string, lines: number): Promise<void> {
    await this.runTmux(["copy-mode", "-e", "-t", paneTarget(name)]);
    await this.runTmux([
      "send-keys",
      "-X",
      "-N",
      String(Math.abs(lines)),
      "-t",
      paneTarget(name),
      lines < 0 ? "scroll-up" : "scroll-down"
    ]);
  }

  public async clearHistory(name: string): Promise<void> {
    await this.runTmux(["clear-history", "-t", paneTarget(name)]);
  }

  public async detachClients(name: string): Promise<void> {
    await this.runTmux(["detach-client", "-s", sessionTarget(name)]);
  }

  public attach(name: string, options: AttachOptions): Promise<void> {
    const args = [...this.tmuxArgsPrefix, "attach-session", "-t", sessionTarget(name)];
    if (options.readOnly) {
      args.push("-r");
    }
    return new Promise((resolve, reject) => {
      const child = spawn(this.tmuxBinary, args, {
        stdio: "inherit",
        env: withoutTmuxEnv(process.env)
      });
      child.once("error", (error) => {
        reject(
          isMissingBinaryError(error)
            ? missingBinary(`tmux not found: ${this.tmuxBinary}`)
            : runtimeFailure(`tmux attach failed: ${error.message}`)
        );
      });
      child.once("exit", (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(runtimeFailure(`tmux attach exited with code ${String(code)}`));
      });
    });
  }
}
