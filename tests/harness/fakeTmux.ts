import fs from "node:fs";
import { runtimeFailure } from "../../src/errors.js";
import type {
  AttachOptions,
  CaptureOptions,
  CreateSessionSpec,
  PaneDetails,
  PaneSnapshot,
  ScreenMode,
  SessionSummary,
  TmuxGateway
} from "../../src/tmux/types.js";
import { FakeRemote, parseHelperInvocation, type RemoteProgram } from "./fakeRemote.js";

export const FAKE_PROMPT = "user@host:~$ ";

interface Row {
  text: string;
  /** The row continues on the next one. */
  wrapped: boolean;
}

/** A handler for a shell command typed in a fake session; returns the lines it prints. */
export type FakeCommand = (args: string[], session: FakeSession) => string[];

export interface FakeSession {
  name: string;
  cols: number;
  rows: number;
  createdAt: number;
  attachedClients: number;
  cwd: string;
  env: Record<string, string>;
  shell: string;
  mode: ScreenMode;
  options: Map<string, string>;
  history: Row[];
  /** First history row the screen may show; everything above it is scrollback. */
  top: number;
  input: string;
  echo: boolean;
  program?: RemoteProgram;
  pipe?: { file: string | null; command: string };
  /** Fixed screen set by a test; replaces the rendered history while present. */
  fixed?: { lines: string[]; cursor: { x: number; y: number } };
}

interface FakeTmuxOptions {
  remote?: FakeRemote;
  /** Called while `attach` runs, standing in for what the human does in the session. */
  onAttach?: (session: FakeSession, options: AttachOptions) => void | Promise<void>;
}

// `printf '\033[H\033[2J'`: home the cursor and erase the screen.
const CLEAR_SCREEN_ARG = "'\\033[H\\033[2J'";

const missing = (name: string): Error => runtimeFailure(`tmux command failed: can't find session: ${name}`);

// Matches the `cat >> <file>` sinks the client hands to pipe-pane.
const CAT_SINK = /^cat >> (?:'((?:[^']|'\\'')*)'|(\S+))$/;

export class FakeTmuxGateway implements TmuxGateway {
  private readonly sessions = new Map<string, FakeSession>();
  private readonly commands = new Map<string, FakeCommand>();
  private clock = 1_700_000_000;
  public readonly calls: string[] = [];
  public readonly remote: FakeRemote;
  public onAttach?: FakeTmuxOptions["onAttach"];

  public constructor(seedSessions: string[] = [], options: FakeTmuxOptions = {}) {
    this.remote = options.remote ?? new FakeRemote();
    this.onAttach = options.onAttach;
    for (const name of seedSessions) {
      this.addSession({ name, env: {} });
    }
    this.defineCommand("echo", (args) => [args.join(" ")]);
    this.defineCommand("true", () => []);
    this.defineCommand("printf", (args, session) => {
      if (args.join(" ") === CLEAR_SCREEN_ARG) {
        session.history.push({ text: "", wrapped: false });
        session.top = session.history.length - 1;
        return [];
      }
      return [args.join(" ")];
    });
  }

  public defineCommand(name: string, handler: FakeCommand): void {
    this.commands.set(name, handler);
  }

  public session(name: string): FakeSession {
    const session = this.sessions.get(name);
    if (!session) {
      throw missing(name);
    }
    return session;
  }

  public setAttached(name: string, clients: number): void {
    this.session(name).attachedClients = clients;
  }

  public setMode(name: string, mode: ScreenMode): void {
    this.session(name).mode = mode;
  }

  public setScreen(name: string, lines: string[], cursor: { x: number; y: number }): void {
    this.session(name).fixed = { lines: [...lines], cursor: { ...cursor } };
  }

  public clearScreen(name: string): void {
    const session = this.session(name);
    session.fixed = undefined;
    session.history = [];
    session.top = 0;
  }

  /** Prints lines as if a program in the session wrote them. */
  public print(name: string, text: string): void {
    this.write(this.session(name), text);
  }

  public screenText(name: string): string[] {
    return this.visibleRows(this.session(name)).map((row) => row.text);
  }

  public listSessions(): Promise<SessionSummary[]> {
    this.calls.push("listSessions");
    return Promise.resolve(
      [...this.sessions.values()].map((session) => ({
        name: session.name,
        attachedClients: session.attachedClients,
        createdAt: session.createdAt,
        cols: session.cols,
        rows: session.rows
      }))
    );
  }

  public async hasSession(name: string): Promise<boolean> {
    this.calls.push(`hasSession:${name}`);
    return this.sessions.has(name);
  }

  public async createSession(spec: CreateSessionSpec): Promise<void> {
    this.calls.push(`createSession:${spec.name}`);
    if (this.sessions.has(spec.name)) {
      throw runtimeFailure(`tmux command failed: duplicate session: ${spec.name}`);
    }
    this.addSession(spec);
  }

  public async killSession(name: string): Promise<void> {
    this.calls.push(`killSession:${name}`);
    this.session(name);
    this.sessions.delete(name);
  }

  public async resizeWindow(name: string, cols?: number, rows?: number): Promise<void> {
    this.calls.push(`resizeWindow:${name}:${cols ?? "-"}x${rows ?? "-"}`);
    const session = this.session(name);
    session.cols = cols ?? session.cols;
    session.rows = rows ?? session.rows;
  }

  public async snapshot(name: string): Promise<PaneSnapshot> {
    this.calls.push(`snapshot:${name}`);
    const session = this.session(name);
    const { lines, cursor } = this.render(session);
    return {
      lines,
      cursor,
      mode: session.mode,
      cols: session.cols,
      rows: session.rows,
      attachedClients: session.attachedClients
    };
  }

  public async capturePane(name: string, options: CaptureOptions = {}): Promise<string> {
    this.calls.push(
      `capturePane:${name}:${options.scrollback ?? 0}:${options.escapes ? "e" : ""}${options.joinWrapped ? "J" : ""}`
    );
    const session = this.session(name);
    if (session.fixed) {
      return `${session.fixed.lines.join("\n")}\n`;
    }
    const visible = this.visibleRows(session);
    const visibleStart = this.visibleStart(session);
    const start = Math.max(0, visibleStart - (options.scrollback ?? 0));
    const rows = options.scrollback !== undefined ? session.history.slice(start) : visible;
    const lines: string[] = [];
    let pending = "";
    for (const row of rows) {
      if (options.joinWrapped && row.wrapped) {
        pending += row.text;
        continue;
      }
      lines.push(pending + row.text);
      pending = "";
    }
    if (pending !== "") {
      lines.push(pending);
    }
    return `${lines.join("\n")}\n`;
  }

  public async describePane(name: string): Promise<PaneDetails> {
    this.calls.push(`describePane:${name}`);
    const session = this.session(name);
    return {
      pid: 4242,
      currentCommand: session.program ? "python3" : session.shell,
      currentPath: session.cwd,
      piping: session.pipe !== undefined
    };
  }

  public async sendText(name: string, text: string): Promise<void> {
    this.calls.push(`sendText:${name}:${text.length > 60 ? `${text.slice(0, 60)}...` : text}`);
    const session = this.session(name);
    session.input += text;
    if (session.echo) {
      this.write(session, text);
    }
  }

  public async sendKeys(name: string, keys: string[]): Promise<void> {
    this.calls.push(`sendKeys:${name}:${keys.join(" ")}`);
    const session = this.session(name);
    for (const key of keys) {
      if (key === "Enter") {
        this.submit(session);
      } else if (key === "C-c") {
        session.input = "";
        session.program = undefined;
        session.echo = true;
        this.write(session, "^C\n");
        this.write(session, FAKE_PROMPT);
      }
    }
  }

  public async getOption(name: string, key: string): Promise<string | null> {
    this.calls.push(`getOption:${name}:${key}`);
    return this.session(name).options.get(key) ?? null;
  }

  public async setOption(name: string, key: string, value: string): Promise<void> {
    this.calls.push(`setOption:${name}:${key}=${value}`);
    this.session(name).options.set(key, value);
  }

  public async unsetOption(name: string, key: string): Promise<void> {
    this.calls.push(`unsetOption:${name}:${key}`);
    this.session(name).options.delete(key);
  }

  public async pipePane(name: string, shellCommand: string): Promise<void> {
    this.calls.push(`pipePane:${name}:${shellCommand}`);
    const session = this.session(name);
    const match = CAT_SINK.exec(shellCommand);
    const file = match ? (match[1]?.replace(/'\\''/g, "'") ?? match[2] ?? null) : null;
    session.pipe = { file, command: shellCommand };
  }

  public async stopPipe(name: string): Promise<void> {
    this.calls.push(`stopPipe:${name}`);
    this.session(name).pipe = undefined;
  }

  public async scroll(name: string, lines: number): Promise<void> {
    this.calls.push(`scroll:${name}:${lines}`);
    this.session(name);
  }

  public async clearHistory(name: string): Promise<void> {
    this.calls.push(`clearHistory:${name}`);
    const session = this.session(name);
    session.history = session.history.slice(this.visibleStart(session));
    session.top = 0;
  }

  public async detachClients(name: string): Promise<void> {
    this.calls.push(`detachClients:${name}`);
    this.session(name).attachedClients = 0;
  }

  public async attach(name: string, options: AttachOptions): Promise<void> {
    this.calls.push(`attach:${name}${options.readOnly ? ":ro" : ""}`);
    const session = this.session(name);
    session.attachedClients += 1;
    await this.onAttach?.(session, options);
    if (this.sessions.has(name)) {
      session.attachedClients = Math.max(0, session.attachedClients - 1);
    }
  }

  private addSession(spec: CreateSessionSpec): void {
    this.clock += 1;
    const session: FakeSession = {
      name: spec.name,
      cols: spec.cols ?? 80,
      rows: spec.rows ?? 24,
      createdAt: this.clock,
      attachedClients: 0,
      cwd: spec.cwd ?? "/home/user",
      env: { ...spec.env },
      shell: spec.shell ?? "bash",
      mode: "normal",
      options: new Map(),
      history: [],
      top: 0,
      input: "",
      echo: true
    };
    this.sessions.set(spec.name, session);
    this.write(session, FAKE_PROMPT);
  }

  private submit(session: FakeSession): void {
    const line = session.input;
    session.input = "";
    if (session.echo) {
      this.write(session, "\n");
    }

    if (session.program) {
      this.feed(session, session.program.next(line));
      return;
    }

    const invocation = parseHelperInvocation(line);
    if (invocation) {
      const program = this.remote.start(invocation, session.cwd);
      this.feed(session, program.begin());
      if (program.waiting) {
        session.program = program;
      }
      return;
    }

    const words = line.trim().split(/\s+/).filter(Boolean);
    if (words.length > 0) {
      const handler = this.commands.get(words[0]);
      const output = handler
        ? handler(words.slice(1), session)
        : [`bash: ${words[0]}: command not found`];
      for (const outputLine of output) {
        this.write(session, `${outputLine}\n`);
      }
    }
    this.write(session, FAKE_PROMPT);
  }

  /** Applies one step of a remote program: its output, its echo wish and whether it is done. */
  private feed(session: FakeSession, step: { output: string[]; echo: boolean; done: boolean }): void {
    for (const line of step.output) {
      this.write(session, `${line}\n`);
    }
    session.echo = step.echo;
    if (step.done) {
      session.program = undefined;
      session.echo = true;
      this.write(session, FAKE_PROMPT);
    }
  }

  private write(session: FakeSession, text: string): void {
    if (session.pipe?.file) {
      fs.appendFileSync(session.pipe.file, this.remote.filterPipe(text));
    }
    if (session.history.length === 0) {
      session.history.push({ text: "", wrapped: false });
    }
    for (const char of text) {
      const last = session.history[session.history.length - 1];
      if (char === "\n") {
        session.history.push({ text: "", wrapped: false });
        continue;
      }
      if (last.text.length >= session.cols) {
        last.wrapped = true;
        session.history.push({ text: char, wrapped: false });
        continue;
      }
      last.text += char;
    }
  }

  private visibleStart(session: FakeSession): number {
    return Math.max(session.top, session.history.length - session.rows);
  }

  private visibleRows(session: FakeSession): Row[] {
    return session.history.slice(this.visibleStart(session));
  }

  private render(session: FakeSession): Pick<PaneSnapshot, "lines" | "cursor"> {
    if (session.fixed) {
      const lines = [...session.fixed.lines];
      while (lines.length < session.rows) {
        lines.push("");
      }
      return { lines: lines.slice(0, session.rows), cursor: { ...session.fixed.cursor } };
    }
    const visible = this.visibleRows(session);
    const lines = visible.map((row) => row.text);
    const cursor = { x: lines[lines.length - 1]?.length ?? 0, y: Math.max(0, lines.length - 1) };
    while (lines.length < session.rows) {
      lines.push("");
    }
    return { lines, cursor };
  }
}
