export type ScreenMode = "normal" | "alternate";

export interface SessionSummary {
  name: string;
  attachedClients: number;
  /** Unix epoch seconds. */
  createdAt: number;
  cols: number;
  rows: number;
}

export interface CursorPosition {
  x: number;
  y: number;
}

/** One observation of a session's active pane: the visible rows only, no scrollback. */
export interface PaneSnapshot {
  lines: string[];
  cursor: CursorPosition;
  mode: ScreenMode;
  cols: number;
  rows: number;
  attachedClients: number;
}

export interface PaneDetails {
  pid: number;
  currentCommand: string;
  currentPath: string;
  piping: boolean;
}

export interface CreateSessionSpec {
  name: string;
  cols?: number;
  rows?: number;
  cwd?: string;
  env: Record<string, string>;
  shell?: string;
}

export interface CaptureOptions {
  /** Include this many lines of history above the visible screen. */
  scrollback?: number;
  escapes?: boolean;
  joinWrapped?: boolean;
}

export interface AttachOptions {
  readOnly: boolean;
}

export interface TmuxGateway {
  listSessions(): Promise<SessionSummary[]>;
  hasSession(name: string): Promise<boolean>;
  createSession(spec: CreateSessionSpec): Promise<void>;
  killSession(name: string): Promise<void>;
  resizeWindow(name: string, cols?: number, rows?: number): Promise<void>;
  snapshot(name: string): Promise<PaneSnapshot>;
  capturePane(name: string, options?: CaptureOptions): Promise<string>;
  describePane(name: string): Promise<PaneDetails>;
  sendText(name: string, text: string): Promise<void>;
  sendKeys(name: string, keys: string[]): Promise<void>;
  getOption(name: string, key: string): Promise<string | null>;
  setOption(name: string, key: string, value: string): Promise<void>;
  unsetOption(name: string, key: string): Promise<void>;
  pipePane(name: string, shellCommand: string): Promise<void>;
  stopPipe(name: string): Promise<void>;
  scroll(name: string, lines: number): Promise<void>;
  /** Drops the scrollback above the visible screen. */
  clearHistory(name: string): Promise<void>;
  detachClients(name: string): Promise<void>;
  attach(name: string, options: AttachOptions): Promise<void>;
}

/** Identity of what a poll saw; two snapshots with equal keys are indistinguishable to the detectors. */
export const snapshotKey = (snapshot: PaneSnapshot): string =>
  `${snapshot.cursor.x},${snapshot.cursor.y}\n${snapshot.lines.join("\n")}`;
