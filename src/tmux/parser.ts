import type { PaneDetails, ScreenMode, SessionSummary } from "./types.js";

const splitLine = (line: string): string[] => line.split("\t").map((item) => item.trim());

const toInt = (value: string | undefined): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? 0 : parsed;
};

export const parseSessions = (raw: string): SessionSummary[] =>
  raw
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const [name, attached, created, cols, rows] = splitLine(line);
      return {
        name,
        attachedClients: toInt(attached),
        createdAt: toInt(created),
        cols: toInt(cols),
        rows: toInt(rows)
      };
    });

export interface PaneHeader {
  cursorX: number;
  cursorY: number;
  mode: ScreenMode;
  cols: number;
  rows: number;
  attachedClients: number;
}

export const parsePaneHeader = (raw: string): PaneHeader => {
  const [cursorX, cursorY, alternate, cols, rows, attached] = splitLine(raw.trim());
  return {
    cursorX: toInt(cursorX),
    cursorY: toInt(cursorY),
    mode: alternate === "1" ? "alternate" : "normal",
    cols: toInt(cols),
    rows: toInt(rows),
    attachedClients: toInt(attached)
  };
};

export const parsePaneDetails = (raw: string): PaneDetails => {
  const [pid, currentCommand, piping, currentPath] = raw.trim().split("\t");
  return {
    pid: toInt(pid),
    currentCommand: currentCommand ?? "",
    currentPath: currentPath ?? "",
    piping: piping === "1"
  };
};

/**
 * Splits `capture-pane -p` output of the visible screen into exactly `rows` rows.
 * tmux ends every row with a newline and leaves trailing blank rows out only
 * when asked to, so both shapes are normalized here.
 */
export const parseScreenRows = (raw: string, rows: number): string[] => {
  const lines = raw.split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  while (lines.length < rows) {
    lines.push("");
  }
  return lines.slice(0, Math.max(rows, 0));
};
