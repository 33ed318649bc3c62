import stringWidth from "string-width";
import type { PaneSnapshot } from "../tmux/types.js";
import { snapshotKey } from "../tmux/types.js";
import { detected, pending, type Detection, type Detector } from "./poll.js";

// $ % # for shells, > ) ] : for REPLs such as ">>>", "(Pdb)", "In [1]:" and "irb>".
const PROMPT_MARKERS = new Set(["$", "%", "#", ">", ")", "]", ":"]);

export interface PromptMatch {
  row: number;
  line: string;
}

// One entry per terminal column; a wide character is followed by an empty cell.
const toCells = (text: string): string[] => {
  const cells: string[] = [];
  for (const char of text) {
    const width = stringWidth(char);
    if (width === 0 && cells.length > 0) {
      cells[cells.length - 1] += char;
      continue;
    }
    cells.push(char);
    for (let extra = 1; extra < width; extra += 1) {
      cells.push("");
    }
  }
  return cells;
};

/**
 * Whether the cursor sits right after a prompt marker and a space, with
 * nothing typed after it. Only the cursor row is considered, so an old prompt
 * further up the screen never counts.
 */
export const cursorAtPrompt = (line: string, cursorX: number): boolean => {
  const cells = toCells(line.trimEnd());
  if (cells.length === 0 || cursorX < 2 || cells.length > cursorX) {
    return false;
  }
  const beforeCursor = cells[cursorX - 1];
  if (beforeCursor !== undefined && beforeCursor.trim() !== "") {
    return false;
  }
  const marker = cells[cursorX - 2];
  return marker !== undefined && PROMPT_MARKERS.has(marker);
};

export const promptCandidate = (snapshot: PaneSnapshot): PromptMatch | null => {
  const line = snapshot.lines[snapshot.cursor.y];
  if (line === undefined || !cursorAtPrompt(line, snapshot.cursor.x)) {
    return null;
  }
  return { row: snapshot.cursor.y, line: line.trimEnd() };
};

/** A prompt only counts once two consecutive polls show the same screen and cursor. */
export class PromptDetector implements Detector<PaneSnapshot, PromptMatch> {
  public readonly minSamples = 2;
  private previousKey?: string;

  public observe(snapshot: PaneSnapshot): Detection<PromptMatch> {
    const key = snapshotKey(snapshot);
    const stable = key === this.previousKey;
    this.previousKey = key;
    const candidate = promptCandidate(snapshot);
    if (!candidate || !stable) {
      return pending();
    }
    return detected(candidate);
  }
}
