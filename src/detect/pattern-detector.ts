import { invalidInput } from "../errors.js";
import type { PaneSnapshot } from "../tmux/types.js";
import { detected, pending, type Detection, type Detector } from "./poll.js";

export interface PatternOptions {
  ignoreCase: boolean;
  contextLines: number;
}

export interface PatternMatch {
  pattern: string;
  row: number;
  /** Rows around the match, present when context was asked for. */
  context: string[];
  contextStart: number;
}

export const validatePatterns = (patterns: readonly string[], contextLines: number): void => {
  if (patterns.length === 0) {
    throw invalidInput("At least one pattern is required");
  }
  if (patterns.some((pattern) => pattern === "")) {
    throw invalidInput("Patterns must not be empty");
  }
  if (!Number.isInteger(contextLines) || contextLines < 0) {
    throw invalidInput("Context lines must be a non-negative integer");
  }
};

/** First pattern, in argument order, that occurs anywhere in the rows. */
export const findFirstPattern = (
  lines: readonly string[],
  patterns: readonly string[],
  ignoreCase: boolean
): { pattern: string; row: number } | null => {
  const haystack = ignoreCase ? lines.map((line) => line.toLowerCase()) : lines;
  for (const pattern of patterns) {
    const needle = ignoreCase ? pattern.toLowerCase() : pattern;
    const row = haystack.findIndex((line) => line.includes(needle));
    if (row !== -1) {
      return { pattern, row };
    }
  }
  return null;
};

export class PatternDetector implements Detector<PaneSnapshot, PatternMatch> {
  public readonly minSamples = 1;

  public constructor(
    private readonly patterns: readonly string[],
    private readonly options: PatternOptions
  ) {}

  public observe(snapshot: PaneSnapshot): Detection<PatternMatch> {
    const found = findFirstPattern(snapshot.lines, this.patterns, this.options.ignoreCase);
    if (!found) {
      return pending();
    }
    const contextStart = Math.max(0, found.row - this.options.contextLines);
    const contextEnd = Math.min(snapshot.lines.length, found.row + this.options.contextLines + 1);
    return detected({
      pattern: found.pattern,
      row: found.row,
      context: snapshot.lines.slice(contextStart, contextEnd),
      contextStart
    });
  }
}
