import type { PaneSnapshot } from "../tmux/types.js";
import { detected, pending, type Detection, type Detector } from "../detect/poll.js";

export type MarkerKind =
  | "READY"
  | "DONE"
  | "HASH"
  | "EXISTS"
  | "NOWRITE"
  | "NOPY"
  | "ERR"
  | "NOFILE"
  | "INFO"
  | "C"
  | "PAGE"
  | "END";

export interface MarkerLine {
  kind: MarkerKind;
  detail: string;
}

const KINDS: ReadonlySet<string> = new Set<MarkerKind>([
  "READY",
  "DONE",
  "HASH",
  "EXISTS",
  "NOWRITE",
  "NOPY",
  "ERR",
  "NOFILE",
  "INFO",
  "C",
  "PAGE",
  "END"
]);

const isMarkerKind = (value: string): value is MarkerKind => KINDS.has(value);

const ANSI_ESCAPE = /\u001b\[[0-9;?]*[A-Za-z]|\u001b\][^\u0007]*\u0007|\r/g;

export const stripAnsi = (text: string): string => text.replace(ANSI_ESCAPE, "");

export const markerText = (kind: MarkerKind, tag: string): string => `TH_${kind}_${tag}`;

export const parseMarkerLine = (line: string, tag: string): MarkerLine | null => {
  const clean = stripAnsi(line).trim();
  const match = /^TH_([A-Z]+)_([0-9a-f]+)(?: (.*))?$/.exec(clean);
  if (!match || match[2] !== tag || !isMarkerKind(match[1])) {
    return null;
  }
  return { kind: match[1], detail: match[3] ?? "" };
};

export const parseMarkers = (lines: readonly string[], tag: string): MarkerLine[] => {
  const markers: MarkerLine[] = [];
  for (const line of lines) {
    const marker = parseMarkerLine(line, tag);
    if (marker) {
      markers.push(marker);
    }
  }
  return markers;
};

/** Adds every `C <index> <data>` line to `into`; re-seen indexes are overwritten with the same data. */
export const collectChunks = (markers: readonly MarkerLine[], into: Map<number, string>): void => {
  for (const marker of markers) {
    if (marker.kind !== "C") {
      continue;
    }
    const match = /^(\d+) ?(\S*)$/.exec(marker.detail);
    if (match) {
      into.set(Number.parseInt(match[1], 10), match[2]);
    }
  }
};

export interface MarkerSighting {
  marker: MarkerLine;
  lines: string[];
}

/** Fires on the lowest visible marker of one of the wanted kinds that passes `accept`. */
export class MarkerDetector implements Detector<PaneSnapshot, MarkerSighting> {
  public readonly minSamples = 1;

  public constructor(
    private readonly tag: string,
    private readonly kinds: ReadonlySet<MarkerKind>,
    private readonly accept: (marker: MarkerLine) => boolean = () => true
  ) {}

  public observe(snapshot: PaneSnapshot): Detection<MarkerSighting> {
    for (let row = snapshot.lines.length - 1; row >= 0; row -= 1) {
      const marker = parseMarkerLine(snapshot.lines[row] ?? "", this.tag);
      if (marker && this.kinds.has(marker.kind) && this.accept(marker)) {
        return detected({ marker, lines: snapshot.lines });
      }
    }
    return pending();
  }
}
