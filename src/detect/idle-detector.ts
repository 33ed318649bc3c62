import { invalidInput } from "../errors.js";
import type { PaneSnapshot } from "../tmux/types.js";
import { detected, pending, type Detection, type Detector } from "./poll.js";

export const DEFAULT_IDLE_SECONDS = 2;

export interface IdleResult {
  idleMs: number;
}

export const validateIdleWait = (idleSeconds: number, timeoutSeconds: number): void => {
  if (!Number.isFinite(idleSeconds) || idleSeconds < 0) {
    throw invalidInput("Idle time must be non-negative");
  }
  if (idleSeconds >= timeoutSeconds) {
    throw invalidInput(
      `Idle time (${idleSeconds}s) must be less than timeout (${timeoutSeconds}s)`
    );
  }
};

/** Content-agnostic: fires once the visible rows have not changed for the idle window. */
export class IdleDetector implements Detector<PaneSnapshot, IdleResult> {
  public readonly minSamples = 1;
  private lastContent?: string;
  private lastChangedAt = 0;

  public constructor(private readonly idleMs: number) {}

  public observe(snapshot: PaneSnapshot, now: number): Detection<IdleResult> {
    const content = snapshot.lines.join("\n");
    if (content !== this.lastContent) {
      this.lastContent = content;
      this.lastChangedAt = now;
    }
    const idleMs = now - this.lastChangedAt;
    return idleMs >= this.idleMs ? detected({ idleMs }) : pending();
  }
}
