import { runtimeFailure, sessionLocked } from "../errors.js";
import type { Logger } from "../util/file-logger.js";
import type { TmuxGateway } from "../tmux/types.js";
import { isLocked } from "./lock-state.js";
import type { SessionKeyValueStore } from "./option-store.js";

export interface KillCandidate {
  name: string;
  locked: boolean;
  attachedClients: number;
}

export interface KillBlocker {
  name: string;
  reason: "locked" | "attached";
}

export interface BulkKillOptions {
  force: boolean;
  /** The human side may kill locked sessions; the agent side never may. */
  ignoreLocks?: boolean;
}

export const findBlockers = (
  candidates: readonly KillCandidate[],
  options: BulkKillOptions
): KillBlocker[] => {
  const blockers: KillBlocker[] = [];
  for (const candidate of candidates) {
    if (candidate.locked && !options.ignoreLocks) {
      blockers.push({ name: candidate.name, reason: "locked" });
    } else if (candidate.attachedClients > 0 && !options.force) {
      blockers.push({ name: candidate.name, reason: "attached" });
    }
  }
  return blockers;
};

export const describeBlockers = (blockers: readonly KillBlocker[]): string => {
  const locked = blockers.filter((blocker) => blocker.reason === "locked").map((blocker) => blocker.name);
  const attached = blockers
    .filter((blocker) => blocker.reason === "attached")
    .map((blocker) => blocker.name);
  const parts: string[] = [];
  if (locked.length > 0) {
    parts.push(`locked: ${locked.join(", ")}`);
  }
  if (attached.length > 0) {
    parts.push(`attached (use --force): ${attached.join(", ")}`);
  }
  return `Refusing to kill any session; ${parts.join("; ")}`;
};

/**
 * Validates every session before killing any of them. A client that attaches
 * between validation and the kill loop is not noticed; tmux offers no way to
 * hold the server still across calls.
 */
export const killAllSessions = async (
  tmux: TmuxGateway,
  store: SessionKeyValueStore,
  options: BulkKillOptions,
  logger?: Logger
): Promise<string[]> => {
  const sessions = await tmux.listSessions();
  const candidates: KillCandidate[] = [];
  for (const session of sessions) {
    candidates.push({
      name: session.name,
      locked: await isLocked(store, session.name),
      attachedClients: session.attachedClients
    });
  }

  const blockers = findBlockers(candidates, options);
  if (blockers.length > 0) {
    const message = describeBlockers(blockers);
    logger?.log("[kill --all] refused:", message);
    throw blockers.some((blocker) => blocker.reason === "locked")
      ? sessionLocked(message)
      : runtimeFailure(message);
  }

  const killed: string[] = [];
  for (const candidate of candidates) {
    await tmux.killSession(candidate.name);
    killed.push(candidate.name);
  }
  return killed;
};
