import { sessionLocked } from "../errors.js";
import type { SessionKeyValueStore } from "./option-store.js";

/** Agent commands that only observe, or only talk to the human, and so still run on a locked session. */
export const ALLOWED_WHEN_LOCKED: ReadonlySet<string> = new Set([
  "capture",
  "status",
  "wait",
  "wait-idle",
  "wait-for",
  "request",
  "request-wait",
  "request-status",
  "request-cancel",
  "list",
  "scroll",
  "pipe-log",
  "unpipe"
]);

export const isAllowedWhenLocked = (command: string): boolean => ALLOWED_WHEN_LOCKED.has(command);

export const isLocked = async (store: SessionKeyValueStore, session: string): Promise<boolean> =>
  (await store.get(session, "locked")) === "1";

/** Returns false when the session was already in the requested state. */
export const setLocked = async (
  store: SessionKeyValueStore,
  session: string,
  locked: boolean
): Promise<boolean> => {
  if ((await isLocked(store, session)) === locked) {
    return false;
  }
  if (locked) {
    await store.set(session, "locked", "1");
  } else {
    await store.delete(session, "locked");
  }
  return true;
};

export const ensureCommandAllowed = async (
  store: SessionKeyValueStore,
  session: string,
  command: string
): Promise<void> => {
  if (isAllowedWhenLocked(command)) {
    return;
  }
  if (await isLocked(store, session)) {
    throw sessionLocked(
      `Session '${session}' is locked for human use; '${command}' is not allowed`
    );
  }
};
