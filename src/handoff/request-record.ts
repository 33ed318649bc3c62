import { runtimeFailure } from "../errors.js";
import type { SessionKeyValueStore } from "../session/option-store.js";

export type RequestStatus = "pending" | "completed";

/** Absence of a record is the NONE state; a cancelled request is removed outright. */
export interface RequestRecord {
  status: RequestStatus;
  message: string;
  /** Unix epoch milliseconds. */
  createdAt: number;
  response?: string;
  completedAt?: number;
}

const isRequestRecord = (value: unknown): value is RequestRecord => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (!("status" in value) || !("message" in value) || !("createdAt" in value)) {
    return false;
  }
  if (value.status !== "pending" && value.status !== "completed") {
    return false;
  }
  if (typeof value.message !== "string" || typeof value.createdAt !== "number") {
    return false;
  }
  if ("completedAt" in value && typeof value.completedAt !== "number") {
    return false;
  }
  return !("response" in value) || typeof value.response === "string";
};

export const parseRequestRecord = (raw: string | null): RequestRecord | null => {
  if (raw === null) {
    return null;
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw runtimeFailure(`Corrupt request record: ${raw}`);
  }
  if (!isRequestRecord(value)) {
    throw runtimeFailure(`Corrupt request record: ${raw}`);
  }
  return value;
};

/** Request record and detached flag for one tmux server. Each write replaces the whole record. */
export class RequestStore {
  public constructor(private readonly store: SessionKeyValueStore) {}

  public async read(session: string): Promise<RequestRecord | null> {
    return parseRequestRecord(await this.store.get(session, "request"));
  }

  public async write(session: string, record: RequestRecord): Promise<void> {
    await this.store.set(session, "request", JSON.stringify(record));
  }

  public async clear(session: string): Promise<void> {
    await this.store.delete(session, "request");
  }

  public async isDetached(session: string): Promise<boolean> {
    return (await this.store.get(session, "detached")) === "1";
  }

  public async setDetached(session: string): Promise<void> {
    await this.store.set(session, "detached", "1");
  }

  public async clearDetached(session: string): Promise<void> {
    await this.store.delete(session, "detached");
  }
}
