import { EventEmitter } from "node:events";
import { isLocked, setLocked } from "../session/lock-state.js";
import type { SessionKeyValueStore } from "../session/option-store.js";
import type { TmuxGateway } from "../tmux/types.js";
import type { HandoffCoordinator } from "./coordinator.js";
import { RequestStore, type RequestRecord } from "./request-record.js";

export interface BoardEntry {
  session: string;
  attachedClients: number;
  locked: boolean;
  request: RequestRecord | null;
}

/**
 * Polled view of every session on the server, for the human-side watcher.
 * Emits "update" with the entries whenever they change and "error" when a poll fails.
 */
export class RequestBoard extends EventEmitter {
  private timer?: NodeJS.Timeout;
  private running = false;
  private entries: BoardEntry[] = [];
  private lastSerialized?: string;
  private readonly requests: RequestStore;

  public constructor(
    private readonly tmux: TmuxGateway,
    private readonly store: SessionKeyValueStore,
    private readonly coordinator: HandoffCoordinator,
    private readonly pollIntervalMs: number
  ) {
    super();
    this.requests = new RequestStore(store);
  }

  public getEntries(): BoardEntry[] {
    return this.entries;
  }

  public getPending(): BoardEntry[] {
    return this.entries.filter((entry) => entry.request?.status === "pending");
  }

  public async start(): Promise<void> {
    this.running = true;
    await this.refresh(true);
    this.scheduleNextTick();
  }

  public stop(): void {
    this.running = false;
    clearTimeout(this.timer);
    this.timer = undefined;
  }

  public async complete(session: string, response?: string): Promise<boolean> {
    const record = await this.coordinator.complete(session, response);
    await this.refresh(true);
    return record !== null;
  }

  public async toggleLock(session: string): Promise<boolean> {
    const locked = !(await isLocked(this.store, session));
    await setLocked(this.store, session, locked);
    await this.refresh(true);
    return locked;
  }

  public async refresh(force = false): Promise<void> {
    const sessions = await this.tmux.listSessions();
    const entries: BoardEntry[] = [];
    for (const session of sessions) {
      entries.push({
        session: session.name,
        attachedClients: session.attachedClients,
        locked: await isLocked(this.store, session.name),
        request: await this.requests.read(session.name)
      });
    }

    const serialized = JSON.stringify(entries);
    if (force || serialized !== this.lastSerialized) {
      this.lastSerialized = serialized;
      this.entries = entries;
      this.emit("update", entries);
    }
  }

  private scheduleNextTick(): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.refresh()
        .catch((error: unknown) => {
          this.emit("error", error instanceof Error ? error : new Error(String(error)));
        })
        .finally(() => {
          this.scheduleNextTick();
        });
    }, this.pollIntervalMs);
  }
}
