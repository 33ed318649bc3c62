import { humanDetached, invalidInput, runtimeFailure, timedOut } from "../errors.js";
import { detected, pending, pollUntil, type Detection, type Detector } from "../detect/poll.js";
import type { SessionKeyValueStore } from "../session/option-store.js";
import type { TmuxGateway } from "../tmux/types.js";
import { formatSeconds, type Clock } from "../util/clock.js";
import type { Logger } from "../util/file-logger.js";
import { RequestStore, type RequestRecord } from "./request-record.js";

export const DEFAULT_REQUEST_MESSAGE = "Human assistance requested";

export type RequestState =
  | { state: "none" }
  | { state: "pending"; record: RequestRecord }
  | { state: "completed"; record: RequestRecord };

export interface WaitResult {
  response?: string;
  elapsedMs: number;
}

interface HandoffCoordinatorOptions {
  tmux: TmuxGateway;
  store: SessionKeyValueStore;
  clock: Clock;
  pollIntervalMs: number;
  /** Epoch milliseconds for stored timestamps; the poll loop uses `clock`. */
  wallClock?: () => number;
  logger?: Logger;
}

interface HandoffSample {
  exists: boolean;
  attachedClients: number;
  record: RequestRecord | null;
  detachedFlag: boolean;
}

type HandoffEvent =
  | { kind: "completed"; record: RequestRecord }
  | { kind: "detached" }
  | { kind: "cancelled" }
  | { kind: "gone" };

/**
 * Watches one pending request. A human leaving shows up either as the
 * detached flag written by `termhand-assist attach`, or as the attached
 * client count falling back to zero after having been non-zero.
 */
export class HandoffWatch implements Detector<HandoffSample, HandoffEvent> {
  public readonly minSamples = 1;
  private sawAttached = false;

  public observe(sample: HandoffSample): Detection<HandoffEvent> {
    if (!sample.exists) {
      return detected({ kind: "gone" });
    }
    if (!sample.record) {
      return detected({ kind: "cancelled" });
    }
    if (sample.record.status === "completed") {
      return detected({ kind: "completed", record: sample.record });
    }
    if (sample.detachedFlag) {
      return detected({ kind: "detached" });
    }
    if (sample.attachedClients > 0) {
      this.sawAttached = true;
    } else if (this.sawAttached) {
      return detected({ kind: "detached" });
    }
    return pending();
  }
}

export class HandoffCoordinator {
  private readonly requests: RequestStore;
  private readonly wallClock: () => number;

  public constructor(private readonly options: HandoffCoordinatorOptions) {
    this.requests = new RequestStore(options.store);
    this.wallClock = options.wallClock ?? Date.now;
  }

  public async status(session: string): Promise<RequestState> {
    const record = await this.requests.read(session);
    if (!record) {
      return { state: "none" };
    }
    return record.status === "pending"
      ? { state: "pending", record }
      : { state: "completed", record };
  }

  public async create(session: string, message: string): Promise<RequestRecord> {
    const existing = await this.requests.read(session);
    if (existing?.status === "pending") {
      throw invalidInput(
        `A request is already pending for session '${session}': ${existing.message}`
      );
    }
    const record: RequestRecord = {
      status: "pending",
      message,
      createdAt: this.wallClock()
    };
    await this.requests.clearDetached(session);
    await this.requests.write(session, record);
    this.options.logger?.log("[request] created", session, message);
    return record;
  }

  /** Returns null when nothing is pending, which the human side treats as a no-op. */
  public async complete(session: string, response?: string): Promise<RequestRecord | null> {
    const existing = await this.requests.read(session);
    if (existing?.status !== "pending") {
      return null;
    }
    const record: RequestRecord = {
      status: "completed",
      message: existing.message,
      createdAt: existing.createdAt,
      completedAt: this.wallClock(),
      ...(response !== undefined ? { response } : {})
    };
    await this.requests.write(session, record);
    await this.requests.clearDetached(session);
    this.options.logger?.log("[request] completed", session);
    return record;
  }

  public async cancel(session: string): Promise<RequestRecord> {
    const existing = await this.requests.read(session);
    if (existing?.status !== "pending") {
      throw invalidInput(`No pending request for session '${session}'`);
    }
    await this.requests.clear(session);
    await this.requests.clearDetached(session);
    this.options.logger?.log("[request] cancelled", session);
    return existing;
  }

  /** Called by the human side on leaving; returns whether a request was still pending. */
  public async markDetachedIfPending(session: string): Promise<boolean> {
    const existing = await this.requests.read(session);
    if (existing?.status !== "pending") {
      return false;
    }
    await this.requests.setDetached(session);
    return true;
  }

  /**
   * Blocks until the pending request is answered. A completed record is
   * delivered once and then cleared. A detach leaves the request pending so
   * the agent can wait again.
   */
  public async wait(session: string, timeoutMs: number): Promise<WaitResult> {
    const initial = await this.requests.read(session);
    if (!initial) {
      throw invalidInput(`No pending request for session '${session}'`);
    }
    if (initial.status === "completed") {
      await this.consume(session);
      return { response: initial.response, elapsedMs: 0 };
    }

    const outcome = await pollUntil(() => this.sample(session), new HandoffWatch(), {
      timeoutMs,
      intervalMs: this.options.pollIntervalMs,
      clock: this.options.clock
    });

    if (outcome.status === "timeout") {
      throw timedOut(`Timeout: no response after ${formatSeconds(outcome.elapsedMs)}`);
    }

    const event = outcome.value;
    switch (event.kind) {
      case "completed":
        await this.consume(session);
        return { response: event.record.response, elapsedMs: outcome.elapsedMs };
      case "detached":
        await this.requests.clearDetached(session);
        throw humanDetached(
          `Human detached without response (${formatSeconds(outcome.elapsedMs)})`
        );
      case "cancelled":
        throw runtimeFailure(`Request for session '${session}' was cancelled`);
      case "gone":
        throw runtimeFailure(`Session '${session}' no longer exists`);
    }
  }

  private async consume(session: string): Promise<void> {
    await this.requests.clear(session);
    await this.requests.clearDetached(session);
  }

  private async sample(session: string): Promise<HandoffSample> {
    const sessions = await this.options.tmux.listSessions();
    const summary = sessions.find((candidate) => candidate.name === session);
    if (!summary) {
      return { exists: false, attachedClients: 0, record: null, detachedFlag: false };
    }
    return {
      exists: true,
      attachedClients: summary.attachedClients,
      record: await this.requests.read(session),
      detachedFlag: await this.requests.isDetached(session)
    };
  }
}
