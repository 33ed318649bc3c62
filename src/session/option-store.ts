import type { TmuxGateway } from "../tmux/types.js";

export type SessionKey = "locked" | "request" | "detached" | "dl_strategy";

/** Per-session persisted values that outlive one CLI invocation. */
export interface SessionKeyValueStore {
  get(session: string, key: SessionKey): Promise<string | null>;
  set(session: string, key: SessionKey, value: string): Promise<void>;
  delete(session: string, key: SessionKey): Promise<void>;
}

export const OPTION_PREFIX = "@termhand_";

export const optionName = (key: SessionKey): string => `${OPTION_PREFIX}${key}`;

/** Stores values as tmux user options, so they live and die with the session. */
export class TmuxOptionStore implements SessionKeyValueStore {
  public constructor(private readonly tmux: TmuxGateway) {}

  public get(session: string, key: SessionKey): Promise<string | null> {
    return this.tmux.getOption(session, optionName(key));
  }

  public set(session: string, key: SessionKey, value: string): Promise<void> {
    return this.tmux.setOption(session, optionName(key), value);
  }

  public delete(session: string, key: SessionKey): Promise<void> {
    return this.tmux.unsetOption(session, optionName(key));
  }
}
