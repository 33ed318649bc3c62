import { describe, expect, test } from "vitest";
import { CommandError } from "../../src/errors.js";
import {
  describeBlockers,
  findBlockers,
  killAllSessions
} from "../../src/session/bulk-guard.js";
import {
  ALLOWED_WHEN_LOCKED,
  ensureCommandAllowed,
  isLocked,
  setLocked
} from "../../src/session/lock-state.js";
import { TmuxOptionStore, optionName } from "../../src/session/option-store.js";
import { FakeTmuxGateway } from "../harness/fakeTmux.js";

describe("option store", () => {
  test("keeps values as prefixed tmux user options", async () => {
    const tmux = new FakeTmuxGateway(["main"]);
    const store = new TmuxOptionStore(tmux);

    await store.set("main", "locked", "1");
    expect(tmux.session("main").options.get("@termhand_locked")).toBe("1");
    expect(await store.get("main", "locked")).toBe("1");

    await store.delete("main", "locked");
    expect(await store.get("main", "locked")).toBeNull();
    expect(optionName("dl_strategy")).toBe("@termhand_dl_strategy");
  });
});

describe("session lock", () => {
  test("setLocked reports whether anything changed", async () => {
    const store = new TmuxOptionStore(new FakeTmuxGateway(["main"]));

    expect(await setLocked(store, "main", true)).toBe(true);
    expect(await setLocked(store, "main", true)).toBe(false);
    expect(await isLocked(store, "main")).toBe(true);
    expect(await setLocked(store, "main", false)).toBe(true);
    expect(await isLocked(store, "main")).toBe(false);
  });

  test("blocks acting commands on a locked session", async () => {
    const store = new TmuxOptionStore(new FakeTmuxGateway(["main"]));
    await setLocked(store, "main", true);

    const error = await ensureCommandAllowed(store, "main", "run").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({
      kind: "locked",
      message: "Session 'main' is locked for human use; 'run' is not allowed"
    });
  });

  test("lets observing commands through", async () => {
    const store = new TmuxOptionStore(new FakeTmuxGateway(["main"]));
    await setLocked(store, "main", true);

    for (const command of ALLOWED_WHEN_LOCKED) {
      await expect(ensureCommandAllowed(store, "main", command)).resolves.toBeUndefined();
    }
    expect([...ALLOWED_WHEN_LOCKED].sort()).toEqual([
      "capture",
      "list",
      "pipe-log",
      "request",
      "request-cancel",
      "request-status",
      "request-wait",
      "scroll",
      "status",
      "unpipe",
      "wait",
      "wait-for",
      "wait-idle"
    ]);
  });
});

describe("bulk kill guard", () => {
  test("names every blocker, locks first", () => {
    const blockers = findBlockers(
      [
        { name: "a", locked: true, attachedClients: 0 },
        { name: "b", locked: false, attachedClients: 2 },
        { name: "c", locked: false, attachedClients: 0 },
        { name: "d", locked: true, attachedClients: 1 }
      ],
      { force: false }
    );
    expect(blockers).toEqual([
      { name: "a", reason: "locked" },
      { name: "b", reason: "attached" },
      { name: "d", reason: "locked" }
    ]);
    expect(describeBlockers(blockers)).toBe(
      "Refusing to kill any session; locked: a, d; attached (use --force): b"
    );
  });

  test("force clears attached blockers but never locks", () => {
    const candidates = [
      { name: "a", locked: true, attachedClients: 0 },
      { name: "b", locked: false, attachedClients: 1 }
    ];
    expect(findBlockers(candidates, { force: true })).toEqual([{ name: "a", reason: "locked" }]);
    expect(findBlockers(candidates, { force: true, ignoreLocks: true })).toEqual([]);
  });

  test("kills nothing when one session is locked", async () => {
    const tmux = new FakeTmuxGateway(["one", "two", "three"]);
    const store = new TmuxOptionStore(tmux);
    await setLocked(store, "two", true);

    await expect(killAllSessions(tmux, store, { force: true })).rejects.toMatchObject({
      kind: "locked",
      message: "Refusing to kill any session; locked: two"
    });
    expect(tmux.calls.filter((call) => call.startsWith("killSession"))).toEqual([]);
    expect((await tmux.listSessions()).map((session) => session.name)).toEqual(["one", "two", "three"]);
  });

  test("an attached session without force is a runtime failure", async () => {
    const tmux = new FakeTmuxGateway(["one", "two"]);
    tmux.setAttached("one", 1);

    await expect(killAllSessions(tmux, new TmuxOptionStore(tmux), { force: false })).rejects.toMatchObject({
      kind: "runtime",
      message: "Refusing to kill any session; attached (use --force): one"
    });
  });

  test("kills every session in order once all pass", async () => {
    const tmux = new FakeTmuxGateway(["one", "two"]);
    tmux.setAttached("two", 1);

    const killed = await killAllSessions(tmux, new TmuxOptionStore(tmux), { force: true });

    expect(killed).toEqual(["one", "two"]);
    expect(await tmux.listSessions()).toEqual([]);
  });
});
