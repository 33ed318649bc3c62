import os from "node:os";
import { describe, expect, test } from "vitest";
import { kill, list, normalizeSessionName, resize, start, status } from "../../src/commands/session-commands.js";
import { setLocked } from "../../src/session/lock-state.js";
import { FakeTmuxGateway } from "../harness/fakeTmux.js";
import { createTestContext } from "../harness/context.js";

const startArgs = (session: string) => ({
  session,
  env: [],
  locked: false,
  noSize: false
});

describe("start", () => {
  test("creates a session at the default size", async () => {
    const ctx = createTestContext();
    await start(ctx, startArgs("web"));

    expect(ctx.io.stdout).toEqual(["Created session 'web' (80x24)"]);
    expect(ctx.tmux.session("web")).toMatchObject({ cols: 80, rows: 24 });
  });

  test("passes size, cwd and env through and can lock at birth", async () => {
    const ctx = createTestContext();
    await start(ctx, {
      ...startArgs("api"),
      cols: 132,
      rows: 40,
      cwd: os.tmpdir(),
      env: ["NODE_ENV=test"],
      locked: true
    });

    expect(ctx.io.stdout).toEqual(["Created session 'api' (132x40) [LOCKED]"]);
    expect(ctx.tmux.session("api")).toMatchObject({
      cols: 132,
      rows: 40,
      cwd: os.tmpdir(),
      env: { NODE_ENV: "test" }
    });
    expect(ctx.tmux.session("api").options.get("@termhand_locked")).toBe("1");
  });

  test("--no-size leaves the size to tmux", async () => {
    const ctx = createTestContext();
    await start(ctx, { ...startArgs("web"), noSize: true });
    expect(ctx.io.stdout).toEqual(["Created session 'web'"]);

    await expect(start(ctx, { ...startArgs("other"), noSize: true, cols: 100 })).rejects.toMatchObject({
      kind: "invalid-input",
      message: "--no-size cannot be combined with -x/--cols or -y/--rows"
    });
  });

  test("normalizes names the way tmux does", async () => {
    expect(normalizeSessionName("my.app:1")).toBe("my_app_1");
    const ctx = createTestContext();
    await start(ctx, startArgs("my.app"));
    expect(await ctx.tmux.hasSession("my_app")).toBe(true);
  });

  test("rejects bad input before touching tmux", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web"]) });

    await expect(start(ctx, startArgs("web"))).rejects.toMatchObject({
      kind: "invalid-input",
      message: "Session 'web' already exists"
    });
    await expect(start(ctx, { ...startArgs("x"), cwd: "/definitely/not/here" })).rejects.toMatchObject({
      kind: "invalid-input",
      message: "Working directory does not exist: /definitely/not/here"
    });
    await expect(start(ctx, { ...startArgs("x"), shell: "/definitely/not/a/shell" })).rejects.toMatchObject({
      kind: "invalid-input",
      message: "Shell is not executable: /definitely/not/a/shell"
    });
    await expect(start(ctx, { ...startArgs("x"), env: ["oops"] })).rejects.toMatchObject({
      kind: "invalid-input",
      message: "Invalid environment entry 'oops': must be KEY=VALUE"
    });
    await expect(start(ctx, { ...startArgs("x"), cols: 0 })).rejects.toMatchObject({
      kind: "invalid-input",
      message: "--cols must be a positive integer, got 0"
    });
    expect(ctx.tmux.calls.filter((call) => call.startsWith("createSession"))).toEqual([]);
  });
});

describe("kill", () => {
  test("kills one named session", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web", "db"]) });
    await kill(ctx, { session: "web", all: false, force: false }, "agent");

    expect(ctx.io.stdout).toEqual(["Killed session 'web'"]);
    expect((await ctx.tmux.listSessions()).map((session) => session.name)).toEqual(["db"]);
  });

  test("needs exactly one of --session and --all", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web"]) });
    await expect(kill(ctx, { session: "web", all: true, force: false }, "agent")).rejects.toMatchObject({
      kind: "invalid-input",
      message: "Cannot use --all with --session"
    });
    await expect(kill(ctx, { all: false, force: false }, "agent")).rejects.toMatchObject({
      kind: "invalid-input",
      message: "Either --session or --all is required"
    });
  });

  test("a missing session is a runtime failure", async () => {
    const ctx = createTestContext();
    await expect(kill(ctx, { session: "ghost", all: false, force: false }, "agent")).rejects.toMatchObject({
      kind: "runtime",
      message: "Session 'ghost' does not exist"
    });
  });

  test("the agent cannot kill a locked session unless it forces", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web"]) });
    await setLocked(ctx.store, "web", true);

    await expect(kill(ctx, { session: "web", all: false, force: false }, "agent")).rejects.toMatchObject({
      kind: "locked"
    });
    await kill(ctx, { session: "web", all: false, force: true }, "agent");
    expect(await ctx.tmux.hasSession("web")).toBe(false);
  });

  test("an attached session needs --force", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web"]) });
    ctx.tmux.setAttached("web", 1);

    await expect(kill(ctx, { session: "web", all: false, force: false }, "human")).rejects.toMatchObject({
      kind: "runtime",
      message: "Session 'web' has 1 attached client(s); use --force to kill it anyway"
    });
  });

  test("--all reports each kill, or that there was nothing", async () => {
    const empty = createTestContext();
    await kill(empty, { all: true, force: false }, "agent");
    expect(empty.io.stdout).toEqual(["No sessions to kill"]);

    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["a", "b"]) });
    await kill(ctx, { all: true, force: false }, "agent");
    expect(ctx.io.stdout).toEqual(["Killed session 'a'", "Killed session 'b'"]);
  });

  test("--all from the human side ignores locks", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["a", "b"]) });
    await setLocked(ctx.store, "b", true);

    await expect(kill(ctx, { all: true, force: false }, "agent")).rejects.toMatchObject({ kind: "locked" });
    await kill(ctx, { all: true, force: false }, "human");
    expect(await ctx.tmux.listSessions()).toEqual([]);
  });
});

describe("list, status and resize", () => {
  test("lists sessions by name with their lock", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web", "api"]) });
    await setLocked(ctx.store, "web", true);
    await list(ctx);
    expect(ctx.io.stdout).toEqual(["api", "web [LOCKED]"]);
  });

  test("reports the session's state", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web"]) });
    ctx.tmux.setAttached("web", 2);
    await status(ctx, "web");

    expect(ctx.io.stdout).toEqual([
      "Session: web",
      "State: at prompt",
      "Command: bash (pid 4242)",
      "Directory: /home/user",
      "Size: 80x24",
      "Cursor: 13,0",
      "Screen: normal",
      "Attached: yes (2 client(s))",
      "Locked: no",
      "Logging: no",
      "Request: none",
      "Created: 2023-11-14T22:13:21.000Z"
    ]);
  });

  test("shows a pending request and a busy pane", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web"]) });
    ctx.tmux.setScreen("web", ["npm install", "added 12 packages"], { x: 17, y: 1 });
    await ctx.store.set("web", "request", JSON.stringify({ status: "pending", message: "2FA code", createdAt: 1 }));
    await status(ctx, "web");

    expect(ctx.io.stdout[1]).toBe("State: busy");
    expect(ctx.io.stdout[10]).toBe("Request: pending: 2FA code");
  });

  test("resizes and reports the new size", async () => {
    const ctx = createTestContext({ tmux: new FakeTmuxGateway(["web"]) });
    await resize(ctx, { session: "web", cols: 100 });
    expect(ctx.io.stdout).toEqual(["Resized session 'web' to 100x24"]);

    await expect(resize(ctx, { session: "web" })).rejects.toMatchObject({
      kind: "invalid-input",
      message: "Must specify -x/--cols and/or -y/--rows"
    });
    await setLocked(ctx.store, "web", true);
    await expect(resize(ctx, { session: "web", rows: 10 })).rejects.toMatchObject({ kind: "locked" });
  });
});
