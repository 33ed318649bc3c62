import { execFile, spawnSync } from "node:child_process";
import path from "node:path";
import { promisify } from "node:util";
import { describe, expect, test } from "vitest";
import { TmuxCliExecutor } from "../../src/tmux/cli-executor.js";

const execFileAsync = promisify(execFile);
const shouldRun = process.env.REAL_TMUX_SMOKE === "1";

const socketPath = (name: string): string => path.join("/tmp", `${name}.sock`);

const safeCleanup = async (sockPath: string): Promise<void> => {
  try {
    await execFileAsync("tmux", ["-S", sockPath, "kill-server"]);
  } catch {
    // the server may already be gone
  }
};

const canRunIsolatedTmux = (() => {
  if (!shouldRun) {
    return false;
  }

  const sockPath = socketPath(`termhand-preflight-${process.pid}`);
  const create = spawnSync("tmux", ["-S", sockPath, "new-session", "-d", "-s", "preflight"], {
    encoding: "utf8"
  });
  spawnSync("tmux", ["-S", sockPath, "kill-server"], { encoding: "utf8" });

  const output = `${create.stderr ?? ""}\n${create.stdout ?? ""}`.toLowerCase();
  if (output.includes("operation not permitted") || output.includes("permission denied")) {
    return false;
  }

  return create.status === 0;
})();

describe.skipIf(!canRunIsolatedTmux)("real tmux smoke", () => {
  test("creates, inspects and kills an isolated session", async () => {
    const sockPath = socketPath(`termhand-smoke-${process.pid}-${Date.now()}`);
    const sessionName = "smoke-main";
    const tmux = new TmuxCliExecutor({ socketPath: sockPath });

    await safeCleanup(sockPath);
    try {
      expect(await tmux.listSessions()).toEqual([]);

      await tmux.createSession({ name: sessionName, cols: 100, rows: 30, env: { SMOKE: "1" } });
      expect(await tmux.hasSession(sessionName)).toBe(true);
      expect(await tmux.hasSession("smoke")).toBe(false);

      const snapshot = await tmux.snapshot(sessionName);
      expect(snapshot.cols).toBe(100);
      expect(snapshot.rows).toBe(30);
      expect(snapshot.lines).toHaveLength(30);
      expect(snapshot.mode).toBe("normal");

      await tmux.setOption(sessionName, "@termhand_locked", "1");
      expect(await tmux.getOption(sessionName, "@termhand_locked")).toBe("1");
      await tmux.unsetOption(sessionName, "@termhand_locked");
      expect(await tmux.getOption(sessionName, "@termhand_locked")).toBeNull();

      await tmux.resizeWindow(sessionName, 90, undefined);
      expect((await tmux.snapshot(sessionName)).cols).toBe(90);

      await tmux.killSession(sessionName);
      expect(await tmux.hasSession(sessionName)).toBe(false);
    } finally {
      await safeCleanup(sockPath);
    }
  }, 20_000);

  test("keeps format fields and literal text intact without a utf-8 locale", async () => {
    const sockPath = socketPath(`termhand-locale-${process.pid}-${Date.now()}`);
    const tmux = new TmuxCliExecutor({ socketPath: sockPath });
    const saved = { LANG: process.env.LANG, LC_ALL: process.env.LC_ALL, LC_CTYPE: process.env.LC_CTYPE };
    delete process.env.LANG;
    delete process.env.LC_ALL;
    delete process.env.LC_CTYPE;

    await safeCleanup(sockPath);
    try {
      await tmux.createSession({ name: "semi", cols: 100, rows: 30, env: {}, shell: "sh" });
      expect((await tmux.listSessions()).map((session) => session.name)).toEqual(["semi"]);
      expect((await tmux.snapshot("semi")).cols).toBe(100);

      await tmux.sendText("semi", "echo A;");
      await new Promise((resolve) => setTimeout(resolve, 300));
      const screen = await tmux.capturePane("semi");
      expect(screen.split("\n").some((row) => row.endsWith("echo A;"))).toBe(true);
    } finally {
      for (const [key, value] of Object.entries(saved)) {
        if (value !== undefined) {
          process.env[key] = value;
        }
      }
      await safeCleanup(sockPath);
    }
  }, 20_000);
});
