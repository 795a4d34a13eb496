import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "../../logging/logger.js";

type ExecResult = { stdout: string; stderr: string };
type ExecCallback = (err: Error | null, result?: ExecResult) => void;

const calls: string[] = [];
let readbufError: Error | null = null;

vi.mock("node:child_process", () => {
  return {
    execFile: (cmd: string, args: string[], callback: ExecCallback) => {
      calls.push([cmd, ...args].join(" "));

      if (args[0] === "-ls") {
        const listing = `There is a screen on:\n\t31337.${args[1]}\t(Detached)\n1 Socket in /run/screen/S-root.\n`;
        queueMicrotask(() => callback(null, { stdout: listing, stderr: "" }));
        return;
      }
      if (args.includes("readbuf") && readbufError) {
        const err = readbufError;
        queueMicrotask(() => callback(err));
        return;
      }
      queueMicrotask(() => callback(null, { stdout: "", stderr: "" }));
    }
  };
});

describe("screen output parsing", async () => {
  const { findHypervisorProcess, parseSessionPid } = await import("../screenSessionManager.js");

  it("finds the session pid in a listing", () => {
    const listing = "There are screens on:\n\t12345.fc_abc\t(Detached)\n\t222.fc_abcd\t(Detached)\n2 Sockets in /run/screen/S-root.\n";
    expect(parseSessionPid(listing, "fc_abc")).toBe(12345);
    expect(parseSessionPid(listing, "fc_abcd")).toBe(222);
    expect(parseSessionPid(listing, "fc_ab")).toBeNull();
    expect(parseSessionPid("No Sockets found in /run/screen/S-root.\n", "fc_abc")).toBeNull();
  });

  it("picks the hypervisor process rather than its screen wrapper", () => {
    const ps = [
      "    1 Sun Oct 18 08:00:00 2026 /sbin/init",
      " 4241 Sun Oct 18 23:31:00 2026 SCREEN -dmS fc_abc -L -Logfile /data/abc/logs/abc_screen.log /usr/local/bin/firecracker --api-sock /data/abc/firecracker.socket --id abc",
      " 4242 Sun Oct 18 23:31:00 2026 /usr/local/bin/firecracker --api-sock /data/abc/firecracker.socket --id abc --log-path /data/abc/logs/abc.log",
      " 4300 Sun Oct 18 23:35:00 2026 /usr/local/bin/firecracker --api-sock /data/abd/firecracker.socket --id abd"
    ].join("\n");

    expect(findHypervisorProcess(ps, "abc")).toEqual({
      pid: 4242,
      startedAt: new Date("Sun Oct 18 23:31:00 2026").toISOString()
    });
    expect(findHypervisorProcess(ps, "abd")?.pid).toBe(4300);
    expect(findHypervisorProcess(ps, "zzz")).toBeNull();
  });
});

describe("ScreenSessionManager", async () => {
  // Import after mock.
  const { ScreenSessionManager } = await import("../screenSessionManager.js");
  const sessions = new ScreenSessionManager({ logger: silentLogger() });

  it("starts a detached, logged session and returns its pid", async () => {
    calls.length = 0;
    const pid = await sessions.startDetachedSession("fc_abc", "/usr/local/bin/firecracker", ["--id", "abc"], "/tmp/abc_screen.log");

    expect(pid).toBe(31337);
    expect(calls).toEqual([
      "screen -dmS fc_abc -L -Logfile /tmp/abc_screen.log /usr/local/bin/firecracker --id abc",
      "screen -ls fc_abc"
    ]);
  });

  it("injects a staged file through the paste buffer", async () => {
    calls.length = 0;
    readbufError = null;

    expect(await sessions.sendKeys("fc_abc", "/tmp/commands.txt")).toEqual({ exitCode: 0, stderr: "" });
    expect(calls).toEqual(["screen -S fc_abc -X readbuf /tmp/commands.txt", "screen -S fc_abc -X paste ."]);
  });

  it("reports injection failures instead of throwing", async () => {
    readbufError = Object.assign(new Error("Command failed"), { code: 1, stderr: "No screen session found.\n" });

    expect(await sessions.sendKeys("fc_gone", "/tmp/commands.txt")).toEqual({
      exitCode: 1,
      stderr: "No screen session found.\n"
    });
    readbufError = null;
  });

  it("quits a running session", async () => {
    calls.length = 0;
    await sessions.stopSession("fc_abc");
    expect(calls).toEqual(["screen -ls fc_abc", "screen -S fc_abc -X quit"]);
  });

  it("checks liveness with signal 0", () => {
    expect(sessions.isProcessAlive(process.pid)).toBe(true);
    expect(sessions.isProcessAlive(2147483000)).toBe(false);
  });
});
