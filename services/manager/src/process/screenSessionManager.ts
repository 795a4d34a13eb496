import { execFile } from "node:child_process";
import { setTimeout as delay } from "node:timers/promises";
import { promisify } from "node:util";
import type { Logger } from "../logging/logger.js";
import type { SessionManager } from "../types/interfaces.js";

const execFileAsync = promisify(execFile);

export interface ScreenSessionOptions {
  logger: Logger;
  screenBin?: string;
  /** Grace period between SIGTERM and SIGKILL. */
  killGraceMs?: number;
}

/**
 * Hosts hypervisor processes inside detached GNU screen sessions so their serial
 * console stays reachable (`screen -r fc_<id>`) after the manager exits.
 */
export class ScreenSessionManager implements SessionManager {
  private readonly screenBin: string;

  constructor(private readonly options: ScreenSessionOptions) {
    this.screenBin = options.screenBin ?? "screen";
  }

  async startDetachedSession(sessionName: string, binary: string, args: string[], logPath: string): Promise<number> {
    await execFileAsync(this.screenBin, ["-dmS", sessionName, "-L", "-Logfile", logPath, binary, ...args]);
    const pid = await this.sessionPid(sessionName);
    if (pid === null) {
      throw new Error(`screen session ${sessionName} exited immediately`);
    }
    this.options.logger.debug({ sessionName, pid }, "screen session started");
    return pid;
  }

  isProcessAlive(pid: number): boolean {
    try {
      process.kill(pid, 0); // Signal 0 = check existence
      return true;
    } catch {
      return false;
    }
  }

  async getPidAndStartTime(vmId: string): Promise<{ pid: number; startedAt: string } | null> {
    const { stdout } = await execFileAsync("ps", ["-eo", "pid=,lstart=,args="]);
    return findHypervisorProcess(stdout, vmId);
  }

  async sendKeys(sessionName: string, textFile: string): Promise<{ exitCode: number; stderr: string }> {
    try {
      await execFileAsync(this.screenBin, ["-S", sessionName, "-X", "readbuf", textFile]);
      await execFileAsync(this.screenBin, ["-S", sessionName, "-X", "paste", "."]);
      return { exitCode: 0, stderr: "" };
    } catch (err) {
      return { exitCode: exitCodeOf(err), stderr: stderrOf(err) };
    }
  }

  async stopSession(sessionName: string): Promise<void> {
    if ((await this.sessionPid(sessionName)) === null) return;
    await execFileAsync(this.screenBin, ["-S", sessionName, "-X", "quit"]);
  }

  async killProcess(pid: number): Promise<void> {
    if (!this.isProcessAlive(pid)) return;
    process.kill(pid, "SIGTERM");
    await delay(this.options.killGraceMs ?? 500);
    if (this.isProcessAlive(pid)) {
      process.kill(pid, "SIGKILL");
    }
  }

  private async sessionPid(sessionName: string): Promise<number | null> {
    // `screen -ls` exits 1 when it lists nothing; stdout is still useful.
    const stdout = await execFileAsync(this.screenBin, ["-ls", sessionName])
      .then((r) => r.stdout)
      .catch((err: unknown) => stdoutOf(err));
    return parseSessionPid(stdout, sessionName);
  }
}

/** Finds `<pid>.<sessionName>` in `screen -ls` output. */
export function parseSessionPid(listing: string, sessionName: string): number | null {
  for (const line of listing.split("\n")) {
    const match = /^\s*(\d+)\.(\S+)/.exec(line);
    if (match && match[2] === sessionName) return Number(match[1]);
  }
  return null;
}

/**
 * Parses `ps -eo pid=,lstart=,args=` output. `lstart` is always five fields
 * (e.g. `Sat Oct 18 23:31:00 2026`).
 */
export function findHypervisorProcess(psOutput: string, vmId: string): { pid: number; startedAt: string } | null {
  for (const line of psOutput.split("\n")) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 7) continue;
    const args = fields.slice(6);
    // Skip the screen wrapper; we want the hypervisor itself.
    if (/screen$/i.test(args[0])) continue;
    const idIndex = args.indexOf("--id");
    if (idIndex === -1 || args[idIndex + 1] !== vmId) continue;
    const started = new Date(fields.slice(1, 6).join(" "));
    return {
      pid: Number(fields[0]),
      startedAt: Number.isNaN(started.getTime()) ? fields.slice(1, 6).join(" ") : started.toISOString()
    };
  }
  return null;
}

function exitCodeOf(err: unknown): number {
  if (err instanceof Error && "code" in err && typeof err.code === "number") return err.code;
  return 1;
}

function stderrOf(err: unknown): string {
  if (err instanceof Error && "stderr" in err && typeof err.stderr === "string") return err.stderr;
  return err instanceof Error ? err.message : String(err);
}

function stdoutOf(err: unknown): string {
  if (err instanceof Error && "stdout" in err && typeof err.stdout === "string") return err.stdout;
  return "";
}
