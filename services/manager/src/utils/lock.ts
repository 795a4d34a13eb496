import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { VMMError, errorMessage } from "../errors/vmmErrors.js";
import type { Logger } from "../logging/logger.js";
import { atomicWriteJson } from "./atomicWrite.js";

export interface LockOptions {
  timeoutMs: number;
  /**
   * A lock whose holder has not refreshed it for this long is abandoned. Holders
   * refresh it every third of this interval while their section runs.
   */
  staleMs?: number;
  logger?: Logger;
}

interface LockContent {
  pid: number;
  token?: string;
  acquiredAt: number;
  refreshedAt: number;
}

export class LockTimeoutError extends VMMError {
  constructor(public readonly lockPath: string) {
    super(`Timed out waiting for lock ${lockPath}`);
  }
}

function backoff(attempt: number): number {
  // 25, 50, 100, ... capped at 500
  return Math.min(25 * 2 ** attempt, 500);
}

function pidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * Advisory inter-process lock backed by an exclusively created file.
 * Callers in the same process queue on a promise chain first; nested `withLock`
 * calls from inside a held section run inline.
 */
export class FileLock {
  private chain: Promise<void> = Promise.resolve();
  private readonly held = new AsyncLocalStorage<true>();

  constructor(
    private readonly lockPath: string,
    private readonly options: LockOptions
  ) {}

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    if (this.held.getStore()) {
      return fn();
    }

    const previous = this.chain;
    let release: () => void = () => {};
    this.chain = new Promise((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      const content = await this.acquire();
      const heartbeat = this.startHeartbeat(content);
      try {
        return await this.held.run(true, fn);
      } finally {
        await heartbeat.stop();
        await this.releaseIfOwned(content.token);
      }
    } finally {
      release();
    }
  }

  private get staleMs(): number {
    return this.options.staleMs ?? 10 * 60_000;
  }

  private async acquire(): Promise<LockContent> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
    const started = Date.now();
    let attempt = 0;
    for (;;) {
      try {
        const handle = await fs.open(this.lockPath, "wx");
        const now = Date.now();
        const content: LockContent = { pid: process.pid, token: randomUUID(), acquiredAt: now, refreshedAt: now };
        try {
          await handle.writeFile(JSON.stringify(content));
        } finally {
          await handle.close();
        }
        return content;
      } catch (err) {
        if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
      }

      if (await this.isStale()) {
        await fs.rm(this.lockPath, { force: true });
        continue;
      }
      if (Date.now() - started >= this.options.timeoutMs) {
        throw new LockTimeoutError(this.lockPath);
      }
      await delay(backoff(attempt));
      attempt += 1;
    }
  }

  /** Rewrites `refreshedAt` periodically so long sections never look abandoned. */
  private startHeartbeat(content: LockContent): { stop: () => Promise<void> } {
    let pending: Promise<void> = Promise.resolve();
    const timer = setInterval(() => {
      pending = pending
        .then(() => this.refresh(content))
        .catch((err: unknown) => {
          this.options.logger?.warn({ lockPath: this.lockPath, err: errorMessage(err) }, "failed to refresh lock");
        });
    }, Math.max(1, Math.floor(this.staleMs / 3)));
    timer.unref();
    return {
      stop: async () => {
        clearInterval(timer);
        await pending;
      }
    };
  }

  private async refresh(content: LockContent): Promise<void> {
    const current = await this.readContent();
    if (current?.token !== content.token) return;
    await atomicWriteJson(this.lockPath, { ...content, refreshedAt: Date.now() });
  }

  /** Removes the lock file unless another holder has taken it over. */
  private async releaseIfOwned(token: string | undefined): Promise<void> {
    const current = await this.readContent();
    if (current?.token !== token) {
      this.options.logger?.warn({ lockPath: this.lockPath }, "lock was taken over while held");
      return;
    }
    await fs.rm(this.lockPath, { force: true });
  }

  private async readContent(): Promise<LockContent | null> {
    const text = await fs.readFile(this.lockPath, "utf-8").catch((err: unknown) => {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    });
    return text === null ? null : parseLockContent(text);
  }

  private async isStale(): Promise<boolean> {
    let text: string;
    try {
      text = await fs.readFile(this.lockPath, "utf-8");
    } catch (err) {
      // Released between our open and read; try again.
      if (isErrnoException(err) && err.code === "ENOENT") return false;
      throw err;
    }
    const content = parseLockContent(text);
    // Half-written lock files are treated as held until they age out.
    if (!content) {
      const stat = await fs.stat(this.lockPath).catch(() => null);
      return stat !== null && Date.now() - stat.mtimeMs > this.staleMs;
    }
    if (content.pid !== process.pid && !pidAlive(content.pid)) return true;
    return Date.now() - content.refreshedAt > this.staleMs;
  }
}

function parseLockContent(text: string): LockContent | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "pid" in parsed &&
      "acquiredAt" in parsed &&
      typeof parsed.pid === "number" &&
      typeof parsed.acquiredAt === "number"
    ) {
      const token = "token" in parsed && typeof parsed.token === "string" ? parsed.token : undefined;
      const refreshedAt =
        "refreshedAt" in parsed && typeof parsed.refreshedAt === "number" ? parsed.refreshedAt : parsed.acquiredAt;
      return { pid: parsed.pid, token, acquiredAt: parsed.acquiredAt, refreshedAt };
    }
    return null;
  } catch {
    return null;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
