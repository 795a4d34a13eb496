import fs from "node:fs/promises";
import type { Duplex } from "node:stream";
import { Client, type ClientChannel } from "ssh2";
import type { RetrySettings } from "../config/env.js";
import { VMMError, errorMessage } from "../errors/vmmErrors.js";
import type { Logger } from "../logging/logger.js";
import type { RemoteShell, ShellSession } from "../types/interfaces.js";
import { RetryExhaustedError, retry } from "../utils/retry.js";

/** Transport failures that mean "the guest is not reachable yet". */
export const RETRYABLE_SSH_CODES: ReadonlySet<string> = new Set(["ECONNREFUSED", "EHOSTUNREACH", "ENETUNREACH", "ETIMEDOUT"]);

export function isRetryableSshError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ("code" in err && typeof err.code === "string") return RETRYABLE_SSH_CODES.has(err.code);
  // ssh2 reports its own handshake timeout without an errno code.
  return "level" in err && err.level === "client-timeout";
}

export interface SshRemoteShellOptions {
  logger: Logger;
  retry: RetrySettings;
  port?: number;
  readyTimeoutMs?: number;
  /** Swappable for tests. */
  createClient?: () => Client;
  sleep?: (ms: number) => Promise<unknown>;
}

export class SshRemoteShell implements RemoteShell {
  private readonly logger: Logger;

  constructor(private readonly options: SshRemoteShellOptions) {
    this.logger = options.logger.child({ component: "ssh" });
  }

  async connect(host: string, username: string, keyPath: string): Promise<ShellSession> {
    const privateKey = await fs.readFile(keyPath);
    try {
      return await retry(() => this.connectOnce(host, username, privateKey), {
        attempts: this.options.retry.attempts,
        delayMs: this.options.retry.delayMs,
        shouldRetry: isRetryableSshError,
        onRetry: (err, attempt) =>
          this.logger.info({ host, attempt, err: errorMessage(err) }, "ssh connection failed, retrying"),
        sleep: this.options.sleep
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new VMMError(
          `Could not connect to ${host} after ${err.attempts} attempts: ${errorMessage(err.lastError)}`,
          { cause: err.lastError }
        );
      }
      throw err;
    }
  }

  private connectOnce(host: string, username: string, privateKey: Buffer): Promise<SshShellSession> {
    const client = this.options.createClient?.() ?? new Client();
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        client.removeListener("ready", onReady);
        client.end();
        reject(err);
      };
      const onReady = () => {
        client.removeListener("error", onError);
        resolve(new SshShellSession(client, this.logger));
      };
      client.once("ready", onReady);
      client.once("error", onError);
      client.connect({
        host,
        port: this.options.port ?? 22,
        username,
        privateKey,
        readyTimeout: this.options.readyTimeoutMs ?? 10_000
      });
    });
  }
}

/**
 * An established connection. Transport errors after the handshake destroy the open
 * channel so whoever relays it sees the failure.
 */
export class SshShellSession implements ShellSession {
  private channel: ClientChannel | null = null;
  private failure: Error | null = null;

  constructor(
    private readonly client: Client,
    private readonly logger: Logger
  ) {
    client.on("error", (err: Error) => {
      this.failure = err;
      this.logger.warn({ err: err.message }, "ssh connection lost");
      this.channel?.destroy();
    });
  }

  openShell(size: { rows: number; cols: number }): Promise<Duplex> {
    const failure = this.failure;
    if (failure) return Promise.reject(failure);
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.client.once("error", onError);
      this.client.shell({ rows: size.rows, cols: size.cols, term: process.env.TERM ?? "xterm-256color" }, (err, channel) => {
        this.client.removeListener("error", onError);
        if (err) {
          reject(err);
          return;
        }
        this.channel = channel;
        resolve(channel);
      });
    });
  }

  resize(size: { rows: number; cols: number }): void {
    this.channel?.setWindow(size.rows, size.cols, 0, 0);
  }

  close(): void {
    this.client.end();
  }
}
