import fs from "node:fs/promises";
import path from "node:path";
import type { RetrySettings } from "../config/env.js";
import type { ResolvedVmConfig } from "../config/vmConfig.js";
import { APIError, ConfigurationError, ProcessError, errorMessage } from "../errors/vmmErrors.js";
import type { Logger } from "../logging/logger.js";
import type { FirecrackerApi, FirecrackerApiFactory, SessionManager } from "../types/interfaces.js";
import { RetryExhaustedError, retry } from "../utils/retry.js";

export interface ProcessSupervisorOptions {
  sessions: SessionManager;
  apiFactory: FirecrackerApiFactory;
  logger: Logger;
  socketRetry: RetrySettings;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface SupervisedProcess {
  /** Hypervisor pid (falls back to the session pid when the hypervisor cannot be located). */
  pid: number;
  startedAt: string;
  api: FirecrackerApi;
}

/** What `cleanup` needs to tear an instance's process and files down. */
export type ProcessHandle = Pick<ResolvedVmConfig, "id" | "sessionName" | "vmDir">;

class SocketNotReadyError extends Error {
  constructor(socketPath: string) {
    super(`API socket ${socketPath} does not exist yet`);
    this.name = "SocketNotReadyError";
  }
}

export class ProcessSupervisor {
  private readonly logger: Logger;

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.logger = options.logger.child({ component: "supervisor" });
  }

  /**
   * Lays out the instance directory, copies the base image, starts the hypervisor inside
   * a detached session and waits for its control socket. On failure everything started
   * here is torn down before the error propagates.
   */
  async spawn(config: ResolvedVmConfig): Promise<SupervisedProcess> {
    const { sessions } = this.options;
    await fs.rm(config.socketPath, { force: true });

    let sessionPid: number | undefined;
    try {
      for (const dir of [config.vmDir, path.dirname(config.rootfsPath), config.logsDir]) {
        await fs.mkdir(dir, { recursive: true });
      }
      await copyRootfs(config.baseRootfs, config.rootfsPath);
      await fs.appendFile(config.logPath, "");
      await fs.appendFile(config.screenLogPath, "");

      const args = ["--api-sock", config.socketPath, "--id", config.id, "--log-path", config.logPath];
      sessionPid = await sessions.startDetachedSession(config.sessionName, config.firecrackerBin, args, config.screenLogPath);
      this.logger.debug({ vmId: config.id, sessionPid }, "hypervisor session started");

      const pidToWatch = sessionPid;
      await this.waitForSocket(config, () => sessions.isProcessAlive(pidToWatch));

      const found = await sessions.getPidAndStartTime(config.id);
      const pid = found?.pid ?? sessionPid;
      if (!sessions.isProcessAlive(pid)) {
        throw new ProcessError(`Firecracker process for ${config.id} is not running`);
      }

      this.logger.info({ vmId: config.id, pid }, "hypervisor ready");
      return {
        pid,
        startedAt: found?.startedAt ?? new Date().toISOString(),
        api: this.options.apiFactory(config.socketPath)
      };
    } catch (err) {
      await this.cleanup(config, sessionPid);
      throw err;
    }
  }

  /** Stops the session, kills the process and removes the instance tree. Never throws. */
  async cleanup(handle: ProcessHandle, pid?: number): Promise<void> {
    await this.stop(handle, pid);
    await fs.rm(handle.vmDir, { recursive: true, force: true }).catch((err: unknown) => {
      this.logger.warn({ vmId: handle.id, err: errorMessage(err) }, "failed to remove instance directory during cleanup");
    });
  }

  /** Stops the session and kills the process, leaving the instance tree in place. Never throws. */
  async stop(handle: Pick<ProcessHandle, "id" | "sessionName">, pid?: number): Promise<void> {
    const { sessions } = this.options;
    await sessions.stopSession(handle.sessionName).catch((err: unknown) => {
      this.logger.warn({ vmId: handle.id, err: errorMessage(err) }, "failed to stop session during cleanup");
    });
    if (pid !== undefined) {
      await sessions.killProcess(pid).catch((err: unknown) => {
        this.logger.warn({ vmId: handle.id, pid, err: errorMessage(err) }, "failed to kill process during cleanup");
      });
    }
  }

  private async waitForSocket(config: ResolvedVmConfig, alive: () => boolean): Promise<void> {
    const { attempts, delayMs } = this.options.socketRetry;
    try {
      await retry(
        async () => {
          if (!alive()) {
            throw new ProcessError(`Firecracker process for ${config.id} exited before its API socket appeared`);
          }
          const exists = await fs
            .stat(config.socketPath)
            .then(() => true)
            .catch(() => false);
          if (!exists) throw new SocketNotReadyError(config.socketPath);
        },
        {
          attempts,
          delayMs,
          shouldRetry: (err) => err instanceof SocketNotReadyError,
          onRetry: (_err, attempt) => this.logger.debug({ vmId: config.id, attempt }, "waiting for API socket"),
          sleep: this.options.sleep
        }
      );
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new APIError(`Failed to connect to the API socket after ${err.attempts} attempts`, { cause: err.lastError });
      }
      throw err;
    }
  }
}

async function copyRootfs(source: string, dest: string): Promise<void> {
  try {
    await fs.copyFile(source, dest);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ConfigurationError(`Base rootfs not found: ${source}`, { field: "baseRootfs", cause: err });
    }
    throw err;
  }
}
