import fs from "node:fs/promises";
import path from "node:path";
import { NameConflictError, errorMessage } from "../errors/vmmErrors.js";
import { vmDocumentPath } from "../firecracker/socketPaths.js";
import type { Logger } from "../logging/logger.js";
import type { VmStore } from "../types/interfaces.js";
import type { PersistedVmState, VmRecord } from "../types/vm.js";
import { atomicWriteJson } from "../utils/atomicWrite.js";
import { FileLock } from "../utils/lock.js";

export interface FileVmStoreOptions {
  dataPath: string;
  lockTimeoutMs: number;
  logger?: Logger;
}

/**
 * Persists instance records under DATA_PATH so every operation (and every manager
 * process) sees the same registry.
 *
 * Layout:
 * - ${DATA_PATH}/${vmId}/config.json
 * - ${DATA_PATH}/.registry.lock while a mutation is in flight
 *
 * The instance directory also holds the rootfs copy, logs and control socket, so
 * `delete` removes the whole tree.
 */
export class FileVmStore implements VmStore {
  private readonly lock: FileLock;

  constructor(private readonly options: FileVmStoreOptions) {
    this.lock = new FileLock(path.join(options.dataPath, ".registry.lock"), {
      timeoutMs: options.lockTimeoutMs,
      logger: options.logger
    });
  }

  withLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.withLock(fn);
  }

  async create(vm: VmRecord): Promise<void> {
    await this.withLock(async () => {
      const existing = await this.list();
      if (existing.some((other) => other.name === vm.name && other.id !== vm.id)) {
        throw new NameConflictError(vm.name);
      }
      await this.writeVm(vm);
    });
  }

  async update(id: string, patch: Partial<Omit<VmRecord, "id">>): Promise<VmRecord | null> {
    return this.withLock(async () => {
      const current = await this.get(id);
      if (!current) return null;
      const next: VmRecord = { ...current, ...patch, id };
      await this.writeVm(next);
      return next;
    });
  }

  updateState(id: string, state: PersistedVmState): Promise<VmRecord | null> {
    return this.update(id, { state });
  }

  async get(id: string): Promise<VmRecord | null> {
    if (!isSafeId(id)) return null;
    let text: string;
    try {
      text = await fs.readFile(vmDocumentPath(this.options.dataPath, id), "utf-8");
    } catch {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      if (isVmRecord(parsed)) return parsed;
      this.options.logger?.warn({ vmId: id }, "ignoring malformed instance document");
    } catch (err) {
      this.options.logger?.warn({ vmId: id, err: errorMessage(err) }, "ignoring unreadable instance document");
    }
    return null;
  }

  async list(): Promise<VmRecord[]> {
    const entries = await fs.readdir(this.options.dataPath, { withFileTypes: true }).catch(() => []);
    const vms: VmRecord[] = [];
    for (const e of entries) {
      if (!e.isDirectory() || e.name.startsWith(".")) continue;
      const vm = await this.get(e.name);
      if (vm) vms.push(vm);
    }
    return vms.sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
  }

  async findByStateAndLabels(state: PersistedVmState, labels: Record<string, string> = {}): Promise<VmRecord[]> {
    const wanted = Object.entries(labels);
    return (await this.list()).filter(
      (vm) => vm.state === state && wanted.every(([key, value]) => vm.labels[key] === value)
    );
  }

  async delete(id: string): Promise<boolean> {
    if (!isSafeId(id)) return false;
    return this.withLock(async () => {
      const dir = path.join(this.options.dataPath, id);
      const exists = await fs
        .stat(vmDocumentPath(this.options.dataPath, id))
        .then(() => true)
        .catch(() => false);
      await fs.rm(dir, { recursive: true, force: true });
      return exists;
    });
  }

  async checkIpInUse(ip: string): Promise<boolean> {
    return (await this.usedIps()).has(ip);
  }

  async usedIps(): Promise<Set<string>> {
    const ips = new Set<string>();
    for (const vm of await this.list()) {
      for (const entry of Object.values(vm.network)) {
        ips.add(entry.ipAddress);
      }
    }
    return ips;
  }

  private async writeVm(vm: VmRecord): Promise<void> {
    await atomicWriteJson(vmDocumentPath(this.options.dataPath, vm.id), vm);
  }
}

function isSafeId(id: string): boolean {
  return /^[A-Za-z0-9_-]+$/.test(id);
}

function isRecordOf(value: unknown, check: (v: unknown) => boolean): boolean {
  return typeof value === "object" && value !== null && !Array.isArray(value) && Object.values(value).every(check);
}

function isVmRecord(value: unknown): value is VmRecord {
  if (typeof value !== "object" || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.id === "string" &&
    typeof v.name === "string" &&
    (v.state === "RUNNING" || v.state === "PAUSED") &&
    typeof v.pid === "number" &&
    typeof v.createdAt === "string" &&
    typeof v.rootfsPath === "string" &&
    typeof v.kernelPath === "string" &&
    typeof v.socketPath === "string" &&
    typeof v.logsDir === "string" &&
    typeof v.vcpu === "number" &&
    typeof v.memSizeMib === "number" &&
    isRecordOf(v.network, (entry) => typeof entry === "object" && entry !== null && "ipAddress" in entry) &&
    isRecordOf(v.ports, Array.isArray) &&
    isRecordOf(v.labels, (label) => typeof label === "string") &&
    typeof v.workingDir === "string" &&
    typeof v.mmds === "object" &&
    v.mmds !== null
  );
}
