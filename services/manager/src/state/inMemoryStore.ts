import { AsyncLocalStorage } from "node:async_hooks";
import { NameConflictError } from "../errors/vmmErrors.js";
import type { VmStore } from "../types/interfaces.js";
import type { PersistedVmState, VmRecord } from "../types/vm.js";

/** Registry without persistence, for tests and dry runs. */
export class InMemoryVmStore implements VmStore {
  private readonly items = new Map<string, VmRecord>();
  private chain: Promise<unknown> = Promise.resolve();
  private readonly held = new AsyncLocalStorage<true>();

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    // Nested calls run inline, same as the file-backed registry.
    if (this.held.getStore()) return fn();
    const run = this.chain.then(() => this.held.run(true, fn));
    this.chain = run.catch(() => undefined);
    return run;
  }

  async create(vm: VmRecord): Promise<void> {
    for (const other of this.items.values()) {
      if (other.name === vm.name && other.id !== vm.id) {
        throw new NameConflictError(vm.name);
      }
    }
    this.items.set(vm.id, structuredClone(vm));
  }

  async update(id: string, patch: Partial<Omit<VmRecord, "id">>): Promise<VmRecord | null> {
    const current = this.items.get(id);
    if (!current) {
      return null;
    }
    const next: VmRecord = { ...current, ...structuredClone(patch), id };
    this.items.set(id, next);
    return structuredClone(next);
  }

  updateState(id: string, state: PersistedVmState): Promise<VmRecord | null> {
    return this.update(id, { state });
  }

  async get(id: string): Promise<VmRecord | null> {
    const vm = this.items.get(id);
    return vm ? structuredClone(vm) : null;
  }

  async list(): Promise<VmRecord[]> {
    return Array.from(this.items.values(), (vm) => structuredClone(vm));
  }

  async findByStateAndLabels(state: PersistedVmState, labels: Record<string, string> = {}): Promise<VmRecord[]> {
    const wanted = Object.entries(labels);
    return (await this.list()).filter(
      (vm) => vm.state === state && wanted.every(([key, value]) => vm.labels[key] === value)
    );
  }

  async delete(id: string): Promise<boolean> {
    return this.items.delete(id);
  }

  async checkIpInUse(ip: string): Promise<boolean> {
    return (await this.usedIps()).has(ip);
  }

  async usedIps(): Promise<Set<string>> {
    const ips = new Set<string>();
    for (const vm of this.items.values()) {
      for (const entry of Object.values(vm.network)) ips.add(entry.ipAddress);
    }
    return ips;
  }
}
