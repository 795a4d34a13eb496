import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { VmDefaults } from "../config/env.js";
import { portKey, parsePorts } from "../config/ports.js";
import { resolveVmConfig, type ResolvedVmConfig } from "../config/vmConfig.js";
import {
  ConfigurationError,
  IpExhaustedError,
  NameConflictError,
  VMMError,
  VmNotFoundError,
  errorMessage
} from "../errors/vmmErrors.js";
import type { ProcessSupervisor, SupervisedProcess } from "../firecracker/processSupervisor.js";
import { sessionNameForVm, vmDir } from "../firecracker/socketPaths.js";
import type { VmConfigurator } from "../firecracker/vmConfigurator.js";
import type { Logger } from "../logging/logger.js";
import { allocateIp } from "../network/ipAllocator.js";
import { relayTerminal, terminalSize, type TerminalStreams } from "../ssh/terminalRelay.js";
import type {
  FirecrackerApiFactory,
  NetworkManager,
  RemoteShell,
  RootfsFetcher,
  SessionManager,
  ShellSession,
  VmStore
} from "../types/interfaces.js";
import type {
  Lookup,
  OperationResult,
  PersistedVmState,
  PortMapping,
  PortSpec,
  VmConnectRequest,
  VmCreateRequest,
  VmRecord,
  VmState,
  VmSummary
} from "../types/vm.js";

export interface VmServiceOptions {
  store: VmStore;
  supervisor: ProcessSupervisor;
  configurator: VmConfigurator;
  network: NetworkManager;
  sessions: SessionManager;
  apiFactory: FirecrackerApiFactory;
  fetcher: RootfsFetcher;
  remoteShell: RemoteShell;
  defaults: VmDefaults;
  logger: Logger;
  /** Local terminal used by `connect`; defaults to the process's stdio. */
  terminal?: TerminalStreams;
  /** Where `executeInVm` stages command files. */
  tmpDir?: string;
}

/** Host-side resources acquired during `create`, released in reverse on rollback. */
interface CreateProgress {
  process?: SupervisedProcess;
  parentIface?: string;
  networkConfigured: boolean;
  forwarded: PortMapping[];
  hostIp?: string;
}

export class VmService {
  private readonly store: VmStore;
  private readonly network: NetworkManager;
  private readonly sessions: SessionManager;
  private readonly defaults: VmDefaults;
  private readonly logger: Logger;

  constructor(private readonly options: VmServiceOptions) {
    this.store = options.store;
    this.network = options.network;
    this.sessions = options.sessions;
    this.defaults = options.defaults;
    this.logger = options.logger.child({ component: "lifecycle" });
  }

  async list(): Promise<VmSummary[]> {
    const items = await this.store.list();
    return items.map((vm) => toSummary(vm));
  }

  async create(request: VmCreateRequest): Promise<OperationResult> {
    return this.store.withLock(async () => {
      const existing = await this.store.list();
      const takenNames = new Set(existing.map((vm) => vm.name));
      if (request.name !== undefined && takenNames.has(request.name)) {
        return nameConflict(request.name);
      }

      let config = await resolveVmConfig(request, {
        defaults: this.defaults,
        fetcher: this.options.fetcher,
        takenNames,
        idTaken: (id) =>
          fs
            .stat(vmDir(this.defaults.dataPath, id))
            .then(() => true)
            .catch(() => false)
      });
      this.logTransition(config.id, null, "CREATED");

      const progress: CreateProgress = { networkConfigured: false, forwarded: [] };
      try {
        const proc = await this.options.supervisor.spawn(config);
        progress.process = proc;

        const allocation = allocateIp(config.ipAddress, await this.store.usedIps());
        if (allocation.remapped) {
          this.logger.info(
            { vmId: config.id, requested: config.ipAddress, ip: allocation.ipAddress },
            "requested IP address in use, remapped"
          );
          config = { ...config, ipAddress: allocation.ipAddress, gateway: allocation.gateway };
        }

        progress.parentIface = await this.network.getDefaultInterfaceName();
        progress.networkConfigured = true;
        await this.options.configurator.configure(proc.api, config, progress.parentIface);
        await proc.api.putAction("InstanceStart");
        this.logger.info({ vmId: config.id, name: config.name }, "instance started");

        const ports = await this.applyInitialPortForwards(config, progress);

        if (!this.sessions.isProcessAlive(proc.pid)) {
          this.logger.error({ vmId: config.id, pid: proc.pid }, "hypervisor exited after start, rolling back");
          await this.rollback(config, progress);
          return { ok: false, reason: "failed", message: `VMM ${config.id} failed to create` };
        }

        const record: VmRecord = {
          id: config.id,
          name: config.name,
          state: "RUNNING",
          pid: proc.pid,
          createdAt: proc.startedAt,
          rootfsPath: config.rootfsPath,
          kernelPath: config.kernelPath,
          socketPath: config.socketPath,
          logsDir: config.logsDir,
          vcpu: config.vcpu,
          memSizeMib: config.memSizeMib,
          network: { [config.tapName]: { ipAddress: config.ipAddress, gateway: config.gateway } },
          ports,
          labels: config.labels,
          workingDir: config.workingDir,
          mmds: { enabled: config.mmdsEnabled, ip: config.mmdsIp }
        };
        await this.store.create(record);
        this.logTransition(config.id, "CREATED", "RUNNING");
        return { ok: true, message: `VMM ${config.id} is created successfully`, id: config.id };
      } catch (err) {
        await this.rollback(config, progress);
        if (err instanceof NameConflictError) return nameConflict(err.vmName);
        if (err instanceof IpExhaustedError) return { ok: false, reason: "ip_exhausted", message: err.message };
        if (err instanceof ConfigurationError) throw err;
        throw new VMMError(`Failed to create VMM ${config.id}: ${errorMessage(err)}`, { cause: err });
      } finally {
        progress.process?.api.close();
      }
    });
  }

  async pause(id: string): Promise<OperationResult> {
    return this.setRunState(id, "PAUSED");
  }

  async resume(id: string): Promise<OperationResult> {
    return this.setRunState(id, "RUNNING");
  }

  async delete(id: string): Promise<OperationResult> {
    const vm = await this.store.get(id);
    if (!vm) {
      return { ok: false, reason: "not_found", message: new VmNotFoundError(id).message };
    }
    await this.teardown(vm);
    return { ok: true, message: `VMM ${id} deleted successfully`, id };
  }

  /** Deletes every instance; one failure does not stop the rest. */
  async deleteAll(): Promise<OperationResult> {
    const all = await this.store.list();
    if (all.length === 0) {
      return { ok: false, reason: "no_instances", message: "No VMMs available to delete" };
    }
    const failedIds: string[] = [];
    for (const vm of all) {
      try {
        await this.teardown(vm);
      } catch (err) {
        this.logger.error({ vmId: vm.id, err: errorMessage(err) }, "failed to delete instance");
        failedIds.push(vm.id);
      }
    }
    if (failedIds.length > 0) {
      return {
        ok: false,
        reason: "failed",
        message: `Failed to delete VMMs: ${failedIds.join(", ")}`,
        failedIds
      };
    }
    return { ok: true, message: "All VMMs deleted successfully" };
  }

  async portForward(id: string, hostPort: PortSpec, destPort: PortSpec, remove = false): Promise<OperationResult> {
    const hostPorts = parsePorts(hostPort);
    const destPorts = parsePorts(destPort);
    validatePortPairs(hostPorts, destPorts);

    return this.store.withLock(async () => {
      const all = await this.store.list();
      if (all.length === 0) {
        return { ok: false, reason: "no_instances", message: "No VMMs available to forward ports" };
      }
      const vm = all.find((candidate) => candidate.id === id);
      if (!vm) {
        return { ok: false, reason: "not_found", message: `VMM with ID ${id} does not exist` };
      }
      const destIp = ipOf(vm);
      if (!destIp) {
        throw new VMMError(`Network configuration not found for VMM ${id}`);
      }

      const ports = clonePorts(vm.ports);
      try {
        const hostIp = await this.network.getHostIp();
        for (let i = 0; i < hostPorts.length; i++) {
          const pair: PortMapping = { hostPort: hostPorts[i], destPort: destPorts[i] };
          if (remove) {
            await this.network.deletePortForward(hostIp, pair.hostPort, destIp, pair.destPort);
            removePort(ports, pair);
          } else {
            await this.network.addPortForward(hostIp, pair.hostPort, destIp, pair.destPort);
            addPort(ports, pair);
          }
          this.logger.info({ vmId: id, hostIp, destIp, ...pair, remove }, "port forwarding updated");
        }
      } catch (err) {
        // Record whatever was applied before the failure.
        await this.store.update(id, { ports });
        throw new VMMError(`Failed to configure port forwarding: ${errorMessage(err)}`, { cause: err });
      }
      await this.store.update(id, { ports });
      return { ok: true, message: `Port forwarding ${remove ? "removed" : "added"} successfully`, id };
    });
  }

  /**
   * Opens an interactive shell on the guest and relays the local terminal to it until
   * either side closes.
   */
  async connect(id: string, request: VmConnectRequest): Promise<OperationResult> {
    const keyPath = request.keyPath;
    if (!keyPath) {
      return { ok: false, reason: "failed", message: "SSH key path is required" };
    }
    const keyExists = await fs
      .access(keyPath)
      .then(() => true)
      .catch(() => false);
    if (!keyExists) {
      return { ok: false, reason: "failed", message: `SSH key file not found: ${keyPath}` };
    }

    const all = await this.store.list();
    if (all.length === 0) {
      return { ok: false, reason: "no_instances", message: "No VMMs available to connect" };
    }
    const vm = all.find((candidate) => candidate.id === id);
    if (!vm) {
      return { ok: false, reason: "not_found", message: `VMM with ID ${id} does not exist` };
    }
    const ip = ipOf(vm);
    if (!ip) {
      throw new VMMError(`Network configuration not found for VMM ${id}`);
    }

    const terminal = this.options.terminal ?? { input: process.stdin, output: process.stdout };
    const username = request.username ?? this.defaults.sshUser;
    this.logger.info({ vmId: id, ip, username }, "opening ssh session");

    let session: ShellSession;
    try {
      session = await this.options.remoteShell.connect(ip, username, keyPath);
    } catch (err) {
      throw new VMMError(`Failed to connect to VMM ${id}: ${errorMessage(err)}`, { cause: err });
    }
    try {
      const channel = await session.openShell(terminalSize(terminal));
      await relayTerminal(channel, terminal);
    } finally {
      session.close();
    }
    return { ok: true, message: `SSH session to VMM ${id} closed`, id };
  }

  /**
   * Types `commands` into the instance's serial console. Meant for guests without
   * network access; there is no output capture.
   */
  async executeInVm(id: string, commands: string[]): Promise<boolean> {
    if (commands.length === 0) return false;
    const vm = await this.store.get(id);
    if (!vm) {
      throw new VmNotFoundError(id);
    }

    const stagingDir = await fs.mkdtemp(path.join(this.options.tmpDir ?? os.tmpdir(), "microvm-console-"));
    const file = path.join(stagingDir, "commands.txt");
    try {
      await fs.writeFile(file, `${commands.join("\n")}\n`, "utf-8");
      const result = await this.sessions.sendKeys(sessionNameForVm(id), file);
      if (result.exitCode !== 0) {
        throw new VMMError(`Failed to execute commands in VM ${id}: ${result.stderr.trim()}`);
      }
      this.logger.info({ vmId: id, count: commands.length }, "commands sent to console");
      return true;
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
    }
  }

  async status(id: string): Promise<Lookup<string>> {
    const vm = await this.store.get(id);
    if (!vm) return { found: false, message: `VMM with ID ${id} does not exist` };
    return { found: true, value: `VMM ${id} is ${vm.state === "PAUSED" ? "paused" : "running"}` };
  }

  async inspect(id: string): Promise<Lookup<VmRecord>> {
    const vm = await this.store.get(id);
    if (!vm) return { found: false, message: `VMM with ID ${id} does not exist` };
    return { found: true, value: vm };
  }

  /** Live configuration as reported by the hypervisor. */
  async config(id: string): Promise<Lookup<unknown>> {
    const vm = await this.store.get(id);
    if (!vm) return { found: false, message: `VMM with ID ${id} does not exist` };
    const api = this.options.apiFactory(vm.socketPath);
    try {
      return { found: true, value: await api.getVmConfig() };
    } finally {
      api.close();
    }
  }

  async find(state: PersistedVmState, labels: Record<string, string> = {}): Promise<VmRecord[]> {
    return this.store.findByStateAndLabels(state, labels);
  }

  private async setRunState(id: string, target: PersistedVmState): Promise<OperationResult> {
    const vm = await this.store.get(id);
    if (!vm) {
      return { ok: false, reason: "not_found", message: new VmNotFoundError(id).message };
    }
    const verb = target === "PAUSED" ? "paused" : "resumed";
    if (vm.state !== target) {
      const api = this.options.apiFactory(vm.socketPath);
      try {
        await api.patchVmState(target === "PAUSED" ? "Paused" : "Resumed");
      } catch (err) {
        throw new VMMError(`Failed to ${target === "PAUSED" ? "pause" : "resume"} VMM ${id}: ${errorMessage(err)}`, {
          cause: err
        });
      } finally {
        api.close();
      }
      await this.store.updateState(id, target);
      this.logTransition(id, vm.state, target);
    }
    return { ok: true, message: `VMM ${id} ${verb} successfully`, id };
  }

  /** Port forwards requested at create time. Failures are logged, never fatal. */
  private async applyInitialPortForwards(
    config: ResolvedVmConfig,
    progress: CreateProgress
  ): Promise<Record<string, PortMapping[]>> {
    const ports: Record<string, PortMapping[]> = {};
    if (!config.exposePorts) return ports;
    if (config.hostPorts.length === 0 || config.destPorts.length === 0) {
      this.logger.warn({ vmId: config.id }, "port forwarding requested but no ports specified");
      return ports;
    }
    if (config.hostPorts.length !== config.destPorts.length) {
      this.logger.warn(
        { vmId: config.id, hostPorts: config.hostPorts, destPorts: config.destPorts },
        "host and destination port counts differ, skipping port forwarding"
      );
      return ports;
    }

    try {
      progress.hostIp = await this.network.getHostIp();
      for (let i = 0; i < config.hostPorts.length; i++) {
        const pair: PortMapping = { hostPort: config.hostPorts[i], destPort: config.destPorts[i] };
        await this.network.addPortForward(progress.hostIp, pair.hostPort, config.ipAddress, pair.destPort);
        progress.forwarded.push(pair);
        addPort(ports, pair);
      }
    } catch (err) {
      this.logger.error({ vmId: config.id, err: errorMessage(err) }, "failed to configure port forwarding");
    }
    return ports;
  }

  private async rollback(config: ResolvedVmConfig, progress: CreateProgress): Promise<void> {
    this.logger.warn({ vmId: config.id }, "rolling back instance");
    const { hostIp, parentIface } = progress;
    if (hostIp) {
      for (const pair of progress.forwarded) {
        await this.bestEffort(config.id, "delete port forward", () =>
          this.network.deletePortForward(hostIp, pair.hostPort, config.ipAddress, pair.destPort)
        );
      }
    }
    progress.forwarded = [];
    if (progress.networkConfigured) {
      if (parentIface && config.natEnabled) {
        await this.bestEffort(config.id, "disable NAT", () =>
          this.network.disableNat(config.tapName, parentIface, config.ipAddress)
        );
      }
      await this.bestEffort(config.id, "delete tap", () => this.network.deleteTap(config.tapName));
      progress.networkConfigured = false;
    }
    // A failed spawn has already cleaned up after itself.
    if (progress.process) {
      await this.options.supervisor.cleanup(config, progress.process.pid);
    }
  }

  /**
   * Releases everything an instance holds on the host, then its registry entry and
   * directory tree. Host-side failures are logged; only losing the registry entry fails.
   */
  private async teardown(vm: VmRecord): Promise<void> {
    const hostIp = await this.network.getHostIp().catch(() => undefined);
    const parentIface = await this.network.getDefaultInterfaceName().catch(() => undefined);

    for (const [tapName, entry] of Object.entries(vm.network)) {
      if (hostIp) {
        for (const mappings of Object.values(vm.ports)) {
          for (const pair of mappings) {
            await this.bestEffort(vm.id, "delete port forward", () =>
              this.network.deletePortForward(hostIp, pair.hostPort, entry.ipAddress, pair.destPort)
            );
          }
        }
      }
      if (parentIface) {
        await this.bestEffort(vm.id, "disable NAT", () => this.network.disableNat(tapName, parentIface, entry.ipAddress));
      }
      await this.bestEffort(vm.id, "delete tap", () => this.network.deleteTap(tapName));
    }

    await this.options.supervisor.stop({ id: vm.id, sessionName: sessionNameForVm(vm.id) }, vm.pid);
    // The registry entry owns the instance tree; it goes under the registry lock.
    try {
      const removed = await this.store.delete(vm.id);
      if (!removed) this.logger.warn({ vmId: vm.id }, "instance document was already gone");
    } catch (err) {
      throw new VMMError(`Failed to delete VMM ${vm.id}: ${errorMessage(err)}`, { cause: err });
    }
    this.logTransition(vm.id, vm.state, "DELETED");
  }

  private async bestEffort(vmId: string, what: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn({ vmId, err: errorMessage(err) }, `failed to ${what}`);
    }
  }

  private logTransition(vmId: string, from: VmState | null, to: VmState): void {
    this.logger.debug({ vmId, from, to }, "state transition");
  }
}

function nameConflict(name: string): OperationResult {
  return { ok: false, reason: "name_conflict", message: new NameConflictError(name).message };
}

function validatePortPairs(hostPorts: number[], destPorts: number[]): void {
  if (hostPorts.length === 0 || destPorts.length === 0) {
    throw new ConfigurationError("Both hostPort and destPort must be provided", { field: "ports" });
  }
  if (hostPorts.length !== destPorts.length) {
    throw new ConfigurationError("Number of host ports must match number of destination ports", { field: "ports" });
  }
  for (const port of [...hostPorts, ...destPorts]) {
    if (port < 1 || port > 65535) {
      throw new ConfigurationError(`Port out of range: ${port}`, { field: "ports" });
    }
  }
}

function ipOf(vm: VmRecord): string | undefined {
  return Object.values(vm.network)[0]?.ipAddress;
}

function clonePorts(ports: Record<string, PortMapping[]>): Record<string, PortMapping[]> {
  const copy: Record<string, PortMapping[]> = {};
  for (const [key, mappings] of Object.entries(ports)) {
    copy[key] = mappings.map((m) => ({ ...m }));
  }
  return copy;
}

function addPort(ports: Record<string, PortMapping[]>, pair: PortMapping): void {
  const key = portKey(pair.destPort);
  const list = (ports[key] ??= []);
  if (!list.some((m) => m.hostPort === pair.hostPort)) {
    list.push(pair);
  }
}

function removePort(ports: Record<string, PortMapping[]>, pair: PortMapping): void {
  const key = portKey(pair.destPort);
  const remaining = (ports[key] ?? []).filter((m) => m.hostPort !== pair.hostPort);
  if (remaining.length > 0) {
    ports[key] = remaining;
  } else {
    delete ports[key];
  }
}

function toSummary(vm: VmRecord): VmSummary {
  return {
    id: vm.id,
    name: vm.name,
    state: vm.state,
    pid: vm.pid,
    ipAddress: ipOf(vm) ?? null,
    createdAt: vm.createdAt,
    labels: vm.labels
  };
}
