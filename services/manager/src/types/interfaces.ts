import type { Duplex } from "node:stream";
import type { PersistedVmState, VmRecord } from "./vm.js";

export interface VmStore {
  /** Throws NameConflictError when an active record already uses the name. */
  create(vm: VmRecord): Promise<void>;
  update(id: string, patch: Partial<Omit<VmRecord, "id">>): Promise<VmRecord | null>;
  updateState(id: string, state: PersistedVmState): Promise<VmRecord | null>;
  get(id: string): Promise<VmRecord | null>;
  list(): Promise<VmRecord[]>;
  findByStateAndLabels(state: PersistedVmState, labels?: Record<string, string>): Promise<VmRecord[]>;
  /** Removes the document and the instance tree. Returns false when the id is unknown. */
  delete(id: string): Promise<boolean>;
  checkIpInUse(ip: string): Promise<boolean>;
  usedIps(): Promise<Set<string>>;
  /** Runs `fn` with registry mutations serialized against other processes. */
  withLock<T>(fn: () => Promise<T>): Promise<T>;
}

export interface BootSource {
  kernelImagePath: string;
  bootArgs: string;
}

export interface DriveConfig {
  driveId: string;
  pathOnHost: string;
  isRootDevice: boolean;
  isReadOnly: boolean;
}

export interface MachineConfig {
  vcpuCount: number;
  memSizeMib: number;
}

export interface NetworkInterfaceConfig {
  ifaceId: string;
  hostDevName: string;
  guestMac?: string;
}

export interface MmdsConfig {
  version: "V1" | "V2";
  ipv4Address: string;
  networkInterfaces: string[];
}

export type InstanceAction = "InstanceStart" | "SendCtrlAltDel" | "FlushMetrics";

export interface FirecrackerApi {
  readonly socketPath: string;
  putBootSource(input: BootSource): Promise<void>;
  putDrive(input: DriveConfig): Promise<void>;
  putMachineConfig(input: MachineConfig): Promise<void>;
  putNetworkInterface(input: NetworkInterfaceConfig): Promise<void>;
  putMmdsConfig(input: MmdsConfig): Promise<void>;
  putMmdsData(payload: Record<string, unknown>): Promise<void>;
  putAction(action: InstanceAction): Promise<void>;
  patchVmState(state: "Paused" | "Resumed"): Promise<void>;
  getVmConfig(): Promise<unknown>;
  close(): void;
}

export type FirecrackerApiFactory = (socketPath: string) => FirecrackerApi;

export interface SessionManager {
  /** Starts `binary args...` inside a detached terminal session and returns the session pid. */
  startDetachedSession(sessionName: string, binary: string, args: string[], logPath: string): Promise<number>;
  isProcessAlive(pid: number): boolean;
  /** Locates the hypervisor process started for `vmId`. */
  getPidAndStartTime(vmId: string): Promise<{ pid: number; startedAt: string } | null>;
  /** Types the contents of `textFile` into the session as literal keystrokes. */
  sendKeys(sessionName: string, textFile: string): Promise<{ exitCode: number; stderr: string }>;
  stopSession(sessionName: string): Promise<void>;
  killProcess(pid: number): Promise<void>;
}

export interface TapOptions {
  bridge: boolean;
  bridgeName: string;
}

export interface NetworkManager {
  createTap(tapName: string, parentIface: string, gatewayIp: string, options: TapOptions): Promise<void>;
  deleteTap(tapName: string): Promise<void>;
  enableNat(tapName: string, parentIface: string, vmIp: string): Promise<void>;
  disableNat(tapName: string, parentIface: string, vmIp: string): Promise<void>;
  addPortForward(hostIp: string, hostPort: number, destIp: string, destPort: number): Promise<void>;
  deletePortForward(hostIp: string, hostPort: number, destIp: string, destPort: number): Promise<void>;
  getHostIp(): Promise<string>;
  getDefaultInterfaceName(): Promise<string>;
}

export interface ShellSession {
  openShell(size: { rows: number; cols: number }): Promise<Duplex>;
  resize?(size: { rows: number; cols: number }): void;
  close(): void;
}

export interface RemoteShell {
  connect(host: string, username: string, keyPath: string): Promise<ShellSession>;
}

export interface RootfsFetcher {
  /** Downloads `url` into `destDir` and returns the local path. */
  fetch(url: string, destDir: string): Promise<string>;
}
