/**
 * `CREATED` only exists in memory while `create` runs; `DELETED` is represented by the
 * absence of the persisted document.
 */
export type VmState = "CREATED" | "RUNNING" | "PAUSED" | "DELETED";

export type PersistedVmState = Extract<VmState, "RUNNING" | "PAUSED">;

export interface NetworkEntry {
  ipAddress: string;
  gateway: string;
}

export interface PortMapping {
  hostPort: number;
  destPort: number;
}

export interface VmRecord {
  id: string;
  name: string;
  state: PersistedVmState;
  pid: number;
  createdAt: string;
  rootfsPath: string;
  kernelPath: string;
  socketPath: string;
  logsDir: string;
  vcpu: number;
  memSizeMib: number;
  /** Keyed by tap device name; exactly one entry. */
  network: Record<string, NetworkEntry>;
  /** Keyed by `<destPort>/tcp`. */
  ports: Record<string, PortMapping[]>;
  labels: Record<string, string>;
  workingDir: string;
  mmds: { enabled: boolean; ip: string | null };
}

export type PortSpec = number | string | Array<number | string> | null | undefined;

export interface VmCreateRequest {
  name?: string;
  kernelPath?: string;
  baseRootfs?: string;
  rootfsUrl?: string;
  vcpu?: number;
  memSizeMib?: number;
  ipAddress?: string;
  bridge?: boolean;
  bridgeName?: string;
  mmdsEnabled?: boolean;
  mmdsIp?: string;
  labels?: Record<string, string>;
  workingDir?: string;
  exposePorts?: boolean;
  hostPort?: PortSpec;
  destPort?: PortSpec;
  userData?: string;
  userDataFile?: string;
}

export interface VmPortForwardRequest {
  hostPort: PortSpec;
  destPort: PortSpec;
  remove?: boolean;
}

export interface VmConnectRequest {
  username?: string;
  keyPath?: string;
}

export type OperationFailureReason =
  | "not_found"
  | "name_conflict"
  | "no_instances"
  | "ip_exhausted"
  | "failed";

export type OperationResult =
  | { ok: true; message: string; id?: string }
  | { ok: false; reason: OperationFailureReason; message: string; failedIds?: string[] };

export type Lookup<T> = { found: true; value: T } | { found: false; message: string };

export interface VmSummary {
  id: string;
  name: string;
  state: PersistedVmState;
  pid: number;
  ipAddress: string | null;
  createdAt: string;
  labels: Record<string, string>;
}
