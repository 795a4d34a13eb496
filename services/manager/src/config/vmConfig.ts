import fs from "node:fs/promises";
import path from "node:path";
import { ConfigurationError, errorMessage } from "../errors/vmmErrors.js";
import {
  firecrackerApiSocketPath,
  firecrackerLogPath,
  screenLogPath,
  sessionNameForVm,
  tapNameForVm,
  vmDir,
  vmLogsDir,
  vmRootfsDir
} from "../firecracker/socketPaths.js";
import { gatewayFor, isValidIpv4 } from "../network/ipAllocator.js";
import type { RootfsFetcher } from "../types/interfaces.js";
import type { VmCreateRequest } from "../types/vm.js";
import { MIN_MEM_SIZE_MIB, type VmDefaults } from "./env.js";
import { generateId, generateName } from "./names.js";
import { parsePorts } from "./ports.js";

/** Fully resolved, validated configuration for one instance. */
export interface ResolvedVmConfig {
  id: string;
  name: string;
  kernelPath: string;
  baseRootfs: string;
  rootfsPath: string;
  vcpu: number;
  memSizeMib: number;
  ipAddress: string;
  gateway: string;
  bridge: boolean;
  bridgeName: string;
  natEnabled: boolean;
  mmdsEnabled: boolean;
  mmdsIp: string | null;
  userData?: string;
  labels: Record<string, string>;
  workingDir: string;
  exposePorts: boolean;
  hostPorts: number[];
  destPorts: number[];
  vmDir: string;
  logsDir: string;
  socketPath: string;
  logPath: string;
  screenLogPath: string;
  sessionName: string;
  tapName: string;
  firecrackerBin: string;
}

export interface ResolveDeps {
  defaults: VmDefaults;
  fetcher: RootfsFetcher;
  /** Ids that already have an instance directory. */
  idTaken?: (id: string) => Promise<boolean>;
  takenNames?: ReadonlySet<string>;
}

export async function resolveVmConfig(request: VmCreateRequest, deps: ResolveDeps): Promise<ResolvedVmConfig> {
  const { defaults } = deps;

  const vcpu = request.vcpu ?? defaults.vcpu;
  if (!Number.isInteger(vcpu) || vcpu <= 0) {
    throw new ConfigurationError("vcpu must be a positive integer", { field: "vcpu" });
  }
  const memSizeMib = request.memSizeMib ?? defaults.memSizeMib;
  if (!Number.isInteger(memSizeMib) || memSizeMib < MIN_MEM_SIZE_MIB) {
    throw new ConfigurationError(`memSizeMib must be an integer of at least ${MIN_MEM_SIZE_MIB}`, { field: "memSizeMib" });
  }

  const ipAddress = request.ipAddress ?? defaults.ipAddress;
  if (!isValidIpv4(ipAddress)) {
    throw new ConfigurationError(`Invalid IP address: ${ipAddress}`, { field: "ipAddress" });
  }
  const lastOctet = Number(ipAddress.split(".")[3]);
  if (lastOctet === 0 || lastOctet === 255) {
    throw new ConfigurationError(`IP address ${ipAddress} is not a host address`, { field: "ipAddress" });
  }

  const userData = await resolveUserData(request);
  let mmdsEnabled = request.mmdsEnabled ?? defaults.mmdsEnabled;
  let mmdsIp = request.mmdsIp ?? null;
  if (userData !== undefined) {
    mmdsEnabled = true;
  }
  if (mmdsEnabled && !mmdsIp) {
    mmdsIp = defaults.mmdsIp;
  }
  if (mmdsIp && !isValidIpv4(mmdsIp)) {
    throw new ConfigurationError(`Invalid MMDS IP address: ${mmdsIp}`, { field: "mmdsIp" });
  }

  const labels = request.labels ?? {};
  for (const [key, value] of Object.entries(labels)) {
    if (typeof value !== "string") {
      throw new ConfigurationError(`Label ${key} must be a string`, { field: "labels" });
    }
  }

  const id = await uniqueId(deps.idTaken);
  const name = request.name ?? generateName(deps.takenNames);
  if (!/^[A-Za-z0-9][A-Za-z0-9_.-]{0,62}$/.test(name)) {
    throw new ConfigurationError("name must be 1-63 characters of letters, digits, '.', '_' or '-'", { field: "name" });
  }

  const kernelPath = path.resolve(request.kernelPath ?? defaults.kernelPath);
  const baseRootfs = request.rootfsUrl
    ? await deps.fetcher.fetch(request.rootfsUrl, defaults.dataPath)
    : path.resolve(request.baseRootfs ?? defaults.baseRootfs);

  return {
    id,
    name,
    kernelPath,
    baseRootfs,
    rootfsPath: path.join(vmRootfsDir(defaults.dataPath, id), path.basename(baseRootfs)),
    vcpu,
    memSizeMib,
    ipAddress,
    gateway: gatewayFor(ipAddress),
    bridge: request.bridge ?? defaults.bridge,
    bridgeName: request.bridgeName ?? defaults.bridgeName,
    natEnabled: defaults.natEnabled,
    mmdsEnabled,
    mmdsIp: mmdsEnabled ? mmdsIp : null,
    userData: userData ?? (mmdsEnabled ? defaults.userData : undefined),
    labels,
    workingDir: request.workingDir ?? defaults.workingDir,
    exposePorts: request.exposePorts ?? defaults.exposePorts,
    hostPorts: parsePorts(request.hostPort),
    destPorts: parsePorts(request.destPort),
    vmDir: vmDir(defaults.dataPath, id),
    logsDir: vmLogsDir(defaults.dataPath, id),
    socketPath: firecrackerApiSocketPath(defaults.dataPath, id),
    logPath: firecrackerLogPath(defaults.dataPath, id),
    screenLogPath: screenLogPath(defaults.dataPath, id),
    sessionName: sessionNameForVm(id),
    tapName: tapNameForVm(id),
    firecrackerBin: defaults.firecrackerBin
  };
}

async function resolveUserData(request: VmCreateRequest): Promise<string | undefined> {
  if (request.userDataFile) {
    try {
      return await fs.readFile(request.userDataFile, "utf-8");
    } catch (err) {
      const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
      throw new ConfigurationError(
        missing
          ? `User data file not found: ${request.userDataFile}`
          : `Error reading user data file ${request.userDataFile}: ${errorMessage(err)}`,
        { field: "userDataFile", cause: err }
      );
    }
  }
  return request.userData ? request.userData : undefined;
}

async function uniqueId(idTaken?: (id: string) => Promise<boolean>): Promise<string> {
  for (let i = 0; i < 10; i++) {
    const id = generateId();
    if (!idTaken || !(await idTaken(id))) return id;
  }
  throw new ConfigurationError("Could not generate a unique instance id", { field: "id" });
}
