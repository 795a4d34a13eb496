export interface VmDefaults {
  dataPath: string;
  firecrackerBin: string;
  kernelPath: string;
  baseRootfs: string;
  vcpu: number;
  memSizeMib: number;
  ipAddress: string;
  bridge: boolean;
  bridgeName: string;
  mmdsEnabled: boolean;
  mmdsIp: string;
  natEnabled: boolean;
  exposePorts: boolean;
  sshUser: string;
  /** Fallback cloud-init user data when MMDS is enabled and none was supplied. */
  userData?: string;
  workingDir: string;
}

export interface RetrySettings {
  attempts: number;
  delayMs: number;
}

export interface EnvConfig {
  apiKey: string;
  port: number;
  host: string;
  logLevel: string;
  verbose: boolean;
  defaults: VmDefaults;
  socketRetry: RetrySettings;
  sshRetry: RetrySettings;
  lockTimeoutMs: number;
}

export const MIN_MEM_SIZE_MIB = 128;

type Env = Record<string, string | undefined>;

export function loadEnv(env: Env = process.env, options: { requireApiKey?: boolean } = {}): EnvConfig {
  const parsePositiveInt = (name: string, fallback: number) => {
    const n = Number(env[name] ?? String(fallback));
    if (!Number.isFinite(n) || n <= 0) {
      throw new Error(`${name} must be a positive number`);
    }
    return Math.floor(n);
  };
  const parseBool = (name: string, fallback: boolean) => {
    const raw = (env[name] ?? "").trim().toLowerCase();
    if (!raw) return fallback;
    if (["1", "true", "yes", "on"].includes(raw)) return true;
    if (["0", "false", "no", "off"].includes(raw)) return false;
    throw new Error(`${name} must be a boolean (true/false)`);
  };
  const parseIpv4 = (name: string, fallback: string) => {
    const value = (env[name] ?? "").trim() || fallback;
    if (!/^(?:\d{1,3}\.){3}\d{1,3}$/.test(value)) {
      throw new Error(`${name} must be an IPv4 address`);
    }
    return value;
  };

  const apiKey = env.API_KEY ?? "";
  if (options.requireApiKey && !apiKey) {
    throw new Error("API_KEY is required");
  }

  const dataPath = env.DATA_PATH ?? "/var/lib/firecracker";
  if (!dataPath.startsWith("/")) {
    throw new Error("DATA_PATH must be an absolute path");
  }

  const memSizeMib = parsePositiveInt("MEM_SIZE_MIB", 1024);
  if (memSizeMib < MIN_MEM_SIZE_MIB) {
    throw new Error(`MEM_SIZE_MIB must be at least ${MIN_MEM_SIZE_MIB}`);
  }

  const userData = env.USER_DATA?.length ? env.USER_DATA : undefined;

  return {
    apiKey,
    port: parsePositiveInt("PORT", 3000),
    host: env.HOST ?? "0.0.0.0",
    logLevel: env.LOG_LEVEL ?? "info",
    verbose: parseBool("VERBOSE", false),
    defaults: {
      dataPath,
      firecrackerBin: env.FIRECRACKER_BIN ?? "/usr/local/bin/firecracker",
      kernelPath: env.KERNEL_PATH ?? `${dataPath}/vmlinux`,
      baseRootfs: env.BASE_ROOTFS_PATH ?? `${dataPath}/rootfs.img`,
      vcpu: parsePositiveInt("VCPU_COUNT", 1),
      memSizeMib,
      ipAddress: parseIpv4("IP_ADDR", "172.16.0.2"),
      bridge: parseBool("BRIDGE", false),
      bridgeName: env.BRIDGE_NAME ?? "docker0",
      mmdsEnabled: parseBool("MMDS_ENABLED", false),
      mmdsIp: parseIpv4("MMDS_IP", "169.254.169.254"),
      natEnabled: parseBool("NAT_ENABLED", true),
      exposePorts: parseBool("EXPOSE_PORTS", false),
      sshUser: env.SSH_USER ?? "root",
      userData,
      workingDir: env.WORKING_DIR ?? "/root"
    },
    socketRetry: {
      attempts: parsePositiveInt("SOCKET_RETRY_ATTEMPTS", 3),
      delayMs: parsePositiveInt("SOCKET_RETRY_DELAY_MS", 500)
    },
    sshRetry: {
      attempts: parsePositiveInt("SSH_RETRY_ATTEMPTS", 3),
      delayMs: parsePositiveInt("SSH_RETRY_DELAY_MS", 2000)
    },
    lockTimeoutMs: parsePositiveInt("LOCK_TIMEOUT_MS", 30_000)
  };
}
