import path from "node:path";

export function vmDir(dataPath: string, vmId: string): string {
  return path.join(dataPath, vmId);
}

export function vmRootfsDir(dataPath: string, vmId: string): string {
  return path.join(vmDir(dataPath, vmId), "rootfs");
}

export function vmLogsDir(dataPath: string, vmId: string): string {
  return path.join(vmDir(dataPath, vmId), "logs");
}

export function vmDocumentPath(dataPath: string, vmId: string): string {
  return path.join(vmDir(dataPath, vmId), "config.json");
}

export function firecrackerApiSocketPath(dataPath: string, vmId: string): string {
  // Unix socket paths have a ~108-byte limit; keep DATA_PATH short.
  return path.join(vmDir(dataPath, vmId), "firecracker.socket");
}

export function firecrackerLogPath(dataPath: string, vmId: string): string {
  return path.join(vmLogsDir(dataPath, vmId), `${vmId}.log`);
}

export function screenLogPath(dataPath: string, vmId: string): string {
  return path.join(vmLogsDir(dataPath, vmId), `${vmId}_screen.log`);
}

export function sessionNameForVm(vmId: string): string {
  return `fc_${vmId}`;
}

export function tapNameForVm(vmId: string): string {
  // Linux interface names max 15 chars: "tap" (3) + 12 hex chars.
  return `tap${vmId}`.slice(0, 15);
}
