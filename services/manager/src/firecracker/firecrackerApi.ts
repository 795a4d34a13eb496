import http from "node:http";
import { APIError, errorMessage } from "../errors/vmmErrors.js";
import type {
  BootSource,
  DriveConfig,
  FirecrackerApi,
  InstanceAction,
  MachineConfig,
  MmdsConfig,
  NetworkInterfaceConfig
} from "../types/interfaces.js";

/**
 * Firecracker's REST API over its per-instance unix socket.
 */
export class FirecrackerApiClient implements FirecrackerApi {
  private readonly agent = new http.Agent({ keepAlive: true, maxSockets: 1 });

  constructor(
    public readonly socketPath: string,
    private readonly timeoutMs = 10_000
  ) {}

  async putBootSource(input: BootSource): Promise<void> {
    await this.request("putBootSource", "PUT", "/boot-source", {
      kernel_image_path: input.kernelImagePath,
      boot_args: input.bootArgs
    });
  }

  async putDrive(input: DriveConfig): Promise<void> {
    await this.request("putDrive", "PUT", `/drives/${encodeURIComponent(input.driveId)}`, {
      drive_id: input.driveId,
      path_on_host: input.pathOnHost,
      is_root_device: input.isRootDevice,
      is_read_only: input.isReadOnly
    });
  }

  async putMachineConfig(input: MachineConfig): Promise<void> {
    await this.request("putMachineConfig", "PUT", "/machine-config", {
      vcpu_count: input.vcpuCount,
      mem_size_mib: input.memSizeMib
    });
  }

  async putNetworkInterface(input: NetworkInterfaceConfig): Promise<void> {
    await this.request("putNetworkInterface", "PUT", `/network-interfaces/${encodeURIComponent(input.ifaceId)}`, {
      iface_id: input.ifaceId,
      host_dev_name: input.hostDevName,
      ...(input.guestMac ? { guest_mac: input.guestMac } : {})
    });
  }

  async putMmdsConfig(input: MmdsConfig): Promise<void> {
    await this.request("putMmdsConfig", "PUT", "/mmds/config", {
      version: input.version,
      ipv4_address: input.ipv4Address,
      network_interfaces: input.networkInterfaces
    });
  }

  async putMmdsData(payload: Record<string, unknown>): Promise<void> {
    await this.request("putMmdsData", "PUT", "/mmds", payload);
  }

  async putAction(action: InstanceAction): Promise<void> {
    await this.request("putAction", "PUT", "/actions", { action_type: action });
  }

  async patchVmState(state: "Paused" | "Resumed"): Promise<void> {
    await this.request("patchVmState", "PATCH", "/vm", { state });
  }

  async getVmConfig(): Promise<unknown> {
    const text = await this.request("getVmConfig", "GET", "/vm/config");
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new APIError(`getVmConfig returned invalid JSON: ${errorMessage(err)}`, { method: "getVmConfig", cause: err });
    }
  }

  close(): void {
    this.agent.destroy();
  }

  private request(method: string, verb: string, pathName: string, body?: unknown): Promise<string> {
    const payload = body === undefined ? "" : JSON.stringify(body);
    return new Promise((resolve, reject) => {
      const req = http.request(
        {
          method: verb,
          path: pathName,
          socketPath: this.socketPath,
          agent: this.agent,
          timeout: this.timeoutMs,
          headers: {
            Accept: "application/json",
            "Content-Type": "application/json",
            "Content-Length": Buffer.byteLength(payload)
          }
        },
        (res) => {
          let data = "";
          res.setEncoding("utf-8");
          res.on("data", (chunk: string) => (data += chunk));
          res.on("end", () => {
            const status = res.statusCode ?? 0;
            if (status >= 200 && status < 300) {
              resolve(data);
              return;
            }
            reject(
              new APIError(`Firecracker API ${method} failed with ${status}: ${faultMessage(data)}`, {
                method,
                statusCode: status
              })
            );
          });
        }
      );

      req.on("timeout", () => req.destroy(new Error(`timed out after ${this.timeoutMs}ms`)));
      req.on("error", (err) => {
        reject(new APIError(`Firecracker API ${method} failed: ${err.message}`, { method, cause: err }));
      });
      if (payload) {
        req.write(payload);
      }
      req.end();
    });
  }
}

function faultMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null && "fault_message" in parsed && typeof parsed.fault_message === "string") {
      return parsed.fault_message;
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  return body || "<empty body>";
}

export const createFirecrackerApi = (socketPath: string): FirecrackerApi => new FirecrackerApiClient(socketPath);
