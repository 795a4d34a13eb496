import fs from "node:fs/promises";
import type { ResolvedVmConfig } from "../config/vmConfig.js";
import { ConfigurationError, errorMessage } from "../errors/vmmErrors.js";
import type { Logger } from "../logging/logger.js";
import type { FirecrackerApi, NetworkManager } from "../types/interfaces.js";

export const GUEST_IFACE = "eth0";
export const ROOT_DRIVE_ID = "rootfs";

export type ConfigStep = "boot-source" | "root-drive" | "machine-config" | "network" | "mmds";

const STEP_LABELS: Record<ConfigStep, string> = {
  "boot-source": "boot source",
  "root-drive": "root drive",
  "machine-config": "VMM resources",
  network: "network",
  mmds: "MMDS"
};

/** The subset of the resolved configuration the configuration sequence reads. */
export type ConfiguratorInput = Pick<
  ResolvedVmConfig,
  | "id"
  | "name"
  | "kernelPath"
  | "rootfsPath"
  | "vcpu"
  | "memSizeMib"
  | "ipAddress"
  | "gateway"
  | "tapName"
  | "bridge"
  | "bridgeName"
  | "natEnabled"
  | "mmdsEnabled"
  | "mmdsIp"
  | "userData"
>;

/**
 * Kernel command line. The `ip=` argument configures the guest interface statically;
 * `ds=nocloud-net` points cloud-init at the metadata service when it is enabled.
 */
export function buildBootArgs(input: ConfiguratorInput): string {
  const parts = ["console=ttyS0", "reboot=k", "panic=1"];
  if (input.mmdsEnabled && input.mmdsIp) {
    parts.push(`ds=nocloud-net;s=http://${input.mmdsIp}/latest/`);
  }
  parts.push(`ip=${input.ipAddress}::${input.gateway}:255.255.255.0:${input.name}:${GUEST_IFACE}:on`);
  return parts.join(" ");
}

export function buildMmdsPayload(input: ConfiguratorInput): Record<string, unknown> {
  const latest: Record<string, unknown> = {
    "meta-data": {
      "instance-id": input.id,
      "local-hostname": input.name
    }
  };
  if (input.userData) {
    latest["user-data"] = input.userData;
  }
  return { latest };
}

/** Locally administered unicast MAC derived from the instance id. */
export function guestMacFor(vmId: string): string {
  const bytes = Buffer.alloc(6);
  Buffer.from(vmId.replace(/[^0-9a-f]/gi, "").padEnd(12, "0").slice(0, 12), "hex").copy(bytes);
  bytes[0] = (bytes[0] & 0xfe) | 0x02;
  return Array.from(bytes)
    .map((byte) => byte.toString(16).padStart(2, "0"))
    .join(":");
}

export interface VmConfiguratorOptions {
  network: NetworkManager;
  logger: Logger;
}

/**
 * Applies boot source, root drive, machine resources, network and (optionally) MMDS in
 * that order. The first failing step aborts the sequence with a ConfigurationError
 * naming it; the instance is not started.
 */
export class VmConfigurator {
  private readonly logger: Logger;

  constructor(private readonly options: VmConfiguratorOptions) {
    this.logger = options.logger.child({ component: "configurator" });
  }

  async configure(api: FirecrackerApi, input: ConfiguratorInput, parentIface: string): Promise<void> {
    await fs.access(input.kernelPath).catch(() => {
      throw new ConfigurationError(`Kernel file not found: ${input.kernelPath}`, { field: "kernelPath" });
    });
    await this.step("boot-source", input.id, () =>
      api.putBootSource({ kernelImagePath: input.kernelPath, bootArgs: buildBootArgs(input) })
    );

    await this.step("root-drive", input.id, () =>
      api.putDrive({ driveId: ROOT_DRIVE_ID, pathOnHost: input.rootfsPath, isRootDevice: true, isReadOnly: false })
    );

    await this.step("machine-config", input.id, () =>
      api.putMachineConfig({ vcpuCount: input.vcpu, memSizeMib: input.memSizeMib })
    );

    await this.step("network", input.id, async () => {
      const { network } = this.options;
      await network.createTap(input.tapName, parentIface, input.gateway, {
        bridge: input.bridge,
        bridgeName: input.bridgeName
      });
      await api.putNetworkInterface({
        ifaceId: GUEST_IFACE,
        hostDevName: input.tapName,
        guestMac: guestMacFor(input.id)
      });
      if (input.natEnabled) {
        await network.enableNat(input.tapName, parentIface, input.ipAddress);
      }
    });

    if (input.mmdsEnabled && input.mmdsIp) {
      const mmdsIp = input.mmdsIp;
      await this.step("mmds", input.id, async () => {
        await api.putMmdsConfig({ version: "V2", ipv4Address: mmdsIp, networkInterfaces: [GUEST_IFACE] });
        await api.putMmdsData(buildMmdsPayload(input));
      });
    }
  }

  private async step(step: ConfigStep, vmId: string, fn: () => Promise<unknown>): Promise<void> {
    this.logger.debug({ vmId, step }, "configuring");
    try {
      await fn();
    } catch (err) {
      this.logger.error({ vmId, step, err: errorMessage(err) }, "configuration step failed");
      throw new ConfigurationError(`Failed to configure ${STEP_LABELS[step]} (${step}): ${errorMessage(err)}`, {
        field: step,
        cause: err
      });
    }
  }
}
