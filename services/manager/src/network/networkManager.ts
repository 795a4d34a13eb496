import { execFile } from "node:child_process";
import os from "node:os";
import { promisify } from "node:util";
import type { Logger } from "../logging/logger.js";
import type { NetworkManager, TapOptions } from "../types/interfaces.js";

const execFileAsync = promisify(execFile);

type Rule = { table?: "nat"; chain: string; spec: string[] };

/**
 * Host networking through `ip` and `iptables`. Needs CAP_NET_ADMIN.
 */
export class IpNetworkManager implements NetworkManager {
  constructor(private readonly logger: Logger) {}

  async createTap(tapName: string, _parentIface: string, gatewayIp: string, options: TapOptions): Promise<void> {
    // A tap left behind by a crashed instance would make `tuntap add` fail.
    await execFileAsync("ip", ["link", "del", tapName]).catch(() => undefined);
    await execFileAsync("ip", ["tuntap", "add", "dev", tapName, "mode", "tap"]);
    if (options.bridge) {
      await execFileAsync("ip", ["link", "set", tapName, "master", options.bridgeName]);
    } else {
      await execFileAsync("ip", ["addr", "add", `${gatewayIp}/24`, "dev", tapName]);
    }
    await execFileAsync("ip", ["link", "set", tapName, "up"]);
    this.logger.debug({ tapName, gatewayIp, bridge: options.bridge }, "tap device created");
  }

  async deleteTap(tapName: string): Promise<void> {
    const exists = await execFileAsync("ip", ["link", "show", tapName])
      .then(() => true)
      .catch(() => false);
    if (!exists) return;
    await execFileAsync("ip", ["link", "del", tapName]);
    this.logger.debug({ tapName }, "tap device deleted");
  }

  async enableNat(tapName: string, parentIface: string, vmIp: string): Promise<void> {
    await execFileAsync("sysctl", ["-w", "net.ipv4.ip_forward=1"]);
    for (const rule of natRules(tapName, parentIface, vmIp)) {
      await this.ensureRule(rule);
    }
  }

  async disableNat(tapName: string, parentIface: string, vmIp: string): Promise<void> {
    for (const rule of natRules(tapName, parentIface, vmIp)) {
      await this.removeRule(rule);
    }
  }

  async addPortForward(hostIp: string, hostPort: number, destIp: string, destPort: number): Promise<void> {
    for (const rule of forwardRules(hostIp, hostPort, destIp, destPort)) {
      await this.ensureRule(rule);
    }
  }

  async deletePortForward(hostIp: string, hostPort: number, destIp: string, destPort: number): Promise<void> {
    for (const rule of forwardRules(hostIp, hostPort, destIp, destPort)) {
      await this.removeRule(rule);
    }
  }

  async getHostIp(): Promise<string> {
    const routed = await execFileAsync("ip", ["-4", "route", "get", "1.1.1.1"])
      .then(({ stdout }) => /\bsrc\s+(\d+\.\d+\.\d+\.\d+)/.exec(stdout)?.[1])
      .catch(() => undefined);
    if (routed) return routed;

    for (const addrs of Object.values(os.networkInterfaces())) {
      for (const addr of addrs ?? []) {
        if (addr.family === "IPv4" && !addr.internal) return addr.address;
      }
    }
    throw new Error("Could not determine the host IP address");
  }

  async getDefaultInterfaceName(): Promise<string> {
    const { stdout } = await execFileAsync("ip", ["route", "show", "default"]);
    const iface = /\bdev\s+(\S+)/.exec(stdout)?.[1];
    if (!iface) {
      throw new Error("No default route found");
    }
    return iface;
  }

  private async ensureRule(rule: Rule): Promise<void> {
    const prefix = rule.table ? ["-t", rule.table] : [];
    const has = await execFileAsync("iptables", [...prefix, "-C", rule.chain, ...rule.spec])
      .then(() => true)
      .catch(() => false);
    if (!has) {
      await execFileAsync("iptables", [...prefix, "-A", rule.chain, ...rule.spec]);
    }
  }

  private async removeRule(rule: Rule): Promise<void> {
    const prefix = rule.table ? ["-t", rule.table] : [];
    // -D fails when the rule is already gone, which is the state we want.
    await execFileAsync("iptables", [...prefix, "-D", rule.chain, ...rule.spec]).catch((err: unknown) => {
      this.logger.debug({ chain: rule.chain, spec: rule.spec, err }, "iptables rule not present");
    });
  }
}

function natRules(tapName: string, parentIface: string, vmIp: string): Rule[] {
  return [
    { table: "nat", chain: "POSTROUTING", spec: ["-o", parentIface, "-s", vmIp, "-j", "MASQUERADE"] },
    { chain: "FORWARD", spec: ["-i", tapName, "-o", parentIface, "-j", "ACCEPT"] },
    {
      chain: "FORWARD",
      spec: ["-i", parentIface, "-o", tapName, "-m", "conntrack", "--ctstate", "RELATED,ESTABLISHED", "-j", "ACCEPT"]
    }
  ];
}

function forwardRules(hostIp: string, hostPort: number, destIp: string, destPort: number): Rule[] {
  return [
    {
      table: "nat",
      chain: "PREROUTING",
      spec: ["-p", "tcp", "-d", hostIp, "--dport", String(hostPort), "-j", "DNAT", "--to-destination", `${destIp}:${destPort}`]
    },
    { chain: "FORWARD", spec: ["-p", "tcp", "-d", destIp, "--dport", String(destPort), "-j", "ACCEPT"] }
  ];
}
