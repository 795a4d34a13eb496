import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors/vmmErrors.js";
import { silentLogger } from "../../logging/logger.js";
import { FakeFirecrackerApi, FakeNetworkManager } from "../../services/__tests__/fakes.js";
import {
  VmConfigurator,
  buildBootArgs,
  buildMmdsPayload,
  guestMacFor,
  type ConfiguratorInput
} from "../vmConfigurator.js";

let dir: string;
let input: ConfiguratorInput;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "microvm-configure-"));
  await fs.writeFile(path.join(dir, "vmlinux"), "kernel");
  input = {
    id: "a1b2c3d4e5f6",
    name: "web",
    kernelPath: path.join(dir, "vmlinux"),
    rootfsPath: path.join(dir, "rootfs.ext4"),
    vcpu: 2,
    memSizeMib: 512,
    ipAddress: "172.16.0.2",
    gateway: "172.16.0.1",
    tapName: "tapa1b2c3d4e5f6",
    bridge: false,
    bridgeName: "docker0",
    natEnabled: true,
    mmdsEnabled: false,
    mmdsIp: null,
    userData: undefined
  };
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("boot arguments and metadata", () => {
  it("configures the guest interface statically", () => {
    expect(buildBootArgs(input)).toBe(
      "console=ttyS0 reboot=k panic=1 ip=172.16.0.2::172.16.0.1:255.255.255.0:web:eth0:on"
    );
  });

  it("points cloud-init at the metadata service when enabled", () => {
    expect(buildBootArgs({ ...input, mmdsEnabled: true, mmdsIp: "169.254.169.254" })).toBe(
      "console=ttyS0 reboot=k panic=1 ds=nocloud-net;s=http://169.254.169.254/latest/ ip=172.16.0.2::172.16.0.1:255.255.255.0:web:eth0:on"
    );
  });

  it("builds the nocloud metadata document", () => {
    expect(buildMmdsPayload(input)).toEqual({
      latest: { "meta-data": { "instance-id": "a1b2c3d4e5f6", "local-hostname": "web" } }
    });
    expect(buildMmdsPayload({ ...input, userData: "#cloud-config\n" })).toEqual({
      latest: {
        "meta-data": { "instance-id": "a1b2c3d4e5f6", "local-hostname": "web" },
        "user-data": "#cloud-config\n"
      }
    });
  });

  it("derives a locally administered unicast MAC from the id", () => {
    expect(guestMacFor("a1b2c3d4e5f6")).toBe("a2:b2:c3:d4:e5:f6");
    expect(guestMacFor("0123456789ab")).toBe("02:23:45:67:89:ab");
  });
});

describe("VmConfigurator", () => {
  it("applies every step in order", async () => {
    const api = new FakeFirecrackerApi("/tmp/fc.sock");
    const network = new FakeNetworkManager();
    const configurator = new VmConfigurator({ network, logger: silentLogger() });

    await configurator.configure(api, { ...input, mmdsEnabled: true, mmdsIp: "169.254.169.254" }, "enp3s0");

    expect(api.calls).toEqual([
      {
        method: "putBootSource",
        payload: {
          kernelImagePath: input.kernelPath,
          bootArgs:
            "console=ttyS0 reboot=k panic=1 ds=nocloud-net;s=http://169.254.169.254/latest/ ip=172.16.0.2::172.16.0.1:255.255.255.0:web:eth0:on"
        }
      },
      {
        method: "putDrive",
        payload: { driveId: "rootfs", pathOnHost: input.rootfsPath, isRootDevice: true, isReadOnly: false }
      },
      { method: "putMachineConfig", payload: { vcpuCount: 2, memSizeMib: 512 } },
      {
        method: "putNetworkInterface",
        payload: { ifaceId: "eth0", hostDevName: "tapa1b2c3d4e5f6", guestMac: "a2:b2:c3:d4:e5:f6" }
      },
      {
        method: "putMmdsConfig",
        payload: { version: "V2", ipv4Address: "169.254.169.254", networkInterfaces: ["eth0"] }
      },
      {
        method: "putMmdsData",
        payload: { latest: { "meta-data": { "instance-id": "a1b2c3d4e5f6", "local-hostname": "web" } } }
      }
    ]);
    expect(network.calls).toEqual([
      "createTap tapa1b2c3d4e5f6 enp3s0 172.16.0.1 bridge=false",
      "enableNat tapa1b2c3d4e5f6 enp3s0 172.16.0.2"
    ]);
  });

  it("leaves NAT alone when it is disabled", async () => {
    const network = new FakeNetworkManager();
    const configurator = new VmConfigurator({ network, logger: silentLogger() });

    await configurator.configure(new FakeFirecrackerApi("/tmp/fc.sock"), { ...input, natEnabled: false }, "enp3s0");

    expect(network.calls).toEqual(["createTap tapa1b2c3d4e5f6 enp3s0 172.16.0.1 bridge=false"]);
  });

  it("stops at a missing kernel", async () => {
    const api = new FakeFirecrackerApi("/tmp/fc.sock");
    const configurator = new VmConfigurator({ network: new FakeNetworkManager(), logger: silentLogger() });
    const kernelPath = path.join(dir, "missing");

    const err = await configurator.configure(api, { ...input, kernelPath }, "enp3s0").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err instanceof ConfigurationError && err.message).toBe(`Kernel file not found: ${kernelPath}`);
    expect(err instanceof ConfigurationError && err.field).toBe("kernelPath");
    expect(api.calls).toEqual([]);
  });

  it("names the step that failed", async () => {
    const network = new FakeNetworkManager();
    network.failOn.add("createTap");
    const api = new FakeFirecrackerApi("/tmp/fc.sock");
    const configurator = new VmConfigurator({ network, logger: silentLogger() });

    const err = await configurator.configure(api, input, "enp3s0").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    if (!(err instanceof ConfigurationError)) return;
    expect(err.message).toBe("Failed to configure network (network): createTap failed");
    expect(err.field).toBe("network");
    expect(api.calls.map((c) => c.method)).toEqual(["putBootSource", "putDrive", "putMachineConfig"]);
  });
});
