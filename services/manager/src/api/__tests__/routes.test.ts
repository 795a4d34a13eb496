import { describe, expect, it } from "vitest";
import { buildApp } from "../../app.js";
import { ConfigurationError, VMMError, VmNotFoundError } from "../../errors/vmmErrors.js";
import { silentLogger } from "../../logging/logger.js";
import type { VmOperations } from "../../types/deps.js";
import type {
  Lookup,
  OperationResult,
  PersistedVmState,
  PortSpec,
  VmCreateRequest,
  VmRecord,
  VmSummary
} from "../../types/vm.js";
import { parseLabelQuery, parseStateQuery } from "../routes.js";

const record: VmRecord = {
  id: "a1b2c3d4e5f6",
  name: "web",
  state: "RUNNING",
  pid: 4100,
  createdAt: "2026-01-01T00:00:00.000Z",
  rootfsPath: "/var/lib/firecracker/a1b2c3d4e5f6/rootfs/rootfs.img",
  kernelPath: "/var/lib/firecracker/vmlinux",
  socketPath: "/var/lib/firecracker/a1b2c3d4e5f6/firecracker.socket",
  logsDir: "/var/lib/firecracker/a1b2c3d4e5f6/logs",
  vcpu: 1,
  memSizeMib: 1024,
  network: { tapa1b2c3d4e5f6: { ipAddress: "172.16.0.2", gateway: "172.16.0.1" } },
  ports: {},
  labels: { env: "prod" },
  workingDir: "/root",
  mmds: { enabled: false, ip: null }
};

class FakeVmService implements VmOperations {
  public createCalls: VmCreateRequest[] = [];
  public createResult: OperationResult = { ok: true, message: "VMM a1b2c3d4e5f6 is created successfully", id: "a1b2c3d4e5f6" };
  public createError: Error | null = null;
  public listResult: VmSummary[] = [];
  public records: VmRecord[] = [];
  public paused: string[] = [];
  public resumed: string[] = [];
  public deleted: string[] = [];
  public deleteAllResult: OperationResult = { ok: true, message: "All VMMs deleted successfully" };
  public forwards: Array<{ id: string; hostPort: PortSpec; destPort: PortSpec; remove: boolean }> = [];
  public consoleCalls: Array<{ id: string; commands: string[] }> = [];
  public findCalls: Array<{ state: PersistedVmState; labels: Record<string, string> }> = [];

  async list() {
    return this.listResult;
  }

  async create(request: VmCreateRequest) {
    this.createCalls.push(request);
    if (this.createError) throw this.createError;
    return this.createResult;
  }

  async pause(id: string) {
    this.paused.push(id);
    return this.found(id, `VMM ${id} paused successfully`);
  }

  async resume(id: string) {
    this.resumed.push(id);
    return this.found(id, `VMM ${id} resumed successfully`);
  }

  async delete(id: string) {
    this.deleted.push(id);
    return this.found(id, `VMM ${id} deleted successfully`);
  }

  async deleteAll() {
    return this.deleteAllResult;
  }

  async portForward(id: string, hostPort: PortSpec, destPort: PortSpec, remove = false): Promise<OperationResult> {
    this.forwards.push({ id, hostPort, destPort, remove });
    return { ok: true, message: `Port forwarding ${remove ? "removed" : "added"} successfully`, id };
  }

  async executeInVm(id: string, commands: string[]) {
    if (!this.records.some((vm) => vm.id === id)) throw new VmNotFoundError(id);
    this.consoleCalls.push({ id, commands });
    return commands.length > 0;
  }

  async status(id: string): Promise<Lookup<string>> {
    const vm = this.records.find((candidate) => candidate.id === id);
    if (!vm) return { found: false, message: `VMM with ID ${id} does not exist` };
    return { found: true, value: `VMM ${id} is running` };
  }

  async inspect(id: string): Promise<Lookup<VmRecord>> {
    const vm = this.records.find((candidate) => candidate.id === id);
    if (!vm) return { found: false, message: `VMM with ID ${id} does not exist` };
    return { found: true, value: vm };
  }

  async config(id: string): Promise<Lookup<unknown>> {
    if (!this.records.some((vm) => vm.id === id)) return { found: false, message: `VMM with ID ${id} does not exist` };
    return { found: true, value: { "machine-config": { vcpu_count: 1, mem_size_mib: 1024 } } };
  }

  async find(state: PersistedVmState, labels: Record<string, string> = {}) {
    this.findCalls.push({ state, labels });
    return this.records.filter((vm) => vm.state === state);
  }

  private found(id: string, message: string): OperationResult {
    if (!this.records.some((vm) => vm.id === id)) {
      return { ok: false, reason: "not_found", message: `VMM with ID ${id} not found` };
    }
    return { ok: true, message, id };
  }
}

const apiKey = "test-key";
const headers = { "x-api-key": apiKey };

function buildTestApp(service: FakeVmService, exposeInternalErrors = false) {
  return buildApp({ apiKey, deps: { vmService: service }, logger: silentLogger(), exposeInternalErrors });
}

describe("manager API", () => {
  it("rejects missing API key", async () => {
    const app = buildTestApp(new FakeVmService());
    const res = await app.inject({ method: "GET", url: "/v1/vms" });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ message: "Unauthorized" });
  });

  it("rejects a wrong API key", async () => {
    const app = buildTestApp(new FakeVmService());
    const res = await app.inject({ method: "GET", url: "/v1/vms", headers: { "x-api-key": "other-key" } });
    expect(res.statusCode).toBe(401);
  });

  it("keeps the health probe open", async () => {
    const app = buildTestApp(new FakeVmService());
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("lists VMs", async () => {
    const service = new FakeVmService();
    service.listResult = [
      {
        id: record.id,
        name: "web",
        state: "RUNNING",
        pid: 4100,
        ipAddress: "172.16.0.2",
        createdAt: record.createdAt,
        labels: {}
      }
    ];

    const app = buildTestApp(service);
    const res = await app.inject({ method: "GET", url: "/v1/vms", headers });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toHaveLength(1);
    expect(res.json()[0].ipAddress).toBe("172.16.0.2");
  });

  it("returns 404 for missing VM", async () => {
    const app = buildTestApp(new FakeVmService());
    const res = await app.inject({ method: "GET", url: "/v1/vms/missing", headers });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ message: "VMM with ID missing does not exist" });
  });

  it("inspects, reports status and live config", async () => {
    const service = new FakeVmService();
    service.records = [record];
    const app = buildTestApp(service);

    const inspect = await app.inject({ method: "GET", url: `/v1/vms/${record.id}`, headers });
    expect(inspect.statusCode).toBe(200);
    expect(inspect.json().name).toBe("web");

    const status = await app.inject({ method: "GET", url: `/v1/vms/${record.id}/status`, headers });
    expect(status.json()).toEqual({ message: `VMM ${record.id} is running` });

    const config = await app.inject({ method: "GET", url: `/v1/vms/${record.id}/config`, headers });
    expect(config.json()).toEqual({ "machine-config": { vcpu_count: 1, mem_size_mib: 1024 } });

    const missing = await app.inject({ method: "GET", url: "/v1/vms/nope/config", headers });
    expect(missing.statusCode).toBe(404);
  });

  it("creates a VM", async () => {
    const service = new FakeVmService();
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "POST",
      url: "/v1/vms",
      headers,
      payload: { name: "web", vcpu: 2, memSizeMib: 512, hostPort: "8080,8081", destPort: [80, 443], exposePorts: true }
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ message: "VMM a1b2c3d4e5f6 is created successfully", id: "a1b2c3d4e5f6" });
    expect(service.createCalls[0]).toEqual({
      name: "web",
      vcpu: 2,
      memSizeMib: 512,
      hostPort: "8080,8081",
      destPort: [80, 443],
      exposePorts: true
    });
  });

  it("validates the create body", async () => {
    const service = new FakeVmService();
    const app = buildTestApp(service);

    const res = await app.inject({ method: "POST", url: "/v1/vms", headers, payload: { vcpu: 0 } });
    expect(res.statusCode).toBe(400);
    expect(service.createCalls).toEqual([]);
  });

  it("maps create failures to status codes", async () => {
    const service = new FakeVmService();
    const app = buildTestApp(service);

    service.createResult = { ok: false, reason: "name_conflict", message: "VMM with name web already exists" };
    const conflict = await app.inject({ method: "POST", url: "/v1/vms", headers, payload: { name: "web" } });
    expect(conflict.statusCode).toBe(409);
    expect(conflict.json()).toEqual({ message: "VMM with name web already exists", reason: "name_conflict" });

    service.createError = new ConfigurationError("Kernel file not found: /nope", { field: "kernelPath" });
    const invalid = await app.inject({ method: "POST", url: "/v1/vms", headers, payload: {} });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toEqual({ message: "Kernel file not found: /nope" });

    service.createError = new VMMError("Failed to create VMM a1b2c3d4e5f6: boom");
    const failed = await app.inject({ method: "POST", url: "/v1/vms", headers, payload: {} });
    expect(failed.statusCode).toBe(500);
    expect(failed.json().message).toBe("Internal Server Error");
    expect(typeof failed.json().requestId).toBe("string");
  });

  it("exposes internal error messages when configured to", async () => {
    const service = new FakeVmService();
    service.createError = new VMMError("Failed to create VMM a1b2c3d4e5f6: boom");
    const app = buildTestApp(service, true);

    const res = await app.inject({ method: "POST", url: "/v1/vms", headers, payload: {} });
    expect(res.statusCode).toBe(500);
    expect(res.json().message).toBe("Failed to create VMM a1b2c3d4e5f6: boom");
  });

  it("pauses/resumes/deletes a VM", async () => {
    const service = new FakeVmService();
    service.records = [record];
    const app = buildTestApp(service);

    const pause = await app.inject({ method: "POST", url: `/v1/vms/${record.id}/pause`, headers });
    const resume = await app.inject({ method: "POST", url: `/v1/vms/${record.id}/resume`, headers });
    const del = await app.inject({ method: "DELETE", url: `/v1/vms/${record.id}`, headers });

    expect(pause.json()).toEqual({ message: `VMM ${record.id} paused successfully`, id: record.id });
    expect(resume.statusCode).toBe(200);
    expect(del.statusCode).toBe(200);
    expect(service.paused).toEqual([record.id]);
    expect(service.resumed).toEqual([record.id]);
    expect(service.deleted).toEqual([record.id]);

    const missing = await app.inject({ method: "DELETE", url: "/v1/vms/nope", headers });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ message: "VMM with ID nope not found", reason: "not_found" });
  });

  it("reports partial failures of delete-all", async () => {
    const service = new FakeVmService();
    service.deleteAllResult = { ok: false, reason: "failed", message: "Failed to delete VMMs: b", failedIds: ["b"] };
    const app = buildTestApp(service);

    const res = await app.inject({ method: "DELETE", url: "/v1/vms", headers });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ message: "Failed to delete VMMs: b", reason: "failed", failedIds: ["b"] });
  });

  it("forwards ports", async () => {
    const service = new FakeVmService();
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "POST",
      url: `/v1/vms/${record.id}/port-forward`,
      headers,
      payload: { hostPort: "8080,8081", destPort: [80, 81] }
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ message: "Port forwarding added successfully", id: record.id });
    expect(service.forwards).toEqual([{ id: record.id, hostPort: "8080,8081", destPort: [80, 81], remove: false }]);
  });

  it("passes null port lists through as absent", async () => {
    const service = new FakeVmService();
    service.records = [record];
    const app = buildTestApp(service);

    const created = await app.inject({
      method: "POST",
      url: "/v1/vms",
      headers,
      payload: { exposePorts: true, hostPort: null, destPort: null }
    });
    expect(created.statusCode).toBe(201);
    expect(service.createCalls).toEqual([{ exposePorts: true, hostPort: null, destPort: null }]);

    await app.inject({
      method: "POST",
      url: `/v1/vms/${record.id}/port-forward`,
      headers,
      payload: { hostPort: null, destPort: 80 }
    });
    expect(service.forwards).toEqual([{ id: record.id, hostPort: null, destPort: 80, remove: false }]);
  });

  it("sends console commands", async () => {
    const service = new FakeVmService();
    service.records = [record];
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "POST",
      url: `/v1/vms/${record.id}/console`,
      headers,
      payload: { commands: ["uname -a"] }
    });
    expect(res.json()).toEqual({ success: true });
    expect(service.consoleCalls).toEqual([{ id: record.id, commands: ["uname -a"] }]);

    const missing = await app.inject({
      method: "POST",
      url: "/v1/vms/nope/console",
      headers,
      payload: { commands: ["ls"] }
    });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ message: "VMM with ID nope not found" });
  });

  it("finds VMs by state and labels", async () => {
    const service = new FakeVmService();
    service.records = [record];
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "GET",
      url: "/v1/vms/find?state=running&label=env%3Dprod&label=team%3Dcore",
      headers
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toHaveLength(1);
    expect(service.findCalls).toEqual([{ state: "RUNNING", labels: { env: "prod", team: "core" } }]);

    const bad = await app.inject({ method: "GET", url: "/v1/vms/find?state=stopped", headers });
    expect(bad.statusCode).toBe(400);
    expect(bad.json()).toEqual({ message: "Unknown state: stopped" });
  });
});

describe("query parsing", () => {
  it("parses label filters", () => {
    expect(parseLabelQuery(undefined)).toEqual({});
    expect(parseLabelQuery("env=prod")).toEqual({ env: "prod" });
    expect(parseLabelQuery(["a=1", "b=x=y"])).toEqual({ a: "1", b: "x=y" });
    expect(() => parseLabelQuery("=prod")).toThrow("Invalid label filter: =prod (expected key=value)");
  });

  it("parses states case-insensitively", () => {
    expect(parseStateQuery("paused")).toBe("PAUSED");
    expect(() => parseStateQuery(undefined)).toThrow("No state provided");
    expect(() => parseStateQuery("gone")).toThrow("Unknown state: gone");
  });
});
