import type { FastifyPluginAsync, FastifyReply } from "fastify";
import type { AppDeps } from "../types/deps.js";
import type { OperationFailureReason, OperationResult, PersistedVmState, PortSpec, VmCreateRequest } from "../types/vm.js";
import { HttpError } from "./httpErrors.js";

export interface ApiPluginOptions {
  deps: AppDeps;
}

const BODY_LIMIT = 64 * 1024;

const idParams = { type: "object", required: ["id"], properties: { id: { type: "string" } } } as const;

// A type union rather than anyOf: with coercion on, Ajv leaves a value that already
// matches one of the listed types as it is, so null stays absent instead of becoming 0.
const portSpecSchema = {
  type: ["integer", "string", "array", "null"],
  items: { type: ["integer", "string"] }
} as const;

const createBodySchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    name: { type: "string", minLength: 1 },
    kernelPath: { type: "string" },
    baseRootfs: { type: "string" },
    rootfsUrl: { type: "string" },
    vcpu: { type: "integer", minimum: 1 },
    memSizeMib: { type: "integer", minimum: 1 },
    ipAddress: { type: "string" },
    bridge: { type: "boolean" },
    bridgeName: { type: "string" },
    mmdsEnabled: { type: "boolean" },
    mmdsIp: { type: "string" },
    labels: { type: "object", additionalProperties: { type: "string" } },
    workingDir: { type: "string" },
    exposePorts: { type: "boolean" },
    hostPort: portSpecSchema,
    destPort: portSpecSchema,
    userData: { type: "string" },
    userDataFile: { type: "string" }
  }
} as const;

const STATUS_BY_REASON: Record<OperationFailureReason, number> = {
  not_found: 404,
  no_instances: 404,
  name_conflict: 409,
  ip_exhausted: 422,
  failed: 422
};

function sendResult(reply: FastifyReply, result: OperationResult, okStatus = 200) {
  if (result.ok) {
    reply.code(okStatus);
    return { message: result.message, ...(result.id ? { id: result.id } : {}) };
  }
  reply.code(STATUS_BY_REASON[result.reason]);
  return { message: result.message, reason: result.reason, ...(result.failedIds ? { failedIds: result.failedIds } : {}) };
}

/** `?label=env=prod&label=team=core` → `{ env: "prod", team: "core" }`. */
export function parseLabelQuery(raw: string | string[] | undefined): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const item of raw === undefined ? [] : Array.isArray(raw) ? raw : [raw]) {
    const eq = item.indexOf("=");
    if (eq <= 0) {
      throw new HttpError(400, `Invalid label filter: ${item} (expected key=value)`);
    }
    labels[item.slice(0, eq)] = item.slice(eq + 1);
  }
  return labels;
}

export function parseStateQuery(raw: string | undefined): PersistedVmState {
  if (!raw) {
    throw new HttpError(400, "No state provided");
  }
  const state = raw.toUpperCase();
  if (state !== "RUNNING" && state !== "PAUSED") {
    throw new HttpError(400, `Unknown state: ${raw}`);
  }
  return state;
}

export const apiPlugin: FastifyPluginAsync<ApiPluginOptions> = async (app, opts) => {
  const vms = opts.deps.vmService;

  app.get("/health", async () => ({ status: "ok" }));

  app.get("/v1/vms", async () => vms.list());

  app.get<{ Querystring: { state?: string; label?: string | string[] } }>(
    "/v1/vms/find",
    {
      schema: {
        querystring: {
          type: "object",
          properties: {
            state: { type: "string" },
            label: { anyOf: [{ type: "string" }, { type: "array", items: { type: "string" } }] }
          }
        }
      }
    },
    async (request) => {
      const state = parseStateQuery(request.query.state);
      return vms.find(state, parseLabelQuery(request.query.label));
    }
  );

  app.post<{ Body: VmCreateRequest }>(
    "/v1/vms",
    { bodyLimit: BODY_LIMIT, schema: { body: createBodySchema } },
    async (request, reply) => sendResult(reply, await vms.create(request.body), 201)
  );

  app.delete("/v1/vms", async (_request, reply) => {
    const result = await vms.deleteAll();
    const response = sendResult(reply, result);
    if (!result.ok && result.reason === "failed") reply.code(500);
    return response;
  });

  app.get<{ Params: { id: string } }>("/v1/vms/:id", { schema: { params: idParams } }, async (request, reply) => {
    const found = await vms.inspect(request.params.id);
    if (!found.found) {
      reply.code(404);
      return { message: found.message };
    }
    return found.value;
  });

  app.get<{ Params: { id: string } }>("/v1/vms/:id/status", { schema: { params: idParams } }, async (request, reply) => {
    const found = await vms.status(request.params.id);
    if (!found.found) {
      reply.code(404);
      return { message: found.message };
    }
    return { message: found.value };
  });

  app.get<{ Params: { id: string } }>("/v1/vms/:id/config", { schema: { params: idParams } }, async (request, reply) => {
    const found = await vms.config(request.params.id);
    if (!found.found) {
      reply.code(404);
      return { message: found.message };
    }
    return found.value;
  });

  app.post<{ Params: { id: string } }>("/v1/vms/:id/pause", { schema: { params: idParams } }, async (request, reply) =>
    sendResult(reply, await vms.pause(request.params.id))
  );

  app.post<{ Params: { id: string } }>("/v1/vms/:id/resume", { schema: { params: idParams } }, async (request, reply) =>
    sendResult(reply, await vms.resume(request.params.id))
  );

  app.delete<{ Params: { id: string } }>("/v1/vms/:id", { schema: { params: idParams } }, async (request, reply) =>
    sendResult(reply, await vms.delete(request.params.id))
  );

  app.post<{ Params: { id: string }; Body: { hostPort: PortSpec; destPort: PortSpec; remove?: boolean } }>(
    "/v1/vms/:id/port-forward",
    {
      bodyLimit: BODY_LIMIT,
      schema: {
        params: idParams,
        body: {
          type: "object",
          required: ["hostPort", "destPort"],
          properties: { hostPort: portSpecSchema, destPort: portSpecSchema, remove: { type: "boolean" } }
        }
      }
    },
    async (request, reply) => {
      const { hostPort, destPort, remove } = request.body;
      return sendResult(reply, await vms.portForward(request.params.id, hostPort, destPort, remove ?? false));
    }
  );

  app.post<{ Params: { id: string }; Body: { commands: string[] } }>(
    "/v1/vms/:id/console",
    {
      bodyLimit: BODY_LIMIT,
      schema: {
        params: idParams,
        body: {
          type: "object",
          required: ["commands"],
          properties: { commands: { type: "array", items: { type: "string" } } }
        }
      }
    },
    async (request) => ({ success: await vms.executeInVm(request.params.id, request.body.commands) })
  );
};
