import { timingSafeEqual } from "node:crypto";
import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

export interface AuthPluginOptions {
  apiKey: string;
}

function keyMatches(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

const authPluginImpl: FastifyPluginAsync<AuthPluginOptions> = async (app, opts) => {
  app.addHook("preHandler", async (request, reply) => {
    const url = request.raw.url ?? request.url;
    // Only API routes are protected; /health stays open for probes.
    if (!url.startsWith("/v1/")) {
      return;
    }

    const rawKey = request.headers["x-api-key"];
    const key = Array.isArray(rawKey) ? rawKey[0] : rawKey;
    if (typeof key === "string" && opts.apiKey && keyMatches(key, opts.apiKey)) return;

    reply.code(401);
    return reply.send({ message: "Unauthorized" });
  });
};

export const authPlugin = fp(authPluginImpl);
