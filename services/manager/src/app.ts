import Fastify from "fastify";
import { authPlugin } from "./api/auth.js";
import { HttpError, statusForVmmError } from "./api/httpErrors.js";
import { apiPlugin } from "./api/routes.js";
import type { Logger } from "./logging/logger.js";
import type { AppDeps } from "./types/deps.js";

export interface BuildAppOptions {
  apiKey: string;
  deps: AppDeps;
  logger: Logger;
  /** Include internal error messages in 500 responses. */
  exposeInternalErrors?: boolean;
}

export function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    // Keep JSON bodies reasonably small by default; override per-route where needed.
    bodyLimit: 256 * 1024,
    logger: options.logger,
    // Port lists accept several JSON types.
    ajv: { customOptions: { allowUnionTypes: true } }
  });

  app.setErrorHandler(async (err, request, reply) => {
    if (err instanceof HttpError) {
      reply.code(err.statusCode);
      return reply.send({ message: err.message });
    }

    const vmmStatus = statusForVmmError(err);
    const statusCode = vmmStatus ?? (typeof err.statusCode === "number" ? err.statusCode : 500);

    if (statusCode >= 400 && statusCode < 500) {
      // Validation failures and Fastify's own client errors (e.g. 413 body limit).
      reply.code(statusCode);
      return reply.send({ message: err.message });
    }

    request.log.error({ err }, "Request failed");
    reply.code(500);
    return reply.send({
      message: options.exposeInternalErrors ? err.message : "Internal Server Error",
      requestId: request.id
    });
  });

  app.register(authPlugin, { apiKey: options.apiKey });
  app.register(apiPlugin, { deps: options.deps });

  return app;
}
