import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  verbose?: boolean;
}

/**
 * Root logger shared by the HTTP server and the lifecycle components.
 * Components take a child: `logger.child({ component: "registry" })`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.verbose ? "debug" : (options.level ?? "info");
  return pino({
    level,
    base: { service: "microvm-manager" },
    redact: {
      paths: ["req.headers.x-api-key", 'req.headers["x-api-key"]'],
      remove: true
    }
  });
}

/** Logger for tests and library callers that do not care about output. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
