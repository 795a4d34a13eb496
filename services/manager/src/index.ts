#!/usr/bin/env node
import { buildApp } from "./app.js";
import { parseCli } from "./cli.js";
import { loadEnv, type EnvConfig } from "./config/env.js";
import { errorMessage } from "./errors/vmmErrors.js";
import { createFirecrackerApi } from "./firecracker/firecrackerApi.js";
import { ProcessSupervisor } from "./firecracker/processSupervisor.js";
import { VmConfigurator } from "./firecracker/vmConfigurator.js";
import { createLogger, type Logger } from "./logging/logger.js";
import { IpNetworkManager } from "./network/networkManager.js";
import { ScreenSessionManager } from "./process/screenSessionManager.js";
import { VmService } from "./services/vmService.js";
import { SshRemoteShell } from "./ssh/sshShell.js";
import { FileVmStore } from "./state/fileVmStore.js";
import { HttpRootfsFetcher } from "./storage/rootfsFetcher.js";

function createVmService(env: EnvConfig, logger: Logger): VmService {
  const sessions = new ScreenSessionManager({ logger });
  const network = new IpNetworkManager(logger.child({ component: "network" }));
  const store = new FileVmStore({
    dataPath: env.defaults.dataPath,
    lockTimeoutMs: env.lockTimeoutMs,
    logger: logger.child({ component: "registry" })
  });

  return new VmService({
    store,
    supervisor: new ProcessSupervisor({
      sessions,
      apiFactory: createFirecrackerApi,
      logger,
      socketRetry: env.socketRetry
    }),
    configurator: new VmConfigurator({ network, logger }),
    network,
    sessions,
    apiFactory: createFirecrackerApi,
    fetcher: new HttpRootfsFetcher({ logger }),
    remoteShell: new SshRemoteShell({ logger, retry: env.sshRetry }),
    defaults: env.defaults,
    logger
  });
}

async function main() {
  const command = parseCli(process.argv.slice(2));
  if (command.kind === "usage") {
    process.stderr.write(`${command.message}\n`);
    process.exitCode = 2;
    return;
  }

  const env = loadEnv(process.env, { requireApiKey: command.kind === "serve" });
  // Keep an interactive session's terminal free of info-level noise.
  const level = command.kind === "connect" ? "warn" : env.logLevel;
  const logger = createLogger({ level, verbose: env.verbose });
  const vmService = createVmService(env, logger);

  if (command.kind === "connect") {
    const result = await vmService.connect(command.id, { username: command.username, keyPath: command.keyPath });
    process.stdout.write(`${result.message}\n`);
    if (!result.ok) process.exitCode = 1;
    return;
  }

  const app = buildApp({
    apiKey: env.apiKey,
    deps: { vmService },
    logger,
    exposeInternalErrors: (process.env.EXPOSE_INTERNAL_ERRORS ?? "").toLowerCase() === "true"
  });
  app.listen({ port: env.port, host: env.host }).catch((err: unknown) => {
    app.log.error({ err }, "Failed to start server");
    process.exit(1);
  });

  const shutdown = async () => {
    await app.close().catch((err: unknown) => logger.warn({ err: errorMessage(err) }, "error during shutdown"));
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("Fatal error", err);
  process.exit(1);
});
