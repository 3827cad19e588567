/**
 * podmig node agent runtime.
 *
 * Wires the pod registry, migration manager, checkpoint preparer and pod
 * reaper together and serves the migration routes over HTTP.
 *
 * Usage:
 *   import { startAgent } from "./agent.js";
 *   const agent = await startAgent();               // load config from file
 *   const agent = await startAgent({ config });     // explicit config
 */

import type { Server } from "node:http";
import { loadConfig, type PodmigConfig } from "./config.js";
import { createLogger, type LoggerOptions } from "./logger.js";
import { createPodRegistry, type PodRegistry } from "./pods/registry.js";
import { createPodReaper, type PodReaper } from "./pods/reaper.js";
import { createMigrationManager, type MigrationManager } from "./migration/manager.js";
import { createMigrationRoutes } from "./migration/handlers.js";
import { createCheckpointPreparer, type ContainerRuntime } from "./runtime/preparer.js";
import { createFsContainerRuntime } from "./runtime/fs-runtime.js";
import { startHttpServer, stopHttpServer } from "./server.js";
import type { Logger } from "./types.js";

export interface AgentInstance {
  config: PodmigConfig;
  logger: Logger;
  pods: PodRegistry;
  migrations: MigrationManager;
  reaper: PodReaper;
  /** HTTP server (if started). */
  httpServer?: Server;
  /**
   * Stop serving and wait for running preparations to finish. Later calls
   * share the first call's shutdown.
   */
  stop: () => Promise<void>;
}

export interface StartAgentOptions {
  /** Config override. If not provided, loaded from file. */
  config?: PodmigConfig;
  /** Logger override; otherwise built from config.logLevel. */
  logger?: Logger;
  loggerOptions?: LoggerOptions;
  /** Container runtime; defaults to the filesystem runtime. */
  runtime?: ContainerRuntime;
  /** Skip HTTP server startup. */
  noHttp?: boolean;
}

export async function startAgent(opts?: StartAgentOptions): Promise<AgentInstance> {
  const config = opts?.config ?? loadConfig();
  const logger = opts?.logger ?? createLogger({ level: config.logLevel, ...opts?.loggerOptions });

  logger.info(`[podmig:agent] starting (root: ${config.rootPath}, capture timeout: ${config.captureTimeoutMs || "none"})`);

  const pods = createPodRegistry({ logger });
  for (const pod of config.pods) {
    pods.add(pod);
  }

  const preparer = createCheckpointPreparer({
    findMigration: (pod) => migrations.findMigrationForPod(pod),
    registry: pods,
    runtime: opts?.runtime ?? createFsContainerRuntime({ logger }),
    logger,
  });

  const migrations = createMigrationManager({
    podRegistry: pods,
    prepareMigration: preparer.prepareMigration,
    rootPath: config.rootPath,
    captureTimeoutMs: config.captureTimeoutMs,
    logger,
  });

  const reaper = createPodReaper({ registry: pods, migrations, logger });

  let httpServer: Server | undefined;
  if (!opts?.noHttp) {
    const server = startHttpServer(createMigrationRoutes(migrations), {
      port: config.http.port,
      host: config.http.host,
      logger,
    });
    await new Promise<void>((resolve, reject) => {
      const onListening = () => {
        server.off("error", onError);
        resolve();
      };
      const onError = (err: Error) => {
        server.off("listening", onListening);
        reject(err);
      };
      server.once("listening", onListening);
      server.once("error", onError);
    });
    httpServer = server;
  }

  let stopping: Promise<void> | null = null;

  async function shutdown(): Promise<void> {
    if (httpServer) {
      await stopHttpServer(httpServer);
    }
    await preparer.drain();
    logger.info("[podmig:agent] stopped");
  }

  function stop(): Promise<void> {
    if (!stopping) stopping = shutdown();
    return stopping;
  }

  return { config, logger, pods, migrations, reaper, httpServer, stop };
}
