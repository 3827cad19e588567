/**
 * podmig: per-pod migration rendezvous for a node agent.
 */

export type { Logger, Pod, PodPhase } from "./types.js";
export { isPodPhase } from "./types.js";

export type { LoggerOptions, LogLevel } from "./logger.js";
export { createLogger } from "./logger.js";

export type { PodmigConfig } from "./config.js";
export { loadConfig, resolveConfig } from "./config.js";

export type { HttpHandler, HttpServerOptions } from "./server.js";
export { startHttpServer, stopHttpServer, writeJson } from "./server.js";

export * from "./migration/index.js";

export type { PodRegistry } from "./pods/registry.js";
export { createPodRegistry } from "./pods/registry.js";
export type { PodReaper } from "./pods/reaper.js";
export { createPodReaper } from "./pods/reaper.js";
export { MIGRATION_FINALIZER, hasMigrationFinalizer } from "./pods/finalizer.js";

export type { ContainerRuntime, CheckpointPreparer } from "./runtime/preparer.js";
export { createCheckpointPreparer } from "./runtime/preparer.js";
export type { CheckpointManifest } from "./runtime/fs-runtime.js";
export { createFsContainerRuntime, CHECKPOINT_MANIFEST } from "./runtime/fs-runtime.js";

export type { AgentInstance, StartAgentOptions } from "./agent.js";
export { startAgent } from "./agent.js";
