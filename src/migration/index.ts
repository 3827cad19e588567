/**
 * Migration coordinator: module exports.
 */

// --- Types ---
export type {
  RendezvousState,
  ReleaseOutcome,
  MigratePodOptions,
  Migration,
  PrepareMigrationFn,
  MigrationResult,
  ResultContainer,
} from "./types.js";

export {
  MigrationErrorCode,
  MigrationManagerError,
  TERMINAL_RENDEZVOUS_STATES,
  VALID_RENDEZVOUS_TRANSITIONS,
  httpStatusFor,
} from "./types.js";

// --- Rendezvous ---
export type { Rendezvous } from "./rendezvous.js";
export { createRendezvous, RendezvousError } from "./rendezvous.js";

// --- Session ---
export type { MigrationSession, MigrationSessionParams } from "./session.js";
export { createMigrationSession } from "./session.js";

export type { MigrationSessionStore, SessionStoreParams } from "./session-store.js";
export { createSessionStore } from "./session-store.js";

// --- Manager ---
export type {
  MigrationManager,
  MigrationManagerConfig,
  MigrationRequestParams,
  MigrationLookup,
} from "./manager.js";
export { createMigrationManager } from "./manager.js";

// --- HTTP ---
export { createMigrationRoutes, getMigrationRequestParams } from "./handlers.js";
