/**
 * Migration Coordinator: Type Definitions
 *
 * A migration is a two-phase rendezvous between the request handler and the
 * preparer that checkpoints the pod:
 *
 *   AWAITING_CAPTURE → CAPTURE_COMPLETE → RELEASED
 *
 * ABANDONED is entered instead when the capture deadline elapses, the
 * preparer cannot be started, or the result cannot be delivered.
 */

import type { Pod } from "../types.js";

// --- Rendezvous States ---

export type RendezvousState =
  | "AWAITING_CAPTURE"
  | "CAPTURE_COMPLETE"
  | "RELEASED"
  | "ABANDONED";

/** Terminal rendezvous states: no further transitions allowed. */
export const TERMINAL_RENDEZVOUS_STATES: ReadonlySet<RendezvousState> = new Set([
  "RELEASED",
  "ABANDONED",
]);

/**
 * Valid rendezvous transitions.
 * Key = current state, value = allowed next states.
 */
export const VALID_RENDEZVOUS_TRANSITIONS: Readonly<Record<RendezvousState, readonly RendezvousState[]>> = {
  AWAITING_CAPTURE: ["CAPTURE_COMPLETE", "ABANDONED"],
  CAPTURE_COMPLETE: ["RELEASED", "ABANDONED"],
  RELEASED: [],
  ABANDONED: [],
};

/** How the preparer was let go: after a delivered result, or without one. */
export type ReleaseOutcome = "released" | "abandoned";

// --- Preparer Contract ---

/**
 * Parameters handed to the preparer for one migration.
 *
 * The preparer writes one checkpoint per container under `checkpointsDir`,
 * calls `captureComplete()`, then awaits `waitForRelease()` before it
 * resumes or tears down the pod.
 */
export interface MigratePodOptions {
  readonly checkpointsDir: string;
  /** Always false: a migrated pod is stopped once released. */
  readonly keepRunning: boolean;
  readonly containers: readonly string[];
  captureComplete(): void;
  /** Report that the checkpoint could not be taken; abandons the migration. */
  captureFailed(reason: string): void;
  waitForRelease(): Promise<ReleaseOutcome>;
  /** Aborted when the migration is abandoned. */
  readonly signal: AbortSignal;
}

/** The capability a live migration exposes to collaborators. */
export interface Migration {
  options(): MigratePodOptions;
  /** Resolves once the preparer has been released (or the migration abandoned). */
  waitUntilFinished(): Promise<ReleaseOutcome>;
}

/** Fire-and-forget hook that starts checkpointing a pod. */
export type PrepareMigrationFn = (pod: Pod) => void;

// --- Result ---

export interface ResultContainer {
  checkpointPath: string;
}

export interface MigrationResult {
  path: string;
  /** Checkpoint location per requested container, keyed by container name. */
  components: Record<string, ResultContainer>;
}

// --- Errors ---

export enum MigrationErrorCode {
  INVALID_REQUEST = "INVALID_REQUEST",
  NOT_FOUND = "NOT_FOUND",
  CONFLICT = "CONFLICT",
  ALREADY_MIGRATING = "ALREADY_MIGRATING",
  PREPARE_FAILED = "PREPARE_FAILED",
  CAPTURE_FAILED = "CAPTURE_FAILED",
  CAPTURE_TIMEOUT = "CAPTURE_TIMEOUT",
  RESULT_ENCODING_FAILED = "RESULT_ENCODING_FAILED",
}

const HTTP_STATUS: Readonly<Record<MigrationErrorCode, number>> = {
  [MigrationErrorCode.INVALID_REQUEST]: 400,
  [MigrationErrorCode.NOT_FOUND]: 404,
  [MigrationErrorCode.CONFLICT]: 409,
  [MigrationErrorCode.ALREADY_MIGRATING]: 409,
  [MigrationErrorCode.PREPARE_FAILED]: 500,
  [MigrationErrorCode.CAPTURE_FAILED]: 500,
  [MigrationErrorCode.CAPTURE_TIMEOUT]: 504,
  [MigrationErrorCode.RESULT_ENCODING_FAILED]: 500,
};

/** HTTP status a migration error is surfaced as. */
export function httpStatusFor(code: MigrationErrorCode): number {
  return HTTP_STATUS[code];
}

export class MigrationManagerError extends Error {
  readonly code: MigrationErrorCode;

  constructor(code: MigrationErrorCode, message: string) {
    super(message);
    this.name = "MigrationManagerError";
    this.code = code;
  }
}
