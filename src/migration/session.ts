/**
 * Migration Session: the per-pod rendezvous object.
 *
 * Holds the working directory and the containers to checkpoint, and exposes
 * the Migration capability the preparer and the pod reaper use.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../types.js";
import type {
  Migration,
  MigratePodOptions,
  MigrationResult,
  ReleaseOutcome,
  ResultContainer,
} from "./types.js";
import { createRendezvous, type Rendezvous } from "./rendezvous.js";

export interface MigrationSession extends Migration {
  readonly podUID: string;
  /** `<migrationRoot>/<podUID>`. */
  readonly path: string;
  readonly containers: readonly string[];
  readonly rendezvous: Rendezvous;
  readonly createdAt: number;
  /**
   * Create the working directory. Failure is logged and reported as false;
   * the migration carries on, since the preparer may still succeed.
   */
  ensurePathExists(): Promise<boolean>;
  buildResult(): MigrationResult;
}

export interface MigrationSessionParams {
  podUID: string;
  migrationRoot: string;
  containers: readonly string[];
  logger: Logger;
}

export function createMigrationSession(params: MigrationSessionParams): MigrationSession {
  const { podUID, migrationRoot, logger } = params;
  const sessionPath = join(migrationRoot, podUID);
  const containers = Object.freeze([...params.containers]);
  const rendezvous = createRendezvous();

  const opts: MigratePodOptions = Object.freeze({
    checkpointsDir: sessionPath,
    keepRunning: false,
    containers,
    captureComplete: () => rendezvous.completeCapture(),
    captureFailed: (reason: string) => rendezvous.abandon(`capture failed: ${reason}`),
    waitForRelease: () => rendezvous.waitForRelease(),
    signal: rendezvous.signal,
  });

  async function ensurePathExists(): Promise<boolean> {
    try {
      await mkdir(sessionPath, { recursive: true, mode: 0o777 });
      return true;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`[podmig:migration] failed to create checkpoint dir ${sessionPath}: ${msg}`);
      return false;
    }
  }

  function buildResult(): MigrationResult {
    const result: Record<string, ResultContainer> = {};
    for (const name of containers) {
      result[name] = { checkpointPath: join(sessionPath, name) };
    }
    return { path: sessionPath, components: result };
  }

  return {
    podUID,
    path: sessionPath,
    containers,
    rendezvous,
    createdAt: Date.now(),
    ensurePathExists,
    buildResult,
    options: () => opts,
    waitUntilFinished: (): Promise<ReleaseOutcome> => rendezvous.waitForRelease(),
  };
}
