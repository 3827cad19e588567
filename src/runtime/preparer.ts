/**
 * Checkpoint Preparer: the pod-side half of a migration.
 *
 * prepareMigration(pod) returns at once and drives the checkpoint on its
 * own async task:
 *   checkpoint every container → captureComplete() → waitForRelease()
 *   → stop the pod (released) or leave it running (abandoned)
 */

import { join } from "node:path";
import type { Logger, Pod } from "../types.js";
import type { PodRegistry } from "../pods/registry.js";
import type { MigrationLookup } from "../migration/manager.js";
import type { PrepareMigrationFn } from "../migration/types.js";

/** Writes a single container's checkpoint. */
export interface ContainerRuntime {
  checkpointContainer(
    pod: Pod,
    container: string,
    checkpointPath: string,
    signal: AbortSignal,
  ): Promise<void>;
}

export interface CheckpointPreparer {
  prepareMigration: PrepareMigrationFn;
  /** Resolves once every preparation started so far has finished. */
  drain(): Promise<void>;
}

export interface CheckpointPreparerParams {
  /** Resolves the live migration for a pod, normally manager.findMigrationForPod. */
  findMigration: (pod: Pod) => MigrationLookup;
  registry: PodRegistry;
  runtime: ContainerRuntime;
  logger: Logger;
}

export function createCheckpointPreparer(params: CheckpointPreparerParams): CheckpointPreparer {
  const { findMigration, registry, runtime, logger } = params;
  const inFlight = new Set<Promise<void>>();

  async function run(pod: Pod): Promise<void> {
    const lookup = findMigration(pod);
    if (!lookup.found) {
      throw new Error(`no migration registered for pod ${pod.uid}`);
    }
    const opts = lookup.migration.options();

    try {
      await Promise.all(
        opts.containers.map((name) =>
          runtime.checkpointContainer(pod, name, join(opts.checkpointsDir, name), opts.signal),
        ),
      );
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      if (!opts.signal.aborted) opts.captureFailed(msg);
      logger.error(`[podmig:preparer] checkpoint of ${pod.name} failed: ${msg}`);
      return;
    }

    if (opts.signal.aborted) {
      logger.warn(`[podmig:preparer] migration of ${pod.name} abandoned during checkpoint, resuming`);
      return;
    }

    opts.captureComplete();
    logger.info(`[podmig:preparer] checkpoint of ${pod.name} complete, waiting for release`);

    const outcome = await opts.waitForRelease();
    if (outcome === "released" && !opts.keepRunning) {
      registry.setPhase(pod.uid, "Succeeded");
      logger.info(`[podmig:preparer] ${pod.name} stopped after migration`);
    } else {
      logger.info(`[podmig:preparer] ${pod.name} resumed (${outcome})`);
    }
  }

  function prepareMigration(pod: Pod): void {
    const task = run(pod)
      .catch((err: unknown) => {
        const msg = err instanceof Error ? err.message : String(err);
        logger.error(`[podmig:preparer] preparation of ${pod.name} failed: ${msg}`);
      })
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  }

  async function drain(): Promise<void> {
    while (inFlight.size > 0) {
      await Promise.all([...inFlight]);
    }
  }

  return { prepareMigration, drain };
}
