/**
 * Pod Reaper: removes terminated pods from the registry.
 *
 * A pod carrying the migration finalizer is not removed while a migration
 * is live: the reaper waits until the preparer has been let go, so the
 * checkpoint is never torn down under a running migration.
 */

import type { Logger } from "../types.js";
import type { MigrationManager } from "../migration/manager.js";
import type { PodRegistry } from "./registry.js";
import { hasMigrationFinalizer } from "./finalizer.js";

export interface PodReaper {
  /** Resolves true once the pod is removed, false if it was not registered. */
  terminatePod(uid: string): Promise<boolean>;
}

export interface PodReaperParams {
  registry: PodRegistry;
  migrations: Pick<MigrationManager, "findMigrationForPod">;
  logger: Logger;
}

export function createPodReaper(params: PodReaperParams): PodReaper {
  const { registry, migrations, logger } = params;

  async function terminatePod(uid: string): Promise<boolean> {
    const pod = registry.getPodByUID(uid);
    if (!pod) return false;

    if (hasMigrationFinalizer(pod)) {
      const lookup = migrations.findMigrationForPod(pod);
      if (lookup.found) {
        logger.info(`[podmig:pods] waiting for migration of ${pod.name} before removal`);
        const outcome = await lookup.migration.waitUntilFinished();
        logger.info(`[podmig:pods] migration of ${pod.name} ${outcome}`);
      }
    }

    return registry.remove(uid);
  }

  return { terminatePod };
}
