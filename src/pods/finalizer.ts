import type { Pod } from "../types.js";

/** Finalizer that holds a pod's deletion until its migration has finished. */
export const MIGRATION_FINALIZER = "podmig.schrej.net/Migrate";

export function hasMigrationFinalizer(pod: Pod): boolean {
  return pod.finalizers.includes(MIGRATION_FINALIZER);
}
