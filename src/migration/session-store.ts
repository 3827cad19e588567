/**
 * Migration Session Store: the registry of live migrations, keyed by pod UID.
 *
 * All operations are synchronous. Callers that check-then-insert must not
 * await in between; on a single event loop that makes the pair atomic.
 */

import type { Logger } from "../types.js";
import type { MigrationSession } from "./session.js";

export interface MigrationSessionStore {
  /** Register a session. Throws if the pod already has one. */
  add(session: MigrationSession): void;

  get(podUID: string): MigrationSession | null;

  has(podUID: string): boolean;

  /**
   * Remove the pod's session. When `expected` is given the entry is removed
   * only if it is that exact session, so a stale teardown cannot evict a
   * newer migration.
   */
  remove(podUID: string, expected?: MigrationSession): boolean;

  list(): MigrationSession[];

  readonly size: number;
}

export interface SessionStoreParams {
  logger: Logger;
}

export function createSessionStore(params: SessionStoreParams): MigrationSessionStore {
  const { logger } = params;
  const sessions = new Map<string, MigrationSession>();

  function add(session: MigrationSession): void {
    if (sessions.has(session.podUID)) {
      throw new Error(`Migration session already exists for pod ${session.podUID}`);
    }
    sessions.set(session.podUID, session);
    logger.debug?.(`[podmig:migration] registered session for pod ${session.podUID}`);
  }

  function get(podUID: string): MigrationSession | null {
    return sessions.get(podUID) ?? null;
  }

  function remove(podUID: string, expected?: MigrationSession): boolean {
    const current = sessions.get(podUID);
    if (!current) return false;
    if (expected && current !== expected) return false;
    sessions.delete(podUID);
    logger.debug?.(`[podmig:migration] removed session for pod ${podUID}`);
    return true;
  }

  return {
    add,
    get,
    has: (podUID: string) => sessions.has(podUID),
    remove,
    list: () => [...sessions.values()],
    get size() {
      return sessions.size;
    },
  };
}
