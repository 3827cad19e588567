/**
 * Pod Registry: the pods this node is running, keyed by UID.
 *
 * In-memory stand-in for the node's pod manager: the migration coordinator
 * only needs getPodByUID(); the rest serves the preparer and the reaper.
 */

import type { Logger, Pod, PodPhase } from "../types.js";
import { validateId } from "../utils/id.js";

export interface PodRegistry {
  /** Add a pod. Throws if the UID is already registered or unsafe. */
  add(pod: Pod): Pod;
  getPodByUID(uid: string): Pod | null;
  setPhase(uid: string, phase: PodPhase): Pod;
  remove(uid: string): boolean;
  list(filter?: { phase?: PodPhase }): Pod[];
}

export interface PodRegistryParams {
  logger: Logger;
}

export function createPodRegistry(params: PodRegistryParams): PodRegistry {
  const { logger } = params;
  const pods = new Map<string, Pod>();

  function add(pod: Pod): Pod {
    validateId(pod.uid, "pod UID");
    if (pods.has(pod.uid)) {
      throw new Error(`pod already exists: ${pod.uid}`);
    }
    const record = clonePod(pod);
    pods.set(pod.uid, record);
    logger.info(`[podmig:pods] added ${pod.namespace}/${pod.name} (${pod.uid}, ${pod.phase})`);
    return clonePod(record);
  }

  function getPodByUID(uid: string): Pod | null {
    const pod = pods.get(uid);
    return pod ? clonePod(pod) : null;
  }

  function setPhase(uid: string, phase: PodPhase): Pod {
    const pod = pods.get(uid);
    if (!pod) {
      throw new Error(`pod not found: ${uid}`);
    }
    const from = pod.phase;
    pod.phase = phase;
    logger.info(`[podmig:pods] ${pod.namespace}/${pod.name}: ${from} → ${phase}`);
    return clonePod(pod);
  }

  function remove(uid: string): boolean {
    const existed = pods.delete(uid);
    if (existed) {
      logger.info(`[podmig:pods] removed ${uid}`);
    }
    return existed;
  }

  function list(filter?: { phase?: PodPhase }): Pod[] {
    const results: Pod[] = [];
    for (const pod of pods.values()) {
      if (filter?.phase !== undefined && pod.phase !== filter.phase) continue;
      results.push(clonePod(pod));
    }
    return results;
  }

  return { add, getPodByUID, setPhase, remove, list };
}

/** Clone a pod so callers cannot mutate registry internals. */
function clonePod(pod: Pod): Pod {
  return {
    ...pod,
    containers: [...pod.containers],
    finalizers: [...pod.finalizers],
  };
}
