/**
 * Filesystem container runtime.
 *
 * Stands in for a real checkpointing runtime on nodes without one: each
 * container's checkpoint is a directory holding a JSON manifest.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger, Pod } from "../types.js";
import type { ContainerRuntime } from "./preparer.js";

export const CHECKPOINT_MANIFEST = "checkpoint.json";

export interface CheckpointManifest {
  podUID: string;
  podName: string;
  namespace: string;
  container: string;
  checkpointedAt: string;
}

export interface FsContainerRuntimeParams {
  logger: Logger;
  /** Clock override for tests. */
  now?: () => Date;
}

export function createFsContainerRuntime(params: FsContainerRuntimeParams): ContainerRuntime {
  const { logger } = params;
  const now = params.now ?? (() => new Date());

  async function checkpointContainer(
    pod: Pod,
    container: string,
    checkpointPath: string,
    signal: AbortSignal,
  ): Promise<void> {
    signal.throwIfAborted();
    if (!pod.containers.includes(container)) {
      throw new Error(`pod ${pod.name} has no container ${container}`);
    }

    await mkdir(checkpointPath, { recursive: true });
    const manifest: CheckpointManifest = {
      podUID: pod.uid,
      podName: pod.name,
      namespace: pod.namespace,
      container,
      checkpointedAt: now().toISOString(),
    };
    await writeFile(join(checkpointPath, CHECKPOINT_MANIFEST), JSON.stringify(manifest, null, 2), "utf-8");
    logger.debug?.(`[podmig:runtime] checkpointed ${pod.name}/${container} → ${checkpointPath}`);
  }

  return { checkpointContainer };
}
