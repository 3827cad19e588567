/**
 * Migration Manager: single authority over live migration sessions.
 *
 * Flow for one pod:
 *   resolve pod → create session → ensure dir → prepareMigration(pod)
 *   → await capture → deliver result → release → teardown
 *
 * The result is always delivered before the preparer is released, so the
 * caller knows the checkpoint location before the source pod goes away.
 * Teardown is the only place a session leaves the store.
 */

import type { ServerResponse } from "node:http";
import { join } from "node:path";
import type { Logger, Pod } from "../types.js";
import type { PodRegistry } from "../pods/registry.js";
import { isSafeId } from "../utils/id.js";
import { writeJson, writeRaw } from "../server.js";
import type { Migration, MigrationResult, PrepareMigrationFn } from "./types.js";
import { MigrationErrorCode, MigrationManagerError, TERMINAL_RENDEZVOUS_STATES, httpStatusFor } from "./types.js";
import { createMigrationSession, type MigrationSession } from "./session.js";
import { createSessionStore, type MigrationSessionStore } from "./session-store.js";
import { RendezvousError } from "./rendezvous.js";

// --- Manager Interface ---

export interface MigrationRequestParams {
  podUID: string;
  /** Requested containers; empty means every container of the pod. */
  containerNames: string[];
}

export type MigrationLookup =
  | { found: true; migration: Migration }
  | { found: false; migration: null };

export interface MigrationManager {
  /**
   * Run a migration on behalf of an HTTP request and write the outcome to
   * `res`. Resolves after the response is committed and the preparer has
   * been released.
   */
  handleMigrationRequest(params: MigrationRequestParams, res: ServerResponse): Promise<void>;

  /** Non-blocking lookup of the pod's live migration. */
  findMigrationForPod(pod: Pod): MigrationLookup;

  /**
   * Programmatic migration. Containers default to every container of the pod.
   * @throws MigrationManagerError with the same codes as the HTTP path
   */
  triggerPodMigration(pod: Pod, containerNames?: string[]): Promise<MigrationResult>;

  /** UIDs of pods with a live migration. */
  listActive(): string[];
}

export interface MigrationManagerConfig {
  podRegistry: PodRegistry;
  prepareMigration: PrepareMigrationFn;
  /** Working directories are created under `<rootPath>/migration`. */
  rootPath: string;
  logger: Logger;
  /** Give up waiting for capture after this long. 0 (default) waits forever. */
  captureTimeoutMs?: number;
  /** Injected for tests; defaults to a fresh store. */
  sessionStore?: MigrationSessionStore;
}

type DeliverFn = (result: MigrationResult) => Promise<void>;

// --- Factory Function ---

export function createMigrationManager(config: MigrationManagerConfig): MigrationManager {
  const { podRegistry, prepareMigration, logger } = config;
  const migrationRoot = join(config.rootPath, "migration");
  const captureTimeoutMs = config.captureTimeoutMs ?? 0;
  const store = config.sessionStore ?? createSessionStore({ logger });

  /**
   * Validate the request and register a session. Synchronous from lookup to
   * insert, so two requests for the same pod cannot both get through.
   */
  function openSession(podUID: string, containerNames: readonly string[]): { pod: Pod; session: MigrationSession } {
    if (!isSafeId(podUID)) {
      throw new MigrationManagerError(MigrationErrorCode.INVALID_REQUEST, `Invalid pod UID: "${podUID}"`);
    }
    const unsafe = containerNames.find((name) => !isSafeId(name));
    if (unsafe !== undefined) {
      throw new MigrationManagerError(MigrationErrorCode.INVALID_REQUEST, `Invalid container name: "${unsafe}"`);
    }

    const pod = podRegistry.getPodByUID(podUID);
    if (!pod) {
      throw new MigrationManagerError(MigrationErrorCode.NOT_FOUND, `Pod not found: ${podUID}`);
    }
    if (pod.phase !== "Running") {
      throw new MigrationManagerError(
        MigrationErrorCode.CONFLICT,
        `Pod ${pod.name} is ${pod.phase}, must be Running to migrate`,
      );
    }
    if (store.has(podUID)) {
      throw new MigrationManagerError(
        MigrationErrorCode.ALREADY_MIGRATING,
        `Pod ${pod.name} already has a migration in progress`,
      );
    }

    const requested = containerNames.length > 0 ? containerNames : pod.containers;
    const session = createMigrationSession({
      podUID,
      migrationRoot,
      containers: [...new Set(requested)],
      logger,
    });
    store.add(session);
    return { pod, session };
  }

  async function awaitCapture(session: MigrationSession): Promise<void> {
    const { rendezvous } = session;
    let timedOut = false;
    const timer = captureTimeoutMs > 0
      ? setTimeout(() => {
          if (rendezvous.state !== "AWAITING_CAPTURE") return;
          timedOut = true;
          rendezvous.abandon(`capture not completed within ${captureTimeoutMs}ms`);
        }, captureTimeoutMs)
      : undefined;

    try {
      await rendezvous.waitForCapture();
    } catch (err) {
      if (timedOut) {
        throw new MigrationManagerError(
          MigrationErrorCode.CAPTURE_TIMEOUT,
          `Checkpoint of pod ${session.podUID} did not complete within ${captureTimeoutMs}ms`,
        );
      }
      if (err instanceof RendezvousError) {
        throw new MigrationManagerError(MigrationErrorCode.CAPTURE_FAILED, err.message);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  function teardown(session: MigrationSession): void {
    if (!TERMINAL_RENDEZVOUS_STATES.has(session.rendezvous.state)) {
      session.rendezvous.abandon("migration ended without releasing the preparer");
    }
    store.remove(session.podUID, session);
    logger.info(
      `[podmig:migration] pod ${session.podUID} migration ${session.rendezvous.state.toLowerCase()} ` +
      `after ${Date.now() - session.createdAt}ms`,
    );
  }

  async function migrate(
    podUID: string,
    containerNames: readonly string[],
    deliver: DeliverFn,
  ): Promise<MigrationResult> {
    const { pod, session } = openSession(podUID, containerNames);

    try {
      await session.ensurePathExists();

      logger.info(`[podmig:migration] starting migration of pod ${pod.name} (${session.containers.join(", ")})`);
      try {
        prepareMigration(pod);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        session.rendezvous.abandon(`preparer failed to start: ${msg}`);
        throw new MigrationManagerError(
          MigrationErrorCode.PREPARE_FAILED,
          `Failed to start checkpoint of pod ${pod.name}: ${msg}`,
        );
      }

      await awaitCapture(session);

      const result = session.buildResult();
      await deliver(result);
      session.rendezvous.release();
      return result;
    } finally {
      teardown(session);
    }
  }

  async function handleMigrationRequest(params: MigrationRequestParams, res: ServerResponse): Promise<void> {
    logger.debug?.(`[podmig:migration] POST migrate ${params.podUID} ${params.containerNames.join(",")}`);

    try {
      await migrate(params.podUID, params.containerNames, async (result) => {
        let payload: string;
        try {
          payload = JSON.stringify(result);
        } catch (err) {
          const msg = err instanceof Error ? err.message : String(err);
          logger.error(`[podmig:migration] failed to encode migration result: ${msg}`);
          await writeJson(res, 500, {
            error: { code: MigrationErrorCode.RESULT_ENCODING_FAILED, message: msg },
          });
          return;
        }
        if (res.destroyed) {
          logger.warn(`[podmig:migration] client for ${params.podUID} disconnected, releasing without a response`);
        }
        await writeRaw(res, 200, payload);
      });
    } catch (err) {
      if (!(err instanceof MigrationManagerError) || res.headersSent) throw err;
      logger.warn(`[podmig:migration] migrate ${params.podUID} rejected: ${err.message}`);
      await writeJson(res, httpStatusFor(err.code), {
        error: { code: err.code, message: err.message },
      });
    }
  }

  function findMigrationForPod(pod: Pod): MigrationLookup {
    const session = store.get(pod.uid);
    return session ? { found: true, migration: session } : { found: false, migration: null };
  }

  /**
   * The result is handed to the caller before the preparer is released:
   * resolving inside deliver queues the caller's continuation ahead of
   * migrate()'s own.
   */
  function triggerPodMigration(pod: Pod, containerNames?: string[]): Promise<MigrationResult> {
    return new Promise((resolve, reject) => {
      let delivered = false;
      migrate(pod.uid, containerNames ?? [], async (result) => {
        delivered = true;
        resolve(result);
      }).catch((err: unknown) => {
        if (!delivered) {
          reject(err);
          return;
        }
        const msg = err instanceof Error ? err.message : String(err);
        logger.error(`[podmig:migration] pod ${pod.uid} failed after its result was delivered: ${msg}`);
      });
    });
  }

  function listActive(): string[] {
    return store.list().map((s) => s.podUID);
  }

  return { handleMigrationRequest, findMigrationForPod, triggerPodMigration, listActive };
}
