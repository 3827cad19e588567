import { describe, it, expect, beforeEach } from "vitest";
import { createPodRegistry, type PodRegistry } from "../../../src/pods/registry.js";
import { createMigrationSession, type MigrationSession } from "../../../src/migration/session.js";
import { createCheckpointPreparer, type ContainerRuntime } from "../../../src/runtime/preparer.js";
import type { Logger, Pod } from "../../../src/types.js";
import { makeLogger, makePod } from "../../helpers/fakes.js";

/** Runtime that records calls and can be made to fail or stall. */
function makeRuntime(opts: { fail?: string; gate?: Promise<void> } = {}) {
  const calls: Array<{ container: string; path: string }> = [];
  const runtime: ContainerRuntime = {
    async checkpointContainer(_pod, container, checkpointPath) {
      calls.push({ container, path: checkpointPath });
      if (opts.gate) await opts.gate;
      if (container === opts.fail) throw new Error(`runtime refused ${container}`);
    },
  };
  return { runtime, calls };
}

describe("CheckpointPreparer", () => {
  let logger: Logger;
  let registry: PodRegistry;
  let pod: Pod;
  let session: MigrationSession;

  beforeEach(() => {
    logger = makeLogger();
    registry = createPodRegistry({ logger });
    pod = registry.add(makePod());
    session = createMigrationSession({
      podUID: pod.uid,
      migrationRoot: "/var/lib/podmig/migration",
      containers: pod.containers,
      logger,
    });
  });

  function makePreparer(runtime: ContainerRuntime) {
    return createCheckpointPreparer({
      findMigration: () => ({ found: true, migration: session }),
      registry,
      runtime,
      logger,
    });
  }

  it("checkpoints each container under the session path and signals capture", async () => {
    const { runtime, calls } = makeRuntime();
    const preparer = makePreparer(runtime);

    preparer.prepareMigration(pod);
    await session.rendezvous.waitForCapture();

    expect(calls).toEqual([
      { container: "web", path: "/var/lib/podmig/migration/pod-A/web" },
      { container: "sidecar", path: "/var/lib/podmig/migration/pod-A/sidecar" },
    ]);
    expect(session.rendezvous.state).toBe("CAPTURE_COMPLETE");

    session.rendezvous.release();
    await preparer.drain();
  });

  it("stops the pod once released", async () => {
    const preparer = makePreparer(makeRuntime().runtime);

    preparer.prepareMigration(pod);
    await session.rendezvous.waitForCapture();
    expect(registry.getPodByUID("pod-A")?.phase).toBe("Running");

    session.rendezvous.release();
    await preparer.drain();

    expect(registry.getPodByUID("pod-A")?.phase).toBe("Succeeded");
  });

  it("leaves the pod running when abandoned after capture", async () => {
    const preparer = makePreparer(makeRuntime().runtime);

    preparer.prepareMigration(pod);
    await session.rendezvous.waitForCapture();
    session.rendezvous.abandon("client went away");
    await preparer.drain();

    expect(registry.getPodByUID("pod-A")?.phase).toBe("Running");
  });

  it("reports a container failure as captureFailed", async () => {
    const preparer = makePreparer(makeRuntime({ fail: "sidecar" }).runtime);

    preparer.prepareMigration(pod);
    await expect(session.rendezvous.waitForCapture()).rejects.toThrow(
      "Migration abandoned: capture failed: runtime refused sidecar",
    );
    await preparer.drain();

    expect(session.rendezvous.state).toBe("ABANDONED");
    expect(registry.getPodByUID("pod-A")?.phase).toBe("Running");
  });

  it("does not signal capture after being abandoned mid-checkpoint", async () => {
    let open: () => void = () => {};
    const gate = new Promise<void>((resolve) => { open = resolve; });
    const preparer = makePreparer(makeRuntime({ gate }).runtime);

    preparer.prepareMigration(pod);
    session.rendezvous.abandon("deadline");
    open();
    await preparer.drain();

    expect(session.rendezvous.state).toBe("ABANDONED");
    expect(logger.warn).toHaveBeenCalledWith(
      "[podmig:preparer] migration of web-0 abandoned during checkpoint, resuming",
    );
  });

  it("logs and returns when no migration is registered", async () => {
    const preparer = createCheckpointPreparer({
      findMigration: () => ({ found: false, migration: null }),
      registry,
      runtime: makeRuntime().runtime,
      logger,
    });

    preparer.prepareMigration(pod);
    await preparer.drain();

    expect(logger.error).toHaveBeenCalledWith(
      "[podmig:preparer] preparation of web-0 failed: no migration registered for pod pod-A",
    );
  });
});
