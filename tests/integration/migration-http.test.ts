/**
 * End-to-end: a real agent on an ephemeral port, the filesystem runtime
 * writing checkpoints under a temp root, requests made with fetch.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { request } from "node:http";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resolveConfig } from "../../src/config.js";
import { startAgent, type AgentInstance } from "../../src/agent.js";
import { MIGRATION_FINALIZER } from "../../src/pods/finalizer.js";
import type { ContainerRuntime } from "../../src/runtime/preparer.js";
import { makeLogger } from "../helpers/fakes.js";

describe("migration over HTTP", () => {
  let root: string;
  let agent: AgentInstance;
  let baseUrl: string;

  let openGate: () => void = () => {};
  let gate: Promise<void> = Promise.resolve();

  /** Filesystem-free runtime whose checkpoints complete only when the gate opens. */
  const gatedRuntime: ContainerRuntime = {
    async checkpointContainer() {
      await gate;
    },
  };

  async function startGated(): Promise<void> {
    await agent.stop();
    gate = new Promise<void>((resolve) => { openGate = resolve; });
    agent = await startAgent({
      config: resolveConfig({
        rootPath: root,
        http: { port: 0, host: "127.0.0.1" },
        pods: [{ uid: "pod-A", name: "web-0", containers: ["web"] }],
      }),
      logger: makeLogger(),
      runtime: gatedRuntime,
    });
    const addr = agent.httpServer?.address();
    if (!addr || typeof addr === "string") throw new Error("agent did not bind");
    baseUrl = `http://127.0.0.1:${addr.port}`;
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "podmig-it-"));
    agent = await startAgent({
      config: resolveConfig({
        rootPath: root,
        http: { port: 0, host: "127.0.0.1" },
        pods: [
          { uid: "pod-A", name: "web-0", containers: ["web", "sidecar"], finalizers: [MIGRATION_FINALIZER] },
          { uid: "pod-B", name: "batch-0", phase: "Pending", containers: ["job"] },
        ],
      }),
      logger: makeLogger(),
    });
    const addr = agent.httpServer?.address();
    if (!addr || typeof addr === "string") throw new Error("agent did not bind");
    baseUrl = `http://127.0.0.1:${addr.port}`;
  });

  afterEach(async () => {
    await agent.stop();
    await rm(root, { recursive: true, force: true });
  });

  it("checkpoints the requested containers and stops the pod", async () => {
    const res = await fetch(`${baseUrl}/migrate/pod-A?containers=web`, { method: "POST" });
    expect(res.status).toBe(200);

    const podDir = join(root, "migration", "pod-A");
    expect(await res.json()).toEqual({
      path: podDir,
      components: { web: { checkpointPath: join(podDir, "web") } },
    });

    const manifest: unknown = JSON.parse(await readFile(join(podDir, "web", "checkpoint.json"), "utf-8"));
    expect(manifest).toMatchObject({ podUID: "pod-A", container: "web" });

    await agent.stop();
    expect(agent.pods.getPodByUID("pod-A")?.phase).toBe("Succeeded");
    expect(agent.migrations.listActive()).toEqual([]);
  });

  it("checkpoints every container when none are named", async () => {
    const res = await fetch(`${baseUrl}/migrate/pod-A`, { method: "POST" });
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      components: {
        web: { checkpointPath: join(root, "migration", "pod-A", "web") },
        sidecar: { checkpointPath: join(root, "migration", "pod-A", "sidecar") },
      },
    });
  });

  it("maps failures to status codes", async () => {
    const missing = await fetch(`${baseUrl}/migrate/pod-Z`, { method: "POST" });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: { code: "NOT_FOUND", message: "Pod not found: pod-Z" } });

    const pending = await fetch(`${baseUrl}/migrate/pod-B`, { method: "POST" });
    expect(pending.status).toBe(409);

    const badContainer = await fetch(`${baseUrl}/migrate/pod-A?containers=db`, { method: "POST" });
    expect(badContainer.status).toBe(500);
    expect(await badContainer.json()).toEqual({
      error: { code: "CAPTURE_FAILED", message: "Migration abandoned: capture failed: pod web-0 has no container db" },
    });
    expect(agent.pods.getPodByUID("pod-A")?.phase).toBe("Running");

    const wrongMethod = await fetch(`${baseUrl}/migrate/pod-A`, { method: "GET" });
    expect(wrongMethod.status).toBe(405);
  });

  it("lists nothing active when idle", async () => {
    const res = await fetch(`${baseUrl}/migrate`);
    expect(await res.json()).toEqual({ active: [] });
  });

  it("finishes the migration when the client disconnects before capture", async () => {
    await startGated();

    const req = request(`${baseUrl}/migrate/pod-A`, { method: "POST" });
    // The hang-up surfaces as an error on the client side.
    req.on("error", () => {});
    const disconnected = new Promise<void>((resolve) => req.once("close", () => resolve()));
    req.end();
    await vi.waitFor(() => expect(agent.migrations.listActive()).toEqual(["pod-A"]));

    req.destroy();
    await disconnected;
    openGate();

    await vi.waitFor(() => expect(agent.migrations.listActive()).toEqual([]));
    await agent.stop();
    expect(agent.pods.getPodByUID("pod-A")?.phase).toBe("Succeeded");
  });

  it("lets the reaper remove a migrated pod", async () => {
    await fetch(`${baseUrl}/migrate/pod-A`, { method: "POST" });
    await expect(agent.reaper.terminatePod("pod-A")).resolves.toBe(true);
    expect(agent.pods.getPodByUID("pod-A")).toBeNull();
  });
});
