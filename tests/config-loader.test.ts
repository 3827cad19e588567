import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, resolveConfig } from "../src/config.js";

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    expect(resolveConfig()).toEqual({
      rootPath: "/var/lib/podmig",
      http: { port: 10250, host: "127.0.0.1" },
      captureTimeoutMs: 0,
      logLevel: "info",
      pods: [],
    });
  });

  it("keeps valid values", () => {
    const config = resolveConfig({
      rootPath: "/srv/podmig",
      http: { port: 8080, host: "0.0.0.0" },
      captureTimeoutMs: 30_000,
      logLevel: "debug",
    });
    expect(config.rootPath).toBe("/srv/podmig");
    expect(config.http).toEqual({ port: 8080, host: "0.0.0.0" });
    expect(config.captureTimeoutMs).toBe(30_000);
    expect(config.logLevel).toBe("debug");
  });

  it("falls back on invalid values", () => {
    const config = resolveConfig({
      rootPath: "",
      http: { port: 70_000 },
      captureTimeoutMs: -5,
      logLevel: "verbose",
    });
    expect(config.rootPath).toBe("/var/lib/podmig");
    expect(config.http.port).toBe(10250);
    expect(config.captureTimeoutMs).toBe(0);
    expect(config.logLevel).toBe("info");
  });

  it("reads pods with defaults and skips entries without a UID", () => {
    const config = resolveConfig({
      pods: [
        { uid: "pod-1", containers: ["web", 7] },
        { uid: "pod-2", name: "db-0", namespace: "data", phase: "Pending", finalizers: ["x/y"] },
        { name: "no-uid" },
        "junk",
      ],
    });
    expect(config.pods).toEqual([
      { uid: "pod-1", name: "pod-1", namespace: "default", phase: "Running", containers: ["web"], finalizers: [] },
      { uid: "pod-2", name: "db-0", namespace: "data", phase: "Pending", containers: [], finalizers: ["x/y"] },
    ]);
  });
});

describe("loadConfig", () => {
  let dir: string | null = null;
  const saved = process.env.PODMIG_CONFIG;

  afterEach(() => {
    if (saved === undefined) delete process.env.PODMIG_CONFIG;
    else process.env.PODMIG_CONFIG = saved;
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("reads the file named by PODMIG_CONFIG", () => {
    dir = mkdtempSync(join(tmpdir(), "podmig-config-"));
    const file = join(dir, "podmig.json");
    writeFileSync(file, JSON.stringify({ rootPath: "/data/podmig", captureTimeoutMs: 500 }));
    process.env.PODMIG_CONFIG = file;

    const config = loadConfig();
    expect(config.rootPath).toBe("/data/podmig");
    expect(config.captureTimeoutMs).toBe(500);
  });

  it("rejects a file that is not a JSON object", () => {
    dir = mkdtempSync(join(tmpdir(), "podmig-config-"));
    const file = join(dir, "podmig.json");
    writeFileSync(file, "[1, 2]");
    process.env.PODMIG_CONFIG = file;

    expect(() => loadConfig()).toThrow(`Invalid podmig config at ${file}: expected a JSON object`);
  });
});
