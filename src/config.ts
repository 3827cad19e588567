/**
 * podmig configuration resolution.
 * Merges a raw config object with defaults.
 *
 *   resolveConfig(raw): validate an already-parsed object
 *   loadConfig():      read from file / env, then resolve
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { isLogLevel, type LogLevel } from "./logger.js";
import { isPodPhase, type Pod } from "./types.js";

export interface PodmigConfig {
  /** Root under which `migration/<podUID>` working directories are created. */
  rootPath: string;
  http: {
    port: number;
    host: string;
  };
  /**
   * How long a request waits for the preparer to finish capturing.
   * 0 waits forever.
   */
  captureTimeoutMs: number;
  logLevel: LogLevel;
  /** Pods to register on startup, for nodes without a pod source. */
  pods: Pod[];
}

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return v as Record<string, unknown>;
  }
  return {};
}

function isPort(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 65535;
}

function toStringList(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === "string") : [];
}

function toPod(v: unknown): Pod | null {
  const obj = toRecord(v);
  if (typeof obj.uid !== "string" || obj.uid.length === 0) return null;
  return {
    uid: obj.uid,
    name: typeof obj.name === "string" ? obj.name : obj.uid,
    namespace: typeof obj.namespace === "string" ? obj.namespace : "default",
    phase: isPodPhase(obj.phase) ? obj.phase : "Running",
    containers: toStringList(obj.containers),
    finalizers: toStringList(obj.finalizers),
  };
}

export function resolveConfig(raw?: Record<string, unknown> | null): PodmigConfig {
  const r = raw ?? {};
  const httpRaw = toRecord(r.http);

  return {
    rootPath:
      typeof r.rootPath === "string" && r.rootPath.length > 0
        ? r.rootPath
        : "/var/lib/podmig",
    http: {
      port: isPort(httpRaw.port) ? httpRaw.port : 10250,
      host: typeof httpRaw.host === "string" ? httpRaw.host : "127.0.0.1",
    },
    captureTimeoutMs:
      typeof r.captureTimeoutMs === "number" && Number.isFinite(r.captureTimeoutMs) && r.captureTimeoutMs >= 0
        ? r.captureTimeoutMs
        : 0,
    logLevel: isLogLevel(r.logLevel) ? r.logLevel : "info",
    pods: Array.isArray(r.pods)
      ? r.pods.map(toPod).filter((p): p is Pod => p !== null)
      : [],
  };
}

/**
 * Default config file search paths (highest priority first):
 *   1. $PODMIG_CONFIG env
 *   2. ./podmig.json (cwd)
 *   3. ~/.podmig/podmig.json
 */
function resolveConfigPath(): string | null {
  if (process.env.PODMIG_CONFIG) {
    return process.env.PODMIG_CONFIG;
  }
  const cwdPath = path.resolve("podmig.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".podmig", "podmig.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load config from the file system.
 * Falls back to defaults if no config file is found.
 */
export function loadConfig(): PodmigConfig {
  const configPath = resolveConfigPath();
  if (!configPath) {
    return resolveConfig({});
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid podmig config at ${configPath}: expected a JSON object`);
  }
  return resolveConfig(toRecord(raw));
}
