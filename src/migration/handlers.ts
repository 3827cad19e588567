/**
 * Migration HTTP routes.
 *
 * Endpoints:
 *   POST /migrate/{podUID}?containers=a,b   migrate a pod (blocks until checkpointed)
 *   GET  /migrate                           list pods with a live migration
 *
 * `components=` is accepted as an alias of `containers=`.
 */

import type { HttpHandler } from "../server.js";
import { writeJson } from "../server.js";
import type { MigrationManager, MigrationRequestParams } from "./manager.js";

const MIGRATE_PATH = /^\/migrate\/([^/]+)\/?$/;

/**
 * Parse the pod UID and container list out of a request URL.
 * Returns null when the path is not a migrate route.
 */
export function getMigrationRequestParams(url: URL): MigrationRequestParams | null {
  const match = MIGRATE_PATH.exec(url.pathname);
  if (!match) return null;

  const raw = url.searchParams.get("containers") ?? url.searchParams.get("components") ?? "";
  return {
    podUID: safeDecode(match[1]),
    containerNames: raw
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  };
}

/** Malformed escapes are kept as-is and rejected later as an invalid UID. */
function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function createMigrationRoutes(manager: MigrationManager): HttpHandler {
  return async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname === "/migrate" || url.pathname === "/migrate/") {
      if (req.method !== "GET") {
        await writeJson(res, 405, { error: { code: "METHOD_NOT_ALLOWED", message: `${req.method} not allowed` } });
        return true;
      }
      await writeJson(res, 200, { active: manager.listActive() });
      return true;
    }

    const params = getMigrationRequestParams(url);
    if (!params) return false;

    if (req.method !== "POST") {
      res.setHeader("Allow", "POST");
      await writeJson(res, 405, { error: { code: "METHOD_NOT_ALLOWED", message: `${req.method} not allowed` } });
      return true;
    }

    await manager.handleMigrationRequest(params, res);
    return true;
  };
}
