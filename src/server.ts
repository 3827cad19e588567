/**
 * podmig HTTP server.
 *
 * Hosts the node agent routes on a plain node:http server. Route handlers
 * return true when they handled the request; anything else gets a 404.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import type { Logger } from "./types.js";

export type HttpHandler = (
  req: IncomingMessage,
  res: ServerResponse,
) => Promise<boolean>;

export interface HttpServerOptions {
  port: number;
  host?: string;
  logger: Logger;
}

/**
 * Write a JSON response and wait until it has been committed, i.e. the
 * response stream finished or its connection closed. A response whose
 * client already disconnected counts as committed and is not written.
 */
export function writeJson(res: ServerResponse, status: number, body: unknown): Promise<void> {
  return writeRaw(res, status, JSON.stringify(body));
}

/** Like writeJson, for a body that is already serialized. */
export function writeRaw(res: ServerResponse, status: number, payload: string): Promise<void> {
  // Neither finish nor close fires again once the response is gone.
  if (res.destroyed || res.writableFinished) return Promise.resolve();

  return new Promise((resolve) => {
    const done = () => {
      res.off("finish", done);
      res.off("close", done);
      resolve();
    };
    res.once("finish", done);
    res.once("close", done);
    res.statusCode = status;
    res.setHeader("Content-Type", "application/json");
    res.end(payload);
  });
}

/**
 * Create and start the HTTP server.
 *
 * The handler receives the request and returns true if it handled it.
 * Unhandled requests get a 404.
 */
export function startHttpServer(
  handler: HttpHandler,
  opts: HttpServerOptions,
): Server {
  const { port, host = "127.0.0.1", logger } = opts;

  const server = createServer(async (req, res) => {
    try {
      const handled = await handler(req, res);
      if (!handled) {
        await writeJson(res, 404, { error: { code: "NOT_FOUND", message: "not found" } });
      }
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`[podmig:http] unhandled error: ${msg}`);
      if (!res.headersSent) {
        await writeJson(res, 500, { error: { code: "INTERNAL", message: "internal server error" } });
      }
    }
  });

  server.listen(port, host, () => {
    logger.info(`[podmig:http] server listening on ${host}:${port}`);
  });

  return server;
}

/**
 * Stop the HTTP server gracefully.
 */
export function stopHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
