/**
 * Switchboard HTTP server helpers.
 *
 * Hosts the demonstration agents' A2A endpoints on plain node:http.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import type { Logger } from "./types.js";
import { errorMessage } from "./types.js";

export type HttpHandler = (
  req: IncomingMessage,
  res: ServerResponse,
) => Promise<boolean>;

export interface HttpServerOptions {
  port: number;
  host?: string;
  logger: Logger;
}

/** Read and parse a JSON request body. Rejects on malformed JSON. */
export function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const raw = Buffer.concat(chunks).toString("utf-8");
      if (!raw) { resolve(undefined); return; }
      try { resolve(JSON.parse(raw)); }
      catch { reject(new Error("Invalid JSON body")); }
    });
    req.on("error", reject);
  });
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

/**
 * Create and start an HTTP server.
 *
 * The handler returns true if it handled the request.
 * Unhandled requests get a 404. Resolves once the server is listening.
 */
export function startHttpServer(
  handler: HttpHandler,
  opts: HttpServerOptions,
): Promise<Server> {
  const { port, host = "127.0.0.1", logger } = opts;

  const server = createServer((req, res) => {
    handler(req, res)
      .then((handled) => {
        if (!handled) sendJson(res, 404, { error: "not found" });
      })
      .catch((e: unknown) => {
        logger.error(`[switchboard:http] unhandled error: ${errorMessage(e)}`);
        if (!res.headersSent) sendJson(res, 500, { error: "internal server error" });
      });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      logger.info(`[switchboard:http] server listening on ${host}:${listeningPort(server)}`);
      resolve(server);
    });
  });
}

/** The bound port of a listening server (resolves port 0). */
export function listeningPort(server: Server): number {
  const addr = server.address();
  return typeof addr === "object" && addr !== null ? addr.port : 0;
}

/**
 * Stop the HTTP server gracefully.
 */
export function stopHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((e) => {
      if (e) reject(e);
      else resolve();
    });
  });
}
