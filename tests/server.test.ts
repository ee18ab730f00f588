import { describe, it, expect, afterEach } from "vitest";
import type { Server } from "node:http";
import {
  startHttpServer,
  stopHttpServer,
  readJsonBody,
  sendJson,
  listeningPort,
} from "../src/server.js";
import { silentLogger, spyLogger } from "./helpers/fixtures.js";

let server: Server | null = null;

afterEach(async () => {
  if (server) {
    await stopHttpServer(server);
    server = null;
  }
});

/** Helper to make HTTP requests to the test server. */
async function request(
  port: number,
  path: string,
  opts?: { method?: string; body?: string },
): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`http://127.0.0.1:${port}${path}`, {
    method: opts?.method ?? "GET",
    headers: opts?.body !== undefined ? { "Content-Type": "application/json" } : {},
    body: opts?.body,
  });
  const text = await res.text();
  let body: unknown;
  try { body = JSON.parse(text); } catch { body = text; }
  return { status: res.status, body };
}

describe("startHttpServer", () => {
  it("resolves once listening and serves handled requests", async () => {
    server = await startHttpServer(
      async (_req, res) => {
        sendJson(res, 200, { ok: true });
        return true;
      },
      { port: 0, logger: silentLogger },
    );

    const port = listeningPort(server);
    expect(port).toBeGreaterThan(0);
    expect(await request(port, "/anything")).toEqual({ status: 200, body: { ok: true } });
  });

  it("404s requests the handler declines", async () => {
    server = await startHttpServer(async () => false, { port: 0, logger: silentLogger });
    expect(await request(listeningPort(server), "/nope")).toEqual({ status: 404, body: { error: "not found" } });
  });

  it("500s and logs when the handler throws", async () => {
    const logger = spyLogger();
    server = await startHttpServer(async () => {
      throw new Error("kaboom");
    }, { port: 0, logger });

    expect(await request(listeningPort(server), "/")).toEqual({
      status: 500,
      body: { error: "internal server error" },
    });
    expect(logger.error).toHaveBeenCalledWith("[switchboard:http] unhandled error: kaboom");
  });

  it("rejects when the port is taken", async () => {
    server = await startHttpServer(async () => false, { port: 0, logger: silentLogger });
    await expect(
      startHttpServer(async () => false, { port: listeningPort(server), logger: silentLogger }),
    ).rejects.toThrow(/EADDRINUSE/);
  });
});

describe("readJsonBody", () => {
  async function echoServer(): Promise<number> {
    server = await startHttpServer(async (req, res) => {
      try {
        sendJson(res, 200, { parsed: (await readJsonBody(req)) ?? null });
      } catch (e) {
        sendJson(res, 400, { error: e instanceof Error ? e.message : String(e) });
      }
      return true;
    }, { port: 0, logger: silentLogger });
    return listeningPort(server);
  }

  it("parses a JSON body", async () => {
    const port = await echoServer();
    expect(await request(port, "/", { method: "POST", body: '{"a":[1,2]}' }))
      .toEqual({ status: 200, body: { parsed: { a: [1, 2] } } });
  });

  it("resolves undefined for an empty body", async () => {
    const port = await echoServer();
    expect(await request(port, "/", { method: "POST", body: "" }))
      .toEqual({ status: 200, body: { parsed: null } });
  });

  it("rejects malformed JSON", async () => {
    const port = await echoServer();
    expect(await request(port, "/", { method: "POST", body: "{oops" }))
      .toEqual({ status: 400, body: { error: "Invalid JSON body" } });
  });
});
