/**
 * Switchboard A2A Agent Host
 *
 * Serves one agent over A2A using the SDK's request handler and
 * JSON-RPC transport.
 *
 * Endpoints (relative to the agent's base URL):
 *   POST /                               — JSON-RPC (message/send, tasks/get, ...)
 *   GET  /.well-known/agent-card.json     — Agent card
 *   GET  /.well-known/agent.json          — Agent card (legacy path)
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import {
  DefaultRequestHandler,
  InMemoryTaskStore,
  DefaultExecutionEventBusManager,
  JsonRpcTransportHandler,
  type AgentExecutor,
} from "@a2a-js/sdk/server";
import type { AgentCard } from "@a2a-js/sdk";
import type { Logger } from "../types.js";
import { errorMessage } from "../types.js";
import { readJsonBody, sendJson, type HttpHandler } from "../server.js";
import { AGENT_CARD_PATHS } from "../discovery/discovery.js";

export interface AgentHostConfig {
  card: AgentCard;
  executor: AgentExecutor;
  logger: Logger;
}

export class AgentHost {
  readonly card: AgentCard;
  private readonly transportHandler: JsonRpcTransportHandler;
  private readonly logger: Logger;

  constructor(config: AgentHostConfig) {
    this.card = config.card;
    this.logger = config.logger;

    const requestHandler = new DefaultRequestHandler(
      config.card,
      new InMemoryTaskStore(),
      config.executor,
      new DefaultExecutionEventBusManager(),
    );
    this.transportHandler = new JsonRpcTransportHandler(requestHandler);
  }

  /**
   * Handle a parsed JSON-RPC request body.
   * Streaming results are drained and the last event returned.
   */
  async handleRequest(requestBody: unknown): Promise<{ status: number; body: unknown }> {
    try {
      const result = await this.transportHandler.handle(requestBody);

      if (result && typeof result === "object" && Symbol.asyncIterator in result) {
        let last: unknown = null;
        for await (const event of result as AsyncGenerator) {
          last = event;
        }
        return { status: 200, body: last };
      }

      return { status: 200, body: result };
    } catch (e) {
      const msg = errorMessage(e);
      this.logger.error(`[switchboard:a2a] Error for ${this.card.name}: ${msg}`);
      return {
        status: 500,
        body: {
          jsonrpc: "2.0",
          error: { code: -32603, message: msg },
          id: null,
        },
      };
    }
  }

  /** HTTP handler for node:http; returns false for unknown routes. */
  httpHandler(): HttpHandler {
    return async (req: IncomingMessage, res: ServerResponse): Promise<boolean> => {
      const url = new URL(req.url ?? "/", "http://localhost");
      const method = req.method ?? "GET";

      if (method === "GET" && AGENT_CARD_PATHS.some((p) => p === url.pathname)) {
        sendJson(res, 200, this.card);
        return true;
      }

      if (method === "POST" && url.pathname === "/") {
        let body: unknown;
        try {
          body = await readJsonBody(req);
        } catch (e) {
          sendJson(res, 400, {
            jsonrpc: "2.0",
            error: { code: -32700, message: errorMessage(e) },
            id: null,
          });
          return true;
        }
        const { status, body: out } = await this.handleRequest(body);
        sendJson(res, status, out);
        return true;
      }

      return false;
    };
  }
}
