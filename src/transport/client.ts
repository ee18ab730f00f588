/**
 * Switchboard Dispatcher
 *
 * Sends a query to a discovered agent over A2A JSON-RPC (`message/send`)
 * and reduces whatever comes back to a single string.
 *
 * Replies arrive in three shapes: a Task (usually carrying artifacts), a
 * bare Message, or anything else a non-conforming agent returns. They are
 * tagged once by classifyReply() and rendered by normalizeReply(), so no
 * caller branches on the wire shape.
 *
 * send() never throws. Every transport failure becomes a string starting
 * with "Error" so the REPL keeps running.
 */

import { randomUUID } from "node:crypto";
import type { Task, Message, MessageSendParams } from "@a2a-js/sdk";
import type { Logger } from "../types.js";
import { errorMessage } from "../types.js";
import type { AgentRegistry, DescriptorStore } from "../registry/store.js";
import { userMessage, extractText, firstArtifactText } from "./a2a-helpers.js";

/** A reply from `message/send`, tagged by shape. */
export type DispatchReply =
  | { kind: "task"; task: Task }
  | { kind: "message"; message: Message }
  | { kind: "opaque"; value: unknown };

export interface DispatcherConfig {
  /** Source of the live descriptor snapshot. */
  registry: AgentRegistry;
  logger: Logger;
  /** Bound on a single dispatch (ms). Default: 60000. */
  timeoutMs?: number;
}

export interface Dispatcher {
  /**
   * Deliver `query` to `agentName` and return the normalized reply.
   * `store` pins the snapshot the agent was selected from; it defaults to
   * the registry's current one.
   */
  send(agentName: string, query: string, store?: DescriptorStore): Promise<string>;
}

export function unavailableAgentMessage(agentName: string): string {
  return `Error: agent ${agentName} is not available`;
}

export function dispatchErrorMessage(agentName: string, cause: string): string {
  return `Error communicating with ${agentName}: ${cause}`;
}

/** Build the JSON-RPC envelope for one query. Fresh ids on every call. */
export function buildSendRequest(query: string): {
  jsonrpc: "2.0";
  method: "message/send";
  params: MessageSendParams;
  id: string;
} {
  return {
    jsonrpc: "2.0",
    method: "message/send",
    params: { message: userMessage(query) },
    id: randomUUID(),
  };
}

export function createDispatcher(config: DispatcherConfig): Dispatcher {
  const { registry, logger, timeoutMs = 60_000 } = config;

  async function send(
    agentName: string,
    query: string,
    store: DescriptorStore = registry.current(),
  ): Promise<string> {
    const descriptor = store.get(agentName);
    if (!descriptor) {
      logger.warn(`[switchboard:dispatch] No connection for agent ${agentName}`);
      return unavailableAgentMessage(agentName);
    }

    logger.info(`[switchboard:dispatch] Sending query to ${agentName} at ${descriptor.rpcUrl}`);

    try {
      const res = await fetch(descriptor.rpcUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(buildSendRequest(query)),
        signal: AbortSignal.timeout(timeoutMs),
      });

      const body: unknown = await res.json();
      const text = normalizeReply(parseResponse(body, res.status));
      logger.debug?.(`[switchboard:dispatch] Response from ${agentName}: ${text.slice(0, 100)}`);
      return text;
    } catch (e) {
      const msg = dispatchErrorMessage(agentName, errorMessage(e));
      logger.error(`[switchboard:dispatch] ${msg}`);
      return msg;
    }
  }

  return { send };
}

// --- Reply shapes ---

/** Tag a JSON-RPC `result` by shape. */
export function classifyReply(result: unknown): DispatchReply {
  if (isA2ATask(result)) return { kind: "task", task: result };
  if (isA2AMessage(result)) return { kind: "message", message: result };
  return { kind: "opaque", value: result };
}

/**
 * Reduce a reply to text: the first text part of the first artifact for a
 * task, the text parts of a message, otherwise a rendering of the whole
 * object. Never returns an empty string.
 */
export function normalizeReply(reply: DispatchReply): string {
  switch (reply.kind) {
    case "task": {
      const text = firstArtifactText(reply.task);
      return text ? text : render(reply.task);
    }
    case "message": {
      const text = extractText(reply.message);
      return text.length > 0 ? text : render(reply.message);
    }
    case "opaque":
      return render(reply.value);
  }
}

function render(value: unknown): string {
  if (typeof value === "string" && value.length > 0) return value;
  return JSON.stringify(value) ?? String(value);
}

/** Parse a JSON-RPC response body; throws on transport-level errors. */
function parseResponse(body: unknown, httpStatus: number): DispatchReply {
  if (httpStatus !== 200) {
    const errMsg = extractJsonRpcError(body) ?? JSON.stringify(body);
    throw new Error(`A2A request failed (${httpStatus}): ${errMsg}`);
  }

  const rpcError = extractJsonRpcError(body);
  if (rpcError) {
    throw new Error(`A2A RPC error: ${rpcError}`);
  }

  if (typeof body !== "object" || body === null || !("result" in body)) {
    throw new Error(`A2A response missing result: ${String(JSON.stringify(body)).slice(0, 200)}`);
  }
  return classifyReply(body.result);
}

// --- Type guards ---

/** Check if an unknown value is an A2A Task. */
function isA2ATask(v: unknown): v is Task {
  if (typeof v !== "object" || v === null) return false;
  const obj = v as Record<string, unknown>;
  return (
    obj.kind === "task" &&
    typeof obj.id === "string" &&
    typeof obj.status === "object" && obj.status !== null
  );
}

/** Check if an unknown value is an A2A Message. */
function isA2AMessage(v: unknown): v is Message {
  if (typeof v !== "object" || v === null) return false;
  const obj = v as Record<string, unknown>;
  return (
    obj.kind === "message" &&
    typeof obj.role === "string" &&
    Array.isArray(obj.parts)
  );
}

/** Safely extract a JSON-RPC error string from an unknown response body. */
function extractJsonRpcError(body: unknown): string | null {
  if (typeof body !== "object" || body === null) return null;
  const obj = body as Record<string, unknown>;
  if (typeof obj.error !== "object" || obj.error === null) return null;
  const e = obj.error as Record<string, unknown>;
  const code = typeof e.code === "number" ? e.code : -1;
  const msg = typeof e.message === "string" ? e.message : "Unknown error";
  return `[${code}] ${msg}`;
}
