/**
 * Demonstration agents and the helper that serves one over HTTP.
 */

import type { Server } from "node:http";
import type { AgentExecutor } from "@a2a-js/sdk/server";
import type { AgentSkill } from "@a2a-js/sdk";
import type { Logger } from "../types.js";
import { AgentHost } from "../transport/server.js";
import { createAgentCard, GREET_SKILL, TELL_TIME_SKILL } from "../transport/agent-card.js";
import { startHttpServer, stopHttpServer, listeningPort, sendJson } from "../server.js";
import { createTimeExecutor } from "./time-agent.js";
import { createGreetingExecutor } from "./greeting-agent.js";

export { createTimeExecutor, formatClock } from "./time-agent.js";
export { createGreetingExecutor, greetingFor } from "./greeting-agent.js";

export interface AgentDefinition {
  name: string;
  description: string;
  skills: AgentSkill[];
  executor: AgentExecutor;
}

export interface ServedAgent {
  name: string;
  /** Base URL; the card's JSON-RPC endpoint. */
  url: string;
  /** Bound port (resolved when 0 was requested). */
  port: number;
  server: Server;
  stop(): Promise<void>;
}

/**
 * Serve `def` on host:port (0 = auto-assign). The card advertises the
 * bound address, so it is built once the server is listening.
 */
export async function serveAgent(
  def: AgentDefinition,
  opts: { host: string; port: number; logger: Logger },
): Promise<ServedAgent> {
  let host: AgentHost | null = null;

  const server = await startHttpServer(async (req, res) => {
    if (!host) {
      sendJson(res, 503, { error: "agent starting" });
      return true;
    }
    return host.httpHandler()(req, res);
  }, { host: opts.host, port: opts.port, logger: opts.logger });

  const port = listeningPort(server);
  const url = `http://${opts.host}:${port}/`;
  host = new AgentHost({
    card: createAgentCard({
      name: def.name,
      description: def.description,
      skills: def.skills,
      endpointUrl: url,
    }),
    executor: def.executor,
    logger: opts.logger,
  });

  opts.logger.info(`[switchboard:agents] ${def.name} serving at ${url}`);
  return { name: def.name, url, port, server, stop: () => stopHttpServer(server) };
}

export function timeAgentDefinition(logger: Logger, now?: () => Date): AgentDefinition {
  return {
    name: "time_agent",
    description: "An agent that can tell the current time.",
    skills: [TELL_TIME_SKILL],
    executor: createTimeExecutor({ logger, now }),
  };
}

export function greetingAgentDefinition(logger: Logger): AgentDefinition {
  return {
    name: "greeting_agent",
    description: "A friendly agent that greets users and makes conversation.",
    skills: [GREET_SKILL],
    executor: createGreetingExecutor({ logger }),
  };
}

/** Start both demonstration agents. */
export async function startDemoAgents(opts: {
  host: string;
  timePort: number;
  greetingPort: number;
  logger: Logger;
}): Promise<ServedAgent[]> {
  const { host, logger } = opts;
  return Promise.all([
    serveAgent(timeAgentDefinition(logger), { host, port: opts.timePort, logger }),
    serveAgent(greetingAgentDefinition(logger), { host, port: opts.greetingPort, logger }),
  ]);
}
