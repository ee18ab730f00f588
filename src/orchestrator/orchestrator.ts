/**
 * Orchestrator
 *
 * Drives one query end to end:
 *   received → matching → (terminal answer | dispatching) → done
 *
 * The descriptor snapshot is read once per query and handed to both the
 * matcher and the dispatcher, so a concurrent refresh cannot make a query
 * see half of one store and half of another.
 */

import type { Logger } from "../types.js";
import { errorMessage } from "../types.js";
import type { AgentRegistry } from "../registry/store.js";
import type { DiscoveryClient } from "../discovery/discovery.js";
import type { Matcher, RoutingDecision } from "../routing/matcher.js";
import type { Dispatcher } from "../transport/client.js";

export interface OrchestratorDeps {
  registry: AgentRegistry;
  discovery: DiscoveryClient;
  matcher: Matcher;
  dispatcher: Dispatcher;
  logger: Logger;
}

export interface QueryResult {
  answer: string;
  /** Present when the query was dispatched to an agent. */
  decision: RoutingDecision | null;
}

export interface Orchestrator {
  /** Route and answer a query. Never rejects. */
  handle(query: string): Promise<QueryResult>;
  /** handle() reduced to the answer text. */
  ask(query: string): Promise<string>;
  /** Re-run discovery and swap in the new store. Returns a summary line. */
  refresh(): Promise<string>;
}

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { registry, discovery, matcher, dispatcher, logger } = deps;

  async function handle(query: string): Promise<QueryResult> {
    const store = registry.current();
    try {
      const outcome = await matcher.match(query, store);
      switch (outcome.kind) {
        case "answer":
        case "unavailable":
          return { answer: outcome.text, decision: null };
        case "routed": {
          const answer = await dispatcher.send(outcome.decision.selectedAgent, query, store);
          return { answer, decision: outcome.decision };
        }
      }
    } catch (e) {
      const msg = errorMessage(e);
      logger.error(`[switchboard:orchestrator] Query failed: ${msg}`);
      return { answer: `Error: ${msg}`, decision: null };
    }
  }

  async function ask(query: string): Promise<string> {
    return (await handle(query)).answer;
  }

  async function refresh(): Promise<string> {
    try {
      const count = await discovery.discoverAll(registry);
      return count > 0
        ? `Refreshed agent registry: ${count} agent(s) available.`
        : "No agents found during refresh.";
    } catch (e) {
      const msg = errorMessage(e);
      logger.error(`[switchboard:orchestrator] Refresh failed: ${msg}`);
      return `Error: refresh failed: ${msg}`;
    }
  }

  return { handle, ask, refresh };
}
