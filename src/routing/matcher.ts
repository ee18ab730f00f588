/**
 * Capability Matcher
 *
 * Maps a free-text query to one agent in a descriptor snapshot. Stages run
 * in strict order, each falling through to the next:
 *
 *   1. list-agents shortcut  → terminal answer (the digest), no dispatch
 *   2. LLM classification    → exact name, then substring either way
 *   3. keyword buckets       → first agent serving a bucket the query hits
 *   4. first available       → first agent in store order
 *
 * An empty store ends in the "no agents available" outcome. Every stage
 * reports a checked result; nothing here throws.
 */

import type { Logger, Result } from "../types.js";
import { errorMessage, err } from "../types.js";
import type { AgentDescriptor } from "../registry/descriptor.js";
import { NO_AGENTS_AVAILABLE, type DescriptorStore } from "../registry/store.js";
import { DEFAULT_TOPIC_BUCKETS, matchTopics, type TopicBucket } from "./keywords.js";
import { buildClassificationPrompt } from "./prompt.js";

/** Queries answered with the agent digest instead of a dispatch. */
export const LIST_AGENTS_COMMANDS: ReadonlySet<string> = new Set([
  "list",
  "agents",
  "list agents",
  "show agents",
]);

/** Prompt in, model text out. Failure is a value, not an exception. */
export type Classifier = (prompt: string) => Promise<Result<string>>;

export type RoutingMethod =
  | "llm-classification"
  | "keyword-fallback"
  | "first-available-fallback";

export interface RoutingDecision {
  query: string;
  selectedAgent: string;
  method: RoutingMethod;
}

export type MatchOutcome =
  | { kind: "answer"; text: string }
  | { kind: "routed"; decision: RoutingDecision }
  | { kind: "unavailable"; text: string };

export interface MatcherConfig {
  /** LLM backend, or null when none is configured. */
  classifier: Classifier | null;
  logger: Logger;
  /** Opt-in: any descriptor tag appearing in the query selects that agent. */
  tagMatch?: boolean;
  buckets?: readonly TopicBucket[];
}

export interface Matcher {
  match(query: string, store: DescriptorStore): Promise<MatchOutcome>;
}

export function isListAgentsCommand(query: string): boolean {
  return LIST_AGENTS_COMMANDS.has(query.trim().toLowerCase());
}

/**
 * Resolve an LLM reply to a known agent name: exact match first, then the
 * first name (store order) that contains the reply or is contained in it.
 */
export function resolveCandidate(reply: string, names: readonly string[]): string | null {
  const candidate = reply.trim().toLowerCase();
  if (candidate.length === 0) return null;

  const exact = names.find((n) => n.toLowerCase() === candidate);
  if (exact) return exact;

  return names.find((n) => {
    const name = n.toLowerCase();
    return name.includes(candidate) || candidate.includes(name);
  }) ?? null;
}

/** Lowercased text a descriptor is keyword-matched against. */
function searchableText(d: AgentDescriptor): string {
  const skills = d.skills.map((s) => `${s.name} ${s.description} ${s.examples.join(" ")}`);
  return [d.displayDescription, ...skills, ...d.tags].join(" ").toLowerCase();
}

export function createMatcher(config: MatcherConfig): Matcher {
  const {
    classifier,
    logger,
    tagMatch = false,
    buckets = DEFAULT_TOPIC_BUCKETS,
  } = config;

  async function classify(query: string, store: DescriptorStore): Promise<string | null> {
    if (!classifier) return null;

    const prompt = buildClassificationPrompt(store.describeForPrompt(), query);
    let result: Result<string>;
    try {
      result = await classifier(prompt);
    } catch (e) {
      result = err(errorMessage(e));
    }

    if (!result.ok) {
      logger.warn(`[switchboard:matcher] LLM routing failed: ${result.error}`);
      return null;
    }

    const selected = resolveCandidate(result.value, store.names());
    if (!selected) {
      logger.warn(`[switchboard:matcher] LLM chose unknown agent "${result.value.trim()}"`);
    }
    return selected;
  }

  function keywordMatch(query: string, store: DescriptorStore): string | null {
    const entries = store.all();

    for (const bucket of matchTopics(query, buckets)) {
      for (const [name, d] of entries) {
        const text = searchableText(d);
        if (bucket.agentKeywords.some((kw) => text.includes(kw))) {
          logger.debug?.(`[switchboard:matcher] ${name} serves topic "${bucket.topic}"`);
          return name;
        }
      }
    }

    if (tagMatch) {
      const q = query.toLowerCase();
      for (const [name, d] of entries) {
        if (d.tags.some((tag) => tag.length > 0 && q.includes(tag.toLowerCase()))) {
          logger.debug?.(`[switchboard:matcher] ${name} matched by tag`);
          return name;
        }
      }
    }

    return null;
  }

  async function match(query: string, store: DescriptorStore): Promise<MatchOutcome> {
    if (isListAgentsCommand(query)) {
      return { kind: "answer", text: store.describeForPrompt() };
    }

    if (store.size === 0) {
      return { kind: "unavailable", text: NO_AGENTS_AVAILABLE };
    }

    const routed = (selectedAgent: string, method: RoutingMethod): MatchOutcome => {
      logger.info(`[switchboard:matcher] "${query.slice(0, 80)}" → ${selectedAgent} (${method})`);
      return { kind: "routed", decision: { query, selectedAgent, method } };
    };

    const llmChoice = await classify(query, store);
    if (llmChoice) return routed(llmChoice, "llm-classification");

    const keywordChoice = keywordMatch(query, store);
    if (keywordChoice) return routed(keywordChoice, "keyword-fallback");

    // Non-empty store checked above.
    return routed(store.names()[0], "first-available-fallback");
  }

  return { match };
}
