/**
 * Agent descriptors — the orchestrator's view of a discovered agent.
 *
 * Built once from a remote agent card after a successful discovery and
 * never mutated afterwards; a refresh builds new descriptors instead.
 */

/** A named capability advertised in an agent card. */
export interface Skill {
  id: string;
  name: string;
  description: string;
  /** Sample utterances, in card order. */
  examples: string[];
  tags: string[];
}

/** Informational flags copied from the card; not used for routing. */
export interface DescriptorCapabilities {
  streaming: boolean;
  pushNotifications: boolean;
}

export interface AgentDescriptor {
  /** Registry key. Unique within a store. */
  name: string;
  /** Base URL the card was fetched from. */
  endpoint: string;
  /** JSON-RPC endpoint advertised by the card (`url`), or `endpoint` when absent. */
  rpcUrl: string;
  /** Display name from the card. */
  displayName: string;
  displayDescription: string;
  skills: readonly Skill[];
  /** Card-level and skill-level tags, de-duplicated, first occurrence wins. */
  tags: readonly string[];
  capabilities: DescriptorCapabilities;
}

/**
 * Derive a registry key from a card's display name:
 * lowercased, spaces and hyphens collapsed to underscores.
 *
 * @example normalizeAgentName("Time Agent") // "time_agent"
 */
export function normalizeAgentName(displayName: string): string {
  return displayName.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/**
 * Pick a name not in `taken`, suffixing `_1`, `_2`, ... on collision.
 */
export function uniqueAgentName(base: string, taken: ReadonlySet<string>): string {
  let name = base;
  let counter = 1;
  while (taken.has(name)) {
    name = `${base}_${counter}`;
    counter++;
  }
  return name;
}

/** Strip trailing slashes so `${endpoint}/path` joins cleanly. */
export function normalizeEndpoint(url: string): string {
  return url.trim().replace(/\/+$/, "");
}
