/**
 * Agent Card Discovery
 *
 * Fetches each registered agent's card from its well-known endpoint and
 * builds a fresh DescriptorStore. Per-agent failures are isolated: the
 * agent is left out of the store and the rest of the batch continues.
 */

import type { Logger, Result } from "../types.js";
import { ok, err, errorMessage } from "../types.js";
import type { AgentDescriptor, Skill } from "../registry/descriptor.js";
import { normalizeAgentName, normalizeEndpoint, uniqueAgentName } from "../registry/descriptor.js";
import { DescriptorStore, type AgentRegistry } from "../registry/store.js";

/** Card paths tried in order; the legacy one only after a 404. */
export const AGENT_CARD_PATHS = ["/.well-known/agent-card.json", "/.well-known/agent.json"] as const;

/** The subset of an A2A agent card the router relies on. */
export interface RemoteCard {
  name: string;
  description: string;
  /** JSON-RPC endpoint, if advertised. */
  url?: string;
  skills: Skill[];
  tags: string[];
  capabilities: { streaming: boolean; pushNotifications: boolean };
}

export interface FetchCardOptions {
  /** Bound on the whole request, connect through body (ms). */
  timeoutMs: number;
}

export interface DiscoveryOptions {
  logger: Logger;
  timeoutMs: number;
  /** Host for port-scan targets. Default: "localhost". */
  scanHost?: string;
  /** Ports probed in addition to the registry. */
  scanPorts?: number[];
}

export interface DiscoveryClient {
  /**
   * Discover every registry entry (plus scan targets), swap the result
   * into the registry, and return how many agents are now available.
   * Zero is a valid outcome.
   */
  discoverAll(registry: AgentRegistry): Promise<number>;
}

// --- Card parsing ---

function toRecord(v: unknown): Record<string, unknown> | null {
  return typeof v === "object" && v !== null && !Array.isArray(v)
    ? v as Record<string, unknown>
    : null;
}

function stringList(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === "string") : [];
}

function parseSkill(v: unknown): Skill | null {
  const obj = toRecord(v);
  if (!obj || typeof obj.name !== "string") return null;
  return {
    id: typeof obj.id === "string" ? obj.id : obj.name,
    name: obj.name,
    description: typeof obj.description === "string" ? obj.description : "",
    examples: stringList(obj.examples),
    tags: stringList(obj.tags),
  };
}

/**
 * Validate an unknown JSON body as an agent card.
 * Only `name` is mandatory; everything else degrades to an empty value.
 */
export function parseAgentCard(body: unknown): Result<RemoteCard> {
  const obj = toRecord(body);
  if (!obj) return err("agent card is not a JSON object");
  if (typeof obj.name !== "string" || obj.name.trim().length === 0) {
    return err("agent card has no name");
  }

  const skills = Array.isArray(obj.skills)
    ? obj.skills.map(parseSkill).filter((s): s is Skill => s !== null)
    : [];

  const tags: string[] = [];
  for (const tag of [...stringList(obj.tags), ...skills.flatMap((s) => s.tags)]) {
    if (!tags.includes(tag)) tags.push(tag);
  }

  const caps = toRecord(obj.capabilities) ?? {};

  return ok({
    name: obj.name,
    description: typeof obj.description === "string" ? obj.description : "",
    url: typeof obj.url === "string" && obj.url.length > 0 ? obj.url : undefined,
    skills,
    tags,
    capabilities: {
      streaming: caps.streaming === true,
      pushNotifications: caps.pushNotifications === true,
    },
  });
}

/** Build the immutable descriptor for a discovered card. */
export function toDescriptor(name: string, endpoint: string, card: RemoteCard): AgentDescriptor {
  return {
    name,
    endpoint,
    rpcUrl: card.url ?? endpoint,
    displayName: card.name,
    displayDescription: card.description,
    skills: card.skills,
    tags: card.tags,
    capabilities: card.capabilities,
  };
}

// --- Fetching ---

/**
 * Fetch and validate the agent card served under `baseUrl`.
 * Never throws: timeouts, non-2xx responses and bad bodies are failures.
 */
export async function fetchAgentCard(
  baseUrl: string,
  opts: FetchCardOptions,
): Promise<Result<RemoteCard>> {
  const base = normalizeEndpoint(baseUrl);
  const signal = AbortSignal.timeout(opts.timeoutMs);

  try {
    for (const cardPath of AGENT_CARD_PATHS) {
      const url = `${base}${cardPath}`;
      const res = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal,
      });

      if (res.status === 404) continue;
      if (!res.ok) return err(`HTTP ${res.status} from ${url}`);

      let body: unknown;
      try {
        body = await res.json();
      } catch (e) {
        return err(`invalid JSON from ${url}: ${errorMessage(e)}`);
      }
      return parseAgentCard(body);
    }
    return err(`no agent card at ${base}`);
  } catch (e) {
    return err(errorMessage(e));
  }
}

// --- Batch discovery ---

export function createDiscoveryClient(opts: DiscoveryOptions): DiscoveryClient {
  const { logger, timeoutMs, scanHost = "localhost", scanPorts = [] } = opts;

  async function probe(label: string, url: string, scanning = false): Promise<RemoteCard | null> {
    const result = await fetchAgentCard(url, { timeoutMs });
    if (!result.ok) {
      // Empty scan ports are expected; keep them out of the warnings.
      const msg = `[switchboard:discovery] ${label} at ${url} unavailable: ${result.error}`;
      if (scanning) logger.debug?.(msg);
      else logger.warn(msg);
      return null;
    }
    return result.value;
  }

  async function discoverAll(registry: AgentRegistry): Promise<number> {
    const configured = Array.from(registry.staticRegistry());
    const knownUrls = new Set(configured.map(([, url]) => url));
    const scanUrls = scanPorts
      .map((port) => `http://${scanHost}:${port}`)
      .filter((url) => !knownUrls.has(url));

    if (scanUrls.length > 0) {
      logger.debug?.(`[switchboard:discovery] Scanning ${scanUrls.join(", ")}`);
    }

    // All fetches run concurrently; a slow agent only delays its own slot.
    const [configuredCards, scannedCards] = await Promise.all([
      Promise.all(configured.map(([name, url]) => probe(name, url))),
      Promise.all(scanUrls.map((url) => probe("scan target", url, true))),
    ]);

    const descriptors: AgentDescriptor[] = [];
    configured.forEach(([name, url], i) => {
      const card = configuredCards[i];
      if (!card) return;
      descriptors.push(toDescriptor(name, url, card));
      logger.info(`[switchboard:discovery] Connected to ${name}: ${card.description}`);
    });

    const taken = new Set(configured.map(([name]) => name));
    const scanned = new Map<string, string>();
    scanUrls.forEach((url, i) => {
      const card = scannedCards[i];
      if (!card) return;
      const name = uniqueAgentName(normalizeAgentName(card.name), taken);
      taken.add(name);
      scanned.set(name, url);
      descriptors.push(toDescriptor(name, url, card));
      logger.info(`[switchboard:discovery] Registered scanned agent '${name}' at ${url}`);
    });

    registry.swap(new DescriptorStore(descriptors), scanned);
    logger.info(
      `[switchboard:discovery] ${descriptors.length} of ${configured.length + scanUrls.length} agent(s) available`,
    );
    return descriptors.length;
  }

  return { discoverAll };
}
