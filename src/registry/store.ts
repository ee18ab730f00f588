/**
 * Agent Registry
 *
 * Two layers:
 *   - the raw registry: name → base URL, loaded from a JSON source
 *     (plus agents found by port scan during the last discovery pass)
 *   - the descriptor store: name → AgentDescriptor for agents whose
 *     card was fetched successfully
 *
 * DescriptorStore is an immutable snapshot. Discovery builds a fresh
 * one and AgentRegistry.swap() installs it in a single assignment, so
 * a match that grabbed the previous snapshot keeps seeing it whole.
 */

import * as fs from "node:fs";
import { ConfigurationError } from "../errors.js";
import { errorMessage } from "../types.js";
import type { AgentDescriptor } from "./descriptor.js";
import { normalizeEndpoint } from "./descriptor.js";

/** Returned by describeForPrompt() when no agent was discovered. */
export const NO_AGENTS_AVAILABLE = "No agents available.";

/** Where a registry mapping comes from. */
export type RegistrySource =
  | { path: string }
  | { entries: unknown; label?: string };

// --- Descriptor store ---

export class DescriptorStore {
  private readonly byName: ReadonlyMap<string, AgentDescriptor>;
  private digest: string | null = null;

  constructor(descriptors: Iterable<AgentDescriptor> = []) {
    const map = new Map<string, AgentDescriptor>();
    for (const d of descriptors) {
      map.set(d.name, d);
    }
    this.byName = map;
  }

  static empty(): DescriptorStore {
    return new DescriptorStore();
  }

  get(name: string): AgentDescriptor | undefined {
    return this.byName.get(name);
  }

  /** Entries in discovery order. */
  all(): Array<[string, AgentDescriptor]> {
    return Array.from(this.byName.entries());
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }

  get size(): number {
    return this.byName.size;
  }

  /**
   * Render every descriptor for an LLM prompt or the list-agents command:
   * name, the card's display name when it differs, description, and per
   * skill its description plus up to 3 examples.
   */
  describeForPrompt(): string {
    if (this.digest !== null) return this.digest;
    if (this.byName.size === 0) return NO_AGENTS_AVAILABLE;

    const lines = ["Available agents:"];
    for (const [name, d] of this.byName) {
      const label = d.displayName && d.displayName !== name ? ` (${d.displayName})` : "";
      lines.push("", `- **${name}**${label}: ${d.displayDescription}`);
      if (d.skills.length === 0) continue;
      lines.push("  Skills:");
      for (const skill of d.skills) {
        lines.push(`    • ${skill.name}: ${skill.description}`);
        if (skill.examples.length > 0) {
          lines.push(`      Examples: ${skill.examples.slice(0, 3).join(", ")}`);
        }
      }
    }

    this.digest = lines.join("\n");
    return this.digest;
  }
}

// --- Registry ---

export class AgentRegistry {
  private staticEntries = new Map<string, string>();
  private scannedEntries = new Map<string, string>();
  private store: DescriptorStore = DescriptorStore.empty();

  /**
   * Replace the raw registry with the mapping read from `source`.
   * Throws ConfigurationError on an unreadable or malformed source; the
   * registry is left empty in that case.
   */
  load(source: RegistrySource): number {
    this.staticEntries = new Map();
    this.scannedEntries = new Map();
    this.store = DescriptorStore.empty();

    const entries = "path" in source
      ? parseRegistryEntries(readRegistryFile(source.path), source.path)
      : parseRegistryEntries(source.entries, source.label ?? "inline registry");

    this.staticEntries = entries;
    return entries.size;
  }

  /** The configured name → URL mapping. */
  staticRegistry(): Map<string, string> {
    return new Map(this.staticEntries);
  }

  /** Configured entries plus those added by the last port scan. */
  entries(): Map<string, string> {
    return new Map([...this.staticEntries, ...this.scannedEntries]);
  }

  /** The current descriptor snapshot. Hold on to it for the whole query. */
  current(): DescriptorStore {
    return this.store;
  }

  /**
   * Install a freshly discovered snapshot. `scanned` replaces the
   * previous pass's port-scan entries.
   */
  swap(store: DescriptorStore, scanned: ReadonlyMap<string, string> = new Map()): void {
    this.scannedEntries = new Map(scanned);
    this.store = store;
  }

  get(name: string): AgentDescriptor | undefined {
    return this.store.get(name);
  }

  all(): Array<[string, AgentDescriptor]> {
    return this.store.all();
  }

  describeForPrompt(): string {
    return this.store.describeForPrompt();
  }
}

// --- Source parsing ---

function readRegistryFile(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new ConfigurationError(`Cannot read agent registry ${filePath}: ${errorMessage(e)}`, filePath);
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ConfigurationError(`Agent registry ${filePath} is not valid JSON: ${errorMessage(e)}`, filePath);
  }
}

function isHttpUrl(v: string): boolean {
  try {
    const u = new URL(v);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Validate a name → URL mapping. Every value must be an http(s) URL;
 * one bad entry rejects the whole source.
 */
export function parseRegistryEntries(raw: unknown, label: string): Map<string, string> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(`Agent registry ${label}: expected a JSON object of name → URL`, label);
  }

  const entries = new Map<string, string>();
  for (const [name, url] of Object.entries(raw)) {
    if (name.trim().length === 0) {
      throw new ConfigurationError(`Agent registry ${label}: empty agent name`, label);
    }
    if (typeof url !== "string" || !isHttpUrl(url)) {
      throw new ConfigurationError(`Agent registry ${label}: "${name}" must map to an http(s) URL`, label);
    }
    entries.set(name, normalizeEndpoint(url));
  }
  return entries;
}
