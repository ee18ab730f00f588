/**
 * Switchboard configuration resolution.
 * Merges a raw config record with sensible defaults.
 *
 * Two loading modes:
 *   1. Programmatic: resolveSwitchboardConfig(raw)
 *   2. File:         loadSwitchboardConfig() — reads from file / env directly
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import { errorMessage } from "./types.js";

export interface DiscoveryConfig {
  /** Per-card fetch bound (ms). */
  timeoutMs: number;
  /** Host used to build port-scan targets. */
  scanHost: string;
  /** Extra ports probed for agents not listed in the registry. */
  scanPorts: number[];
}

export interface RoutingConfig {
  /** Whether LLM classification may run at all. */
  llm: boolean;
  /** pi-ai model string, "provider/model-id". */
  model: string;
  maxTokens: number;
  temperature: number;
  /** Per-classification bound (ms). */
  timeoutMs: number;
  /** Broad tag rule: any descriptor tag found in the query selects that agent. */
  tagMatch: boolean;
}

export interface SwitchboardConfig {
  /** JSON file holding the name → base URL registry. */
  registryPath: string;
  logLevel: LogLevel;
  discovery: DiscoveryConfig;
  dispatch: {
    /** Per-dispatch bound (ms). */
    timeoutMs: number;
  };
  routing: RoutingConfig;
  /** Where `switchboard agents` serves the demonstration agents. */
  agents: {
    host: string;
    timePort: number;
    greetingPort: number;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return v as Record<string, unknown>;
  }
  return {};
}

function isPort(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v > 0 && v < 65536;
}

function positiveNumber(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isFinite(v) && v > 0 ? v : fallback;
}

export function resolveSwitchboardConfig(raw?: Record<string, unknown> | null): SwitchboardConfig {
  const r = raw ?? {};
  const discoveryRaw = toRecord(r.discovery);
  const dispatchRaw = toRecord(r.dispatch);
  const routingRaw = toRecord(r.routing);
  const agentsRaw = toRecord(r.agents);

  const logLevel = LOG_LEVELS.find((l) => l === r.logLevel) ?? "info";

  return {
    registryPath: typeof r.registryPath === "string" && r.registryPath.trim().length > 0
      ? r.registryPath
      : "agent_registry.json",
    logLevel,
    discovery: {
      timeoutMs: positiveNumber(discoveryRaw.timeoutMs, 5_000),
      scanHost: typeof discoveryRaw.scanHost === "string" ? discoveryRaw.scanHost : "localhost",
      scanPorts: Array.isArray(discoveryRaw.scanPorts)
        ? discoveryRaw.scanPorts.filter(isPort)
        : [],
    },
    dispatch: {
      timeoutMs: positiveNumber(dispatchRaw.timeoutMs, 60_000),
    },
    routing: {
      llm: routingRaw.llm !== false, // default true
      model: typeof routingRaw.model === "string" ? routingRaw.model : "google/gemini-2.5-flash-lite",
      maxTokens: positiveNumber(routingRaw.maxTokens, 100),
      temperature: typeof routingRaw.temperature === "number" ? routingRaw.temperature : 0.1,
      timeoutMs: positiveNumber(routingRaw.timeoutMs, 10_000),
      tagMatch: routingRaw.tagMatch === true,
    },
    agents: {
      host: typeof agentsRaw.host === "string" ? agentsRaw.host : "127.0.0.1",
      timePort: isPort(agentsRaw.timePort) ? agentsRaw.timePort : 6000,
      greetingPort: isPort(agentsRaw.greetingPort) ? agentsRaw.greetingPort : 5000,
    },
  };
}

/**
 * Default config file search paths (highest priority first):
 *   1. $SWITCHBOARD_CONFIG env
 *   2. ./switchboard.json (cwd)
 *   3. ~/.switchboard/switchboard.json
 */
function resolveConfigPath(): string | null {
  if (process.env.SWITCHBOARD_CONFIG) {
    return process.env.SWITCHBOARD_CONFIG;
  }
  const cwdPath = path.resolve("switchboard.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".switchboard", "switchboard.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load Switchboard config from the file system.
 * Falls back to defaults if no config file is found. A relative
 * `registryPath` is taken relative to the config file's directory.
 */
export function loadSwitchboardConfig(): SwitchboardConfig {
  const configPath = resolveConfigPath();
  if (!configPath) {
    return resolveSwitchboardConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (e) {
    throw new ConfigurationError(`Cannot read config at ${configPath}: ${errorMessage(e)}`, configPath);
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(`Invalid config at ${configPath}: expected a JSON object`, configPath);
  }
  const config = resolveSwitchboardConfig(toRecord(raw));
  return {
    ...config,
    registryPath: path.resolve(path.dirname(configPath), config.registryPath),
  };
}
