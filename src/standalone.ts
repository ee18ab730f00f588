/**
 * Switchboard runtime
 *
 * Wires config, registry, discovery, matcher and dispatcher into a ready
 * orchestrator. The CLI is a thin layer over this.
 *
 * Usage:
 *   import { startSwitchboard } from "./standalone.js";
 *   const sb = await startSwitchboard();               // config from file
 *   const sb = await startSwitchboard({ config });     // explicit config
 *   console.log(await sb.orchestrator.ask("What time is it?"));
 */

import { loadSwitchboardConfig, type SwitchboardConfig } from "./config.js";
import { createSwitchboardLogger, type SwitchboardLoggerOptions } from "./logger.js";
import { AgentRegistry, type RegistrySource } from "./registry/store.js";
import { createDiscoveryClient } from "./discovery/discovery.js";
import { createMatcher, type Classifier } from "./routing/matcher.js";
import { createDispatcher } from "./transport/client.js";
import { createLlmClassifier } from "./llm/classifier.js";
import { createOrchestrator, type Orchestrator } from "./orchestrator/orchestrator.js";
import type { Logger } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SwitchboardInstance {
  config: SwitchboardConfig;
  registry: AgentRegistry;
  orchestrator: Orchestrator;
  logger: Logger;
  /** Agents available after the initial discovery pass. */
  discovered: number;
}

export interface StartSwitchboardOptions {
  /** Config override. If not provided, loaded from file. */
  config?: SwitchboardConfig;
  /** Registry override. Default: the file at config.registryPath. */
  registry?: RegistrySource;
  /** Logger override. Default: a winston logger at config.logLevel. */
  logger?: Logger;
  loggerOptions?: SwitchboardLoggerOptions;
  /**
   * Classifier override. `null` disables LLM classification; undefined
   * builds the pi-ai classifier from config.routing.
   */
  classifier?: Classifier | null;
}

// ---------------------------------------------------------------------------
// Boot
// ---------------------------------------------------------------------------

/**
 * Load config and registry, run one discovery pass, and return the
 * assembled instance. Throws ConfigurationError if the registry or
 * config file cannot be used; nothing else at startup throws.
 */
export async function startSwitchboard(opts?: StartSwitchboardOptions): Promise<SwitchboardInstance> {
  const config = opts?.config ?? loadSwitchboardConfig();
  const logger = opts?.logger ?? createSwitchboardLogger({
    level: config.logLevel,
    ...opts?.loggerOptions,
  });

  const registry = new AgentRegistry();
  const configured = registry.load(opts?.registry ?? { path: config.registryPath });
  logger.info(`[switchboard:standalone] registry has ${configured} configured agent(s)`);

  const classifier = opts?.classifier !== undefined
    ? opts.classifier
    : buildClassifier(config, logger);

  const matcher = createMatcher({
    classifier,
    logger,
    tagMatch: config.routing.tagMatch,
  });
  const dispatcher = createDispatcher({
    registry,
    logger,
    timeoutMs: config.dispatch.timeoutMs,
  });
  const discovery = createDiscoveryClient({
    logger,
    timeoutMs: config.discovery.timeoutMs,
    scanHost: config.discovery.scanHost,
    scanPorts: config.discovery.scanPorts,
  });

  const discovered = await discovery.discoverAll(registry);
  logger.info(`[switchboard:standalone] ${discovered} agent(s) available`);

  const orchestrator = createOrchestrator({ registry, discovery, matcher, dispatcher, logger });
  return { config, registry, orchestrator, logger, discovered };
}

function buildClassifier(config: SwitchboardConfig, logger: Logger): Classifier | null {
  if (!config.routing.llm) {
    logger.info("[switchboard:standalone] LLM classification disabled");
    return null;
  }
  return createLlmClassifier({
    model: config.routing.model,
    maxTokens: config.routing.maxTokens,
    temperature: config.routing.temperature,
    timeoutMs: config.routing.timeoutMs,
    logger,
  });
}
