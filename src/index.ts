/**
 * Switchboard — A2A agent registry and query routing
 *
 * Provides:
 * - Agent registry (name → URL) and immutable descriptor snapshots
 * - Agent-card discovery with optional port scanning
 * - Capability matching: LLM classification, keyword buckets, first available
 * - JSON-RPC dispatch with reply normalization
 * - Orchestrator and interactive loop
 * - Demonstration time and greeting agents
 */

export { startSwitchboard, type SwitchboardInstance, type StartSwitchboardOptions } from "./standalone.js";
export { createSwitchboardLogger, type SwitchboardLoggerOptions, type LogLevel } from "./logger.js";
export {
  loadSwitchboardConfig,
  resolveSwitchboardConfig,
  type SwitchboardConfig,
  type DiscoveryConfig,
  type RoutingConfig,
} from "./config.js";
export { ConfigurationError } from "./errors.js";
export { ok, err, errorMessage, type Logger, type Result, type Ok, type Err } from "./types.js";

export {
  normalizeAgentName,
  uniqueAgentName,
  normalizeEndpoint,
  type AgentDescriptor,
  type Skill,
  type DescriptorCapabilities,
} from "./registry/descriptor.js";
export {
  AgentRegistry,
  DescriptorStore,
  NO_AGENTS_AVAILABLE,
  parseRegistryEntries,
  type RegistrySource,
} from "./registry/store.js";

export {
  AGENT_CARD_PATHS,
  createDiscoveryClient,
  fetchAgentCard,
  parseAgentCard,
  toDescriptor,
  type DiscoveryClient,
  type DiscoveryOptions,
  type RemoteCard,
} from "./discovery/discovery.js";

export {
  createMatcher,
  isListAgentsCommand,
  resolveCandidate,
  LIST_AGENTS_COMMANDS,
  type Classifier,
  type Matcher,
  type MatcherConfig,
  type MatchOutcome,
  type RoutingDecision,
  type RoutingMethod,
} from "./routing/matcher.js";
export { DEFAULT_TOPIC_BUCKETS, matchTopics, type TopicBucket } from "./routing/keywords.js";
export { buildClassificationPrompt } from "./routing/prompt.js";
export { createLlmClassifier, resolveModel, type LlmClassifierOptions } from "./llm/classifier.js";

export {
  createDispatcher,
  normalizeReply,
  classifyReply,
  type Dispatcher,
  type DispatcherConfig,
  type DispatchReply,
} from "./transport/client.js";
export { AgentHost, type AgentHostConfig } from "./transport/server.js";
export { createAgentCard, type CreateCardParams } from "./transport/agent-card.js";
export { startHttpServer, stopHttpServer } from "./server.js";

export { createOrchestrator, type Orchestrator, type QueryResult } from "./orchestrator/orchestrator.js";
export { runRepl, type ReplOptions } from "./cli/repl.js";
export {
  serveAgent,
  startDemoAgents,
  timeAgentDefinition,
  greetingAgentDefinition,
  type AgentDefinition,
  type ServedAgent,
} from "./agents/index.js";
