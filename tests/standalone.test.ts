/**
 * End-to-end: real demonstration agents, real discovery and dispatch,
 * keyword routing only.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { startSwitchboard } from "../src/standalone.js";
import { resolveSwitchboardConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";
import {
  serveAgent,
  timeAgentDefinition,
  greetingAgentDefinition,
  type ServedAgent,
} from "../src/agents/index.js";
import { silentLogger } from "./helpers/fixtures.js";

const config = resolveSwitchboardConfig({
  routing: { llm: false },
  discovery: { timeoutMs: 2000 },
  dispatch: { timeoutMs: 5000 },
});

let timeAgent: ServedAgent;
let greetingAgent: ServedAgent;

beforeAll(async () => {
  timeAgent = await serveAgent(
    timeAgentDefinition(silentLogger, () => new Date(2025, 5, 1, 8, 15)),
    { host: "127.0.0.1", port: 0, logger: silentLogger },
  );
  greetingAgent = await serveAgent(greetingAgentDefinition(silentLogger), {
    host: "127.0.0.1", port: 0, logger: silentLogger,
  });
});

afterAll(async () => {
  await Promise.all([timeAgent.stop(), greetingAgent.stop()]);
});

async function startBoth() {
  return startSwitchboard({
    config,
    logger: silentLogger,
    registry: { entries: { time_agent: timeAgent.url, greeting_agent: greetingAgent.url } },
  });
}

describe("startSwitchboard", () => {
  it("discovers the configured agents", async () => {
    const sb = await startBoth();
    expect(sb.discovered).toBe(2);
    expect(sb.registry.current().names()).toEqual(["time_agent", "greeting_agent"]);
  });

  it("routes a time question to the time agent", async () => {
    const sb = await startBoth();
    const result = await sb.orchestrator.handle("What time is it?");
    expect(result.decision).toEqual({
      query: "What time is it?",
      selectedAgent: "time_agent",
      method: "keyword-fallback",
    });
    expect(result.answer).toBe("The current time is 08:15.");
  });

  it("routes a greeting to the greeting agent", async () => {
    const sb = await startBoth();
    expect(await sb.orchestrator.ask("Hello there")).toBe(
      'Hello there! You said "Hello there". Nice to hear from you, how can I help today?',
    );
  });

  it("lists both agents without dispatching", async () => {
    const sb = await startBoth();
    const result = await sb.orchestrator.handle("list agents");
    expect(result.decision).toBeNull();
    expect(result.answer).toContain("- **time_agent**: An agent that can tell the current time.");
    expect(result.answer).toContain(
      "- **greeting_agent**: A friendly agent that greets users and makes conversation.",
    );
  });

  it("reports no agents for an empty registry", async () => {
    const sb = await startSwitchboard({ config, logger: silentLogger, registry: { entries: {} } });
    expect(sb.discovered).toBe(0);
    expect(await sb.orchestrator.ask("What time is it?")).toBe("No agents available.");
  });

  it("rejects with ConfigurationError for an unreadable registry", async () => {
    await expect(startSwitchboard({
      config: resolveSwitchboardConfig({ registryPath: "/nonexistent/agent_registry.json" }),
      logger: silentLogger,
    })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("refresh drops an agent that went away", async () => {
    const extra = await serveAgent(greetingAgentDefinition(silentLogger), {
      host: "127.0.0.1", port: 0, logger: silentLogger,
    });
    const sb = await startSwitchboard({
      config,
      logger: silentLogger,
      registry: { entries: { time_agent: timeAgent.url, spare_agent: extra.url } },
    });
    expect(sb.discovered).toBe(2);

    await extra.stop();
    expect(await sb.orchestrator.refresh()).toBe("Refreshed agent registry: 1 agent(s) available.");
    expect(sb.registry.current().names()).toEqual(["time_agent"]);
  });
});
