import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  AgentRegistry,
  DescriptorStore,
  NO_AGENTS_AVAILABLE,
  parseRegistryEntries,
} from "../../src/registry/store.js";
import {
  normalizeAgentName,
  normalizeEndpoint,
  uniqueAgentName,
} from "../../src/registry/descriptor.js";
import { ConfigurationError } from "../../src/errors.js";
import { makeDescriptor, makeSkill, timeDescriptor, greetingDescriptor } from "../helpers/fixtures.js";

describe("descriptor names", () => {
  it("normalizes display names", () => {
    expect(normalizeAgentName("Time Agent")).toBe("time_agent");
    expect(normalizeAgentName("  arXiv-Research  Agent ")).toBe("arxiv_research_agent");
  });

  it("suffixes colliding names", () => {
    expect(uniqueAgentName("time_agent", new Set())).toBe("time_agent");
    expect(uniqueAgentName("time_agent", new Set(["time_agent"]))).toBe("time_agent_1");
    expect(uniqueAgentName("time_agent", new Set(["time_agent", "time_agent_1"]))).toBe("time_agent_2");
  });

  it("strips trailing slashes from endpoints", () => {
    expect(normalizeEndpoint("http://localhost:6000/")).toBe("http://localhost:6000");
    expect(normalizeEndpoint("http://localhost:6000//")).toBe("http://localhost:6000");
    expect(normalizeEndpoint("http://localhost:6000")).toBe("http://localhost:6000");
  });
});

describe("DescriptorStore", () => {
  it("keeps discovery order", () => {
    const store = new DescriptorStore([timeDescriptor, greetingDescriptor]);
    expect(store.names()).toEqual(["time_agent", "greeting_agent"]);
    expect(store.size).toBe(2);
    expect(store.get("time_agent")).toBe(timeDescriptor);
    expect(store.get("missing")).toBeUndefined();
  });

  it("describes an empty store as no agents available", () => {
    expect(DescriptorStore.empty().describeForPrompt()).toBe(NO_AGENTS_AVAILABLE);
  });

  it("renders names, descriptions, skills and at most three examples", () => {
    const store = new DescriptorStore([
      makeDescriptor("time_agent", {
        displayDescription: "Tells the time.",
        skills: [makeSkill({
          name: "tell_time",
          description: "Returns the current time.",
          examples: ["a", "b", "c", "d"],
        })],
      }),
      makeDescriptor("bare_agent", { displayDescription: "No skills." }),
    ]);

    expect(store.describeForPrompt()).toBe([
      "Available agents:",
      "",
      "- **time_agent**: Tells the time.",
      "  Skills:",
      "    • tell_time: Returns the current time.",
      "      Examples: a, b, c",
      "",
      "- **bare_agent**: No skills.",
    ].join("\n"));
  });

  it("shows the card's display name when it differs from the registry name", () => {
    const store = new DescriptorStore([
      makeDescriptor("time_agent", { displayName: "Time Agent", displayDescription: "Tells the time." }),
      makeDescriptor("greeting_agent", { displayDescription: "Says hello." }),
    ]);
    expect(store.describeForPrompt()).toBe([
      "Available agents:",
      "",
      "- **time_agent** (Time Agent): Tells the time.",
      "",
      "- **greeting_agent**: Says hello.",
    ].join("\n"));
  });

  it("omits the examples line for a skill without examples", () => {
    const store = new DescriptorStore([
      makeDescriptor("a", {
        displayDescription: "d",
        skills: [makeSkill({ name: "s", description: "x" })],
      }),
    ]);
    expect(store.describeForPrompt()).toBe("Available agents:\n\n- **a**: d\n  Skills:\n    • s: x");
  });
});

describe("parseRegistryEntries", () => {
  it("accepts a name → URL object", () => {
    const entries = parseRegistryEntries(
      { time_agent: "http://localhost:6000/", greeting_agent: "https://example.test" },
      "inline",
    );
    expect([...entries]).toEqual([
      ["time_agent", "http://localhost:6000"],
      ["greeting_agent", "https://example.test"],
    ]);
  });

  it("rejects non-objects", () => {
    expect(() => parseRegistryEntries(["http://x"], "inline")).toThrow(ConfigurationError);
    expect(() => parseRegistryEntries(null, "inline")).toThrow(
      "Agent registry inline: expected a JSON object of name → URL",
    );
  });

  it("rejects non-URL values", () => {
    expect(() => parseRegistryEntries({ a: 42 }, "inline")).toThrow(
      'Agent registry inline: "a" must map to an http(s) URL',
    );
    expect(() => parseRegistryEntries({ a: "ftp://host" }, "inline")).toThrow(ConfigurationError);
    expect(() => parseRegistryEntries({ a: "not a url" }, "inline")).toThrow(ConfigurationError);
  });

  it("rejects empty names", () => {
    expect(() => parseRegistryEntries({ " ": "http://x" }, "inline")).toThrow(
      "Agent registry inline: empty agent name",
    );
  });
});

describe("AgentRegistry", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "switchboard-registry-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loads a registry file", () => {
    const file = path.join(tmpDir, "agent_registry.json");
    fs.writeFileSync(file, JSON.stringify({ time_agent: "http://localhost:6000" }));

    const registry = new AgentRegistry();
    expect(registry.load({ path: file })).toBe(1);
    expect(registry.staticRegistry().get("time_agent")).toBe("http://localhost:6000");
    expect(registry.current().size).toBe(0);
  });

  it("throws ConfigurationError for a missing file", () => {
    const file = path.join(tmpDir, "missing.json");
    const registry = new AgentRegistry();
    expect(() => registry.load({ path: file })).toThrow(ConfigurationError);
  });

  it("throws ConfigurationError for malformed JSON and stays empty", () => {
    const file = path.join(tmpDir, "bad.json");
    fs.writeFileSync(file, "{ not json");

    const registry = new AgentRegistry();
    registry.load({ entries: { time_agent: "http://localhost:6000" } });
    expect(() => registry.load({ path: file })).toThrow(/is not valid JSON/);
    expect(registry.staticRegistry().size).toBe(0);
  });

  it("records the source path on ConfigurationError", () => {
    const file = path.join(tmpDir, "missing.json");
    try {
      new AgentRegistry().load({ path: file });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (e instanceof ConfigurationError) expect(e.source).toBe(file);
    }
  });

  it("swaps snapshots without touching ones already handed out", () => {
    const registry = new AgentRegistry();
    registry.load({ entries: { time_agent: "http://localhost:6000" } });

    const first = new DescriptorStore([timeDescriptor]);
    registry.swap(first);
    const held = registry.current();

    registry.swap(new DescriptorStore([greetingDescriptor]), new Map([["greeting_agent", "http://localhost:5000"]]));

    expect(held.names()).toEqual(["time_agent"]);
    expect(registry.current().names()).toEqual(["greeting_agent"]);
    expect([...registry.entries().keys()]).toEqual(["time_agent", "greeting_agent"]);
    expect(registry.get("greeting_agent")).toBe(greetingDescriptor);
  });

  it("drops previous scan entries on swap", () => {
    const registry = new AgentRegistry();
    registry.load({ entries: {} });
    registry.swap(DescriptorStore.empty(), new Map([["scanned", "http://localhost:7000"]]));
    registry.swap(DescriptorStore.empty());
    expect(registry.entries().size).toBe(0);
  });
});
