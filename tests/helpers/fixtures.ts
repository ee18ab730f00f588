/**
 * Shared test fixtures: silent loggers and descriptor builders.
 */

import { vi, type Mock } from "vitest";
import type { Logger } from "../../src/types.js";
import type { AgentDescriptor, Skill } from "../../src/registry/descriptor.js";

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/** A logger whose calls can be asserted on. */
export function spyLogger(): {
  info: Mock<Logger["info"]>;
  warn: Mock<Logger["warn"]>;
  error: Mock<Logger["error"]>;
  debug: Mock<(msg: string) => void>;
} {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    debug: vi.fn<(msg: string) => void>(),
  };
}

export function makeSkill(overrides: Partial<Skill> = {}): Skill {
  return {
    id: "skill",
    name: "skill",
    description: "",
    examples: [],
    tags: [],
    ...overrides,
  };
}

export function makeDescriptor(
  name: string,
  overrides: Partial<AgentDescriptor> = {},
): AgentDescriptor {
  const endpoint = overrides.endpoint ?? `http://127.0.0.1:9/${name}`;
  return {
    name,
    endpoint,
    rpcUrl: endpoint,
    displayName: name,
    displayDescription: "",
    skills: [],
    tags: [],
    capabilities: { streaming: false, pushNotifications: false },
    ...overrides,
  };
}

export const timeDescriptor = makeDescriptor("time_agent", {
  displayName: "Time Agent",
  displayDescription: "An agent that can tell the current time.",
  skills: [makeSkill({
    id: "tell_time",
    name: "tell_time",
    description: "Returns the current time.",
    examples: ["What time is it?"],
    tags: ["time", "clock"],
  })],
  tags: ["time", "clock"],
});

export const greetingDescriptor = makeDescriptor("greeting_agent", {
  displayName: "Greeting Agent",
  displayDescription: "A friendly agent that greets users and makes conversation.",
  skills: [makeSkill({
    id: "greet",
    name: "greet",
    description: "Answers greetings and small talk in a friendly way.",
    examples: ["Hello!"],
    tags: ["greeting", "hello"],
  })],
  tags: ["greeting", "hello"],
});
