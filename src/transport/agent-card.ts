/**
 * Agent Card Factory
 *
 * Builds A2A agent cards for the demonstration agents. Each card
 * describes the agent, its skills, and its JSON-RPC endpoint.
 */

import type { AgentCard, AgentSkill } from "@a2a-js/sdk";

export interface CreateCardParams {
  name: string;
  description: string;
  skills: AgentSkill[];
  /** JSON-RPC endpoint; also the base URL the card is served under. */
  endpointUrl: string;
  version?: string;
}

/**
 * Create an A2A Agent Card.
 */
export function createAgentCard(params: CreateCardParams): AgentCard {
  const { name, description, skills, endpointUrl, version = "0.1.0" } = params;

  return {
    name,
    description,
    url: endpointUrl,
    version,
    protocolVersion: "0.3.0",
    defaultInputModes: ["text/plain"],
    defaultOutputModes: ["text/plain"],
    capabilities: {
      streaming: false,
      pushNotifications: false,
    },
    skills,
  };
}

// --- Predefined skills ---

export const TELL_TIME_SKILL: AgentSkill = {
  id: "tell_time",
  name: "Tell time",
  description: "Reports the current local time.",
  tags: ["time", "clock"],
  examples: [
    "What time is it?",
    "Tell me the current time",
    "What's the clock say?",
  ],
};

export const GREET_SKILL: AgentSkill = {
  id: "greet",
  name: "Greet",
  description: "Answers greetings and small talk in a friendly way.",
  tags: ["greeting", "hello"],
  examples: [
    "Hello!",
    "Good morning",
    "How are you?",
  ],
};
