/** Prompt used to ask the LLM which agent should take a query. */

export function buildClassificationPrompt(agentsContext: string, query: string): string {
  return `You are an intelligent agent orchestrator. Analyze the user query and select the MOST APPROPRIATE agent to handle it.

${agentsContext}

User Query: "${query}"

Rules:
1. Choose the agent whose skills BEST match the user's request
2. Respond with ONLY the agent name (e.g., "time_agent" or "greeting_agent")
3. If no agent is a perfect match, choose the closest match
4. Be concise - respond with just the agent name

Agent to use:`;
}
