import { describe, it, expect, vi, type Mock } from "vitest";
import { PassThrough } from "node:stream";
import { runRepl } from "../../src/cli/repl.js";
import type { Orchestrator } from "../../src/orchestrator/orchestrator.js";

function fakeOrchestrator(): Orchestrator & {
  ask: Mock<Orchestrator["ask"]>;
  refresh: Mock<Orchestrator["refresh"]>;
} {
  return {
    handle: async (query) => ({ answer: `answer to ${query}`, decision: null }),
    ask: vi.fn<Orchestrator["ask"]>(async (query) => `answer to ${query}`),
    refresh: vi.fn<Orchestrator["refresh"]>(async () => "Refreshed agent registry: 2 agent(s) available."),
  };
}

async function run(lines: string[], orchestrator: Orchestrator): Promise<string> {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on("data", (c: Buffer) => chunks.push(c.toString("utf8")));

  const done = runRepl({ orchestrator, input, output });
  input.end(lines.map((l) => `${l}\n`).join(""));
  await done;
  return chunks.join("");
}

const banner = "Ready! Type 'list' to see agents, 'refresh' to rediscover, 'exit' to quit.\n\n";

describe("runRepl", () => {
  it("answers each line, skips blanks, and stops at exit", async () => {
    const orchestrator = fakeOrchestrator();
    const out = await run(["What time is it?", "   ", "refresh", "exit", "never read"], orchestrator);

    expect(out).toBe(
      banner +
      "You: Assistant: answer to What time is it?\n\n" +
      "You: " +
      "You: Assistant: Refreshed agent registry: 2 agent(s) available.\n\n" +
      "You: Goodbye!\n",
    );
    expect(orchestrator.ask).toHaveBeenCalledTimes(1);
    expect(orchestrator.refresh).toHaveBeenCalledTimes(1);
  });

  it("accepts quit in any case", async () => {
    const orchestrator = fakeOrchestrator();
    const out = await run(["QUIT", "hello"], orchestrator);
    expect(out).toBe(`${banner}You: Goodbye!\n`);
    expect(orchestrator.ask).not.toHaveBeenCalled();
  });

  it("ends when input ends", async () => {
    const orchestrator = fakeOrchestrator();
    const out = await run(["hello"], orchestrator);
    expect(out).toBe(`${banner}You: Assistant: answer to hello\n\nYou: Goodbye!\n`);
  });

  it("trims queries before asking", async () => {
    const orchestrator = fakeOrchestrator();
    await run(["  list agents  "], orchestrator);
    expect(orchestrator.ask).toHaveBeenCalledWith("list agents");
  });
});
