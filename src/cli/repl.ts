/**
 * Interactive loop: one query at a time, each answered before the next
 * line is read.
 */

import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Orchestrator } from "../orchestrator/orchestrator.js";

const EXIT_COMMANDS = new Set(["exit", "quit"]);
const REFRESH_COMMAND = "refresh";

export interface ReplOptions {
  orchestrator: Orchestrator;
  input: Readable;
  output: Writable;
  /** Prompt text. Default: "You: ". */
  prompt?: string;
}

/** Resolves when the user exits or input ends. */
export async function runRepl(opts: ReplOptions): Promise<void> {
  const { orchestrator, input, output, prompt = "You: " } = opts;
  const rl = readline.createInterface({ input, output, terminal: false });
  rl.setPrompt(prompt);

  output.write("Ready! Type 'list' to see agents, 'refresh' to rediscover, 'exit' to quit.\n\n");
  rl.prompt();

  try {
    for await (const raw of rl) {
      const line = raw.trim();
      if (EXIT_COMMANDS.has(line.toLowerCase())) break;

      if (line.length > 0) {
        const answer = line.toLowerCase() === REFRESH_COMMAND
          ? await orchestrator.refresh()
          : await orchestrator.ask(line);
        output.write(`Assistant: ${answer}\n\n`);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }

  output.write("Goodbye!\n");
}
