#!/usr/bin/env node
/**
 * Switchboard CLI
 *
 * Commands:
 *   switchboard [chat]     Discover agents and start the interactive loop
 *   switchboard agents     Serve the demonstration agents
 *   switchboard help       Show this help
 */

import { loadSwitchboardConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { createSwitchboardLogger } from "../logger.js";
import { startDemoAgents } from "../agents/index.js";
import { NO_AGENTS_AVAILABLE } from "../registry/store.js";
import { startSwitchboard } from "../standalone.js";
import { runRepl } from "./repl.js";

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function cmdChat(): Promise<void> {
  const sb = await startSwitchboard();
  if (sb.discovered === 0) {
    console.log(NO_AGENTS_AVAILABLE);
    return;
  }

  console.log(`Discovered ${sb.discovered} agent(s):`);
  for (const [name, d] of sb.registry.all()) {
    console.log(`  ${name.padEnd(20)} ${d.displayDescription}`);
  }
  console.log();

  await runRepl({
    orchestrator: sb.orchestrator,
    input: process.stdin,
    output: process.stdout,
  });
}

async function cmdAgents(): Promise<void> {
  const config = loadSwitchboardConfig();
  const logger = createSwitchboardLogger({ level: config.logLevel });
  const served = await startDemoAgents({ ...config.agents, logger });

  for (const agent of served) {
    console.log(`  ${agent.name.padEnd(20)} ${agent.url}`);
  }
  console.log("\nServing demonstration agents. Press Ctrl+C to stop.");

  const shutdown = (): void => {
    Promise.all(served.map((a) => a.stop())).then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

function showHelp(): void {
  console.log(`
switchboard — route free-text queries to A2A agents

Usage:
  switchboard [chat]     Discover agents and start the interactive loop
  switchboard agents     Serve the demonstration agents (time, greeting)
  switchboard help       Show this help

In the loop:
  list                   Show the discovered agents
  refresh                Re-run discovery
  exit | quit            Leave

Configuration is read from $SWITCHBOARD_CONFIG, ./switchboard.json or
~/.switchboard/switchboard.json. The agent registry defaults to
./agent_registry.json.
`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case "chat":
    case undefined:
      await cmdChat();
      break;
    case "agents":
      await cmdAgents();
      break;
    case "help":
    case "--help":
    case "-h":
      showHelp();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
