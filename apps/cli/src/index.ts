#!/usr/bin/env tsx
import "dotenv/config";
import chalk from "chalk";
import { Command } from "commander";
import { ConfigError } from "@agentprobe/config";
import { CatalogError, UnknownScenarioError } from "@agentprobe/scenarios";
import { runCommand } from "./commands/run.js";
import { listCommand } from "./commands/list.js";
import { chatCommand } from "./commands/chat.js";

const program = new Command();

program
  .name("agentprobe")
  .description("Scenario harness for hosted voice agents with multilingual TTS")
  .version("0.1.0");

program
  .command("run")
  .description("Run scenarios against the voice agent (prompts when no selector is given)")
  .argument("[selectors...]", "scenario index, id, id prefix, name, or all")
  .option("--catalog <file>", "scenario catalog JSON (defaults to the built-in catalog)")
  .option("--config <file>", "project config (defaults to ./agentprobe.json)")
  .option("-v, --verbose", "print debug lines to stderr")
  .action(runCommand);

program
  .command("list")
  .description("List the scenarios in the catalog")
  .option("--catalog <file>", "scenario catalog JSON (defaults to the built-in catalog)")
  .action(listCommand);

program
  .command("chat")
  .description("Hold a free-form conversation with the agent, typed at the prompt")
  .option("--config <file>", "project config (defaults to ./agentprobe.json)")
  .option("-v, --verbose", "print debug lines to stderr")
  .action(chatCommand);

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigError || err instanceof CatalogError) {
    console.error(chalk.red(`\n  ${err.message}\n`));
  } else if (err instanceof UnknownScenarioError) {
    console.error(chalk.red(`\n  Unknown scenario: ${err.selector}`));
    console.error(chalk.dim(`  Available: ${err.available.join(", ")}\n`));
  } else {
    console.error(chalk.red("\n  Unexpected error:"), err);
  }
  process.exit(1);
});
