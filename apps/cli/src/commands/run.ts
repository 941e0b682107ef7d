import chalk from "chalk";
import ora from "ora";
import { loadCatalog } from "@agentprobe/scenarios";
import { executeScenarios } from "@agentprobe/runner";
import { createHarness, type GlobalOptions } from "../setup.js";
import { printReport, printSummary } from "../output.js";
import { promptForScenarios } from "../prompt.js";

export interface RunOptions extends GlobalOptions {
  catalog?: string;
}

export async function runCommand(selectors: string[], options: RunOptions): Promise<void> {
  const debug = createDebug(options.verbose);

  console.log(chalk.bold("\n  agentprobe\n"));
  debug(`cwd: ${process.cwd()}`);

  // Missing keys stop the run before anything is loaded or asked
  const harness = createHarness(options, debug);

  const spinner = ora("Loading scenarios...").start();
  const catalog = loadCatalog(options.catalog);
  spinner.succeed(`Loaded ${catalog.size} scenario(s) from ${catalog.source}`);

  const scenarios = selectors.length > 0 ? catalog.select(selectors) : await promptForScenarios(catalog);
  if (scenarios.length === 0) {
    console.log(chalk.yellow("  No scenario selected"));
    process.exit(1);
  }
  debug(`selected: ${scenarios.map((s) => s.id).join(", ")}`);

  const { records, summary } = await executeScenarios(scenarios, {
    ...harness,
    onScenarioStart: (scenario, position, total) => {
      console.log(chalk.bold(`\n[${position}/${total}] ${scenario.name}`));
      if (scenario.description) console.log(chalk.dim(`  ${scenario.description}`));
    },
    onScenarioComplete: (record) => debug(`record ${record.id}: ${record.status}`),
  });

  console.log(chalk.bold("\n  Report"));
  for (const record of records) printReport(record);
  printSummary(summary);

  process.exit(summary.status === "pass" ? 0 : 1);
}

export function createDebug(verbose: boolean | undefined): (msg: string) => void {
  return (msg: string) => {
    if (verbose) console.error(chalk.dim(`[debug] ${msg}`));
  };
}
