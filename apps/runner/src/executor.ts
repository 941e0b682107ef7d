/**
 * Runs scenarios strictly one after another, each on its own connection,
 * and persists every run as soon as it finishes.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { ResultRecord, Scenario } from "@agentprobe/shared";
import type { LocalArtifactStore } from "@agentprobe/artifacts";
import { runScenario, type RunScenarioDeps, type ScenarioRun } from "./session/run-scenario.js";
import { persistRun, summarize, type RunSummary } from "./reporter.js";

export interface ExecuteScenariosOpts extends RunScenarioDeps {
  store: LocalArtifactStore;
  onScenarioStart?: (scenario: Scenario, position: number, total: number) => void;
  onScenarioComplete?: (record: ResultRecord, run: ScenarioRun) => void;
}

export interface ExecuteScenariosResult {
  records: ResultRecord[];
  summary: RunSummary;
}

export async function executeScenarios(
  scenarios: readonly Scenario[],
  opts: ExecuteScenariosOpts,
): Promise<ExecuteScenariosResult> {
  const log = opts.log ?? console.log;
  const records: ResultRecord[] = [];

  log(`Running ${scenarios.length} scenario(s) sequentially...`);

  for (const [i, scenario] of scenarios.entries()) {
    if (i > 0 && opts.config.pause_between_scenarios_ms > 0) {
      await sleep(opts.config.pause_between_scenarios_ms);
    }

    opts.onScenarioStart?.(scenario, i + 1, scenarios.length);
    const run = await runScenario(scenario, opts);
    const { record, resultPath } = await persistRun(run, opts.store, { log });
    log(`    Saved ${resultPath}`);

    records.push(record);
    opts.onScenarioComplete?.(record, run);
  }

  const summary = summarize(records);
  log(`Run complete: ${summary.status} (${summary.passed}/${summary.total} scenarios passed)`);

  return { records, summary };
}
