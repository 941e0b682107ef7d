import chalk from "chalk";
import type { ResultRecord, Scenario, TurnOutcome } from "@agentprobe/shared";
import type { RunSummary } from "@agentprobe/runner";

export function printCatalog(scenarios: readonly Scenario[]): void {
  console.log(`\n  ${chalk.bold("Scenarios")}\n`);
  for (const [i, s] of scenarios.entries()) {
    const n = chalk.dim(`${String(i + 1).padStart(2)}.`);
    console.log(`  ${n} ${chalk.cyan(s.id)}  ${s.name}`);
    if (s.description) console.log(`      ${chalk.dim(s.description)}`);
    console.log(
      `      ${chalk.dim(`policy=${s.config.language_policy}  agent.language=${s.config.agent_language}  turns=${s.turns.length}`)}`,
    );
  }
  console.log("");
}

export function printReport(record: ResultRecord): void {
  const status = record.status === "pass" ? chalk.green("PASS") : chalk.red("FAIL");
  console.log(`\n  ${chalk.bold(record.scenario_name)} ${chalk.dim(`(${record.scenario_id})`)}  ${status}`);

  const settings = record.settings_applied ? chalk.green("accepted") : chalk.red("rejected or not confirmed");
  console.log(`  ${chalk.dim("Settings:")}   ${settings}`);
  if (record.error) {
    console.log(`  ${chalk.red("Error:")}      ${record.error}`);
  }

  for (const turn of record.turns) {
    console.log(`  ${formatTurn(turn)}`);
  }

  if (record.conversation.length > 0) {
    console.log(`\n  ${chalk.dim("Conversation:")}`);
    for (const entry of record.conversation) {
      const who = entry.role === "user" ? chalk.cyan("USER ") : chalk.magenta("AGENT");
      console.log(`    ${who} ${entry.content}`);
    }
  }

  for (const e of record.errors) {
    console.log(`  ${chalk.red("Agent error:")} ${e.code} ${e.description}`);
  }
  for (const w of record.warnings) {
    console.log(`  ${chalk.yellow("Agent warning:")} ${w.code} ${w.description}`);
  }

  const audioBytes = record.audio_files.reduce((sum, f) => sum + f.size_bytes, 0);
  console.log(
    `  ${chalk.dim("Audio:")}      ${record.audio_files.length} file(s), ${formatBytes(audioBytes)}`,
  );
  console.log(`  ${chalk.dim("Record:")}     ${record.id}`);
}

export function printSummary(summary: RunSummary): void {
  const status = summary.status === "pass" ? chalk.green("PASS") : chalk.red("FAIL");

  console.log(`\n  ${chalk.bold("Result:")} ${status}\n`);
  console.log(`  ${chalk.dim("Scenarios:")}  ${summary.passed} passed, ${summary.failed} failed, ${summary.total} total`);
  console.log(`  ${chalk.dim("Turns:")}      ${summary.turns.passed} passed, ${summary.turns.failed} failed, ${summary.turns.total} total`);
  console.log(`  ${chalk.dim("Audio:")}      ${summary.audio_files} file(s), ${formatBytes(summary.audio_bytes)}`);
  console.log(`  ${chalk.dim("Duration:")}   ${summary.total_duration_ms}ms`);
  console.log("");
}

function formatTurn(turn: TurnOutcome): string {
  const mark = turn.status === "pass" ? chalk.green("✓") : chalk.red("✗");
  const parts = [`${mark} ${turn.index}. ${turn.label}`];
  if (turn.expected_languages) {
    parts.push(chalk.dim(`expect=${turn.expected_languages.join("|")} got=${turn.detected_language ?? "-"}`));
  }
  if (turn.failure_reason) parts.push(chalk.red(turn.failure_reason));
  if (turn.missing_keywords) parts.push(chalk.red(`missing: ${turn.missing_keywords.join(", ")}`));
  if (turn.first_response_ms !== undefined) parts.push(chalk.dim(`${turn.first_response_ms}ms`));
  return parts.join("  ");
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}
