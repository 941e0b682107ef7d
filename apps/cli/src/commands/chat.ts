import { createInterface } from "node:readline";
import chalk from "chalk";
import ora from "ora";
import { loadChatConfig } from "@agentprobe/scenarios";
import { ChatSession, persistRun } from "@agentprobe/runner";
import { createHarness, type GlobalOptions } from "../setup.js";
import { printReport } from "../output.js";
import { createDebug } from "./run.js";

const QUIT_WORDS = new Set(["quit", "exit", "q"]);

export async function chatCommand(options: GlobalOptions): Promise<void> {
  const debug = createDebug(options.verbose);
  const harness = createHarness(options, debug);
  const config = loadChatConfig();

  console.log(chalk.bold("\n  agentprobe chat\n"));
  console.log(chalk.dim(`  Type a message and press enter. ${[...QUIT_WORDS].join(", ")} or Ctrl-D ends the chat.\n`));

  const chat = new ChatSession(config, { ...harness, log: debug });

  const spinner = ora("Connecting to voice agent...").start();
  try {
    const greeting = await chat.start();
    spinner.succeed("Settings accepted");
    if (greeting?.text) console.log(`${chalk.magenta("agent>")} ${greeting.text}`);
  } catch (err) {
    spinner.fail(`Could not start the conversation: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (chat.isOpen) {
    const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: chalk.cyan("you> ") });
    rl.prompt();
    for await (const line of rl) {
      const text = line.trim();
      if (QUIT_WORDS.has(text.toLowerCase())) break;
      if (text) {
        const reply = await chat.say(text);
        if (reply.outcome === "completed") {
          console.log(`${chalk.magenta("agent>")} ${reply.text || chalk.dim("(audio only)")}`);
        } else {
          console.log(chalk.red(`  ${reply.outcome}${reply.error ? `: ${reply.error}` : ""}`));
        }
        if (!chat.isOpen) break;
      }
      rl.prompt();
    }
    rl.close();
  }

  const run = await chat.finish();
  const { record } = await persistRun(run, harness.store, { log: debug });
  printReport(record);

  process.exit(record.status === "pass" ? 0 : 1);
}
