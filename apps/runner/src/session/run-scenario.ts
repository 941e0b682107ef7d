/**
 * Run one scenario end to end on a fresh agent connection.
 *
 * Always returns a run holding exactly one outcome per scenario turn.
 * Connection and protocol failures are recorded, never thrown.
 */

import type {
  AgentNotice,
  ConversationEntry,
  Credentials,
  LanguagePolicy,
  ProjectConfig,
  RunStatus,
  Scenario,
  Turn,
  TurnOutcome,
} from "@agentprobe/shared";
import { buildSettings, type AgentChannelFactory } from "@agentprobe/adapters";
import { checkResponse, resolveExpectation } from "../assertions/index.js";
import { AgentSession, SessionError, type AgentResponse } from "./agent-session.js";

export interface ScenarioRun {
  scenario: Scenario;
  startedAt: Date;
  finishedAt: Date;
  status: RunStatus;
  settingsApplied: boolean;
  /** Scenario-level failure: connect, settings or a dropped connection */
  error?: string;
  turns: TurnOutcome[];
  /** Agent audio per turn, same order as `turns` */
  turnAudio: Buffer[];
  greetingAudio: Buffer | null;
  conversation: ConversationEntry[];
  errors: AgentNotice[];
  warnings: AgentNotice[];
}

export interface RunScenarioDeps {
  createChannel: AgentChannelFactory;
  credentials: Credentials;
  config: ProjectConfig;
  log?: (line: string) => void;
  keepaliveTickMs?: number;
  readAudioFile?: (path: string) => Promise<Buffer>;
}

export async function runScenario(scenario: Scenario, deps: RunScenarioDeps): Promise<ScenarioRun> {
  const log = deps.log ?? console.log;
  const { config } = deps;
  const startedAt = new Date();

  const session = new AgentSession({
    channel: deps.createChannel(),
    settings: buildSettings(scenario.config, deps.credentials, {
      models: config.models,
      cartesiaVersion: config.cartesia_version,
    }),
    keepaliveIntervalMs: config.keepalive_interval_ms,
    keepaliveTickMs: deps.keepaliveTickMs,
    settingsTimeoutMs: config.settings_timeout_ms,
    greetingTimeoutMs: config.greeting_timeout_ms,
    turnTimeoutMs: config.turn_timeout_ms,
    audioChunkBytes: config.audio_chunk_bytes,
    audioTrailingSilenceMs: config.audio_trailing_silence_ms,
    readAudioFile: deps.readAudioFile,
    log,
  });

  const turns: TurnOutcome[] = [];
  const turnAudio: Buffer[] = [];
  let greetingAudio: Buffer | null = null;
  let error: string | undefined;

  log(`  Scenario: ${scenario.id} (${scenario.turns.length} turns)`);

  try {
    await session.open();

    const greeting = await session.awaitGreeting();
    if (greeting) {
      greetingAudio = greeting.audio.length > 0 ? greeting.audio : null;
      if (greeting.outcome === "timeout") {
        log(`    [WARN] Greeting did not finish within ${config.greeting_timeout_ms}ms`);
      }
    }

    for (const [index, turn] of scenario.turns.entries()) {
      log(`    Turn ${index + 1} [${turn.label}]`);
      const response = await session.sendTurn(turn);
      const outcome = evaluateTurn(turn, index + 1, scenario.config.language_policy, response);
      turns.push(outcome);
      turnAudio.push(response.audio);
      log(`      ${outcome.status}${outcome.failure_reason ? ` (${outcome.failure_reason})` : ""} in ${outcome.duration_ms}ms`);

      // An unreadable turn input fails that turn only; a dead connection ends the scenario
      const lost = response.outcome === "connection_lost" || (response.outcome === "not_sent" && !session.isOpen);
      if (lost) {
        error = response.error ?? session.failureReason ?? "Connection closed";
        break;
      }
    }
  } catch (err) {
    error = err instanceof SessionError ? `${err.kind}: ${err.message}` : describe(err);
    log(`    [ERROR] ${error}`);
  } finally {
    await session.close();
  }

  // Turns never reached still get an outcome
  for (let index = turns.length; index < scenario.turns.length; index++) {
    turns.push(notSentOutcome(scenario, index, error ?? "Scenario ended early"));
    turnAudio.push(Buffer.alloc(0));
  }

  const status: RunStatus =
    error === undefined && session.settingsApplied && turns.every((t) => t.status === "pass") ? "pass" : "fail";

  const run: ScenarioRun = {
    scenario,
    startedAt,
    finishedAt: new Date(),
    status,
    settingsApplied: session.settingsApplied,
    turns,
    turnAudio,
    greetingAudio,
    conversation: [...session.conversation],
    errors: [...session.errors],
    warnings: [...session.warnings],
  };
  if (error !== undefined) run.error = error;
  return run;
}

/**
 * Turn a response into the recorded outcome, running the language and
 * keyword checks when the reply completed.
 */
export function evaluateTurn(
  turn: Turn,
  position: number,
  policy: LanguagePolicy,
  response: AgentResponse,
): TurnOutcome {
  const expectation = resolveExpectation(policy, turn);
  const outcome: TurnOutcome = {
    index: position,
    label: turn.label,
    input: turn.input,
    status: "fail",
    response_text: response.text,
    duration_ms: response.durationMs,
    audio_bytes: response.audio.length,
  };
  if (turn.input_language) outcome.input_language = turn.input_language;
  if (expectation.languages) outcome.expected_languages = expectation.languages;
  if (expectation.keywords) outcome.expected_keywords = expectation.keywords;
  if (response.firstResponseMs !== undefined) outcome.first_response_ms = response.firstResponseMs;
  if (response.error) outcome.error = response.error;

  if (response.outcome !== "completed") {
    outcome.failure_reason = response.outcome;
    return outcome;
  }

  const check = checkResponse(expectation, response.text);
  outcome.status = check.passed ? "pass" : "fail";
  if (check.failure_reason) outcome.failure_reason = check.failure_reason;
  if (check.detected_language) outcome.detected_language = check.detected_language;
  if (check.missing_keywords) outcome.missing_keywords = check.missing_keywords;
  return outcome;
}

function notSentOutcome(scenario: Scenario, index: number, error: string): TurnOutcome {
  const turn = scenario.turns[index];
  if (!turn) throw new RangeError(`Scenario ${scenario.id} has no turn ${index + 1}`);
  return evaluateTurn(turn, index + 1, scenario.config.language_policy, {
    outcome: "not_sent",
    text: "",
    audio: Buffer.alloc(0),
    durationMs: 0,
    error,
  });
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
