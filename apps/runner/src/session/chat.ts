/**
 * Free-form conversation: the caller types each turn live instead of
 * reading them from the catalog. Recorded like any scenario run.
 */

import type { RunStatus, Scenario, ScenarioConfig, Turn, TurnOutcome } from "@agentprobe/shared";
import { buildSettings } from "@agentprobe/adapters";
import { AgentSession, type AgentResponse } from "./agent-session.js";
import { evaluateTurn, type RunScenarioDeps, type ScenarioRun } from "./run-scenario.js";

export const CHAT_SCENARIO_ID = "custom_conversation";

export class ChatSession {
  private session: AgentSession;
  private config: ScenarioConfig;
  private startedAt = new Date();
  private turns: Turn[] = [];
  private outcomes: TurnOutcome[] = [];
  private turnAudio: Buffer[] = [];
  private greetingAudio: Buffer | null = null;
  private error: string | undefined;

  constructor(config: ScenarioConfig, deps: RunScenarioDeps) {
    this.config = config;
    this.session = new AgentSession({
      channel: deps.createChannel(),
      settings: buildSettings(config, deps.credentials, {
        models: deps.config.models,
        cartesiaVersion: deps.config.cartesia_version,
      }),
      keepaliveIntervalMs: deps.config.keepalive_interval_ms,
      keepaliveTickMs: deps.keepaliveTickMs,
      settingsTimeoutMs: deps.config.settings_timeout_ms,
      greetingTimeoutMs: deps.config.greeting_timeout_ms,
      turnTimeoutMs: deps.config.turn_timeout_ms,
      audioChunkBytes: deps.config.audio_chunk_bytes,
      audioTrailingSilenceMs: deps.config.audio_trailing_silence_ms,
      log: deps.log,
    });
  }

  get isOpen(): boolean {
    return this.session.isOpen;
  }

  /** Connect and play the greeting, if any. Rejects with a SessionError. */
  async start(): Promise<AgentResponse | null> {
    try {
      await this.session.open();
    } catch (err) {
      this.error = err instanceof Error ? err.message : String(err);
      throw err;
    }
    const greeting = await this.session.awaitGreeting();
    if (greeting && greeting.audio.length > 0) this.greetingAudio = greeting.audio;
    return greeting;
  }

  async say(text: string): Promise<AgentResponse> {
    const turn: Turn = { label: `Turn ${this.turns.length + 1}`, input: { text } };
    this.turns.push(turn);

    const response = await this.session.sendTurn(turn);
    const outcome = evaluateTurn(turn, this.turns.length, this.config.language_policy, response);
    if (response.outcome === "connection_lost" || response.outcome === "not_sent") {
      this.error = response.error ?? "Connection closed";
    }

    this.outcomes.push(outcome);
    this.turnAudio.push(response.audio);
    return response;
  }

  /** Close the connection and return the conversation as a run. */
  async finish(): Promise<ScenarioRun> {
    await this.session.close();

    const scenario: Scenario = {
      id: CHAT_SCENARIO_ID,
      name: "Custom Conversation",
      description: "Interactive conversation typed at the prompt",
      config: this.config,
      turns: [...this.turns],
    };
    const status: RunStatus =
      this.error === undefined && this.session.settingsApplied && this.outcomes.every((o) => o.status === "pass")
        ? "pass"
        : "fail";

    const run: ScenarioRun = {
      scenario,
      startedAt: this.startedAt,
      finishedAt: new Date(),
      status,
      settingsApplied: this.session.settingsApplied,
      turns: [...this.outcomes],
      turnAudio: [...this.turnAudio],
      greetingAudio: this.greetingAudio,
      conversation: [...this.session.conversation],
      errors: [...this.session.errors],
      warnings: [...this.session.warnings],
    };
    if (this.error !== undefined) run.error = this.error;
    return run;
  }
}
