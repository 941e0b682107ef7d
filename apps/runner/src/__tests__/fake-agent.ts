/**
 * In-process stand-in for the voice agent: an AgentChannel whose server
 * side is scripted by the test.
 */

import { BaseAgentChannel, ChannelError } from "@agentprobe/adapters";
import type { AgentClientMessage, AgentServerEvent } from "@agentprobe/adapters";
import type { Credentials, ProjectConfig } from "@agentprobe/shared";

export type ClientFrame = { kind: "message"; message: AgentClientMessage } | { kind: "audio"; bytes: number };

export interface TimelineEntry {
  direction: "client" | "server";
  type: string;
  at: number;
}

export class FakeAgentChannel extends BaseAgentChannel {
  readonly timeline: TimelineEntry[] = [];
  readonly frames: ClientFrame[] = [];
  connectError: Error | null = null;
  onClientFrame: (frame: ClientFrame) => void = () => {};
  private open = false;

  get connected(): boolean {
    return this.open;
  }

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
    this.open = true;
  }

  async disconnect(): Promise<void> {
    if (!this.open) return;
    this.open = false;
    this.emit("disconnected", { code: 1000, reason: "client done" });
  }

  override send(message: AgentClientMessage): void {
    super.send(message);
    this.record({ kind: "message", message }, message.type);
  }

  override sendAudio(pcm: Buffer): void {
    super.sendAudio(pcm);
    this.record({ kind: "audio", bytes: pcm.length }, "Audio");
  }

  protected sendFrame(_data: string | Buffer): void {
    if (!this.open) throw new ChannelError("Voice agent WebSocket not connected");
  }

  /** Push a server event to the client. */
  agent(event: AgentServerEvent): void {
    this.timeline.push({ direction: "server", type: event.type, at: performance.now() });
    this.emit("event", event);
  }

  agentAudio(bytes: number): void {
    this.timeline.push({ direction: "server", type: "Audio", at: performance.now() });
    this.emit("audio", Buffer.alloc(bytes, 1));
  }

  /** Server-side close. */
  drop(code = 1011, reason = "agent crashed"): void {
    if (!this.open) return;
    this.open = false;
    this.emit("disconnected", { code, reason });
  }

  sentTypes(): string[] {
    return this.timeline.filter((e) => e.direction === "client").map((e) => e.type);
  }

  private record(frame: ClientFrame, type: string): void {
    this.frames.push(frame);
    this.timeline.push({ direction: "client", type, at: performance.now() });
    this.onClientFrame(frame);
  }
}

export interface AgentScript {
  /** Reply text for the n-th user turn (1-based); null means never answer */
  reply?: (content: string, turn: number) => string | null;
  /** Delay before answering, fixed or per turn (1-based) */
  replyDelayMs?: number | ((turn: number) => number);
  /** Gap between the reply text and its audio; audio follows at once when unset */
  audioDelayMs?: number;
  audioBytesPerReply?: number;
  /** Called instead of SettingsApplied when present */
  onSettings?: (channel: FakeAgentChannel) => void;
  /** Called before the n-th turn is answered; return false to skip the answer */
  beforeReply?: (channel: FakeAgentChannel, turn: number) => boolean;
}

/**
 * Behave like the hosted agent: apply settings, speak the greeting, and
 * answer each injected message (or burst of audio) with text and audio.
 */
export function scriptAgent(channel: FakeAgentChannel, script: AgentScript = {}): FakeAgentChannel {
  const delayFor = (turn: number): number => {
    const { replyDelayMs } = script;
    return typeof replyDelayMs === "function" ? replyDelayMs(turn) : replyDelayMs ?? 10;
  };
  const audioBytes = script.audioBytesPerReply ?? 4800;
  let turns = 0;
  let audioTimer: ReturnType<typeof setTimeout> | null = null;

  const speak = (text: string) => {
    channel.agent({ type: "AgentStartedSpeaking" });
    channel.agent({ type: "ConversationText", role: "assistant", content: text });
    const play = () => {
      if (!channel.connected) return;
      channel.agentAudio(audioBytes);
      channel.agentAudio(audioBytes);
      channel.agent({ type: "AgentAudioDone" });
    };
    if (script.audioDelayMs === undefined) play();
    else setTimeout(play, script.audioDelayMs);
  };

  const answer = (content: string, echo: boolean) => {
    const n = ++turns;
    setTimeout(() => {
      if (!channel.connected) return;
      if (script.beforeReply && !script.beforeReply(channel, n)) return;
      if (echo) channel.agent({ type: "ConversationText", role: "user", content });
      const reply = script.reply ? script.reply(content, n) : `Reply ${n}`;
      if (reply !== null) speak(reply);
    }, delayFor(n));
  };

  channel.onClientFrame = (frame) => {
    if (frame.kind === "audio") {
      if (audioTimer) clearTimeout(audioTimer);
      audioTimer = setTimeout(() => {
        audioTimer = null;
        channel.agent({ type: "ConversationText", role: "user", content: "transcribed audio" });
        answer("transcribed audio", false);
      }, 20);
      return;
    }

    const { message } = frame;
    switch (message.type) {
      case "Settings":
        setTimeout(() => {
          channel.agent({ type: "Welcome", request_id: "test-request" });
          if (script.onSettings) {
            script.onSettings(channel);
            return;
          }
          channel.agent({ type: "SettingsApplied" });
          if (message.agent.greeting) speak(message.agent.greeting);
        }, 1);
        break;
      case "InjectUserMessage":
        answer(message.content, true);
        break;
      case "KeepAlive":
        break;
    }
  };

  return channel;
}

export const TEST_CREDENTIALS: Credentials = {
  deepgramApiKey: "test-secret",
  cartesiaApiKey: "test-secret",
  cartesiaVoiceId: "test-voice",
};

/** Project config with timeouts short enough for tests. */
export function testConfig(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
  return {
    agent_url: "ws://127.0.0.1/agent",
    results_dir: "./test_results",
    audio_dir: "./agent_audio_out",
    keepalive_interval_ms: 20,
    settings_timeout_ms: 200,
    greeting_timeout_ms: 200,
    turn_timeout_ms: 200,
    pause_between_scenarios_ms: 0,
    audio_trailing_silence_ms: 100,
    audio_chunk_bytes: 3200,
    cartesia_version: "2024-06-10",
    models: { stt: "nova-3", llm: "gpt-4o-mini", tts: "sonic-multilingual" },
    ...overrides,
  };
}
