/**
 * AgentSession: one live voice-agent connection for one scenario run.
 *
 * Lifecycle: open() (connect, Settings, SettingsApplied), then an optional
 * greeting, sendTurn() one at a time and close(). At most one response
 * window is open at any moment, and the keep-alive is held off for as
 * long as it is. A reply that outlives its window (timed out, or completed
 * on text) is drained before the next turn goes out, so it is never
 * credited to that turn.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { BENIGN_AGENT_ERROR_CODES, FATAL_AGENT_ERROR_CODES } from "@agentprobe/shared";
import type { AgentNotice, ConversationEntry, Turn } from "@agentprobe/shared";
import { KeepAliveTimer } from "@agentprobe/adapters";
import type {
  AgentChannel,
  AgentServerEvent,
  AgentSettingsMessage,
  DisconnectInfo,
} from "@agentprobe/adapters";
import { AudioRecorder, INPUT_AUDIO_CONFIG, chunkPcm, silence } from "@agentprobe/voice";

export type SessionErrorKind =
  | "connect_failed"
  | "settings_rejected"
  | "settings_timeout"
  | "connection_lost";

export class SessionError extends Error {
  readonly kind: SessionErrorKind;

  constructor(kind: SessionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionError";
    this.kind = kind;
  }
}

export type ResponseOutcome = "completed" | "timeout" | "connection_lost" | "not_sent";

export interface AgentResponse {
  outcome: ResponseOutcome;
  /** Assistant ConversationText received in the window, joined by spaces */
  text: string;
  audio: Buffer;
  firstResponseMs?: number;
  durationMs: number;
  error?: string;
}

export interface AgentSessionOptions {
  channel: AgentChannel;
  settings: AgentSettingsMessage;
  keepaliveIntervalMs: number;
  keepaliveTickMs?: number;
  settingsTimeoutMs: number;
  greetingTimeoutMs: number;
  turnTimeoutMs: number;
  audioChunkBytes: number;
  audioTrailingSilenceMs: number;
  readAudioFile?: (path: string) => Promise<Buffer>;
  log?: (line: string) => void;
}

interface PendingResponse {
  waitForAudio: boolean;
  texts: string[];
  startedAt: number;
  firstResponseAt: number | null;
  audioDone: boolean;
  finish: (outcome: Exclude<ResponseOutcome, "not_sent">) => void;
}

interface ReplyDrain {
  done: Promise<void>;
  end: () => void;
  droppedBytes: number;
}

interface SettingsWaiter {
  resolve: () => void;
  reject: (err: SessionError) => void;
}

export class AgentSession {
  readonly conversation: ConversationEntry[] = [];
  readonly errors: AgentNotice[] = [];
  readonly warnings: AgentNotice[] = [];

  private opts: AgentSessionOptions;
  private channel: AgentChannel;
  private recorder = new AudioRecorder();
  private keepAlive: KeepAliveTimer;
  private pending: PendingResponse | null = null;
  private drain: ReplyDrain | null = null;
  private settingsWaiter: SettingsWaiter | null = null;
  private greeting: Promise<AgentResponse> | null = null;
  private pendingUserEcho: string | null = null;
  private createdAt = performance.now();
  private applied = false;
  private opened = false;
  private closed = false;
  private fatal: string | null = null;
  private disconnectInfo: DisconnectInfo | null = null;
  private turnsSent = 0;

  constructor(opts: AgentSessionOptions) {
    this.opts = opts;
    this.channel = opts.channel;
    this.keepAlive = new KeepAliveTimer({
      intervalMs: opts.keepaliveIntervalMs,
      tickMs: opts.keepaliveTickMs,
      send: () => this.channel.send({ type: "KeepAlive" }),
      lastSentAt: () => this.channel.lastSentAt,
      isSuppressed: () => this.inFlight || this.drain !== null,
      onError: (err) => this.log(`    [keepalive] stopped: ${describe(err)}`),
    });

    this.channel.on("event", (event) => this.handleEvent(event));
    this.channel.on("audio", (chunk) => this.handleAudio(chunk));
    this.channel.on("error", (err) => this.handleChannelError(err));
    this.channel.on("disconnected", (info) => this.handleDisconnect(info));
  }

  get settingsApplied(): boolean {
    return this.applied;
  }

  /** A response window (greeting or turn) is open. */
  get inFlight(): boolean {
    return this.pending !== null;
  }

  get isOpen(): boolean {
    return this.opened && !this.closed && this.fatal === null && this.channel.connected;
  }

  /** Number of turns handed to the agent so far; never decreases. */
  get turnIndex(): number {
    return this.turnsSent;
  }

  get keepAlivesSent(): number {
    return this.keepAlive.count;
  }

  /** Why the session can no longer be used, if it can't. */
  get failureReason(): string | null {
    if (this.fatal) return this.fatal;
    if (this.disconnectInfo) return describeDisconnect(this.disconnectInfo);
    return null;
  }

  /**
   * Connect, send Settings and wait for SettingsApplied. Rejects with a
   * SessionError; nothing is retried.
   */
  async open(): Promise<void> {
    if (this.opened) throw new Error("Session already opened");
    this.opened = true;

    try {
      await this.channel.connect();
    } catch (err) {
      this.closed = true;
      throw new SessionError("connect_failed", describe(err), { cause: err });
    }

    const applied = new Promise<void>((resolve, reject) => {
      this.settingsWaiter = { resolve, reject };
    });
    const timer = setTimeout(() => {
      this.settingsWaiter?.reject(
        new SessionError("settings_timeout", `No SettingsApplied within ${this.opts.settingsTimeoutMs}ms`),
      );
    }, this.opts.settingsTimeoutMs);

    try {
      this.channel.send(this.opts.settings);
      const { agent } = this.opts.settings;
      this.log(
        `    Settings sent (agent.language=${agent.language}, listen.language=${agent.listen.provider.language ?? "default"})`,
      );
      await applied;
    } catch (err) {
      throw err instanceof SessionError
        ? err
        : new SessionError("connection_lost", describe(err), { cause: err });
    } finally {
      clearTimeout(timer);
      this.settingsWaiter = null;
    }

    this.keepAlive.start();
  }

  /**
   * Wait for the configured greeting to finish playing. Resolves null when
   * the scenario has no greeting.
   */
  async awaitGreeting(): Promise<AgentResponse | null> {
    return this.greeting;
  }

  /**
   * Send one turn and wait for the agent's reply, bounded by the turn
   * timeout. Never rejects: failures come back as the outcome.
   */
  async sendTurn(turn: Turn): Promise<AgentResponse> {
    if (this.pending) throw new Error("A response window is already open");
    if (this.drain) await this.drain.done;
    this.turnsSent++;

    if (!this.isOpen) {
      return notSent(this.failureReason ?? "Session is not open");
    }

    let frames: (() => void)[];
    let userContent: string;
    try {
      if ("text" in turn.input) {
        const content = turn.input.text;
        frames = [() => this.channel.send({ type: "InjectUserMessage", content })];
        userContent = content;
        this.pendingUserEcho = content.trim();
      } else {
        const pcm = await (this.opts.readAudioFile ?? readFile)(turn.input.audio_file);
        const audio = Buffer.concat([
          pcm,
          silence(this.opts.audioTrailingSilenceMs, INPUT_AUDIO_CONFIG),
        ]);
        frames = chunkPcm(audio, this.opts.audioChunkBytes).map((chunk) => () => this.channel.sendAudio(chunk));
        userContent = `[audio] ${basename(turn.input.audio_file)}`;
        this.pendingUserEcho = null;
      }
    } catch (err) {
      return notSent(`Could not prepare turn input: ${describe(err)}`);
    }

    const response = this.openWindow(turn.wait_for_audio ?? true, this.opts.turnTimeoutMs);
    this.conversation.push({
      role: "user",
      label: turn.label,
      content: userContent,
      timestamp_ms: this.elapsedMs(),
    });

    try {
      for (const send of frames) send();
    } catch (err) {
      this.pending?.finish("connection_lost");
      const result = await response;
      return { ...result, error: describe(err) };
    }

    return response;
  }

  /** Stop the keep-alive and close the connection. Safe to call twice. */
  async close(): Promise<void> {
    this.keepAlive.stop();
    this.pending?.finish("connection_lost");
    this.drain?.end();
    if (this.closed) return;
    this.closed = true;
    try {
      await this.channel.disconnect();
    } catch (err) {
      this.log(`    [WS] disconnect failed: ${describe(err)}`);
    }
  }

  private openWindow(waitForAudio: boolean, timeoutMs: number): Promise<AgentResponse> {
    this.recorder.reset();
    const startedAt = performance.now();

    return new Promise<AgentResponse>((resolve) => {
      const timer = setTimeout(() => pending.finish("timeout"), timeoutMs);

      const pending: PendingResponse = {
        waitForAudio,
        texts: [],
        startedAt,
        firstResponseAt: null,
        audioDone: false,
        finish: (outcome) => {
          if (this.pending !== pending) return;
          clearTimeout(timer);
          this.pending = null;
          if (outcome === "timeout" || (outcome === "completed" && !pending.audioDone)) {
            this.startDrain();
          }

          const result: AgentResponse = {
            outcome,
            text: pending.texts.join(" "),
            audio: this.recorder.take(),
            durationMs: Math.round(performance.now() - startedAt),
          };
          if (pending.firstResponseAt !== null) {
            result.firstResponseMs = Math.round(pending.firstResponseAt - startedAt);
          }
          if (outcome === "connection_lost") {
            result.error = this.failureReason ?? "Connection closed";
          }
          resolve(result);
        },
      };

      this.pending = pending;
    });
  }

  /**
   * Hold back the next window until the reply still in the air ends with
   * AgentAudioDone, or a turn timeout passes without it.
   */
  private startDrain(): void {
    let release = (): void => {};
    const drain: ReplyDrain = {
      done: new Promise<void>((resolve) => {
        release = () => resolve();
      }),
      end: () => {
        clearTimeout(timer);
        if (this.drain !== drain) return;
        this.drain = null;
        if (drain.droppedBytes > 0) {
          this.log(`    Discarded ${drain.droppedBytes} bytes of agent audio from a closed window`);
        }
        release();
      },
      droppedBytes: 0,
    };
    const timer = setTimeout(() => drain.end(), this.opts.turnTimeoutMs);
    this.drain = drain;
  }

  private handleEvent(event: AgentServerEvent): void {
    switch (event.type) {
      case "SettingsApplied": {
        this.applied = true;
        this.log("    [OK] SettingsApplied, config accepted");
        // Greeting audio can follow in the same read, so open its window now
        if (this.opts.settings.agent.greeting) {
          this.greeting = this.openWindow(true, this.opts.greetingTimeoutMs);
        }
        this.settingsWaiter?.resolve();
        break;
      }

      case "ConversationText": {
        if (event.role === "assistant") {
          this.conversation.push({ role: "assistant", content: event.content, timestamp_ms: this.elapsedMs() });
          this.log(`    [AGENT]: ${event.content}`);
          const pending = this.pending;
          if (pending) {
            pending.texts.push(event.content);
            pending.firstResponseAt ??= performance.now();
            if (!pending.waitForAudio) pending.finish("completed");
          }
        } else if (event.role === "user") {
          // Text turns are echoed back verbatim; keep only real transcripts
          if (this.pendingUserEcho !== null && event.content.trim() === this.pendingUserEcho) {
            this.pendingUserEcho = null;
          } else {
            this.conversation.push({ role: "user", content: event.content, timestamp_ms: this.elapsedMs() });
          }
        }
        break;
      }

      case "AgentStartedSpeaking": {
        if (this.pending) this.pending.firstResponseAt ??= performance.now();
        break;
      }

      case "AgentAudioDone": {
        if (this.pending) {
          this.pending.audioDone = true;
          this.pending.finish("completed");
        } else {
          this.drain?.end();
        }
        break;
      }

      case "Error": {
        this.errors.push({ code: event.code, description: event.description });
        if (BENIGN_AGENT_ERROR_CODES.includes(event.code)) break;
        this.log(`    [ERROR] ${event.code}: ${event.description}`);
        if (FATAL_AGENT_ERROR_CODES.includes(event.code)) {
          this.fail(`${event.code}: ${event.description}`);
        }
        break;
      }

      case "Warning": {
        this.warnings.push({ code: event.code, description: event.description });
        this.log(`    [WARN] ${event.code}: ${event.description}`);
        break;
      }

      default:
        break;
    }
  }

  private handleAudio(chunk: Buffer): void {
    if (chunk.length === 0) return;
    if (!this.pending) {
      // Tail of a reply whose window already closed
      if (this.drain) this.drain.droppedBytes += chunk.length;
      return;
    }
    this.recorder.push(chunk);
    this.pending.firstResponseAt ??= performance.now();
  }

  private handleChannelError(err: Error): void {
    this.errors.push({ code: "CHANNEL_ERROR", description: err.message });
    this.log(`    [WS] error: ${err.message}`);
  }

  private handleDisconnect(info: DisconnectInfo): void {
    this.disconnectInfo = info;
    this.keepAlive.stop();
    if (this.closed) return;
    this.closed = true;
    this.log(`    [WS] ${describeDisconnect(info)}`);
    this.settingsWaiter?.reject(new SessionError("connection_lost", describeDisconnect(info)));
    this.pending?.finish("connection_lost");
    this.drain?.end();
  }

  private fail(reason: string): void {
    this.fatal = reason;
    this.keepAlive.stop();
    this.settingsWaiter?.reject(new SessionError("settings_rejected", reason));
    this.pending?.finish("connection_lost");
    this.drain?.end();
  }

  private elapsedMs(): number {
    return Math.round(performance.now() - this.createdAt);
  }

  private log(line: string): void {
    (this.opts.log ?? console.log)(line);
  }
}

function notSent(error: string): AgentResponse {
  return { outcome: "not_sent", text: "", audio: Buffer.alloc(0), durationMs: 0, error };
}

function describeDisconnect(info: DisconnectInfo): string {
  return `Connection closed (code ${info.code}${info.reason ? `: ${info.reason}` : ""})`;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
