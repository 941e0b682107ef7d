/**
 * One bidirectional connection to a hosted voice agent.
 *
 * Text frames are JSON events, binary frames are agent audio
 * (linear16 24kHz mono). Audio is handed through untouched.
 */

import { EventEmitter } from "node:events";
import type { AgentClientMessage, AgentServerEvent } from "./types.js";

export interface DisconnectInfo {
  code: number;
  reason: string;
}

export interface AgentChannelEvents {
  event: (event: AgentServerEvent) => void;
  audio: (chunk: Buffer) => void;
  error: (err: Error) => void;
  disconnected: (info: DisconnectInfo) => void;
}

export interface AgentChannel {
  connect(): Promise<void>;
  send(message: AgentClientMessage): void;
  /** Send raw PCM to the agent (16-bit 16kHz mono) */
  sendAudio(pcm: Buffer): void;
  disconnect(): Promise<void>;
  readonly connected: boolean;
  /** performance.now() of the last frame sent, or null before the first */
  readonly lastSentAt: number | null;

  on<E extends keyof AgentChannelEvents>(event: E, listener: AgentChannelEvents[E]): this;
  off<E extends keyof AgentChannelEvents>(event: E, listener: AgentChannelEvents[E]): this;
  once<E extends keyof AgentChannelEvents>(event: E, listener: AgentChannelEvents[E]): this;
  emit<E extends keyof AgentChannelEvents>(event: E, ...args: Parameters<AgentChannelEvents[E]>): boolean;
}

export abstract class BaseAgentChannel extends EventEmitter implements AgentChannel {
  protected sentAt: number | null = null;

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract get connected(): boolean;
  protected abstract sendFrame(data: string | Buffer): void;

  get lastSentAt(): number | null {
    return this.sentAt;
  }

  send(message: AgentClientMessage): void {
    this.sendFrame(JSON.stringify(message));
    this.sentAt = performance.now();
  }

  sendAudio(pcm: Buffer): void {
    this.sendFrame(pcm);
    this.sentAt = performance.now();
  }
}
