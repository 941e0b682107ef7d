/**
 * Deepgram Voice Agent channel
 *
 * Connects to the converse endpoint with a Token header. Settings and
 * user turns go out as JSON text frames; agent audio comes back as
 * binary frames alongside JSON events.
 */

import WebSocket from "ws";
import { BaseAgentChannel } from "./agent-channel.js";
import { ChannelError } from "./errors.js";
import { parseServerEvent } from "./types.js";

export interface DeepgramAgentChannelConfig {
  url: string;
  apiKey: string;
  connectTimeoutMs?: number;
  closeTimeoutMs?: number;
}

export class DeepgramAgentChannel extends BaseAgentChannel {
  private ws: WebSocket | null = null;
  private config: DeepgramAgentChannelConfig;

  constructor(config: DeepgramAgentChannelConfig) {
    super();
    this.config = config;
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  async connect(): Promise<void> {
    if (this.ws) throw new ChannelError("Channel already connected");

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.config.url, {
        headers: { Authorization: `Token ${this.config.apiKey}` },
      });
      ws.binaryType = "nodebuffer";

      const timeout = setTimeout(() => {
        ws.terminate();
        reject(new ChannelError(`Voice agent connection timed out after ${this.config.connectTimeoutMs ?? 15_000}ms`));
      }, this.config.connectTimeoutMs ?? 15_000);

      const onConnectError = (err: Error) => {
        clearTimeout(timeout);
        reject(new ChannelError(`Voice agent connection failed: ${err.message}`, { cause: err }));
      };

      ws.once("error", onConnectError);

      ws.on("unexpected-response", (_req, res) => {
        clearTimeout(timeout);
        reject(new ChannelError(`Voice agent rejected the connection (HTTP ${res.statusCode ?? "unknown"})`));
        // Aborting the handshake emits one more "error"; onConnectError absorbs it
        ws.terminate();
      });

      ws.on("open", () => {
        clearTimeout(timeout);
        ws.off("error", onConnectError);
        this.ws = ws;

        ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
          if (isBinary) {
            this.emit("audio", toBuffer(data));
          } else {
            this.handleTextFrame(toBuffer(data).toString("utf-8"));
          }
        });

        ws.on("error", (err) => {
          this.emit("error", err);
        });

        ws.on("close", (code, reason) => {
          this.ws = null;
          this.emit("disconnected", { code, reason: reason.toString("utf-8") });
        });

        resolve();
      });
    });
  }

  protected sendFrame(data: string | Buffer): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new ChannelError("Voice agent WebSocket not connected");
    }
    this.ws.send(data);
  }

  /** Close the socket and wait (bounded) for the close handshake. */
  async disconnect(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        ws.terminate();
        resolve();
      }, this.config.closeTimeoutMs ?? 3_000);
      ws.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      ws.close(1000, "client done");
    });
  }

  private handleTextFrame(text: string): void {
    try {
      this.emit("event", parseServerEvent(text));
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.emit("error", new ChannelError(`Unparsable agent message (${detail}): ${text.slice(0, 120)}`));
    }
  }
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
