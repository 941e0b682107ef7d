/**
 * Voice Agent wire messages. Only the subset this harness sends or reads
 * is modelled; anything else arrives as an `Other` event.
 */

import { z } from "zod";

// ============================================================
// Client → agent
// ============================================================

export interface AgentSettingsMessage {
  type: "Settings";
  audio: {
    input: { encoding: "linear16"; sample_rate: number };
    output: { encoding: "linear16"; sample_rate: number; container: "none" };
  };
  agent: {
    language: string;
    listen: { provider: { type: "deepgram"; model: string; language?: string } };
    think: { provider: { type: "open_ai"; model: string }; prompt: string };
    speak: {
      provider: {
        type: "cartesia";
        model_id: string;
        voice: { mode: "id"; id: string };
        language?: string;
      };
      endpoint: { url: string; headers: Record<string, string> };
    };
    greeting?: string;
  };
}

export interface InjectUserMessage {
  type: "InjectUserMessage";
  content: string;
}

export interface KeepAliveMessage {
  type: "KeepAlive";
}

export type AgentClientMessage = AgentSettingsMessage | InjectUserMessage | KeepAliveMessage;

// ============================================================
// Agent → client
// ============================================================

const NoticeFields = {
  code: z.string().default(""),
  description: z.string().default(""),
};

export const KnownServerEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Welcome"), request_id: z.string().optional() }),
  z.object({ type: z.literal("SettingsApplied") }),
  z.object({
    type: z.literal("ConversationText"),
    role: z.string(),
    content: z.string(),
  }),
  z.object({ type: z.literal("UserStartedSpeaking") }),
  z.object({ type: z.literal("AgentThinking"), content: z.string().optional() }),
  z.object({ type: z.literal("AgentStartedSpeaking") }),
  z.object({ type: z.literal("AgentAudioDone") }),
  z.object({ type: z.literal("Error"), ...NoticeFields }),
  z.object({ type: z.literal("Warning"), ...NoticeFields }),
]);

export type KnownServerEvent = z.infer<typeof KnownServerEventSchema>;

/** An event type we do not act on (FunctionCallRequest, History, ...). */
export interface OtherServerEvent {
  type: "Other";
  name: string;
}

export type AgentServerEvent = KnownServerEvent | OtherServerEvent;

const EventEnvelopeSchema = z.object({ type: z.string() }).passthrough();

/**
 * Parse a text frame. Throws on non-JSON or a frame without a `type`.
 */
export function parseServerEvent(text: string): AgentServerEvent {
  const envelope = EventEnvelopeSchema.parse(JSON.parse(text));
  const known = KnownServerEventSchema.safeParse(envelope);
  if (known.success) return known.data;
  return { type: "Other", name: envelope.type };
}
