import {
  CARTESIA_TTS_URL,
  DEFAULT_CARTESIA_VERSION,
  DEFAULT_LLM_MODEL,
  DEFAULT_STT_MODEL,
  DEFAULT_TTS_MODEL,
  INPUT_SAMPLE_RATE,
  OUTPUT_SAMPLE_RATE,
} from "@agentprobe/shared";
import type { Credentials, ModelConfig, ScenarioConfig } from "@agentprobe/shared";
import type { AgentSettingsMessage } from "./types.js";

export interface SettingsOptions {
  models?: Partial<ModelConfig>;
  cartesiaVersion?: string;
}

/**
 * Build the one-time Settings message: Deepgram STT, an OpenAI model
 * managed by the agent, and Cartesia TTS called with our own key.
 * Optional languages are left out entirely rather than sent empty.
 */
export function buildSettings(
  config: ScenarioConfig,
  credentials: Credentials,
  options: SettingsOptions = {},
): AgentSettingsMessage {
  const listenProvider: AgentSettingsMessage["agent"]["listen"]["provider"] = {
    type: "deepgram",
    model: options.models?.stt ?? DEFAULT_STT_MODEL,
  };
  if (config.listen_language) listenProvider.language = config.listen_language;

  const speakProvider: AgentSettingsMessage["agent"]["speak"]["provider"] = {
    type: "cartesia",
    model_id: options.models?.tts ?? DEFAULT_TTS_MODEL,
    voice: { mode: "id", id: credentials.cartesiaVoiceId },
  };
  if (config.tts_language) speakProvider.language = config.tts_language;

  const agent: AgentSettingsMessage["agent"] = {
    language: config.agent_language,
    listen: { provider: listenProvider },
    think: {
      provider: { type: "open_ai", model: options.models?.llm ?? DEFAULT_LLM_MODEL },
      prompt: config.prompt,
    },
    speak: {
      provider: speakProvider,
      endpoint: {
        url: CARTESIA_TTS_URL,
        headers: {
          "X-API-Key": credentials.cartesiaApiKey,
          "Cartesia-Version": options.cartesiaVersion ?? DEFAULT_CARTESIA_VERSION,
        },
      },
    },
  };
  if (config.greeting) agent.greeting = config.greeting;

  return {
    type: "Settings",
    audio: {
      input: { encoding: "linear16", sample_rate: INPUT_SAMPLE_RATE },
      output: { encoding: "linear16", sample_rate: OUTPUT_SAMPLE_RATE, container: "none" },
    },
    agent,
  };
}
