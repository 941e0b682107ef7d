export const RUN_STATUSES = ["pass", "fail"] as const;
export const LANGUAGE_CODES = ["en", "es", "fr", "ja"] as const;
export const LANGUAGE_POLICIES = [
  "mirror",
  "english_only",
  "spanish_only",
  "conditional_mix",
  "none",
] as const;
export const TURN_FAILURE_REASONS = [
  "timeout",
  "language_mismatch",
  "missing_keywords",
  "connection_lost",
  "not_sent",
  "no_response",
] as const;

export const DEFAULT_AGENT_URL = "wss://agent.deepgram.com/v1/agent/converse";
export const CARTESIA_TTS_URL = "https://api.cartesia.ai/tts/bytes";
export const DEFAULT_CARTESIA_VERSION = "2024-06-10";

export const DEFAULT_STT_MODEL = "nova-3";
export const DEFAULT_LLM_MODEL = "gpt-4o-mini";
export const DEFAULT_TTS_MODEL = "sonic-multilingual";

export const INPUT_SAMPLE_RATE = 16_000;
export const OUTPUT_SAMPLE_RATE = 24_000;

// Server idles out after ~8s without a client message
export const DEFAULT_KEEPALIVE_INTERVAL_MS = 7_000;
export const DEFAULT_SETTINGS_TIMEOUT_MS = 10_000;
export const DEFAULT_GREETING_TIMEOUT_MS = 15_000;
export const DEFAULT_TURN_TIMEOUT_MS = 20_000;
export const DEFAULT_PAUSE_BETWEEN_SCENARIOS_MS = 3_000;
export const DEFAULT_AUDIO_TRAILING_SILENCE_MS = 1_000;
export const DEFAULT_AUDIO_CHUNK_BYTES = 3_200; // 100ms of 16kHz linear16

export const DEFAULT_RESULTS_DIR = "./test_results";
export const DEFAULT_AUDIO_DIR = "./agent_audio_out";
export const PROJECT_CONFIG_FILE = "agentprobe.json";

/** Agent error codes that end the scenario immediately. */
export const FATAL_AGENT_ERROR_CODES: readonly string[] = [
  "INVALID_SETTINGS",
  "UNPARSABLE_CLIENT_MESSAGE",
];

/** Idle-timeout notices; recorded but never treated as failures. */
export const BENIGN_AGENT_ERROR_CODES: readonly string[] = ["CLIENT_MESSAGE_TIMEOUT"];
