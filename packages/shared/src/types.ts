import type {
  LANGUAGE_CODES,
  LANGUAGE_POLICIES,
  RUN_STATUSES,
  TURN_FAILURE_REASONS,
} from "./constants.js";

export type RunStatus = (typeof RUN_STATUSES)[number];
export type LanguageCode = (typeof LANGUAGE_CODES)[number];
export type DetectedLanguage = LanguageCode | "unknown";
export type LanguagePolicy = (typeof LANGUAGE_POLICIES)[number];
export type TurnFailureReason = (typeof TURN_FAILURE_REASONS)[number];

// ============================================================
// Scenario catalog
// ============================================================

export interface ScenarioConfig {
  /** `agent.language` sent in Settings ("multi" or an ISO code) */
  agent_language: string;
  /** `listen.provider.language`; omitted from Settings when unset */
  listen_language?: string;
  /** Cartesia `language`; omitted to let the TTS auto-detect */
  tts_language?: string;
  language_policy: LanguagePolicy;
  prompt: string;
  greeting?: string;
}

export type TurnInput = { text: string } | { audio_file: string };

export interface TurnExpectation {
  language?: LanguageCode;
  keywords?: string[];
}

export interface Turn {
  label: string;
  input: TurnInput;
  input_language?: LanguageCode;
  expect?: TurnExpectation;
  /** Complete on AgentAudioDone (default) rather than on the first reply text */
  wait_for_audio?: boolean;
}

export interface Scenario {
  id: string;
  name: string;
  description: string;
  config: ScenarioConfig;
  turns: Turn[];
}

// ============================================================
// Run results
// ============================================================

export interface AgentNotice {
  code: string;
  description: string;
}

export interface ConversationEntry {
  role: "user" | "assistant";
  content: string;
  label?: string;
  timestamp_ms: number;
}

export interface TurnOutcome {
  index: number;
  label: string;
  input: TurnInput;
  input_language?: LanguageCode;
  /** Any of these languages satisfies the turn; absent means no language check */
  expected_languages?: LanguageCode[];
  expected_keywords?: string[];
  status: RunStatus;
  failure_reason?: TurnFailureReason;
  response_text: string;
  detected_language?: DetectedLanguage;
  missing_keywords?: string[];
  first_response_ms?: number;
  duration_ms: number;
  audio_bytes: number;
  audio_file?: string;
  error?: string;
}

export interface AudioFileRecord {
  file: string;
  size_bytes: number;
  duration_ms: number;
  turn: number | "greeting";
}

export interface ResultRecord {
  id: string;
  scenario_id: string;
  scenario_name: string;
  description: string;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  status: RunStatus;
  error?: string;
  config: ScenarioConfig;
  settings_applied: boolean;
  turns: TurnOutcome[];
  conversation: ConversationEntry[];
  errors: AgentNotice[];
  warnings: AgentNotice[];
  audio_files: AudioFileRecord[];
}

// ============================================================
// agentprobe.json project configuration
// ============================================================

export interface ModelConfig {
  stt: string;
  llm: string;
  tts: string;
}

export interface ProjectConfig {
  agent_url: string;
  results_dir: string;
  audio_dir: string;
  keepalive_interval_ms: number;
  settings_timeout_ms: number;
  greeting_timeout_ms: number;
  turn_timeout_ms: number;
  pause_between_scenarios_ms: number;
  audio_trailing_silence_ms: number;
  audio_chunk_bytes: number;
  cartesia_version: string;
  models: ModelConfig;
}

export interface Credentials {
  deepgramApiKey: string;
  cartesiaApiKey: string;
  cartesiaVoiceId: string;
}
