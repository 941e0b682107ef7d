import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import {
  DEFAULT_AGENT_URL,
  DEFAULT_AUDIO_CHUNK_BYTES,
  DEFAULT_AUDIO_DIR,
  DEFAULT_AUDIO_TRAILING_SILENCE_MS,
  DEFAULT_CARTESIA_VERSION,
  DEFAULT_GREETING_TIMEOUT_MS,
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_LLM_MODEL,
  DEFAULT_PAUSE_BETWEEN_SCENARIOS_MS,
  DEFAULT_RESULTS_DIR,
  DEFAULT_SETTINGS_TIMEOUT_MS,
  DEFAULT_STT_MODEL,
  DEFAULT_TTS_MODEL,
  DEFAULT_TURN_TIMEOUT_MS,
  PROJECT_CONFIG_FILE,
  ProjectConfigSchema,
} from "@agentprobe/shared";
import type { Credentials, ProjectConfig } from "@agentprobe/shared";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_CONFIG: ProjectConfig = {
  agent_url: DEFAULT_AGENT_URL,
  results_dir: DEFAULT_RESULTS_DIR,
  audio_dir: DEFAULT_AUDIO_DIR,
  keepalive_interval_ms: DEFAULT_KEEPALIVE_INTERVAL_MS,
  settings_timeout_ms: DEFAULT_SETTINGS_TIMEOUT_MS,
  greeting_timeout_ms: DEFAULT_GREETING_TIMEOUT_MS,
  turn_timeout_ms: DEFAULT_TURN_TIMEOUT_MS,
  pause_between_scenarios_ms: DEFAULT_PAUSE_BETWEEN_SCENARIOS_MS,
  audio_trailing_silence_ms: DEFAULT_AUDIO_TRAILING_SILENCE_MS,
  audio_chunk_bytes: DEFAULT_AUDIO_CHUNK_BYTES,
  cartesia_version: DEFAULT_CARTESIA_VERSION,
  models: {
    stt: DEFAULT_STT_MODEL,
    llm: DEFAULT_LLM_MODEL,
    tts: DEFAULT_TTS_MODEL,
  },
};

const REQUIRED_CREDENTIALS = {
  deepgramApiKey: "DEEPGRAM_API_KEY",
  cartesiaApiKey: "CARTESIA_API_KEY",
  cartesiaVoiceId: "CARTESIA_VOICE_ID",
} as const satisfies Record<keyof Credentials, string>;

/**
 * Read the API credentials. Every key is required; a missing or blank
 * value is a startup error.
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const missing: string[] = [];
  const read = (key: string): string => {
    const value = env[key]?.trim() ?? "";
    if (!value) missing.push(key);
    return value;
  };

  const credentials: Credentials = {
    deepgramApiKey: read(REQUIRED_CREDENTIALS.deepgramApiKey),
    cartesiaApiKey: read(REQUIRED_CREDENTIALS.cartesiaApiKey),
    cartesiaVoiceId: read(REQUIRED_CREDENTIALS.cartesiaVoiceId),
  };

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variable${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`,
    );
  }
  return credentials;
}

/**
 * Load agentprobe.json from the project root (or an explicit path) and
 * merge it over the defaults. Env overrides win over the file.
 */
export function loadConfig(
  projectRoot: string,
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): ProjectConfig {
  const fullPath = resolve(projectRoot, configPath ?? PROJECT_CONFIG_FILE);

  let fromFile: Partial<Omit<ProjectConfig, "models">> & { models?: Partial<ProjectConfig["models"]> } = {};
  if (existsSync(fullPath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(fullPath, "utf-8"));
    } catch (err) {
      throw new ConfigError(
        `Invalid JSON in ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    const parsed = ProjectConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new ConfigError(`Invalid ${fullPath}: ${issues}`);
    }
    fromFile = parsed.data;
  } else if (configPath) {
    throw new ConfigError(`Config file not found: ${fullPath}`);
  }

  const config: ProjectConfig = {
    ...DEFAULT_CONFIG,
    ...fromFile,
    models: { ...DEFAULT_CONFIG.models, ...fromFile.models },
  };

  config.agent_url = getEnv("AGENT_URL", config.agent_url, env);
  config.results_dir = getEnv("RESULTS_DIR", config.results_dir, env);
  config.audio_dir = getEnv("AUDIO_DIR", config.audio_dir, env);
  config.turn_timeout_ms = getEnvInt("TURN_TIMEOUT_MS", config.turn_timeout_ms, env);

  return config;
}

export function getEnv(
  key: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const value = env[key] || fallback;
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvInt(
  key: string,
  fallback?: number,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const raw = env[key];
  if (raw !== undefined && raw !== "") {
    const parsed = parseInt(raw, 10);
    if (isNaN(parsed)) throw new ConfigError(`Invalid integer for ${key}: ${raw}`);
    return parsed;
  }
  if (fallback !== undefined) return fallback;
  throw new ConfigError(`Missing required environment variable: ${key}`);
}
