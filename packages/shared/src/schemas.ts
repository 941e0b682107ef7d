import { z } from "zod";
import {
  LANGUAGE_CODES,
  LANGUAGE_POLICIES,
  RUN_STATUSES,
  TURN_FAILURE_REASONS,
} from "./constants.js";
import type { ResultRecord } from "./types.js";

export const LanguageCodeSchema = z.enum(LANGUAGE_CODES);
export const LanguagePolicySchema = z.enum(LANGUAGE_POLICIES);

// ============================================================
// Scenario catalog schemas
// ============================================================

export const ScenarioConfigSchema = z.object({
  agent_language: z.string().min(1).default("multi"),
  listen_language: z.string().min(1).optional(),
  tts_language: z.string().min(1).optional(),
  language_policy: LanguagePolicySchema.default("none"),
  prompt: z.string().min(1),
  greeting: z.string().min(1).optional(),
});

export const TurnInputSchema = z.union([
  z.object({ text: z.string().min(1) }).strict(),
  z.object({ audio_file: z.string().min(1) }).strict(),
]);

export const TurnExpectationSchema = z.object({
  language: LanguageCodeSchema.optional(),
  keywords: z.array(z.string().min(1)).optional(),
});

export const TurnSchema = z.object({
  label: z.string().min(1),
  input: TurnInputSchema,
  input_language: LanguageCodeSchema.optional(),
  expect: TurnExpectationSchema.optional(),
  wait_for_audio: z.boolean().optional(),
});

export const ScenarioSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_-]+$/, "id may only contain letters, digits, _ and -"),
  name: z.string().min(1),
  description: z.string().default(""),
  config: ScenarioConfigSchema,
  turns: z.array(TurnSchema).min(1),
});

export const CatalogSchema = z
  .object({
    scenarios: z.array(ScenarioSchema).min(1),
  })
  .refine(
    (c) => new Set(c.scenarios.map((s) => s.id)).size === c.scenarios.length,
    { message: "Scenario ids must be unique" },
  );

// ============================================================
// Result record schema
// ============================================================

const AgentNoticeSchema = z.object({
  code: z.string(),
  description: z.string(),
});

const ConversationEntrySchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  label: z.string().optional(),
  timestamp_ms: z.number().min(0),
});

const TurnOutcomeSchema = z.object({
  index: z.number().int().min(0),
  label: z.string(),
  input: TurnInputSchema,
  input_language: LanguageCodeSchema.optional(),
  expected_languages: z.array(LanguageCodeSchema).optional(),
  expected_keywords: z.array(z.string()).optional(),
  status: z.enum(RUN_STATUSES),
  failure_reason: z.enum(TURN_FAILURE_REASONS).optional(),
  response_text: z.string(),
  detected_language: z.union([LanguageCodeSchema, z.literal("unknown")]).optional(),
  missing_keywords: z.array(z.string()).optional(),
  first_response_ms: z.number().min(0).optional(),
  duration_ms: z.number().min(0),
  audio_bytes: z.number().int().min(0),
  audio_file: z.string().optional(),
  error: z.string().optional(),
});

const AudioFileRecordSchema = z.object({
  file: z.string(),
  size_bytes: z.number().int().min(0),
  duration_ms: z.number().min(0),
  turn: z.union([z.number().int().min(0), z.literal("greeting")]),
});

export const ResultRecordSchema: z.ZodType<ResultRecord> = z.object({
  id: z.string().min(1),
  scenario_id: z.string(),
  scenario_name: z.string(),
  description: z.string(),
  started_at: z.string().datetime(),
  finished_at: z.string().datetime(),
  duration_ms: z.number().min(0),
  status: z.enum(RUN_STATUSES),
  error: z.string().optional(),
  config: z.object({
    agent_language: z.string(),
    listen_language: z.string().optional(),
    tts_language: z.string().optional(),
    language_policy: LanguagePolicySchema,
    prompt: z.string(),
    greeting: z.string().optional(),
  }),
  settings_applied: z.boolean(),
  turns: z.array(TurnOutcomeSchema),
  conversation: z.array(ConversationEntrySchema),
  errors: z.array(AgentNoticeSchema),
  warnings: z.array(AgentNoticeSchema),
  audio_files: z.array(AudioFileRecordSchema),
});

// ============================================================
// agentprobe.json project configuration schema
// ============================================================

export const ProjectConfigSchema = z
  .object({
    agent_url: z.string().url(),
    results_dir: z.string().min(1),
    audio_dir: z.string().min(1),
    keepalive_interval_ms: z.number().int().min(1000).max(60_000),
    settings_timeout_ms: z.number().int().min(100),
    greeting_timeout_ms: z.number().int().min(100),
    turn_timeout_ms: z.number().int().min(100),
    pause_between_scenarios_ms: z.number().int().min(0),
    audio_trailing_silence_ms: z.number().int().min(0),
    audio_chunk_bytes: z.number().int().min(2).multipleOf(2),
    cartesia_version: z.string().min(1),
    models: z
      .object({
        stt: z.string().min(1),
        llm: z.string().min(1),
        tts: z.string().min(1),
      })
      .partial(),
  })
  .partial()
  .strict();
