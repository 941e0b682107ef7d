/**
 * Marker-word language guess for agent replies.
 *
 * This is a heuristic over a handful of function words and diacritics,
 * good enough to tell English, Spanish and French replies apart. It is
 * not language identification.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { LANGUAGE_CODES } from "@agentprobe/shared";
import type { DetectedLanguage, LanguageCode } from "@agentprobe/shared";

const MarkerFileSchema = z.object({
  minimum_score: z.number().int().min(1),
  character_weight: z.number().int().min(1),
  words: z.object({
    en: z.array(z.string()),
    es: z.array(z.string()),
    fr: z.array(z.string()),
  }),
  characters: z.object({
    es: z.string(),
    fr: z.string(),
  }),
});

const MARKERS_PATH = fileURLToPath(new URL("./language-markers.json", import.meta.url));
const markers = MarkerFileSchema.parse(JSON.parse(readFileSync(MARKERS_PATH, "utf-8")));

const WORDS: Record<"en" | "es" | "fr", ReadonlySet<string>> = {
  en: new Set(markers.words.en),
  es: new Set(markers.words.es),
  fr: new Set(markers.words.fr),
};

// Hiragana, katakana, CJK unified ideographs
const JAPANESE_CHARS = /[\u3040-\u30ff\u4e00-\u9fff]/g;

export type LanguageScores = Record<LanguageCode, number>;

export interface LanguageGuess {
  language: DetectedLanguage;
  scores: LanguageScores;
}

export function tokenize(text: string): string[] {
  return text
    .normalize("NFC")
    .toLowerCase()
    .split(/[^\p{L}]+/u)
    .filter((t) => t.length > 0);
}

export function scoreLanguages(text: string): LanguageScores {
  const normalized = text.normalize("NFC").toLowerCase();
  const scores: LanguageScores = { en: 0, es: 0, fr: 0, ja: 0 };

  for (const token of tokenize(normalized)) {
    if (WORDS.en.has(token)) scores.en++;
    if (WORDS.es.has(token)) scores.es++;
    if (WORDS.fr.has(token)) scores.fr++;
  }

  for (const ch of normalized) {
    if (markers.characters.es.includes(ch)) scores.es += markers.character_weight;
    if (markers.characters.fr.includes(ch)) scores.fr += markers.character_weight;
  }

  scores.ja = normalized.match(JAPANESE_CHARS)?.length ?? 0;
  return scores;
}

/**
 * Best-scoring language, or "unknown" when nothing reaches the minimum
 * score or the top two tie.
 */
export function detectLanguage(text: string): LanguageGuess {
  const scores = scoreLanguages(text);
  const ranked = LANGUAGE_CODES.map((code) => [code, scores[code]] as const).sort((a, b) => b[1] - a[1]);
  const [first, second] = ranked;

  if (!first || first[1] < markers.minimum_score || (second && second[1] === first[1])) {
    return { language: "unknown", scores };
  }
  return { language: first[0], scores };
}

/** Lowercase and strip diacritics so "Camión" matches "camion". */
export function foldText(text: string): string {
  return text.normalize("NFD").replace(/\p{M}/gu, "").toLowerCase();
}

/** Keywords not found in the text (case- and accent-insensitive substring). */
export function findMissingKeywords(text: string, keywords: readonly string[]): string[] {
  const haystack = foldText(text);
  return keywords.filter((k) => !haystack.includes(foldText(k)));
}
