/**
 * Per-turn expectations: which reply languages are acceptable under the
 * scenario's language policy, and which keywords must appear.
 */

import type {
  DetectedLanguage,
  LanguageCode,
  LanguagePolicy,
  Turn,
  TurnFailureReason,
} from "@agentprobe/shared";
import { detectLanguage, findMissingKeywords } from "./language.js";

export { detectLanguage, scoreLanguages, findMissingKeywords, foldText, tokenize } from "./language.js";
export type { LanguageGuess, LanguageScores } from "./language.js";

export interface TurnExpectationResolved {
  /** Any of these satisfies the turn; undefined means no language check */
  languages?: LanguageCode[];
  keywords?: string[];
}

export function resolveExpectation(policy: LanguagePolicy, turn: Turn): TurnExpectationResolved {
  const keywords = turn.expect?.keywords?.length ? [...turn.expect.keywords] : undefined;

  if (turn.expect?.language) {
    return { languages: [turn.expect.language], keywords };
  }

  switch (policy) {
    case "english_only":
      return { languages: ["en"], keywords };
    case "spanish_only":
      return { languages: ["es"], keywords };
    case "mirror":
      return { languages: turn.input_language ? [turn.input_language] : undefined, keywords };
    case "conditional_mix":
      return { languages: userSpokeSpanish(turn) ? ["en", "es"] : ["en"], keywords };
    case "none":
      return { keywords };
  }
}

function userSpokeSpanish(turn: Turn): boolean {
  if (turn.input_language === "es") return true;
  if ("text" in turn.input) return detectLanguage(turn.input.text).scores.es > 0;
  return false;
}

export interface ResponseCheck {
  passed: boolean;
  failure_reason?: TurnFailureReason;
  detected_language?: DetectedLanguage;
  missing_keywords?: string[];
}

/**
 * Check a completed reply. A language mismatch is reported ahead of
 * missing keywords, but both are recorded.
 */
export function checkResponse(expectation: TurnExpectationResolved, text: string): ResponseCheck {
  const detected = text.trim() ? detectLanguage(text).language : undefined;

  if (!text.trim() && (expectation.languages || expectation.keywords)) {
    return { passed: false, failure_reason: "no_response" };
  }

  const languageOk =
    !expectation.languages || (detected !== undefined && detected !== "unknown" && expectation.languages.includes(detected));

  const missing = expectation.keywords ? findMissingKeywords(text, expectation.keywords) : [];

  const result: ResponseCheck = {
    passed: languageOk && missing.length === 0,
    detected_language: detected,
  };
  if (missing.length > 0) result.missing_keywords = missing;
  if (!languageOk) result.failure_reason = "language_mismatch";
  else if (missing.length > 0) result.failure_reason = "missing_keywords";
  return result;
}
