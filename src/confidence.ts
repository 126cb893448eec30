import { z } from "zod";

// --- Configuration ---

/** Additive scoring model: thresholds and deltas. */
export interface ScorerConfig {
  baseline: number;
  shortOutputChars: number;          // output shorter than this is penalized
  shortOutputPenalty: number;
  detailedOutputChars: number;       // output longer than this is rewarded
  detailedOutputBonus: number;
  uncertaintyPenalty: number;        // per uncertainty phrase
  certaintyBonus: number;            // per certainty phrase
  maxQuestionMarks: number;          // more than this many "?" is penalized
  questionPenalty: number;
  repetitionMinWords: number;        // ratio only checked above this word count
  minUniqueRatio: number;
  repetitionPenalty: number;
  longPromptTokens: number;
  longPromptMinOutputChars: number;
  longPromptPenalty: number;
  fluentTokensPerSecond: number;
  fluentBonus: number;
  uncertaintyPhrases: string[];
  certaintyPhrases: string[];
}

// Italian and English, the two working languages
const UNCERTAINTY_PHRASES = [
  "non sono sicuro", "non so", "forse", "probabilmente", "potrebbe essere", "possibilmente",
  "not sure", "i don't know", "maybe", "probably", "might be", "could be",
];

const CERTAINTY_PHRASES = [
  "sicuramente", "certamente", "conferma", "essenzialmente", "definitivamente",
  "certainly", "definitely", "clearly", "obviously",
];

export const DEFAULT_SCORER_CONFIG: Readonly<ScorerConfig> = Object.freeze({
  baseline: 0.5,
  shortOutputChars: 10,
  shortOutputPenalty: 0.2,
  detailedOutputChars: 50,
  detailedOutputBonus: 0.1,
  uncertaintyPenalty: 0.15,
  certaintyBonus: 0.1,
  maxQuestionMarks: 1,
  questionPenalty: 0.1,
  repetitionMinWords: 10,
  minUniqueRatio: 0.6,
  repetitionPenalty: 0.15,
  longPromptTokens: 500,
  longPromptMinOutputChars: 50,
  longPromptPenalty: 0.1,
  fluentTokensPerSecond: 5,
  fluentBonus: 0.05,
  uncertaintyPhrases: UNCERTAINTY_PHRASES,
  certaintyPhrases: CERTAINTY_PHRASES,
});

/** Numeric overrides accepted from config.json. */
export const ScorerOverridesSchema = z.object({
  baseline: z.number().min(0).max(1),
  shortOutputChars: z.number().int().nonnegative(),
  shortOutputPenalty: z.number(),
  detailedOutputChars: z.number().int().nonnegative(),
  detailedOutputBonus: z.number(),
  uncertaintyPenalty: z.number(),
  certaintyBonus: z.number(),
  maxQuestionMarks: z.number().int().nonnegative(),
  questionPenalty: z.number(),
  repetitionMinWords: z.number().int().nonnegative(),
  minUniqueRatio: z.number().min(0).max(1),
  repetitionPenalty: z.number(),
  longPromptTokens: z.number().nonnegative(),
  longPromptMinOutputChars: z.number().int().nonnegative(),
  longPromptPenalty: z.number(),
  fluentTokensPerSecond: z.number().nonnegative(),
  fluentBonus: z.number(),
}).partial();

// --- Types ---

/** Optional generation statistics reported by the text-generation engine. */
export interface GenerationStats {
  prompt_tokens?: number;
  tokens_per_second?: number;
}

export interface ConfidenceResult {
  confidence: number;   // 0-1
  reasoning: string;    // labels of every adjustment that fired, in order
}

export type ConfidenceLabel = "very-high" | "high" | "medium" | "low" | "very-low";

// --- Helpers ---

function phraseRegex(phrases: string[]): RegExp | null {
  if (phrases.length === 0) return null;
  const alternatives = phrases.map((p) => p.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
  // Unicode-aware word boundaries: an adjacent accented letter is part of the word
  return new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternatives.join("|")})(?![\\p{L}\\p{N}_])`, "giu");
}

function countMatches(regex: RegExp | null, text: string): number {
  return regex ? (text.match(regex) ?? []).length : 0;
}

export function confidenceLabel(confidence: number): ConfidenceLabel {
  if (confidence >= 0.8) return "very-high";
  if (confidence >= 0.6) return "high";
  if (confidence >= 0.4) return "medium";
  if (confidence >= 0.2) return "low";
  return "very-low";
}

export function shouldAskClarification(confidence: number, threshold = 0.4): boolean {
  return confidence < threshold;
}

// --- Scorer ---

/**
 * Stateless heuristic self-evaluation of a generated response.
 * Starts at the baseline, applies each adjustment independently, clamps to [0,1].
 * Missing generation stats skip the stats-based adjustments.
 */
export class ConfidenceScorer {
  readonly config: Readonly<ScorerConfig>;
  private uncertainty: RegExp | null;
  private certainty: RegExp | null;

  constructor(overrides: Partial<ScorerConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_SCORER_CONFIG, ...overrides });
    this.uncertainty = phraseRegex(this.config.uncertaintyPhrases);
    this.certainty = phraseRegex(this.config.certaintyPhrases);
  }

  score(outputText: string, stats?: GenerationStats): ConfidenceResult {
    const c = this.config;
    let confidence = c.baseline;
    const reasons: string[] = [];

    const length = outputText.trim().length;
    if (length < c.shortOutputChars) {
      confidence -= c.shortOutputPenalty;
      reasons.push("output too short");
    } else if (length > c.detailedOutputChars) {
      confidence += c.detailedOutputBonus;
      reasons.push("detailed response");
    }

    const doubts = countMatches(this.uncertainty, outputText);
    if (doubts > 0) {
      confidence -= c.uncertaintyPenalty * doubts;
      reasons.push(`${doubts} uncertainty expression${doubts === 1 ? "" : "s"} found`);
    }

    const certainties = countMatches(this.certainty, outputText);
    if (certainties > 0) {
      confidence += c.certaintyBonus * certainties;
      reasons.push(`${certainties} certainty expression${certainties === 1 ? "" : "s"} found`);
    }

    const questionMarks = outputText.split("?").length - 1;
    if (questionMarks > c.maxQuestionMarks) {
      confidence -= c.questionPenalty;
      reasons.push("response contains questions");
    }

    // Repetition is a hallucination symptom
    const words = outputText.toLowerCase().split(/\s+/).filter(Boolean);
    if (words.length > c.repetitionMinWords) {
      const uniqueRatio = new Set(words).size / words.length;
      if (uniqueRatio < c.minUniqueRatio) {
        confidence -= c.repetitionPenalty;
        reasons.push("too many repetitions");
      }
    }

    if (stats) {
      if ((stats.prompt_tokens ?? 0) > c.longPromptTokens && length < c.longPromptMinOutputChars) {
        confidence -= c.longPromptPenalty;
        reasons.push("response too short for the prompt");
      }
      if ((stats.tokens_per_second ?? 0) > c.fluentTokensPerSecond) {
        confidence += c.fluentBonus;
        reasons.push("fluent generation");
      }
    }

    return {
      confidence: Math.min(Math.max(confidence, 0), 1),
      reasoning: reasons.length > 0 ? reasons.join("; ") : "standard evaluation",
    };
  }
}
