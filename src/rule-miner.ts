import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { StorageError } from "./errors.js";
import { log } from "./log.js";
import type { Mood, Neuron, NeuronStore, RuleDraft } from "./neuron-store.js";
import { tokenize } from "./text.js";

// --- Constants ---

/** Neurons read for one mining pass */
const ANALYSIS_WINDOW = 200;

/** Keyword buckets a single neuron fans into during analyze() */
const KEYWORDS_PER_NEURON = 3;

const SKILL_RULE_MIN_AVG_CONFIDENCE = 0.7;

/** Negative-feedback avoidance: window, minimum negatives, word length, top-N */
const NEGATIVE_WINDOW = 100;
const NEGATIVE_MIN_NEURONS = 3;
const AVOID_WORD_LONGER_THAN = 4;
const AVOID_TOP_WORDS = 5;

/** High-confidence pattern: window, confidence floor, minimum neurons, top-N */
const HIGH_CONF_WINDOW = 100;
const HIGH_CONF_FLOOR = 0.8;
const HIGH_CONF_MIN_NEURONS = 5;
const HIGH_CONF_TOP_KEYWORDS = 3;

/** Low-confidence clarification: window, confidence ceiling, minimum neurons, words read, top-N */
const LOW_CONF_WINDOW = 50;
const LOW_CONF_CEILING = 0.4;
const LOW_CONF_MIN_NEURONS = 5;
const LOW_CONF_LEADING_WORDS = 5;
const LOW_CONF_TOP_TOPICS = 2;

/** A word must recur this often before it becomes a rule */
const MIN_WORD_COUNT = 3;

/** Keywords are tokens longer than this */
const KEYWORD_LONGER_THAN = 3;

// --- Keyword extraction strategy ---

/**
 * Tokenization used by mining. Swappable so the mining control flow stays
 * fixed if extraction improves.
 */
export interface KeywordExtractor {
  /** All tokens of the text, in order. */
  words(text: string): string[];
  /**
   * Tokens longer than `longerThan` characters, in order. The length test runs
   * on the trimmed token, so "LED?" counts as the 3-character "led".
   */
  extractKeywords(text: string, longerThan?: number): string[];
}

export const defaultKeywordExtractor: KeywordExtractor = {
  words: tokenize,
  extractKeywords(text, longerThan = KEYWORD_LONGER_THAN) {
    return tokenize(text).filter((w) => w.length > longerThan);
  },
};

// --- Types ---

export interface PatternGroups {
  by_skill: Map<string, Neuron[]>;
  by_mood: Map<Mood, Neuron[]>;
  by_keywords: Map<string, Neuron[]>;
}

export interface EvolutionResult {
  neurons_analyzed: number;
  rules_generated: number;
  rules_saved: number;
  message: string;
  snapshot_path: string | null;
}

/** Side artifact written after each evolution pass, for human inspection. */
export interface RuleSnapshot {
  generated_at: string;
  rules_count: number;
  rules: RuleDraft[];
}

export interface RuleMinerOptions {
  extractor?: KeywordExtractor;
  /** Where autoEvolve() writes the rule snapshot; null disables it. */
  snapshotPath?: string | null;
  now?: () => Date;
}

// --- Helpers ---

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const bucket = map.get(key);
  if (bucket) bucket.push(value);
  else map.set(key, [value]);
}

/** Top-N entries by count; ties keep first-seen order. */
function mostCommon(words: Iterable<string>, n: number): [string, number][] {
  const counts = new Map<string, number>();
  for (const w of words) counts.set(w, (counts.get(w) ?? 0) + 1);
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, n);
}

// --- Miner ---

/**
 * Auto-evolution: mines recurring patterns in recent neurons and persists them
 * as rules. Stateless between calls. Each pass reads one window of neurons in a
 * single query, then writes rules one atomic insertion at a time.
 */
export class RuleMiner {
  private store: NeuronStore;
  private extractor: KeywordExtractor;
  private snapshotPath: string | null;
  private now: () => Date;

  constructor(store: NeuronStore, options: RuleMinerOptions = {}) {
    this.store = store;
    this.extractor = options.extractor ?? defaultKeywordExtractor;
    this.snapshotPath = options.snapshotPath ?? null;
    this.now = options.now ?? (() => new Date());
  }

  /** Group the last `limit` neurons by skill, by mood and by their first keywords. */
  analyze(limit = ANALYSIS_WINDOW): PatternGroups {
    return this.group(this.store.recent(limit));
  }

  private group(neurons: Neuron[]): PatternGroups {
    const groups: PatternGroups = { by_skill: new Map(), by_mood: new Map(), by_keywords: new Map() };
    for (const n of neurons) {
      if (n.skill_id) push(groups.by_skill, n.skill_id, n);
      push(groups.by_mood, n.mood, n);
      for (const kw of this.extractor.extractKeywords(n.input_text).slice(0, KEYWORDS_PER_NEURON)) {
        push(groups.by_keywords, kw, n);
      }
    }
    return groups;
  }

  /** Run the four mining heuristics over one point-in-time window. */
  generateRules(minOccurrences = 3): RuleDraft[] {
    // recent() is newest first, so sub-windows are prefixes of the same read
    const window = this.store.recent(ANALYSIS_WINDOW);
    return [
      ...this.skillConfidenceRules(this.group(window), minOccurrences),
      ...this.avoidanceRules(window.slice(0, NEGATIVE_WINDOW)),
      ...this.highConfidenceRules(window.slice(0, HIGH_CONF_WINDOW)),
      ...this.clarificationRules(window.slice(0, LOW_CONF_WINDOW)),
    ];
  }

  private skillConfidenceRules(groups: PatternGroups, minOccurrences: number): RuleDraft[] {
    const rules: RuleDraft[] = [];
    for (const [skill, neurons] of groups.by_skill) {
      if (neurons.length < minOccurrences) continue;
      const avg = neurons.reduce((s, n) => s + n.confidence, 0) / neurons.length;
      if (avg <= SKILL_RULE_MIN_AVG_CONFIDENCE) continue;
      rules.push({
        rule_text: `Use high confidence for ${skill} tasks`,
        trigger_pattern: `skill_id:${skill}`,
        confidence_threshold: avg,
        priority: 2,
        enabled: true,
      });
    }
    return rules;
  }

  private avoidanceRules(window: Neuron[]): RuleDraft[] {
    const negatives = window.filter((n) => n.user_feedback < 0);
    if (negatives.length < NEGATIVE_MIN_NEURONS) return [];

    const words = negatives.flatMap((n) =>
      this.extractor.extractKeywords(n.output_text, AVOID_WORD_LONGER_THAN)
    );
    return mostCommon(words, AVOID_TOP_WORDS)
      .filter(([, count]) => count >= MIN_WORD_COUNT)
      .map(([word]) => ({
        rule_text: `Avoid using '${word}' in responses (negative feedback pattern)`,
        trigger_pattern: `avoid_word:${word}`,
        confidence_threshold: 0.3,
        priority: 3,
        enabled: true,
      }));
  }

  private highConfidenceRules(window: Neuron[]): RuleDraft[] {
    const confident = window.filter((n) => n.confidence > HIGH_CONF_FLOOR);
    if (confident.length < HIGH_CONF_MIN_NEURONS) return [];

    const keywords = confident.flatMap((n) => this.extractor.extractKeywords(n.input_text));
    return mostCommon(keywords, HIGH_CONF_TOP_KEYWORDS)
      .filter(([, count]) => count >= MIN_WORD_COUNT)
      .map(([keyword]) => ({
        rule_text: `High confidence pattern detected for '${keyword}' queries`,
        trigger_pattern: `keyword:${keyword}`,
        confidence_threshold: 0.8,
        priority: 1,
        enabled: true,
      }));
  }

  private clarificationRules(window: Neuron[]): RuleDraft[] {
    const unsure = window.filter((n) => n.confidence < LOW_CONF_CEILING);
    if (unsure.length < LOW_CONF_MIN_NEURONS) return [];

    const topics = unsure.flatMap((n) =>
      this.extractor
        .words(n.input_text)
        .slice(0, LOW_CONF_LEADING_WORDS)
        .filter((w) => w.length > KEYWORD_LONGER_THAN)
    );
    return mostCommon(topics, LOW_CONF_TOP_TOPICS)
      .filter(([, count]) => count >= MIN_WORD_COUNT)
      .map(([topic]) => ({
        rule_text: `Ask clarification for '${topic}' topics (low confidence pattern)`,
        trigger_pattern: `clarify:${topic}`,
        confidence_threshold: 0.4,
        priority: 2,
        enabled: true,
      }));
  }

  /** Insert rules whose exact rule_text is not stored yet. Returns how many were inserted. */
  saveRules(rules: RuleDraft[]): number {
    let saved = 0;
    for (const rule of rules) {
      if (this.store.insertRule(rule)) saved++;
    }
    return saved;
  }

  /** Write the rule snapshot to `path`. */
  exportSnapshot(rules: RuleDraft[], path: string): RuleSnapshot {
    const snapshot: RuleSnapshot = {
      generated_at: this.now().toISOString(),
      rules_count: rules.length,
      rules: rules.map((r) => ({
        rule_text: r.rule_text,
        trigger_pattern: r.trigger_pattern,
        confidence_threshold: r.confidence_threshold,
        priority: r.priority,
        enabled: r.enabled,
      })),
    };
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, JSON.stringify(snapshot, null, 2));
    } catch (err) {
      throw new StorageError("exportSnapshot", err);
    }
    log("info", `Rules exported to ${path}`);
    return snapshot;
  }

  /**
   * Full evolution cycle: mine, persist, export. Skips when the store is too small.
   * The snapshot is only written when the miner was given a snapshotPath:
   * loadConfig() supplies <dataDir>/instinct.json, while a bare miner or
   * defaultSettings() opts out and reports snapshot_path null.
   */
  autoEvolve(minNeurons = 50, minOccurrences = 3): EvolutionResult {
    const total = this.store.count();
    if (total < minNeurons) {
      return {
        neurons_analyzed: total,
        rules_generated: 0,
        rules_saved: 0,
        message: `Not enough neurons (${total} < ${minNeurons})`,
        snapshot_path: null,
      };
    }

    const rules = this.generateRules(minOccurrences);
    const saved = this.saveRules(rules);
    if (this.snapshotPath) this.exportSnapshot(rules, this.snapshotPath);
    log("event", `Evolution: generated ${rules.length} rules, saved ${saved} new`);

    return {
      neurons_analyzed: total,
      rules_generated: rules.length,
      rules_saved: saved,
      message: `Generated ${rules.length} rules, saved ${saved} new ones`,
      snapshot_path: this.snapshotPath,
    };
  }
}
