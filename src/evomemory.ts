import { ConfidenceScorer, confidenceLabel, shouldAskClarification, type ConfidenceLabel, type GenerationStats } from "./confidence.js";
import type { EvoMemoryConfig } from "./config.js";
import type { Db } from "./db.js";
import { NeuronStore, type StoreStats } from "./neuron-store.js";
import { RetrievalIndex } from "./rag-lite.js";
import { RuleMiner, type EvolutionResult } from "./rule-miner.js";

export interface RememberOptions {
  idea?: string;
  skill_id?: string;
  stats?: GenerationStats;
}

export interface RememberResult {
  id: number;
  confidence: number;
  reasoning: string;
  label: ConfidenceLabel;
  ask_clarification: boolean;
  reindexed: boolean;
}

export interface AugmentedPrompt {
  prompt: string;
  context_used: boolean;
}

export interface EvoMemoryStats extends StoreStats {
  indexed_neurons: number;
  index_built_at: string | null;
}

export type EvoMemorySettings = Pick<EvoMemoryConfig, "retrieval" | "pruning" | "evolution" | "scorer">;

export interface EvoMemoryOptions {
  settings: EvoMemorySettings;
  now?: () => Date;
}

/**
 * The collaborator-facing engine: score, store, retrieve, evolve.
 * Wires one store, scorer, retrieval index and rule miner over one database.
 */
export class EvoMemory {
  readonly store: NeuronStore;
  readonly scorer: ConfidenceScorer;
  readonly index: RetrievalIndex;
  readonly miner: RuleMiner;
  private settings: EvoMemorySettings;

  constructor(db: Db, options: EvoMemoryOptions) {
    const { settings, now } = options;
    this.settings = settings;
    this.store = new NeuronStore(db, { now });
    this.scorer = new ConfidenceScorer(settings.scorer);
    this.index = new RetrievalIndex(this.store, { maxNeurons: settings.retrieval.maxNeurons });
    this.miner = new RuleMiner(this.store, { snapshotPath: settings.evolution.snapshotPath, now });
  }

  /**
   * Store one exchange after scoring its output. Every reindexEvery-th stored
   * neuron triggers a snapshot rebuild.
   */
  remember(input: string, output: string, options: RememberOptions = {}): RememberResult {
    const { confidence, reasoning } = this.scorer.score(output, options.stats);
    const id = this.store.save({
      input_text: input,
      output_text: output,
      idea: options.idea,
      skill_id: options.skill_id,
      confidence,
    });

    const reindexed = this.store.count() % this.settings.retrieval.reindexEvery === 0;
    if (reindexed) this.index.reindex(this.settings.retrieval.maxNeurons);

    return {
      id,
      confidence,
      reasoning,
      label: confidenceLabel(confidence),
      ask_clarification: shouldAskClarification(confidence),
      reindexed,
    };
  }

  /** Prefix the message with relevant past experiences, when there are any. */
  augmentPrompt(message: string, maxContextTokens = this.settings.retrieval.maxContextTokens): AugmentedPrompt {
    const context = this.index.getContextForPrompt(message, maxContextTokens);
    if (!context) return { prompt: message, context_used: false };
    return { prompt: `${context}### Current question:\n${message}`, context_used: true };
  }

  feedback(id: number, value: number): boolean {
    return this.store.updateFeedback(id, value);
  }

  prune(
    keepDays = this.settings.pruning.keepDays,
    minConfidence = this.settings.pruning.minConfidence
  ): number {
    return this.store.prune(keepDays, minConfidence);
  }

  evolve(minNeurons = this.settings.evolution.minNeurons): EvolutionResult {
    return this.miner.autoEvolve(minNeurons, this.settings.evolution.minOccurrences);
  }

  stats(): EvoMemoryStats {
    const snapshot = this.index.current();
    return {
      ...this.store.stats(),
      indexed_neurons: snapshot?.size ?? 0,
      index_built_at: snapshot?.builtAt ?? null,
    };
  }
}
