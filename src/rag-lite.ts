import { contextHash, type Neuron, type NeuronStore } from "./neuron-store.js";
import { estimateTokens, tokenize, truncate } from "./text.js";
import { log } from "./log.js";

// --- Constants ---

/** BM25 term-frequency saturation */
export const BM25_K1 = 1.5;

/** BM25 length normalization */
export const BM25_B = 0.75;

/** Score multiplier for neurons with confidence above HIGH_CONFIDENCE */
const HIGH_CONFIDENCE_BOOST = 1.2;
const HIGH_CONFIDENCE = 0.7;

/** Score multiplier for neurons the user rated positively */
const POSITIVE_FEEDBACK_BOOST = 1.3;

/** Below this best score no context is injected into the prompt */
const MIN_CONTEXT_SCORE = 0.5;

/** Results considered for prompt context */
const CONTEXT_RESULTS = 3;

/** Fixed score for context-hash matches in hybrid search */
const CONTEXT_MATCH_SCORE = 0.5;

const HYBRID_LIMIT = 5;

export const DEFAULT_MAX_NEURONS = 1000;

// --- Types ---

export interface ScoredNeuron {
  neuron: Neuron;
  score: number;
}

export interface HybridMatch extends ScoredNeuron {
  source: "bm25" | "context_hash";
}

export interface HybridResult {
  bm25_results: ScoredNeuron[];
  context_matches: Neuron[];
  combined: HybridMatch[];
}

export interface IndexedDoc {
  neuron: Neuron;
  length: number;
  termFreqs: ReadonlyMap<string, number>;
}

// --- BM25 ---

/**
 * Immutable BM25 ranking snapshot over a fixed set of neurons.
 * Each neuron is one document: input text + output text.
 */
export class Bm25Snapshot {
  readonly docs: readonly IndexedDoc[];
  readonly avgDocLength: number;
  readonly builtAt: string;
  private idf: ReadonlyMap<string, number>;

  private constructor(docs: IndexedDoc[], idf: Map<string, number>, avgDocLength: number) {
    this.docs = Object.freeze(docs);
    this.idf = idf;
    this.avgDocLength = avgDocLength;
    this.builtAt = new Date().toISOString();
  }

  static build(neurons: Neuron[]): Bm25Snapshot {
    const docs: IndexedDoc[] = [];
    const docFreqs = new Map<string, number>();
    let totalLength = 0;

    for (const neuron of neurons) {
      const terms = tokenize(`${neuron.input_text} ${neuron.output_text}`);
      const termFreqs = new Map<string, number>();
      for (const term of terms) termFreqs.set(term, (termFreqs.get(term) ?? 0) + 1);
      for (const term of termFreqs.keys()) docFreqs.set(term, (docFreqs.get(term) ?? 0) + 1);
      docs.push({ neuron, length: terms.length, termFreqs });
      totalLength += terms.length;
    }

    const n = docs.length;
    const idf = new Map<string, number>();
    for (const [term, df] of docFreqs) {
      idf.set(term, Math.log((n - df + 0.5) / (df + 0.5) + 1));
    }

    return new Bm25Snapshot(docs, idf, n > 0 ? totalLength / n : 0);
  }

  get size(): number {
    return this.docs.length;
  }

  idfOf(term: string): number {
    return this.idf.get(term) ?? 0;
  }

  /** Base BM25 score; query terms outside the vocabulary contribute zero. */
  scoreDoc(queryTerms: string[], doc: IndexedDoc): number {
    const lengthRatio = this.avgDocLength > 0 ? doc.length / this.avgDocLength : 0;
    let score = 0;
    for (const term of queryTerms) {
      const idf = this.idf.get(term);
      if (idf === undefined) continue;
      const tf = doc.termFreqs.get(term) ?? 0;
      score += (idf * (tf * (BM25_K1 + 1))) / (tf + BM25_K1 * (1 - BM25_B + BM25_B * lengthRatio));
    }
    return score;
  }
}

/** Confidence and feedback boosts, applied multiplicatively and independently. */
export function boostScore(score: number, neuron: Neuron): number {
  let boosted = score;
  if (neuron.confidence > HIGH_CONFIDENCE) boosted *= HIGH_CONFIDENCE_BOOST;
  if (neuron.user_feedback > 0) boosted *= POSITIVE_FEEDBACK_BOOST;
  return boosted;
}

// --- Retrieval index ---

export interface RetrievalIndexOptions {
  /** Window used when the first retrieve() builds the snapshot on demand. */
  maxNeurons?: number;
}

/**
 * RAG-Lite: BM25 retrieval over the most recent neurons.
 *
 * The snapshot is rebuilt wholesale by reindex(): the new one is built off to the
 * side and swapped in with a single assignment, so readers holding the old one
 * never see a partial index. Between rebuilds the index may lag the store.
 */
export class RetrievalIndex {
  private store: NeuronStore;
  private maxNeurons: number;
  private snapshot: Bm25Snapshot | null = null;

  constructor(store: NeuronStore, options: RetrievalIndexOptions = {}) {
    this.store = store;
    this.maxNeurons = options.maxNeurons ?? DEFAULT_MAX_NEURONS;
  }

  /** Current snapshot, or null before the first build. */
  current(): Bm25Snapshot | null {
    return this.snapshot;
  }

  /** Rebuild the snapshot over the last maxNeurons neurons. Returns the indexed count. */
  reindex(maxNeurons = this.maxNeurons): number {
    return this.rebuild(maxNeurons).size;
  }

  private rebuild(maxNeurons: number): Bm25Snapshot {
    const next = Bm25Snapshot.build(this.store.recent(maxNeurons));
    this.snapshot = next;
    log("debug", `RAG-Lite indexed ${next.size} neurons`);
    return next;
  }

  private ensureSnapshot(): Bm25Snapshot {
    return this.snapshot ?? this.rebuild(this.maxNeurons);
  }

  /** Ranked neurons for a query, best first. */
  retrieve(query: string, topK = 5): ScoredNeuron[] {
    const snapshot = this.ensureSnapshot();
    const terms = tokenize(query);
    const results = snapshot.docs.map((doc) => ({
      neuron: doc.neuron,
      score: boostScore(snapshot.scoreDoc(terms, doc), doc.neuron),
    }));
    // Stable sort: ties keep snapshot (recency) order
    results.sort((a, b) => b.score - a.score);
    return results.slice(0, Math.max(topK, 0));
  }

  /**
   * Past experiences formatted for prompt injection, or "" when nothing scores
   * at least MIN_CONTEXT_SCORE. Blocks stop once the token estimate would
   * exceed maxContextTokens. Injected neurons get their access bookkeeping bumped.
   */
  getContextForPrompt(query: string, maxContextTokens = 300): string {
    const relevant = this.retrieve(query, CONTEXT_RESULTS);
    if (relevant.length === 0 || relevant[0].score < MIN_CONTEXT_SCORE) return "";

    const parts = ["### Relevant past experiences:"];
    const used: number[] = [];
    let tokens = 0;

    for (const { neuron } of relevant) {
      const estimate = estimateTokens(neuron.output_text);
      if (tokens + estimate > maxContextTokens) break;
      parts.push(
        `- Input: ${truncate(neuron.input_text, 100)}\n` +
        `  Output: ${truncate(neuron.output_text, 150)}\n` +
        `  (confidence: ${neuron.confidence.toFixed(2)})`
      );
      used.push(neuron.id);
      tokens += estimate;
    }

    if (used.length === 0) return "";
    this.store.touch(used);
    return parts.join("\n") + "\n\n";
  }

  /** BM25 results first, then context-hash matches not already present. */
  hybridSearch(query: string): HybridResult {
    const bm25 = this.retrieve(query, HYBRID_LIMIT);
    const contextMatches = this.store.similar(contextHash(query), HYBRID_LIMIT);

    const seen = new Set<number>();
    const combined: HybridMatch[] = [];
    for (const { neuron, score } of bm25) {
      if (seen.has(neuron.id)) continue;
      seen.add(neuron.id);
      combined.push({ neuron, score, source: "bm25" });
    }
    for (const neuron of contextMatches) {
      if (seen.has(neuron.id)) continue;
      seen.add(neuron.id);
      combined.push({ neuron, score: CONTEXT_MATCH_SCORE, source: "context_hash" });
    }

    return {
      bm25_results: bm25,
      context_matches: contextMatches,
      combined: combined.slice(0, HYBRID_LIMIT),
    };
  }
}
