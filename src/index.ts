export { openDb, type Db } from "./db.js";
export {
  loadConfig,
  defaultSettings,
  defaultDataDir,
  type EvoMemoryConfig,
  type LoadConfigOptions,
} from "./config.js";
export { EvoMemoryError, StorageError, ValidationError, type EvoMemoryErrorCode } from "./errors.js";
export {
  NeuronStore,
  contextHash,
  moodFromFeedback,
  type Neuron,
  type NewNeuron,
  type Mood,
  type Feedback,
  type Rule,
  type RuleDraft,
  type Skill,
  type SkillInput,
  type MetaNeuron,
  type StoreStats,
} from "./neuron-store.js";
export {
  ConfidenceScorer,
  DEFAULT_SCORER_CONFIG,
  confidenceLabel,
  shouldAskClarification,
  type ScorerConfig,
  type GenerationStats,
  type ConfidenceResult,
  type ConfidenceLabel,
} from "./confidence.js";
export {
  RetrievalIndex,
  Bm25Snapshot,
  boostScore,
  type ScoredNeuron,
  type HybridMatch,
  type HybridResult,
} from "./rag-lite.js";
export {
  RuleMiner,
  defaultKeywordExtractor,
  type KeywordExtractor,
  type PatternGroups,
  type EvolutionResult,
  type RuleSnapshot,
} from "./rule-miner.js";
export {
  EvoMemory,
  type EvoMemorySettings,
  type RememberOptions,
  type RememberResult,
  type AugmentedPrompt,
  type EvoMemoryStats,
} from "./evomemory.js";
export { createMcpServer } from "./mcp-server.js";
export { tokenize } from "./text.js";
