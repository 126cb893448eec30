import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ScorerOverridesSchema } from "./confidence.js";
import { log } from "./log.js";

export const RetrievalConfigSchema = z.object({
  maxNeurons: z.number().int().positive().default(1000),
  reindexEvery: z.number().int().positive().default(10),
  maxContextTokens: z.number().int().positive().default(300),
});

export const PruningConfigSchema = z.object({
  keepDays: z.number().nonnegative().default(30),
  minConfidence: z.number().min(0).max(1).default(0.3),
});

export const EvolutionConfigSchema = z.object({
  minNeurons: z.number().int().nonnegative().default(50),
  minOccurrences: z.number().int().positive().default(3),
  // null disables the instinct snapshot export
  snapshotPath: z.string().nullable().optional(),
});

export const FileConfigSchema = z.object({
  retrieval: RetrievalConfigSchema.default({}),
  pruning: PruningConfigSchema.default({}),
  evolution: EvolutionConfigSchema.default({}),
  scorer: ScorerOverridesSchema.default({}),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface EvoMemoryConfig {
  dataDir: string;
  dbPath: string;
  retrieval: z.infer<typeof RetrievalConfigSchema>;
  pruning: z.infer<typeof PruningConfigSchema>;
  evolution: {
    minNeurons: number;
    minOccurrences: number;
    snapshotPath: string | null;
  };
  scorer: z.infer<typeof ScorerOverridesSchema>;
}

export interface LoadConfigOptions {
  dataDir?: string;
  dbPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function defaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.EVOMEMORY_HOME || join(homedir(), ".evomemory");
}

function readFileConfig(path: string): FileConfig {
  const defaults = FileConfigSchema.parse({});
  if (!existsSync(path)) return defaults;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    log("warn", `Unreadable config at ${path}, using defaults`);
    return defaults;
  }
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const where = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    log("warn", `Invalid config at ${path} (${where}), using defaults`);
    return defaults;
  }
  return parsed.data;
}

/**
 * Resolve configuration.
 * Database priority: explicit dbPath > EVOMEMORY_DB env var > <dataDir>/neurons.db
 * Data dir priority: explicit dataDir > EVOMEMORY_HOME env var > ~/.evomemory
 */
export function loadConfig(options: LoadConfigOptions = {}): EvoMemoryConfig {
  const env = options.env ?? process.env;
  const dataDir = options.dataDir || defaultDataDir(env);
  const file = readFileConfig(join(dataDir, "config.json"));

  const snapshotPath =
    file.evolution.snapshotPath === undefined
      ? join(dataDir, "instinct.json")
      : file.evolution.snapshotPath;

  return {
    dataDir,
    dbPath: options.dbPath || env.EVOMEMORY_DB || join(dataDir, "neurons.db"),
    retrieval: file.retrieval,
    pruning: file.pruning,
    evolution: {
      minNeurons: file.evolution.minNeurons,
      minOccurrences: file.evolution.minOccurrences,
      snapshotPath,
    },
    scorer: file.scorer,
  };
}

/** Built-in defaults without touching the filesystem; no snapshot export. */
export function defaultSettings(): Pick<EvoMemoryConfig, "retrieval" | "pruning" | "evolution" | "scorer"> {
  const file = FileConfigSchema.parse({});
  return {
    retrieval: file.retrieval,
    pruning: file.pruning,
    evolution: {
      minNeurons: file.evolution.minNeurons,
      minOccurrences: file.evolution.minOccurrences,
      snapshotPath: null,
    },
    scorer: file.scorer,
  };
}
