import Database from "better-sqlite3";
import { dirname } from "node:path";
import { mkdirSync } from "node:fs";
import { StorageError } from "./errors.js";
import { log } from "./log.js";

export type Db = Database.Database;

/**
 * Open the EvoMemory database and run migrations.
 * Use ":memory:" for isolated tests.
 */
export function openDb(path: string): Db {
  try {
    // Create parent dir for file-based DBs (skip for :memory:)
    if (!path.startsWith(":")) {
      mkdirSync(dirname(path), { recursive: true });
    }
    const db = new Database(path);
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    db.pragma("foreign_keys = ON");
    migrate(db);
    log("debug", `Database ready at ${path}`);
    return db;
  } catch (err) {
    throw new StorageError("openDb", err);
  }
}

function migrate(db: Db) {
  db.exec(`
    -- Neurons: one stored input/output exchange
    CREATE TABLE IF NOT EXISTS neurons (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      input_text TEXT NOT NULL,
      idea TEXT,
      output_text TEXT NOT NULL,
      mood TEXT NOT NULL DEFAULT 'neutral',   -- 'positive' | 'neutral' | 'negative'
      confidence REAL NOT NULL DEFAULT 0.5,   -- 0-1
      user_feedback INTEGER NOT NULL DEFAULT 0, -- -1 | 0 | 1
      context_hash TEXT NOT NULL,             -- md5(lower(trim(input_text)))[:8]
      skill_id TEXT,
      timestamp TEXT NOT NULL,                -- ISO-8601
      last_accessed TEXT NOT NULL,            -- ISO-8601
      access_count INTEGER NOT NULL DEFAULT 0
    );

    -- Meta-neurons: reserved for compressing similar neurons (no writer yet)
    CREATE TABLE IF NOT EXISTS meta_neurons (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      pattern TEXT NOT NULL,
      template TEXT NOT NULL,
      occurrences INTEGER NOT NULL DEFAULT 1,
      avg_confidence REAL NOT NULL DEFAULT 0.5,
      skill_id TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    -- Rules: mined heuristics, de-duplicated by exact rule_text
    CREATE TABLE IF NOT EXISTS rules (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      rule_text TEXT NOT NULL,
      trigger_pattern TEXT NOT NULL,
      confidence_threshold REAL NOT NULL DEFAULT 0.5,
      priority INTEGER NOT NULL DEFAULT 1,
      enabled INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      applied_count INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS skills (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      description TEXT,
      neuron_count INTEGER NOT NULL DEFAULT 0,
      avg_confidence REAL NOT NULL DEFAULT 0.5,
      enabled INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_neurons_timestamp ON neurons(timestamp DESC);
    CREATE INDEX IF NOT EXISTS idx_neurons_confidence ON neurons(confidence DESC);
    CREATE INDEX IF NOT EXISTS idx_neurons_context ON neurons(context_hash);
    CREATE INDEX IF NOT EXISTS idx_neurons_skill ON neurons(skill_id);
    CREATE INDEX IF NOT EXISTS idx_rules_text ON rules(rule_text);
  `);
}
