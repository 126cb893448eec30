import { createHash } from "node:crypto";
import { z } from "zod";
import type { Db } from "./db.js";
import { guard, ValidationError } from "./errors.js";
import { log } from "./log.js";

// --- Types ---

export type Mood = "positive" | "neutral" | "negative";
export type Feedback = -1 | 0 | 1;

export interface Neuron {
  id: number;
  input_text: string;
  idea: string | null;
  output_text: string;
  mood: Mood;                // derived from user_feedback
  confidence: number;        // 0-1
  user_feedback: Feedback;
  context_hash: string;      // approximate-match bucket, see contextHash()
  skill_id: string | null;
  timestamp: string;         // ISO-8601, creation
  last_accessed: string;     // ISO-8601
  access_count: number;
}

/** A mined heuristic before persistence. */
export interface RuleDraft {
  rule_text: string;         // natural key for de-duplication
  trigger_pattern: string;
  confidence_threshold: number;
  priority: number;          // higher = more specific/urgent
  enabled: boolean;
}

export interface Rule extends RuleDraft {
  id: number;
  created_at: string;
  applied_count: number;     // reserved, never incremented
}

export interface Skill {
  id: string;
  name: string;
  description: string | null;
  neuron_count: number;      // computed on read
  avg_confidence: number;    // computed on read
  enabled: boolean;
  registered: boolean;       // false when only seen as a neuron skill_id
}

export interface MetaNeuron {
  id: number;
  pattern: string;
  template: string;
  occurrences: number;
  avg_confidence: number;
  skill_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface StoreStats {
  neurons: number;
  meta_neurons: number;
  rules: number;             // enabled only
  skills: number;            // enabled, registered
  avg_confidence: number;    // neurons of the last 7 days
}

// --- Validation ---

export const FeedbackSchema = z.union([z.literal(-1), z.literal(0), z.literal(1)]);
const LimitSchema = z.number().int().positive();
const ConfidenceSchema = z.number().min(0).max(1);

export const NewNeuronSchema = z.object({
  input_text: z.string().min(1),
  output_text: z.string(),
  idea: z.string().nullish(),
  confidence: ConfidenceSchema.default(0.5),
  skill_id: z.string().min(1).nullish(),
  user_feedback: FeedbackSchema.default(0),
});

export type NewNeuron = z.input<typeof NewNeuronSchema>;

export const SkillInputSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().nullish(),
  enabled: z.boolean().default(true),
});

export type SkillInput = z.input<typeof SkillInputSchema>;

function validate<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || what}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid ${what}: ${detail}`, parsed.error.issues);
  }
  return parsed.data;
}

// --- Helpers ---

/**
 * Short, non-cryptographic fingerprint of the normalized input text.
 * " Led ON " and "led on" land in the same bucket.
 */
export function contextHash(text: string): string {
  return createHash("md5").update(text.toLowerCase().trim()).digest("hex").slice(0, 8);
}

export function moodFromFeedback(feedback: number): Mood {
  return feedback > 0 ? "positive" : feedback < 0 ? "negative" : "neutral";
}

function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

/** Escape LIKE wildcards so the query is matched literally. */
function likePattern(substring: string): string {
  return `%${substring.replace(/[\\%_]/g, "\\$&")}%`;
}

const DAY_MS = 24 * 60 * 60 * 1000;

// --- Row mapping ---

interface NeuronRow {
  id: number;
  input_text: string;
  idea: string | null;
  output_text: string;
  mood: string;
  confidence: number;
  user_feedback: number;
  context_hash: string;
  skill_id: string | null;
  timestamp: string;
  last_accessed: string;
  access_count: number;
}

interface RuleRow {
  id: number;
  rule_text: string;
  trigger_pattern: string;
  confidence_threshold: number;
  priority: number;
  enabled: number;
  created_at: string;
  applied_count: number;
}

interface SkillRow {
  id: string;
  name: string;
  description: string | null;
  neuron_count: number;
  avg_confidence: number | null;
  enabled: number;
  registered: number;
}

function toFeedback(value: number): Feedback {
  return value > 0 ? 1 : value < 0 ? -1 : 0;
}

function toNeuron(row: NeuronRow): Neuron {
  const user_feedback = toFeedback(row.user_feedback);
  return {
    ...row,
    user_feedback,
    mood: moodFromFeedback(user_feedback),
  };
}

function toRule(row: RuleRow): Rule {
  return { ...row, enabled: row.enabled === 1 };
}

function toSkill(row: SkillRow): Skill {
  return {
    ...row,
    avg_confidence: row.avg_confidence ?? 0,
    enabled: row.enabled === 1,
    registered: row.registered === 1,
  };
}

// --- Store ---

function prepareStatements(db: Db) {
  return {
    insertNeuron: db.prepare<{
      input_text: string; idea: string | null; output_text: string; mood: Mood;
      confidence: number; user_feedback: Feedback; context_hash: string;
      skill_id: string | null; now: string;
    }>(`
      INSERT INTO neurons (input_text, idea, output_text, mood, confidence, user_feedback,
                           context_hash, skill_id, timestamp, last_accessed, access_count)
      VALUES (@input_text, @idea, @output_text, @mood, @confidence, @user_feedback,
              @context_hash, @skill_id, @now, @now, 0)
    `),
    getNeuron: db.prepare<[number], NeuronRow>(`SELECT * FROM neurons WHERE id = ?`),
    recent: db.prepare<{ limit: number }, NeuronRow>(`
      SELECT * FROM neurons ORDER BY timestamp DESC, id DESC LIMIT @limit
    `),
    recentBySkill: db.prepare<{ skill_id: string; limit: number }, NeuronRow>(`
      SELECT * FROM neurons WHERE skill_id = @skill_id
      ORDER BY timestamp DESC, id DESC LIMIT @limit
    `),
    similar: db.prepare<{ context_hash: string; limit: number }, NeuronRow>(`
      SELECT * FROM neurons WHERE context_hash = @context_hash
      ORDER BY confidence DESC, timestamp DESC, id DESC LIMIT @limit
    `),
    search: db.prepare<{ pattern: string; limit: number }, NeuronRow>(`
      SELECT * FROM neurons
      WHERE input_text LIKE @pattern ESCAPE '\\' OR output_text LIKE @pattern ESCAPE '\\'
      ORDER BY confidence DESC, timestamp DESC, id DESC LIMIT @limit
    `),
    updateFeedback: db.prepare<{ id: number; feedback: Feedback; mood: Mood; now: string }>(`
      UPDATE neurons SET user_feedback = @feedback, mood = @mood, last_accessed = @now
      WHERE id = @id
    `),
    touch: db.prepare<{ id: number; now: string }>(`
      UPDATE neurons SET access_count = access_count + 1, last_accessed = @now WHERE id = @id
    `),
    prune: db.prepare<{ cutoff: string; min_confidence: number }>(`
      DELETE FROM neurons
      WHERE timestamp < @cutoff AND confidence < @min_confidence AND user_feedback <= 0
    `),
    count: db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM neurons`),
    stats: db.prepare<{ since: string }, StoreStats>(`
      SELECT
        (SELECT COUNT(*) FROM neurons) AS neurons,
        (SELECT COUNT(*) FROM meta_neurons) AS meta_neurons,
        (SELECT COUNT(*) FROM rules WHERE enabled = 1) AS rules,
        (SELECT COUNT(*) FROM skills WHERE enabled = 1) AS skills,
        COALESCE((SELECT AVG(confidence) FROM neurons WHERE timestamp > @since), 0) AS avg_confidence
    `),
    ruleByText: db.prepare<[string], { id: number }>(`SELECT id FROM rules WHERE rule_text = ?`),
    insertRule: db.prepare<{
      rule_text: string; trigger_pattern: string; confidence_threshold: number;
      priority: number; enabled: number; now: string;
    }>(`
      INSERT INTO rules (rule_text, trigger_pattern, confidence_threshold, priority, enabled, created_at, applied_count)
      VALUES (@rule_text, @trigger_pattern, @confidence_threshold, @priority, @enabled, @now, 0)
    `),
    allRules: db.prepare<[], RuleRow>(`SELECT * FROM rules ORDER BY priority DESC, id ASC`),
    enabledRules: db.prepare<[], RuleRow>(
      `SELECT * FROM rules WHERE enabled = 1 ORDER BY priority DESC, id ASC`
    ),
    setRuleEnabled: db.prepare<{ id: number; enabled: number }>(
      `UPDATE rules SET enabled = @enabled WHERE id = @id`
    ),
    upsertSkill: db.prepare<{ id: string; name: string; description: string | null; enabled: number; now: string }>(`
      INSERT INTO skills (id, name, description, enabled, created_at)
      VALUES (@id, @name, @description, @enabled, @now)
      ON CONFLICT(id) DO UPDATE SET
        name = @name,
        description = @description,
        enabled = @enabled
    `),
    // Aggregates are derived from neurons on every read, never trusted from the table
    skills: db.prepare<[], SkillRow>(`
      SELECT s.id AS id, s.name AS name, s.description AS description, COUNT(n.id) AS neuron_count,
             AVG(n.confidence) AS avg_confidence, s.enabled AS enabled, 1 AS registered
      FROM skills s LEFT JOIN neurons n ON n.skill_id = s.id
      GROUP BY s.id
      UNION ALL
      SELECT n.skill_id, n.skill_id, NULL, COUNT(*), AVG(n.confidence), 1, 0
      FROM neurons n
      WHERE n.skill_id IS NOT NULL AND n.skill_id NOT IN (SELECT id FROM skills)
      GROUP BY n.skill_id
      ORDER BY neuron_count DESC, id ASC
    `),
    metaNeurons: db.prepare<[], MetaNeuron>(`SELECT * FROM meta_neurons ORDER BY occurrences DESC, id ASC`),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

export interface NeuronStoreOptions {
  /** Clock for creation timestamps and prune cutoffs. */
  now?: () => Date;
}

/**
 * Durable CRUD over neurons, rules, skills and meta-neurons.
 * Every operation is a single statement or a single transaction, so it is
 * atomic at row granularity. Absent rows come back as undefined/false.
 */
export class NeuronStore {
  private db: Db;
  private now: () => Date;
  private stmts: Statements;

  constructor(db: Db, options: NeuronStoreOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
    this.stmts = guard("prepareStatements", () => prepareStatements(db));
  }

  // --- Neurons ---

  /** Persist a new neuron and return its id. Mood is derived, never taken from the caller. */
  save(input: NewNeuron): number {
    const neuron = validate(NewNeuronSchema, input, "neuron");
    return guard("save", () => {
      const result = this.stmts.insertNeuron.run({
        input_text: neuron.input_text,
        idea: neuron.idea ?? null,
        output_text: neuron.output_text,
        mood: moodFromFeedback(neuron.user_feedback),
        confidence: clamp01(neuron.confidence),
        user_feedback: neuron.user_feedback,
        context_hash: contextHash(neuron.input_text),
        skill_id: neuron.skill_id ?? null,
        now: this.now().toISOString(),
      });
      return Number(result.lastInsertRowid);
    });
  }

  get(id: number): Neuron | undefined {
    return guard("get", () => {
      const row = this.stmts.getNeuron.get(id);
      return row ? toNeuron(row) : undefined;
    });
  }

  /** Most recent first; optionally only one skill. */
  recent(limit = 10, skillId?: string): Neuron[] {
    validate(LimitSchema, limit, "limit");
    return guard("recent", () => {
      const rows = skillId !== undefined
        ? this.stmts.recentBySkill.all({ skill_id: skillId, limit })
        : this.stmts.recent.all({ limit });
      return rows.map(toNeuron);
    });
  }

  /** Neurons sharing a context hash, by confidence then recency. */
  similar(hash: string, limit = 5): Neuron[] {
    validate(LimitSchema, limit, "limit");
    return guard("similar", () =>
      this.stmts.similar.all({ context_hash: hash, limit }).map(toNeuron)
    );
  }

  /**
   * Case-insensitive substring filter over input or output text (SQLite LIKE,
   * so case folding covers ASCII only). Not ranked: use RetrievalIndex for that.
   */
  search(substring: string, limit = 10): Neuron[] {
    validate(LimitSchema, limit, "limit");
    return guard("search", () =>
      this.stmts.search.all({ pattern: likePattern(substring), limit }).map(toNeuron)
    );
  }

  /** Set feedback and recompute mood. Returns false when the neuron does not exist. */
  updateFeedback(id: number, feedback: number): boolean {
    const value = validate(FeedbackSchema, feedback, "feedback");
    return guard("updateFeedback", () => {
      const result = this.stmts.updateFeedback.run({
        id,
        feedback: value,
        mood: moodFromFeedback(value),
        now: this.now().toISOString(),
      });
      return result.changes > 0;
    });
  }

  /** Access bookkeeping. Returns how many of the ids existed. */
  touch(ids: number[]): number {
    const now = this.now().toISOString();
    return guard("touch", () =>
      this.db.transaction((list: number[]) => {
        let touched = 0;
        for (const id of list) touched += this.stmts.touch.run({ id, now }).changes;
        return touched;
      })(ids)
    );
  }

  /**
   * Delete neurons older than keepDays AND below minConfidence AND without
   * positive feedback. Positively rated neurons are never pruned.
   */
  prune(keepDays = 30, minConfidence = 0.3): number {
    validate(z.number().nonnegative().finite(), keepDays, "keepDays");
    validate(ConfidenceSchema, minConfidence, "minConfidence");
    // past the epoch nothing is old enough
    const cutoff = new Date(Math.max(this.now().getTime() - keepDays * DAY_MS, 0)).toISOString();
    const deleted = guard("prune", () =>
      this.stmts.prune.run({ cutoff, min_confidence: minConfidence }).changes
    );
    if (deleted > 0) log("info", `Pruned ${deleted} neurons older than ${keepDays}d below ${minConfidence}`);
    return deleted;
  }

  count(): number {
    return guard("count", () => this.stmts.count.get()?.n ?? 0);
  }

  stats(): StoreStats {
    const since = new Date(this.now().getTime() - 7 * DAY_MS).toISOString();
    return guard("stats", () => {
      const row = this.stmts.stats.get({ since });
      return row ?? { neurons: 0, meta_neurons: 0, rules: 0, skills: 0, avg_confidence: 0 };
    });
  }

  // --- Rules ---

  /**
   * Insert a rule unless one with the exact same rule_text exists.
   * The check and the insert run in one transaction. Returns true when inserted.
   */
  insertRule(rule: RuleDraft): boolean {
    return guard("insertRule", () =>
      this.db.transaction((draft: RuleDraft) => {
        if (this.stmts.ruleByText.get(draft.rule_text)) return false;
        this.stmts.insertRule.run({
          rule_text: draft.rule_text,
          trigger_pattern: draft.trigger_pattern,
          confidence_threshold: clamp01(draft.confidence_threshold),
          priority: draft.priority,
          enabled: draft.enabled ? 1 : 0,
          now: this.now().toISOString(),
        });
        return true;
      })(rule)
    );
  }

  listRules(options: { enabledOnly?: boolean } = {}): Rule[] {
    return guard("listRules", () => {
      const rows = options.enabledOnly ? this.stmts.enabledRules.all() : this.stmts.allRules.all();
      return rows.map(toRule);
    });
  }

  setRuleEnabled(id: number, enabled: boolean): boolean {
    return guard("setRuleEnabled", () =>
      this.stmts.setRuleEnabled.run({ id, enabled: enabled ? 1 : 0 }).changes > 0
    );
  }

  // --- Skills & meta-neurons ---

  registerSkill(input: SkillInput): void {
    const skill = validate(SkillInputSchema, input, "skill");
    guard("registerSkill", () => {
      this.stmts.upsertSkill.run({
        id: skill.id,
        name: skill.name,
        description: skill.description ?? null,
        enabled: skill.enabled ? 1 : 0,
        now: this.now().toISOString(),
      });
    });
  }

  skills(): Skill[] {
    return guard("skills", () => this.stmts.skills.all().map(toSkill));
  }

  metaNeurons(): MetaNeuron[] {
    return guard("metaNeurons", () => this.stmts.metaNeurons.all());
  }
}
