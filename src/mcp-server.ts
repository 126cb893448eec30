/**
 * EvoMemory MCP tools
 *
 * Exposes the collaborator-facing operations to an agent:
 *   - evomemory_remember / evomemory_save:  store an exchange (scored or pre-scored)
 *   - evomemory_retrieve / evomemory_context / evomemory_hybrid:  ranked recall
 *   - evomemory_feedback:  rate a previously stored neuron
 *   - evomemory_evolve:  mine recurring patterns into rules
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { confidenceLabel, shouldAskClarification } from "./confidence.js";
import { EvoMemoryError } from "./errors.js";
import type { EvoMemory } from "./evomemory.js";
import type { Neuron } from "./neuron-store.js";

interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

function json(value: unknown): ToolResult {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

/** Expected failures (validation, storage) become tool errors instead of protocol errors. */
function run(fn: () => unknown): ToolResult {
  try {
    return json(fn());
  } catch (err) {
    if (err instanceof EvoMemoryError) {
      return { ...json({ status: "error", code: err.code, message: err.message }), isError: true };
    }
    throw err;
  }
}

function neuronView(n: Neuron) {
  return {
    id: n.id,
    input: n.input_text,
    output: n.output_text,
    idea: n.idea,
    mood: n.mood,
    confidence: n.confidence,
    feedback: n.user_feedback,
    skill_id: n.skill_id,
    context_hash: n.context_hash,
    timestamp: n.timestamp,
    access_count: n.access_count,
  };
}

const limitArg = (fallback: number) => z.number().int().positive().default(fallback);

export function createMcpServer(memory: EvoMemory, version = "0.1.0"): McpServer {
  const server = new McpServer({ name: "evomemory", version });

  // --- Tool: Remember an exchange ---
  server.tool(
    "evomemory_remember",
    "Store one input/output exchange. The output is scored for confidence first. Call this after every generated response and keep the returned id for feedback.",
    {
      input: z.string().min(1).describe("What the user said"),
      output: z.string().describe("What was generated"),
      idea: z.string().optional().describe("Short annotation"),
      skill_id: z.string().optional().describe("Category tag, e.g. 'gpio'"),
      prompt_tokens: z.number().nonnegative().optional().describe("Prompt size reported by the generator"),
      tokens_per_second: z.number().nonnegative().optional().describe("Generation speed"),
    },
    async ({ input, output, idea, skill_id, prompt_tokens, tokens_per_second }) =>
      run(() =>
        memory.remember(input, output, {
          idea,
          skill_id,
          stats: { prompt_tokens, tokens_per_second },
        })
      )
  );

  // --- Tool: Save a pre-scored neuron ---
  server.tool(
    "evomemory_save",
    "Store a neuron with an explicit confidence (0-1). Prefer evomemory_remember unless the response was scored elsewhere.",
    {
      input: z.string().min(1),
      output: z.string(),
      confidence: z.number().describe("Must be within 0-1"),
      idea: z.string().optional(),
      skill_id: z.string().optional(),
    },
    async ({ input, output, confidence, idea, skill_id }) =>
      run(() => ({
        id: memory.store.save({ input_text: input, output_text: output, confidence, idea, skill_id }),
      }))
  );

  server.tool(
    "evomemory_get",
    "Fetch one neuron by id.",
    { id: z.number().int() },
    async ({ id }) =>
      run(() => {
        const neuron = memory.store.get(id);
        return neuron ? { status: "found", neuron: neuronView(neuron) } : { status: "not_found", id };
      })
  );

  server.tool(
    "evomemory_recent",
    "Most recent neurons, newest first, optionally for one skill.",
    { limit: limitArg(10), skill_id: z.string().optional() },
    async ({ limit, skill_id }) => run(() => memory.store.recent(limit, skill_id).map(neuronView))
  );

  server.tool(
    "evomemory_similar",
    "Neurons whose input shares a context hash, by confidence then recency.",
    { context_hash: z.string().length(8), limit: limitArg(5) },
    async ({ context_hash, limit }) => run(() => memory.store.similar(context_hash, limit).map(neuronView))
  );

  server.tool(
    "evomemory_search",
    "Case-insensitive substring filter over stored inputs and outputs (not ranked).",
    { text: z.string(), limit: limitArg(10) },
    async ({ text, limit }) => run(() => memory.store.search(text, limit).map(neuronView))
  );

  // --- Tool: Feedback ---
  server.tool(
    "evomemory_feedback",
    "Rate a stored neuron: 1 good, 0 neutral, -1 bad. Drives mood, retrieval boosts and avoidance rules.",
    {
      id: z.number().int(),
      value: z.number().int().describe("-1, 0 or 1"),
    },
    async ({ id, value }) =>
      run(() =>
        memory.feedback(id, value)
          ? { status: "ok", id, feedback: value }
          : { status: "not_found", id }
      )
  );

  server.tool(
    "evomemory_prune",
    "Delete old, low-confidence neurons without positive feedback.",
    {
      keep_days: z.number().nonnegative().optional(),
      min_confidence: z.number().optional(),
    },
    async ({ keep_days, min_confidence }) =>
      run(() => ({ deleted: memory.prune(keep_days, min_confidence) }))
  );

  server.tool(
    "evomemory_score",
    "Score a generated text for confidence without storing it.",
    {
      text: z.string(),
      prompt_tokens: z.number().nonnegative().optional(),
      tokens_per_second: z.number().nonnegative().optional(),
    },
    async ({ text, prompt_tokens, tokens_per_second }) =>
      run(() => {
        const { confidence, reasoning } = memory.scorer.score(text, { prompt_tokens, tokens_per_second });
        return {
          confidence,
          label: confidenceLabel(confidence),
          ask_clarification: shouldAskClarification(confidence),
          reasoning,
        };
      })
  );

  // --- Tool: Ranked retrieval ---
  server.tool(
    "evomemory_retrieve",
    "BM25-ranked past exchanges for a query, boosted by confidence and positive feedback.",
    { query: z.string(), top_k: limitArg(5) },
    async ({ query, top_k }) =>
      run(() =>
        memory.index.retrieve(query, top_k).map((r) => ({ score: r.score, neuron: neuronView(r.neuron) }))
      )
  );

  server.tool(
    "evomemory_context",
    "Past experiences formatted for prompt injection. Empty when nothing relevant enough is stored.",
    { query: z.string(), max_tokens: limitArg(300) },
    async ({ query, max_tokens }) =>
      run(() => {
        const context = memory.index.getContextForPrompt(query, max_tokens);
        return { context_used: context.length > 0, context };
      })
  );

  server.tool(
    "evomemory_hybrid",
    "BM25 results merged with exact context-hash matches of the query.",
    { query: z.string() },
    async ({ query }) =>
      run(() => {
        const result = memory.index.hybridSearch(query);
        return {
          bm25_results: result.bm25_results.map((r) => ({ score: r.score, id: r.neuron.id })),
          context_matches: result.context_matches.map((n) => n.id),
          combined: result.combined.map((r) => ({ source: r.source, score: r.score, neuron: neuronView(r.neuron) })),
        };
      })
  );

  server.tool(
    "evomemory_reindex",
    "Rebuild the retrieval snapshot over the most recent neurons.",
    { max_neurons: z.number().int().positive().optional() },
    async ({ max_neurons }) => run(() => ({ indexed: memory.index.reindex(max_neurons) }))
  );

  // --- Tool: Evolution ---
  server.tool(
    "evomemory_evolve",
    "Mine recent neurons for recurring patterns and save new rules. Skips when fewer than min_neurons are stored.",
    { min_neurons: z.number().int().nonnegative().optional() },
    async ({ min_neurons }) => run(() => memory.evolve(min_neurons))
  );

  server.tool(
    "evomemory_rules",
    "List mined rules, highest priority first.",
    { enabled_only: z.boolean().default(true) },
    async ({ enabled_only }) => run(() => memory.store.listRules({ enabledOnly: enabled_only }))
  );

  server.tool(
    "evomemory_stats",
    "Counts of neurons, rules, skills and the retrieval snapshot.",
    {},
    async () => run(() => ({ ...memory.stats(), skills_detail: memory.store.skills() }))
  );

  return server;
}
