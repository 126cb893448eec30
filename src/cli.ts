#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { openDb } from "./db.js";
import { EvoMemoryError } from "./errors.js";
import { EvoMemory } from "./evomemory.js";
import { contextHash, type Neuron } from "./neuron-store.js";
import { confidenceLabel, shouldAskClarification } from "./confidence.js";

const args = process.argv.slice(2);
const command = args[0];

function usage() {
  console.log(`
evomemory: episodic memory for conversational agents

COMMANDS:
  remember "<input>" "<output>" [--skill gpio] [--idea "..."]
           [--prompt-tokens 120] [--tps 8.5]
    Score the output and store the exchange as a neuron.

  save "<input>" "<output>" --confidence 0.8 [--skill gpio] [--idea "..."]
    Store a neuron whose confidence was computed elsewhere.

  get <id>                         Show one neuron.
  recent [--limit 10] [--skill gpio]
  similar "<input text>" [--limit 5]
    Neurons whose input hashes to the same context bucket.
  search "<substring>" [--limit 10]

  feedback <id> <-1|0|1>
    Rate a neuron. Positive feedback boosts retrieval and protects from pruning.

  prune [--days 30] [--min-confidence 0.3]
    Delete old low-confidence neurons without positive feedback.

  score "<text>" [--prompt-tokens 600] [--tps 8.5]
    Confidence of a generated text, with the adjustments that fired.

  recall "<query>" [--limit 5]     BM25-ranked retrieval.
  context "<query>" [--max-tokens 300]
    Prompt context block ("" when nothing scores high enough).
  hybrid "<query>"                 BM25 + context-hash matches.
  reindex [--max 1000]             Rebuild the retrieval snapshot and report its size.

  evolve [--min-neurons 50]        Mine recent neurons into rules.
  rules [--all]                    List rules (enabled only unless --all).
  rule-enable <id> / rule-disable <id>

  skills                           Skills with neuron counts and average confidence.
  skill-add <id> "<name>" [--description "..."]

  stats                            Store and index statistics.
  hash "<text>"                    Context hash of a text.

ENVIRONMENT:
  EVOMEMORY_HOME   data directory (default ~/.evomemory)
  EVOMEMORY_DB     database path (default $EVOMEMORY_HOME/neurons.db)
  EVOMEMORY_DEBUG  print debug logs to stderr

EXAMPLES:
  evomemory remember "Accendi il LED" "OK, GPIO 17 su HIGH" --skill gpio
  evomemory context "Come controllo un LED?"
  evomemory feedback 42 1
`);
}

/** Boolean flags that don't take a value */
const BOOLEAN_FLAGS = new Set(["all"]);

function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      const key = args[i].slice(2);
      if (BOOLEAN_FLAGS.has(key)) {
        parsed[key] = "true";
      } else if (i + 1 < args.length) {
        parsed[key] = args[i + 1];
        i++;
      }
    }
  }
  return parsed;
}

function num(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (Number.isNaN(n)) fail(`Not a number: ${value}`);
  return n;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function formatConfidence(c: number): string {
  const pct = (c * 100).toFixed(0);
  if (c >= 0.7) return `\x1b[32m${pct}%\x1b[0m`; // green
  if (c >= 0.4) return `\x1b[33m${pct}%\x1b[0m`; // yellow
  return `\x1b[31m${pct}%\x1b[0m`; // red
}

function formatMood(n: Neuron): string {
  return n.mood === "positive" ? "+" : n.mood === "negative" ? "-" : " ";
}

function printNeuron(n: Neuron, score?: number) {
  const head = score === undefined ? "" : `score ${score.toFixed(3)}  `;
  console.log(`  #${n.id} ${head}${formatConfidence(n.confidence)} [${formatMood(n)}] ${n.skill_id ?? ""}`);
  console.log(`       in:  ${n.input_text.slice(0, 100)}`);
  console.log(`       out: ${n.output_text.slice(0, 100)}`);
}

const config = loadConfig();
const db = openDb(config.dbPath);
const memory = new EvoMemory(db, { settings: config });

function runCommand() {
  const opts = parseArgs(args.slice(1));

  switch (command) {
    case "remember": {
      const [input, output] = [args[1], args[2]];
      if (!input || output === undefined) fail(`Usage: evomemory remember "<input>" "<output>"`);
      const result = memory.remember(input, output, {
        skill_id: opts.skill,
        idea: opts.idea,
        stats: { prompt_tokens: num(opts["prompt-tokens"]), tokens_per_second: num(opts.tps) },
      });
      console.log(`Stored neuron #${result.id}`);
      console.log(`  confidence: ${formatConfidence(result.confidence)} (${result.label})`);
      console.log(`  reasoning:  ${result.reasoning}`);
      if (result.ask_clarification) console.log("  low confidence: consider asking for clarification");
      if (result.reindexed) console.log("  retrieval snapshot rebuilt");
      break;
    }

    case "save": {
      const [input, output] = [args[1], args[2]];
      const confidence = num(opts.confidence);
      if (!input || output === undefined || confidence === undefined) {
        fail(`Usage: evomemory save "<input>" "<output>" --confidence 0.8`);
      }
      const id = memory.store.save({
        input_text: input, output_text: output, confidence, skill_id: opts.skill, idea: opts.idea,
      });
      console.log(`Stored neuron #${id}`);
      break;
    }

    case "get": {
      const id = num(args[1]);
      if (id === undefined) fail("Usage: evomemory get <id>");
      const neuron = memory.store.get(id);
      if (!neuron) fail(`Neuron #${id} not found`);
      console.log(JSON.stringify(neuron, null, 2));
      break;
    }

    case "recent": {
      const neurons = memory.store.recent(num(opts.limit) ?? 10, opts.skill);
      if (neurons.length === 0) console.log("No neurons stored yet.");
      for (const n of neurons) printNeuron(n);
      break;
    }

    case "similar": {
      const text = args[1];
      if (!text) fail(`Usage: evomemory similar "<input text>"`);
      const hash = contextHash(text);
      const neurons = memory.store.similar(hash, num(opts.limit) ?? 5);
      console.log(`Context bucket ${hash}: ${neurons.length} neuron(s)`);
      for (const n of neurons) printNeuron(n);
      break;
    }

    case "search": {
      const text = args[1];
      if (text === undefined) fail(`Usage: evomemory search "<substring>"`);
      const neurons = memory.store.search(text, num(opts.limit) ?? 10);
      if (neurons.length === 0) console.log(`No neurons contain "${text}"`);
      for (const n of neurons) printNeuron(n);
      break;
    }

    case "feedback": {
      const id = num(args[1]);
      const value = num(args[2]);
      if (id === undefined || value === undefined) fail("Usage: evomemory feedback <id> <-1|0|1>");
      if (!memory.feedback(id, value)) fail(`Neuron #${id} not found`);
      console.log(`Feedback ${value} recorded for neuron #${id}`);
      break;
    }

    case "prune": {
      const deleted = memory.prune(num(opts.days), num(opts["min-confidence"]));
      console.log(`Pruned ${deleted} neuron(s)`);
      break;
    }

    case "score": {
      const text = args[1];
      if (text === undefined) fail(`Usage: evomemory score "<text>"`);
      const { confidence, reasoning } = memory.scorer.score(text, {
        prompt_tokens: num(opts["prompt-tokens"]),
        tokens_per_second: num(opts.tps),
      });
      console.log(`confidence: ${formatConfidence(confidence)} (${confidenceLabel(confidence)})`);
      console.log(`reasoning:  ${reasoning}`);
      console.log(`ask clarification: ${shouldAskClarification(confidence) ? "yes" : "no"}`);
      break;
    }

    case "recall": {
      const query = args[1];
      if (!query) fail(`Usage: evomemory recall "<query>"`);
      const results = memory.index.retrieve(query, num(opts.limit) ?? 5);
      if (results.length === 0) console.log("Nothing indexed yet.");
      for (const r of results) printNeuron(r.neuron, r.score);
      break;
    }

    case "context": {
      const query = args[1];
      if (!query) fail(`Usage: evomemory context "<query>"`);
      const context = memory.index.getContextForPrompt(query, num(opts["max-tokens"]) ?? config.retrieval.maxContextTokens);
      console.log(context || "(no relevant context)");
      break;
    }

    case "hybrid": {
      const query = args[1];
      if (!query) fail(`Usage: evomemory hybrid "<query>"`);
      const { combined, context_matches } = memory.index.hybridSearch(query);
      console.log(`${combined.length} result(s), ${context_matches.length} context-hash match(es)`);
      for (const r of combined) {
        console.log(`  via ${r.source}`);
        printNeuron(r.neuron, r.score);
      }
      break;
    }

    case "reindex": {
      const indexed = memory.index.reindex(num(opts.max));
      console.log(`Indexed ${indexed} neuron(s)`);
      break;
    }

    case "evolve": {
      const result = memory.evolve(num(opts["min-neurons"]));
      console.log(result.message);
      console.log(`  neurons analyzed: ${result.neurons_analyzed}`);
      console.log(`  rules generated:  ${result.rules_generated}`);
      console.log(`  rules saved:      ${result.rules_saved}`);
      if (result.snapshot_path) console.log(`  snapshot:         ${result.snapshot_path}`);
      break;
    }

    case "rules": {
      const rules = memory.store.listRules({ enabledOnly: opts.all !== "true" });
      if (rules.length === 0) console.log("No rules yet. Run: evomemory evolve");
      for (const r of rules) {
        const state = r.enabled ? "on " : "off";
        console.log(`  #${r.id} [${state}] p${r.priority} ${r.rule_text}`);
        console.log(`       trigger: ${r.trigger_pattern}  threshold: ${r.confidence_threshold.toFixed(2)}`);
      }
      break;
    }

    case "rule-enable":
    case "rule-disable": {
      const id = num(args[1]);
      if (id === undefined) fail(`Usage: evomemory ${command} <id>`);
      if (!memory.store.setRuleEnabled(id, command === "rule-enable")) fail(`Rule #${id} not found`);
      console.log(`Rule #${id} ${command === "rule-enable" ? "enabled" : "disabled"}`);
      break;
    }

    case "skills": {
      const skills = memory.store.skills();
      if (skills.length === 0) console.log("No skills yet.");
      for (const s of skills) {
        const tag = s.registered ? "" : " (unregistered)";
        console.log(`  ${s.id}${tag}: ${s.neuron_count} neuron(s), avg ${formatConfidence(s.avg_confidence)}`);
      }
      break;
    }

    case "skill-add": {
      const [id, name] = [args[1], args[2]];
      if (!id || !name) fail(`Usage: evomemory skill-add <id> "<name>"`);
      memory.store.registerSkill({ id, name, description: opts.description });
      console.log(`Skill ${id} registered`);
      break;
    }

    case "stats": {
      const s = memory.stats();
      console.log(`
EvoMemory Stats
  neurons:        ${s.neurons}
  meta-neurons:   ${s.meta_neurons}
  rules:          ${s.rules} enabled
  skills:         ${s.skills} enabled
  avg confidence: ${formatConfidence(s.avg_confidence)} (last 7 days)
  database:       ${config.dbPath}
`);
      break;
    }

    case "hash": {
      const text = args[1];
      if (text === undefined) fail(`Usage: evomemory hash "<text>"`);
      console.log(contextHash(text));
      break;
    }

    default:
      usage();
  }
}

try {
  runCommand();
} catch (err) {
  if (err instanceof EvoMemoryError) {
    console.error(`${err.code}: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
} finally {
  db.close();
}
