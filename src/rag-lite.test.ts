import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Bm25Snapshot, boostScore } from "./rag-lite.js";
import { sandbox } from "./test-sandbox.js";

let env: ReturnType<typeof sandbox>;

beforeEach(() => {
  env = sandbox();
});

afterEach(() => {
  env.close();
});

/** Save in order, one clock second apart, so recency order is the reverse. */
function seed(rows: { input: string; output: string; confidence?: number }[]): number[] {
  return rows.map(({ input, output, confidence }) => {
    env.clock.tick();
    return env.store.save({ input_text: input, output_text: output, confidence: confidence ?? 0.5 });
  });
}

function seedLeds() {
  return seed([
    { input: "Accendi il LED rosso", output: "OK, GPIO 17 attivo" },
    { input: "Spegni il LED", output: "OK, GPIO 17 su LOW" },
    { input: "Che temperatura fa?", output: "22.5°C" },
  ]);
}

describe("Bm25Snapshot", () => {
  it("computes idf and document lengths over input + output", () => {
    seedLeds();
    const snapshot = Bm25Snapshot.build(env.store.recent(10));

    expect(snapshot.size).toBe(3);
    expect(snapshot.avgDocLength).toBeCloseTo(20 / 3, 10);
    expect(snapshot.idfOf("led")).toBeCloseTo(Math.log(1.6), 10);
    expect(snapshot.idfOf("temperatura")).toBeCloseTo(Math.log(2.5 / 1.5 + 1), 10);
    expect(snapshot.idfOf("unknown")).toBe(0);
  });

  it("scores with k1 = 1.5 and b = 0.75", () => {
    seedLeds();
    const snapshot = Bm25Snapshot.build(env.store.recent(10));
    const led = snapshot.docs.find((d) => d.neuron.input_text === "Spegni il LED");
    expect(led?.length).toBe(8);

    const lengthNorm = 1 - 0.75 + 0.75 * (8 / (20 / 3));
    const expected = (Math.log(1.6) * 2.5) / (1 + 1.5 * lengthNorm);
    expect(led && snapshot.scoreDoc(["led", "missing"], led)).toBeCloseTo(expected, 10);
  });

  it("is empty over no neurons", () => {
    const snapshot = Bm25Snapshot.build([]);
    expect(snapshot.size).toBe(0);
    expect(snapshot.avgDocLength).toBe(0);
  });
});

describe("boostScore", () => {
  it("applies confidence and feedback boosts independently", () => {
    const [id] = seed([{ input: "x", output: "y", confidence: 0.9 }]);
    const neuron = env.store.get(id);
    expect(neuron && boostScore(1, neuron)).toBeCloseTo(1.2, 10);

    env.store.updateFeedback(id, 1);
    const liked = env.store.get(id);
    expect(liked && boostScore(1, liked)).toBeCloseTo(1.56, 10);
  });

  it("does not boost confidence of exactly 0.7", () => {
    const [id] = seed([{ input: "x", output: "y", confidence: 0.7 }]);
    const neuron = env.store.get(id);
    expect(neuron && boostScore(2, neuron)).toBe(2);
  });
});

describe("RetrievalIndex.retrieve", () => {
  it("ranks an LED neuron first for an LED question", () => {
    seedLeds();
    const results = env.memory.index.retrieve("Come controllo un LED?");

    expect(results).toHaveLength(3);
    expect(["Accendi il LED rosso", "Spegni il LED"]).toContain(results[0].neuron.input_text);
    expect(results[0].score).toBeCloseTo(0.4312, 3);
    expect(results[2].neuron.input_text).toBe("Che temperatura fa?");
    expect(results[2].score).toBe(0);
  });

  it("ranks a document with every query term above one with none", () => {
    seedLeds();
    const results = env.memory.index.retrieve("gpio attivo", 3);
    expect(results[0].neuron.input_text).toBe("Accendi il LED rosso");
    expect(results[2].neuron.input_text).toBe("Che temperatura fa?");
    expect(results[0].score).toBeGreaterThan(results[2].score);
  });

  it("boosts confident and liked neurons", () => {
    const [plain, confident] = seed([
      { input: "blink led", output: "done", confidence: 0.5 },
      { input: "blink led", output: "done", confidence: 0.9 },
      { input: "read temperature", output: "22 degrees" },
    ]);

    const first = env.memory.index.retrieve("blink", 2);
    expect(first.map((r) => r.neuron.id)).toEqual([confident, plain]);
    expect(first[0].score / first[1].score).toBeCloseTo(1.2, 10);

    env.store.updateFeedback(plain, 1);
    env.memory.index.reindex();
    const second = env.memory.index.retrieve("blink", 2);
    expect(second.map((r) => r.neuron.id)).toEqual([plain, confident]);
  });

  it("returns nothing on an empty store", () => {
    expect(env.memory.index.retrieve("anything")).toEqual([]);
    expect(env.memory.index.reindex()).toBe(0);
  });

  it("builds on first use and stays stale until reindexed", () => {
    seedLeds();
    expect(env.memory.index.current()).toBeNull();

    env.memory.index.retrieve("led");
    const before = env.memory.index.current();
    expect(before?.size).toBe(3);

    seed([{ input: "Accendi la ventola", output: "Ventola accesa" }]);
    expect(env.memory.index.retrieve("ventola", 10)).toHaveLength(3);

    expect(env.memory.index.reindex()).toBe(4);
    expect(env.memory.index.current()).not.toBe(before);
    // the old snapshot is untouched by the swap
    expect(before?.size).toBe(3);
    expect(env.memory.index.retrieve("ventola", 1)[0].neuron.input_text).toBe("Accendi la ventola");
  });

  it("indexes only the most recent maxNeurons", () => {
    seedLeds();
    expect(env.memory.index.reindex(2)).toBe(2);
    const inputs = env.memory.index.retrieve("led", 10).map((r) => r.neuron.input_text);
    expect(inputs).toEqual(["Spegni il LED", "Che temperatura fa?"]);
  });
});

describe("RetrievalIndex.getContextForPrompt", () => {
  function seedContext() {
    return seed([
      { input: "Accendi il LED", output: "Fatto, GPIO 17 su HIGH", confidence: 0.9 },
      { input: "Che ore sono", output: "Sono le 10" },
      { input: "Che temperatura fa", output: "22 gradi" },
    ]);
  }

  it("returns empty when the best score is below 0.5", () => {
    seedLeds();
    expect(env.memory.index.getContextForPrompt("Come controllo un LED?")).toBe("");
  });

  it("formats the top three results", () => {
    const [led, hour, temp] = seedContext();
    const context = env.memory.index.getContextForPrompt("accendi led");

    expect(context).toBe(
      "### Relevant past experiences:\n" +
      "- Input: Accendi il LED\n  Output: Fatto, GPIO 17 su HIGH\n  (confidence: 0.90)\n" +
      "- Input: Che temperatura fa\n  Output: 22 gradi\n  (confidence: 0.50)\n" +
      "- Input: Che ore sono\n  Output: Sono le 10\n  (confidence: 0.50)\n\n"
    );
    for (const id of [led, hour, temp]) expect(env.store.get(id)?.access_count).toBe(1);
  });

  it("stops adding blocks at the token budget", () => {
    const [led, hour] = seedContext();
    const context = env.memory.index.getContextForPrompt("accendi led", 6);

    expect(context).toBe(
      "### Relevant past experiences:\n" +
      "- Input: Accendi il LED\n  Output: Fatto, GPIO 17 su HIGH\n  (confidence: 0.90)\n\n"
    );
    expect(env.store.get(led)?.access_count).toBe(1);
    expect(env.store.get(hour)?.access_count).toBe(0);
  });

  it("returns empty when not even the first block fits", () => {
    seedContext();
    expect(env.memory.index.getContextForPrompt("accendi led", 5)).toBe("");
  });

  it("truncates long input and output", () => {
    seed([
      { input: `accendi ${"a".repeat(200)}`, output: "b".repeat(200), confidence: 0.9 },
      { input: "Che ore sono", output: "Sono le 10" },
    ]);
    const context = env.memory.index.getContextForPrompt("accendi", 1000);
    expect(context.split("\n")[1]).toBe(`- Input: accendi ${"a".repeat(92)}`);
    expect(context.split("\n")[2]).toBe(`  Output: ${"b".repeat(150)}`);
  });
});

describe("RetrievalIndex.hybridSearch", () => {
  it("lists BM25 results first, then unseen context-hash matches", () => {
    seedLeds();
    env.memory.index.reindex();
    const [fresh] = seed([{ input: "Spegni tutto", output: "Tutto spento" }]);

    const result = env.memory.index.hybridSearch("  spegni TUTTO ");
    expect(result.bm25_results).toHaveLength(3);
    expect(result.context_matches.map((n) => n.id)).toEqual([fresh]);
    expect(result.combined.map((r) => r.source)).toEqual(["bm25", "bm25", "bm25", "context_hash"]);
    expect(result.combined[3]).toMatchObject({ score: 0.5 });
    expect(result.combined[3].neuron.id).toBe(fresh);
  });

  it("does not repeat a neuron found by both", () => {
    const [led] = seedLeds();
    const result = env.memory.index.hybridSearch("Accendi il LED rosso");
    expect(result.context_matches.map((n) => n.id)).toEqual([led]);
    expect(result.combined).toHaveLength(3);
    expect(result.combined.filter((r) => r.neuron.id === led)).toHaveLength(1);
    expect(result.combined[0]).toMatchObject({ source: "bm25" });
  });

  it("truncates the combined list to five", () => {
    seed(Array.from({ length: 6 }, (_, i) => ({ input: `domanda ${i}`, output: "risposta" })));
    env.memory.index.reindex();
    seed([{ input: "extra", output: "extra" }]);

    const result = env.memory.index.hybridSearch("extra");
    expect(result.bm25_results).toHaveLength(5);
    expect(result.context_matches).toHaveLength(1);
    expect(result.combined).toHaveLength(5);
    expect(result.combined.every((r) => r.source === "bm25")).toBe(true);
  });
});
