import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createMcpServer } from "./mcp-server.js";
import { sandbox } from "./test-sandbox.js";

let env: ReturnType<typeof sandbox>;
let client: Client;

beforeEach(async () => {
  env = sandbox();
  const server = createMcpServer(env.memory);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "evomemory-test", version: "0.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
  await client.close();
  env.close();
});

async function call(name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== "text") throw new Error(`${name} returned no text content`);
  const data: unknown = JSON.parse(first.text);
  return { isError: result.isError ?? false, data };
}

describe("EvoMemory MCP tools", () => {
  it("lists every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "evomemory_context",
      "evomemory_evolve",
      "evomemory_feedback",
      "evomemory_get",
      "evomemory_hybrid",
      "evomemory_prune",
      "evomemory_recent",
      "evomemory_reindex",
      "evomemory_remember",
      "evomemory_retrieve",
      "evomemory_rules",
      "evomemory_save",
      "evomemory_score",
      "evomemory_search",
      "evomemory_similar",
      "evomemory_stats",
    ]);
  });

  it("remembers, fetches and rates a neuron", async () => {
    const remembered = await call("evomemory_remember", {
      input: "Accendi il LED",
      output: "Certamente! Il comando corretto è gpio.write(17, HIGH).",
      skill_id: "gpio",
    });
    expect(remembered.isError).toBe(false);
    expect(remembered.data).toMatchObject({ id: 1, label: "high", ask_clarification: false });

    const rated = await call("evomemory_feedback", { id: 1, value: 1 });
    expect(rated.data).toEqual({ status: "ok", id: 1, feedback: 1 });

    const fetched = await call("evomemory_get", { id: 1 });
    expect(fetched.data).toMatchObject({
      status: "found",
      neuron: { id: 1, input: "Accendi il LED", mood: "positive", feedback: 1, skill_id: "gpio" },
    });
  });

  it("reports absent ids as not found", async () => {
    expect((await call("evomemory_get", { id: 7 })).data).toEqual({ status: "not_found", id: 7 });
    expect((await call("evomemory_feedback", { id: 7, value: -1 })).data).toEqual({ status: "not_found", id: 7 });
  });

  it("turns validation failures into tool errors", async () => {
    const saved = await call("evomemory_save", { input: "x", output: "y", confidence: 1.5 });
    expect(saved.isError).toBe(true);
    expect(saved.data).toMatchObject({ status: "error", code: "VALIDATION_ERROR" });

    env.store.save({ input_text: "x", output_text: "y" });
    const rated = await call("evomemory_feedback", { id: 1, value: 2 });
    expect(rated.isError).toBe(true);
  });

  it("scores without storing", async () => {
    const { data } = await call("evomemory_score", { text: "OK" });
    expect(data).toEqual({ confidence: 0.3, label: "low", ask_clarification: true, reasoning: "output too short" });
    expect(env.store.count()).toBe(0);
  });

  it("retrieves and builds prompt context", async () => {
    env.store.save({ input_text: "Accendi il LED", output_text: "Fatto, GPIO 17 su HIGH", confidence: 0.9 });
    env.store.save({ input_text: "Che ore sono", output_text: "Sono le 10" });

    const retrieved = await call("evomemory_retrieve", { query: "accendi led", top_k: 1 });
    expect(retrieved.data).toMatchObject([{ neuron: { input: "Accendi il LED" } }]);

    const context = await call("evomemory_context", { query: "accendi led" });
    expect(context.data).toMatchObject({ context_used: true });

    const empty = await call("evomemory_context", { query: "meteo domani" });
    expect(empty.data).toEqual({ context_used: false, context: "" });
  });

  it("reindexes and reports stats", async () => {
    env.store.save({ input_text: "a", output_text: "b" });
    expect((await call("evomemory_reindex")).data).toEqual({ indexed: 1 });
    expect((await call("evomemory_stats")).data).toMatchObject({ neurons: 1, indexed_neurons: 1, skills_detail: [] });
  });

  it("evolves and lists rules", async () => {
    for (const confidence of [0.92, 0.9, 0.88]) {
      env.store.save({ input_text: "led", output_text: "ok", skill_id: "gpio", confidence });
    }
    const evolved = await call("evomemory_evolve", { min_neurons: 3 });
    expect(evolved.data).toMatchObject({ rules_generated: 1, rules_saved: 1 });

    const rules = await call("evomemory_rules");
    expect(rules.data).toMatchObject([{ trigger_pattern: "skill_id:gpio", priority: 2, enabled: true }]);
  });
});
