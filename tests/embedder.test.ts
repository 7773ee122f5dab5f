import { describe, it, expect } from "vitest";
import { PineconeGateway, embedWithTimeout } from "../src/memory/embedder.js";
import { PineconeMemoryStore } from "../src/memory/store.js";
import { DedupEngine } from "../src/memory/dedup.js";
import { DEFAULT_RAG_SETTINGS, RetrievalRanker } from "../src/memory/retrieval.js";
import type { EmbedOptions, EmbeddingGateway } from "../src/memory/types.js";
import { EmbeddingUnavailableError } from "../src/errors.js";
import { FakeIndex, fakeInference } from "./helpers/fake-pinecone.js";
import { newMemory, vectorAt } from "./helpers/fakes.js";

const EMBED_OPTS = { embeddingTimeoutMs: 50, embeddingDimension: 3 };

function setup(vectors: Record<string, number[]> = {}, lagging = false) {
  const index = new FakeIndex({ lagging });
  const store = new PineconeMemoryStore({ dimension: 3, index });
  const inference = fakeInference(vectors);
  const gateway = new PineconeGateway({
    model: "test-embed",
    embed: inference.embed,
    index,
    recent: store,
  });
  return { index, store, gateway, inference };
}

describe("PineconeGateway.embed", () => {
  it("embeds stored text as passages and lookups as queries", async () => {
    const { store, gateway, inference } = setup({
      "Went to dinner": [1, 0, 0],
      "what happened": [1, 0, 0],
      "dinner plans": [1, 0, 0],
    });
    const dedup = new DedupEngine(store, gateway, EMBED_OPTS);
    const ranker = new RetrievalRanker(store, gateway, EMBED_OPTS);

    await dedup.ingest({ targetId: "t1", content: "Went to dinner", happenedAt: new Date() });
    const retrieved = await ranker.retrieve("t1", "what happened", DEFAULT_RAG_SETTINGS);
    const similar = await dedup.findSimilar("t1", "dinner plans");

    expect(retrieved).toHaveLength(1);
    expect(similar).toHaveLength(1);
    expect(inference.requests.map((r) => r.parameters.inputType)).toEqual([
      "passage",
      "query",
      "query",
    ]);
    expect(inference.requests[0]).toMatchObject({
      model: "test-embed",
      parameters: { truncate: "END" },
    });
  });

  it("turns a provider failure into EmbeddingUnavailableError", async () => {
    const { gateway } = setup();
    await expect(gateway.embed("unknown text")).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });
});

describe("PineconeGateway.nearestNeighbors", () => {
  it("only returns embedded memories of the target", async () => {
    const { store, gateway } = setup();
    const close = await store.insert(newMemory({ targetId: "t1", embedding: vectorAt(0.95) }));
    await store.insert(newMemory({ targetId: "t2", embedding: [1, 0, 0] }));
    await store.insert(newMemory({ targetId: "t1", embedding: null, needsReembedding: true }));

    const neighbors = await gateway.nearestNeighbors("t1", [1, 0, 0], 5);
    expect(neighbors).toHaveLength(1);
    expect(neighbors[0]?.memoryId).toBe(close.id);
    expect(neighbors[0]?.similarity).toBeCloseTo(0.95, 10);
  });

  it("includes fresh writes the index does not serve yet", async () => {
    const { index, store, gateway } = setup({}, true);
    await store.insert(newMemory({ targetId: "t1", embedding: vectorAt(0.5) }));
    const best = await store.insert(newMemory({ targetId: "t1", embedding: vectorAt(0.9) }));

    expect(index.ids("memory")).toEqual([]);
    const neighbors = await gateway.nearestNeighbors("t1", [1, 0, 0], 1);
    expect(neighbors.map((n) => n.memoryId)).toEqual([best.id]);
    expect(neighbors[0]?.similarity).toBeCloseTo(0.9, 10);
  });

  it("returns nothing for a zero limit", async () => {
    const { store, gateway } = setup();
    await store.insert(newMemory({ targetId: "t1", embedding: [1, 0, 0] }));
    expect(await gateway.nearestNeighbors("t1", [1, 0, 0], 0)).toEqual([]);
  });
});

describe("embedWithTimeout", () => {
  it("aborts the embed call once the deadline passes", async () => {
    let seen: AbortSignal | undefined;
    const gateway: EmbeddingGateway = {
      embed: (_text: string, opts?: EmbedOptions) =>
        new Promise<number[]>((_, reject) => {
          seen = opts?.signal;
          seen?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        }),
      nearestNeighbors: async () => [],
    };

    await expect(
      embedWithTimeout(gateway, "slow", { timeoutMs: 10, dimension: 3 }),
    ).rejects.toThrow("Embedding timed out after 10ms");
    expect(seen?.aborted).toBe(true);
  });

  it("aborts the embed call when the caller aborts", async () => {
    let seen: AbortSignal | undefined;
    const gateway: EmbeddingGateway = {
      embed: (_text: string, opts?: EmbedOptions) =>
        new Promise<number[]>((_, reject) => {
          seen = opts?.signal;
          seen?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        }),
      nearestNeighbors: async () => [],
    };
    const caller = new AbortController();

    const pending = embedWithTimeout(gateway, "slow", {
      timeoutMs: 1000,
      dimension: 3,
      signal: caller.signal,
    });
    caller.abort();

    await expect(pending).rejects.toBeInstanceOf(EmbeddingUnavailableError);
    expect(seen?.aborted).toBe(true);
  });

  it("passes the input type through", async () => {
    const types: (string | undefined)[] = [];
    const gateway: EmbeddingGateway = {
      embed: async (_text: string, opts?: EmbedOptions) => {
        types.push(opts?.inputType);
        return [1, 0, 0];
      },
      nearestNeighbors: async () => [],
    };

    await embedWithTimeout(gateway, "a", { timeoutMs: 50, dimension: 3, inputType: "query" });
    await embedWithTimeout(gateway, "b", { timeoutMs: 50, dimension: 3 });
    expect(types).toEqual(["query", undefined]);
  });
});
