import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_RAG_SETTINGS,
  RetrievalRanker,
  recencyScore,
  relevanceScore,
  resolveRagSettings,
} from "../src/memory/retrieval.js";
import { InMemoryMemoryStore } from "../src/memory/in-memory-store.js";
import { LocalEmbeddingGateway, type EmbedFn } from "../src/memory/local-gateway.js";
import type { RAGSettings } from "../src/memory/types.js";
import { DimensionMismatchError, EmbeddingUnavailableError } from "../src/errors.js";
import { keyedEmbedder, newMemory, vectorAt } from "./helpers/fakes.js";

const NOW = new Date("2024-06-01T12:00:00Z");
const DAY = 86_400_000;

function daysAgo(n: number): Date {
  return new Date(NOW.getTime() - n * DAY);
}

function setup(embedFn: EmbedFn = keyedEmbedder({ "what happened": [1, 0, 0] })) {
  const store = new InMemoryMemoryStore();
  const gateway = new LocalEmbeddingGateway(embedFn, store);
  const ranker = new RetrievalRanker(store, gateway, {
    embeddingTimeoutMs: 50,
    embeddingDimension: 3,
    now: () => NOW,
  });
  return { store, ranker };
}

function settings(overrides: Partial<RAGSettings> = {}): RAGSettings {
  return { ...DEFAULT_RAG_SETTINGS, ...overrides };
}

describe("scoring", () => {
  it("recency is 1 for now and exp(-decay × days) in the past", () => {
    expect(recencyScore(NOW, NOW, 0.1)).toBe(1);
    expect(recencyScore(daysAgo(10), NOW, 0.1)).toBeCloseTo(Math.exp(-1), 10);
  });

  it("treats future dates as age 0", () => {
    expect(recencyScore(new Date(NOW.getTime() + 5 * DAY), NOW, 0.5)).toBe(1);
  });

  it("weights similarity 0.8 and recency 0.2, clamping negative similarity", () => {
    expect(relevanceScore(1, 1)).toBeCloseTo(1, 10);
    expect(relevanceScore(0.5, 0.5)).toBeCloseTo(0.5, 10);
    expect(relevanceScore(-0.5, 1)).toBeCloseTo(0.2, 10);
  });
});

describe("resolveRagSettings", () => {
  it("layers partial settings over the defaults and clamps them", () => {
    expect(
      resolveRagSettings(
        { maxMemories: 3.7, timeDecayFactor: 2 },
        undefined,
        { minRelevanceScore: -1, enabled: false },
      ),
    ).toEqual({
      enabled: false,
      maxMemories: 3,
      maxRecentMessages: 10,
      timeDecayFactor: 1,
      minRelevanceScore: 0,
    });
  });

  it("lets later layers win", () => {
    expect(resolveRagSettings({ maxMemories: 8 }, { maxMemories: 2 }).maxMemories).toBe(2);
  });
});

describe("RetrievalRanker.retrieve", () => {
  async function seedFive(store: InMemoryMemoryStore) {
    for (const s of [0.6, 0.9, 0.5, 0.8, 0.7]) {
      await store.insert(
        newMemory({ content: `sim ${s}`, embedding: vectorAt(s), happenedAt: NOW }),
      );
    }
  }

  it("returns the top memories by relevance with 1-based ranks", async () => {
    const { store, ranker } = setup();
    await seedFive(store);

    const results = await ranker.retrieve("target-1", "what happened", settings({ maxMemories: 3 }));

    expect(results.map((r) => r.memory.content)).toEqual(["sim 0.9", "sim 0.8", "sim 0.7"]);
    expect(results.map((r) => r.rank)).toEqual([1, 2, 3]);
    expect(results[0]?.similarity).toBeCloseTo(0.9, 10);
    expect(results[0]?.recency).toBe(1);
    expect(results[0]?.relevanceScore).toBeCloseTo(0.92, 10);
  });

  it("drops results under the minimum relevance", async () => {
    const { store, ranker } = setup();
    await seedFive(store);

    // 0.8 × 0.9 + 0.2 = 0.92 passes; 0.8 × 0.8 + 0.2 = 0.84 does not
    const results = await ranker.retrieve(
      "target-1",
      "what happened",
      settings({ minRelevanceScore: 0.85 }),
    );
    expect(results.map((r) => r.memory.content)).toEqual(["sim 0.9"]);
  });

  it("prefers recent memories when similarity is equal", async () => {
    const { store, ranker } = setup();
    await store.insert(newMemory({ content: "old", embedding: vectorAt(0.5), happenedAt: daysAgo(30) }));
    await store.insert(newMemory({ content: "new", embedding: vectorAt(0.5), happenedAt: daysAgo(1) }));

    const results = await ranker.retrieve("target-1", "what happened", settings());
    expect(results.map((r) => r.memory.content)).toEqual(["new", "old"]);
  });

  it("ranks purely by similarity when decay is 0", async () => {
    const { store, ranker } = setup();
    await store.insert(newMemory({ content: "ancient but close", embedding: vectorAt(0.9), happenedAt: daysAgo(900) }));
    await store.insert(newMemory({ content: "fresh but far", embedding: vectorAt(0.3), happenedAt: NOW }));

    const results = await ranker.retrieve("target-1", "what happened", settings({ timeDecayFactor: 0 }));
    expect(results.map((r) => r.memory.content)).toEqual(["ancient but close", "fresh but far"]);
    expect(results.every((r) => r.recency === 1)).toBe(true);
  });

  it("breaks exact ties with the more recent memory", async () => {
    const { store, ranker } = setup();
    await store.insert(newMemory({ content: "earlier", embedding: vectorAt(0.5), happenedAt: daysAgo(3) }));
    await store.insert(newMemory({ content: "later", embedding: vectorAt(0.5), happenedAt: daysAgo(2) }));

    const results = await ranker.retrieve("target-1", "what happened", settings({ timeDecayFactor: 0 }));
    expect(results.map((r) => r.memory.content)).toEqual(["later", "earlier"]);
  });

  it("ignores memories without embeddings and other targets", async () => {
    const { store, ranker } = setup();
    await store.insert(newMemory({ content: "no vector" }));
    await store.insert(newMemory({ content: "elsewhere", targetId: "target-2", embedding: vectorAt(0.9) }));
    await store.insert(newMemory({ content: "mine", embedding: vectorAt(0.4) }));

    const results = await ranker.retrieve("target-1", "what happened", settings());
    expect(results.map((r) => r.memory.content)).toEqual(["mine"]);
  });

  it("returns [] for a target with no memories", async () => {
    const { ranker } = setup();
    await expect(ranker.retrieve("target-1", "what happened", settings())).resolves.toEqual([]);
  });

  it("does not call the gateway when disabled or when maxMemories is 0", async () => {
    const embed = vi.fn(keyedEmbedder({ "what happened": [1, 0, 0] }));
    const { ranker } = setup(embed);

    await expect(ranker.retrieve("target-1", "what happened", settings({ enabled: false }))).resolves.toEqual([]);
    await expect(ranker.retrieve("target-1", "what happened", settings({ maxMemories: 0 }))).resolves.toEqual([]);
    expect(embed).not.toHaveBeenCalled();
  });

  it("surfaces an unavailable embedder to the caller", async () => {
    const { ranker } = setup();
    await expect(ranker.retrieve("target-1", "unknown query", settings())).rejects.toBeInstanceOf(
      EmbeddingUnavailableError,
    );
  });

  it("fails on a stored vector of the wrong size", async () => {
    const { store, ranker } = setup();
    await store.insert(newMemory({ content: "legacy", embedding: [1, 0] }));
    await expect(ranker.retrieve("target-1", "what happened", settings())).rejects.toBeInstanceOf(
      DimensionMismatchError,
    );
  });
});
