import { beforeEach, describe, it, expect, vi } from "vitest";
import { DedupEngine, DUPLICATE_SIMILARITY_THRESHOLD } from "../src/memory/dedup.js";
import { InMemoryMemoryStore } from "../src/memory/in-memory-store.js";
import { LocalEmbeddingGateway, type EmbedFn } from "../src/memory/local-gateway.js";
import { contentFingerprint } from "../src/memory/fingerprint.js";
import { DimensionMismatchError } from "../src/errors.js";
import { keyedEmbedder, storedMemories, tickingClock } from "./helpers/fakes.js";

const VECTORS: Record<string, number[]> = {
  "Went hiking together": [1, 0, 0],
  // cosine 0.98 with the hike
  "We hiked up the ridge on Saturday": [0.98, 0.199, 0],
  // cosine 0.9 with the hike: close, but a different event
  "Had dinner after the hike": [0.9, 0.43589, 0],
  "Argued about money": [0, 0, 1],
};

function setup(embedFn: EmbedFn = keyedEmbedder(VECTORS)) {
  const store = new InMemoryMemoryStore({ now: tickingClock("2024-06-01T00:00:00Z") });
  const gateway = new LocalEmbeddingGateway(embedFn, store);
  const engine = new DedupEngine(store, gateway, {
    embeddingTimeoutMs: 50,
    embeddingDimension: 3,
  });
  return { store, gateway, engine };
}

const SATURDAY = new Date("2024-05-25T10:00:00Z");
const SUNDAY = new Date("2024-05-26T10:00:00Z");

describe("DedupEngine.ingest", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  // ── New events ─────────────────────────────────────────

  it("creates a memory with its embedding and fingerprint", async () => {
    const result = await ctx.engine.ingest({
      targetId: "t1",
      content: "Went hiking together",
      facts: { topics: ["outdoors"] },
      happenedAt: SATURDAY,
      sentimentScore: 6,
    });

    expect(result.status).toBe("created");
    expect(result.degraded).toBe(false);
    expect(result.memory.embedding).toEqual([1, 0, 0]);
    expect(result.memory.contentFingerprint).toBe(contentFingerprint("went hiking together"));
    expect(result.memory.needsReembedding).toBe(false);
    expect(result.memory.sourceType).toBe("manual");
    expect(result.memory.sentimentScore).toBe(6);
    expect(result.memory.extractedFacts.topics).toEqual(["outdoors"]);
  });

  it("clamps the sentiment score", async () => {
    const result = await ctx.engine.ingest({
      targetId: "t1",
      content: "Argued about money",
      happenedAt: SATURDAY,
      sentimentScore: -15,
    });
    expect(result.memory.sentimentScore).toBe(-10);
  });

  // ── Exact duplicates ───────────────────────────────────

  it("merges content that only differs in case and whitespace", async () => {
    await ctx.engine.ingest({
      targetId: "t1",
      content: "Went hiking together",
      facts: { topics: ["outdoors"] },
      happenedAt: SUNDAY,
      sentimentScore: 2,
    });
    const result = await ctx.engine.ingest({
      targetId: "t1",
      content: "  went HIKING   together ",
      facts: { topics: ["weekend"], green_flags: ["planned it"] },
      happenedAt: SATURDAY,
      sentimentScore: -4,
    });

    expect(result.status).toBe("merged");
    if (result.status !== "merged") return;
    expect(result.similarity).toBeNull();
    expect(result.memory.content).toBe("Went hiking together");
    expect(result.memory.extractedFacts.topics).toEqual(["outdoors", "weekend"]);
    expect(result.memory.extractedFacts.greenFlags).toEqual(["planned it"]);
    expect(result.memory.happenedAt.toISOString()).toBe(SATURDAY.toISOString());
    expect(result.memory.sentimentScore).toBe(-4);
    expect(await storedMemories(ctx.store, "t1")).toHaveLength(1);
  });

  // ── Semantic duplicates ────────────────────────────────

  it("merges a paraphrase whose similarity reaches the threshold", async () => {
    const first = await ctx.engine.ingest({
      targetId: "t1",
      content: "Went hiking together",
      happenedAt: SATURDAY,
    });
    const result = await ctx.engine.ingest({
      targetId: "t1",
      content: "We hiked up the ridge on Saturday",
      facts: { key_event: "first hike" },
      happenedAt: SATURDAY,
    });

    expect(result.status).toBe("merged");
    if (result.status !== "merged") return;
    expect(result.memory.id).toBe(first.memory.id);
    expect(result.similarity).toBeCloseTo(0.98, 3);
    expect(result.similarity ?? 0).toBeGreaterThanOrEqual(DUPLICATE_SIMILARITY_THRESHOLD);
    expect(result.memory.extractedFacts.keyEvent).toBe("first hike");
    expect(await storedMemories(ctx.store, "t1")).toHaveLength(1);
  });

  it("keeps related but distinct events as separate memories", async () => {
    await ctx.engine.ingest({ targetId: "t1", content: "Went hiking together", happenedAt: SATURDAY });
    const result = await ctx.engine.ingest({
      targetId: "t1",
      content: "Had dinner after the hike",
      happenedAt: SATURDAY,
    });

    expect(result.status).toBe("created");
    expect(await storedMemories(ctx.store, "t1")).toHaveLength(2);
  });

  it("never merges across targets", async () => {
    await ctx.engine.ingest({ targetId: "t1", content: "Went hiking together", happenedAt: SATURDAY });
    const result = await ctx.engine.ingest({
      targetId: "t2",
      content: "Went hiking together",
      happenedAt: SATURDAY,
    });

    expect(result.status).toBe("created");
    expect(await storedMemories(ctx.store, "t1")).toHaveLength(1);
    expect(await storedMemories(ctx.store, "t2")).toHaveLength(1);
  });

  // ── Concurrency ────────────────────────────────────────

  it("leaves one survivor when duplicates for a target arrive concurrently", async () => {
    const results = await Promise.all([
      ctx.engine.ingest({ targetId: "t1", content: "Went hiking together", happenedAt: SATURDAY }),
      ctx.engine.ingest({
        targetId: "t1",
        content: "We hiked up the ridge on Saturday",
        happenedAt: SATURDAY,
      }),
    ]);

    expect(results.map((r) => r.status)).toEqual(["created", "merged"]);
    expect(await storedMemories(ctx.store, "t1")).toHaveLength(1);
  });

  // ── Degraded paths ─────────────────────────────────────

  it("inserts without an embedding when the gateway fails", async () => {
    const result = await ctx.engine.ingest({
      targetId: "t1",
      content: "Something nobody embedded",
      happenedAt: SATURDAY,
    });

    expect(result.status).toBe("created");
    expect(result.degraded).toBe(true);
    expect(result.memory.embedding).toBeNull();
    expect(result.memory.needsReembedding).toBe(true);
  });

  it("still catches exact duplicates while the gateway is down", async () => {
    await ctx.engine.ingest({ targetId: "t1", content: "Something nobody embedded", happenedAt: SATURDAY });
    const result = await ctx.engine.ingest({
      targetId: "t1",
      content: "something nobody embedded",
      happenedAt: SUNDAY,
    });

    expect(result.status).toBe("merged");
    expect(await storedMemories(ctx.store, "t1")).toHaveLength(1);
  });

  it("treats an embedding timeout as unavailable", async () => {
    const slow = setup(() => new Promise<number[]>(() => {}));
    const result = await slow.engine.ingest({
      targetId: "t1",
      content: "Went hiking together",
      happenedAt: SATURDAY,
    });

    expect(result.status).toBe("created");
    expect(result.degraded).toBe(true);
  });

  it("never fingerprint-merges memories with empty content", async () => {
    await ctx.engine.ingest({ targetId: "t1", content: "", facts: { topics: ["photo"] }, happenedAt: SATURDAY });
    const result = await ctx.engine.ingest({
      targetId: "t1",
      content: "   ",
      facts: { topics: ["photo"] },
      happenedAt: SATURDAY,
    });

    expect(result.status).toBe("created");
    expect(result.memory.contentFingerprint).toBeNull();
    expect(await storedMemories(ctx.store, "t1")).toHaveLength(2);
  });

  it("fails on a wrong-sized embedding and writes nothing", async () => {
    const broken = setup(async () => [1, 0]);
    await expect(
      broken.engine.ingest({ targetId: "t1", content: "Went hiking together", happenedAt: SATURDAY }),
    ).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(await storedMemories(broken.store, "t1")).toHaveLength(0);
  });

  it("rejects a zero vector as unavailable", async () => {
    const zero = setup(async () => [0, 0, 0]);
    const result = await zero.engine.ingest({
      targetId: "t1",
      content: "Went hiking together",
      happenedAt: SATURDAY,
    });
    expect(result.degraded).toBe(true);
    expect(result.memory.embedding).toBeNull();
  });

  it("skips the embedder entirely on a fingerprint match", async () => {
    const embed = vi.fn(keyedEmbedder(VECTORS));
    const spied = setup(embed);
    await spied.engine.ingest({ targetId: "t1", content: "Went hiking together", happenedAt: SATURDAY });
    await spied.engine.ingest({ targetId: "t1", content: "WENT hiking together", happenedAt: SATURDAY });
    expect(embed).toHaveBeenCalledTimes(1);
  });
});

describe("DedupEngine.findSimilar", () => {
  it("returns memories above the minimum similarity, most similar first", async () => {
    const { engine } = setup();
    await engine.ingest({ targetId: "t1", content: "Had dinner after the hike", happenedAt: SATURDAY });
    await engine.ingest({ targetId: "t1", content: "Argued about money", happenedAt: SUNDAY });

    const similar = await engine.findSimilar("t1", "We hiked up the ridge on Saturday");
    expect(similar.map((s) => s.memory.content)).toEqual(["Had dinner after the hike"]);
  });

  it("returns [] when the text cannot be embedded", async () => {
    const { engine } = setup();
    await expect(engine.findSimilar("t1", "unknown text")).resolves.toEqual([]);
  });
});
