import { contentFingerprint, embeddingText } from "./fingerprint.js";
import { clampSentiment, mergeMemory, sanitizeFacts } from "./facts.js";
import { embedWithTimeout } from "./embedder.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type {
  EmbeddingGateway,
  Memory,
  MemoryStore,
  Neighbor,
} from "./types.js";
import { EmbeddingUnavailableError, errorMessage } from "../errors.js";
import { log } from "../logger.js";

// ── Dedup Engine: at-most-one-survives ingestion ────────

/** Cosine similarity at or above which two memories are the same event. */
export const DUPLICATE_SIMILARITY_THRESHOLD = 0.92;

/** Neighbours inspected per ingest; the best one above threshold wins. */
const NEIGHBOR_LIMIT = 5;

export interface IngestInput {
  targetId: string;
  content: string;
  facts?: unknown;
  happenedAt: Date;
  sentimentScore?: number;
  sourceType?: string;
}

export type IngestResult =
  | {
      status: "created";
      memory: Memory;
      /** True when the embedding step failed and only fingerprints were checked. */
      degraded: boolean;
    }
  | {
      status: "merged";
      memory: Memory;
      /** Null when the match came from the fingerprint pre-filter. */
      similarity: number | null;
      degraded: boolean;
    };

export interface SimilarMemory {
  memory: Memory;
  similarity: number;
}

export interface DedupEngineOptions {
  embeddingTimeoutMs: number;
  embeddingDimension: number;
}

export class DedupEngine {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly store: MemoryStore,
    private readonly gateway: EmbeddingGateway,
    private readonly opts: DedupEngineOptions,
  ) {}

  /**
   * Insert a memory candidate or fold it into the existing memory it
   * duplicates. Calls for the same target are serialized; different
   * targets run in parallel.
   */
  ingest(input: IngestInput): Promise<IngestResult> {
    return this.locks.runExclusive(input.targetId, () =>
      this.ingestLocked(input),
    );
  }

  private async ingestLocked(input: IngestInput): Promise<IngestResult> {
    const { targetId } = input;
    const content = input.content.trim();
    const facts = sanitizeFacts(input.facts);
    const sentimentScore = clampSentiment(input.sentimentScore ?? 0);
    const candidate = { facts, happenedAt: input.happenedAt, sentimentScore };
    const fingerprint = contentFingerprint(content);

    // 1. Exact pre-filter on the normalized-content hash
    if (fingerprint) {
      const matches = await this.store.findByFingerprint(targetId, fingerprint);
      const oldest = matches.sort(
        (a, b) => a.createdAt.getTime() - b.createdAt.getTime(),
      )[0];
      if (oldest) {
        const merged = await this.store.merge(
          oldest.id,
          mergeMemory(oldest, candidate),
        );
        log.info(
          { targetId, memoryId: merged.id },
          "🔁 Duplicate memory merged (fingerprint)",
        );
        return {
          status: "merged",
          memory: merged,
          similarity: null,
          degraded: false,
        };
      }
    }

    // 2. Semantic check against the nearest embedded memories
    let embedding: number[] | null = null;
    let degraded = false;
    try {
      embedding = await embedWithTimeout(
        this.gateway,
        embeddingText(content, facts),
        {
          timeoutMs: this.opts.embeddingTimeoutMs,
          dimension: this.opts.embeddingDimension,
        },
      );
    } catch (err) {
      if (!(err instanceof EmbeddingUnavailableError)) throw err;
      degraded = true;
      log.warn(
        { targetId, error: err.message },
        "⚠️ Embedding unavailable, deduplicating by fingerprint only",
      );
    }

    if (embedding) {
      const best = await this.bestDuplicate(targetId, embedding);
      if (best) {
        const merged = await this.store.merge(
          best.memory.id,
          mergeMemory(best.memory, candidate),
        );
        log.info(
          { targetId, memoryId: merged.id, similarity: best.similarity },
          "🔁 Duplicate memory merged (semantic)",
        );
        return {
          status: "merged",
          memory: merged,
          similarity: best.similarity,
          degraded: false,
        };
      }
    }

    // 3. New event
    const created = await this.store.insert({
      targetId,
      content,
      happenedAt: new Date(input.happenedAt),
      sourceType: input.sourceType || "manual",
      extractedFacts: facts,
      sentimentScore,
      embedding,
      contentFingerprint: fingerprint,
      needsReembedding: embedding === null,
    });
    log.info(
      { targetId, memoryId: created.id, degraded },
      "🧠 Memory created",
    );
    return { status: "created", memory: created, degraded };
  }

  /** Highest-similarity neighbour at or above the duplicate threshold. */
  private async bestDuplicate(
    targetId: string,
    embedding: number[],
  ): Promise<SimilarMemory | null> {
    let neighbors: Neighbor[];
    try {
      neighbors = await this.gateway.nearestNeighbors(
        targetId,
        embedding,
        NEIGHBOR_LIMIT,
      );
    } catch (err) {
      if (!(err instanceof EmbeddingUnavailableError)) throw err;
      log.warn(
        { targetId, error: err.message },
        "⚠️ Neighbour search unavailable, treating memory as new",
      );
      return null;
    }

    const ranked = neighbors
      .filter((n) => n.similarity >= DUPLICATE_SIMILARITY_THRESHOLD)
      .sort((a, b) => b.similarity - a.similarity);

    for (const n of ranked) {
      const memory = await this.store.getMemory(n.memoryId);
      if (memory && memory.targetId === targetId) {
        return { memory, similarity: n.similarity };
      }
    }
    return null;
  }

  /**
   * Memories of a target semantically close to `text`, most similar first.
   * Returns [] when embeddings are unavailable.
   */
  async findSimilar(
    targetId: string,
    text: string,
    limit = 5,
    minSimilarity = 0.7,
  ): Promise<SimilarMemory[]> {
    if (!text.trim()) return [];

    let neighbors: Neighbor[];
    try {
      const vector = await embedWithTimeout(this.gateway, text, {
        timeoutMs: this.opts.embeddingTimeoutMs,
        dimension: this.opts.embeddingDimension,
        inputType: "query",
      });
      neighbors = await this.gateway.nearestNeighbors(targetId, vector, limit);
    } catch (err) {
      if (!(err instanceof EmbeddingUnavailableError)) throw err;
      log.warn(
        { targetId, error: errorMessage(err) },
        "⚠️ Similar-memory lookup failed",
      );
      return [];
    }

    const out: SimilarMemory[] = [];
    for (const n of neighbors) {
      if (n.similarity < minSimilarity) continue;
      const memory = await this.store.getMemory(n.memoryId);
      if (memory) out.push({ memory, similarity: n.similarity });
    }
    return out.sort((a, b) => b.similarity - a.similarity);
  }
}
