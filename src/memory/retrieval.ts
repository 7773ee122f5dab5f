import { embedWithTimeout } from "./embedder.js";
import { cosineSimilarity } from "./vector.js";
import type {
  EmbeddingGateway,
  MemoryStore,
  RAGSettings,
  RetrievalResult,
} from "./types.js";
import { log } from "../logger.js";

// ── Retrieval Ranker: similarity + recency ──────────────

export const SIMILARITY_WEIGHT = 0.8;
export const RECENCY_WEIGHT = 0.2;

const MS_PER_DAY = 86_400_000;

export const DEFAULT_RAG_SETTINGS: RAGSettings = {
  enabled: true,
  maxMemories: 5,
  maxRecentMessages: 10,
  timeDecayFactor: 0.1,
  minRelevanceScore: 0,
};

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

/**
 * Layer partial settings (e.g. mentor defaults, then chatbot overrides)
 * over the global defaults. Out-of-range values are clamped.
 */
export function resolveRagSettings(
  ...layers: Array<Partial<RAGSettings> | undefined>
): RAGSettings {
  const merged: RAGSettings = { ...DEFAULT_RAG_SETTINGS };
  for (const layer of layers) {
    if (!layer) continue;
    if (typeof layer.enabled === "boolean") merged.enabled = layer.enabled;
    if (typeof layer.maxMemories === "number")
      merged.maxMemories = Math.max(0, Math.floor(layer.maxMemories));
    if (typeof layer.maxRecentMessages === "number")
      merged.maxRecentMessages = Math.max(0, Math.floor(layer.maxRecentMessages));
    if (typeof layer.timeDecayFactor === "number")
      merged.timeDecayFactor = clamp01(layer.timeDecayFactor);
    if (typeof layer.minRelevanceScore === "number")
      merged.minRelevanceScore = clamp01(layer.minRelevanceScore);
  }
  return merged;
}

/** exp(-decay × ageDays). Future timestamps count as age 0. */
export function recencyScore(
  happenedAt: Date,
  now: Date,
  timeDecayFactor: number,
): number {
  const ageDays = Math.max(0, now.getTime() - happenedAt.getTime()) / MS_PER_DAY;
  return Math.exp(-timeDecayFactor * ageDays);
}

/** 0.8 × similarity (negatives clamped to 0) + 0.2 × recency. */
export function relevanceScore(similarity: number, recency: number): number {
  return SIMILARITY_WEIGHT * Math.max(0, similarity) + RECENCY_WEIGHT * recency;
}

export interface RetrievalRankerOptions {
  embeddingTimeoutMs: number;
  embeddingDimension: number;
  now?: () => Date;
}

export class RetrievalRanker {
  private readonly now: () => Date;

  constructor(
    private readonly store: MemoryStore,
    private readonly gateway: EmbeddingGateway,
    private readonly opts: RetrievalRankerOptions,
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Top memories of a target for `queryText`, best first.
   *
   * Rejects with EmbeddingUnavailableError when the query cannot be embedded
   * and with DimensionMismatchError when a stored vector has the wrong size.
   */
  async retrieve(
    targetId: string,
    queryText: string,
    settings: RAGSettings,
  ): Promise<RetrievalResult[]> {
    if (!settings.enabled || settings.maxMemories <= 0) return [];

    const queryVector = await embedWithTimeout(this.gateway, queryText, {
      timeoutMs: this.opts.embeddingTimeoutMs,
      dimension: this.opts.embeddingDimension,
      inputType: "query",
    });

    const candidates = await this.store.findEmbeddedCandidates(targetId);
    if (candidates.length === 0) return [];

    const now = this.now();
    const scored: Omit<RetrievalResult, "rank">[] = [];

    for (const memory of candidates) {
      if (!memory.embedding) continue;
      const similarity = Math.max(
        0,
        cosineSimilarity(queryVector, memory.embedding),
      );
      const recency = recencyScore(
        memory.happenedAt,
        now,
        settings.timeDecayFactor,
      );
      const score = relevanceScore(similarity, recency);
      if (score < settings.minRelevanceScore) continue;
      scored.push({ memory, similarity, recency, relevanceScore: score });
    }

    scored.sort(
      (a, b) =>
        b.relevanceScore - a.relevanceScore ||
        b.memory.happenedAt.getTime() - a.memory.happenedAt.getTime(),
    );

    const results = scored
      .slice(0, settings.maxMemories)
      .map((r, i) => ({ ...r, rank: i + 1 }));

    log.debug(
      { targetId, candidates: candidates.length, returned: results.length },
      "🔎 Memories retrieved",
    );
    return results;
  }
}
