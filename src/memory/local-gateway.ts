import type {
  EmbedOptions,
  EmbeddingGateway,
  MemoryStore,
  Neighbor,
} from "./types.js";
import { cosineSimilarity } from "./vector.js";

// ── Local Embedding Gateway ──────────────────────────────

export type EmbedFn = (text: string, opts?: EmbedOptions) => Promise<number[]>;

/**
 * Pairs any embed function with a brute-force cosine scan over the store's
 * embedded memories. Used with the in-memory store, where there is no
 * vector index to ask.
 */
export class LocalEmbeddingGateway implements EmbeddingGateway {
  constructor(
    private readonly embedFn: EmbedFn,
    private readonly store: MemoryStore,
  ) {}

  embed(text: string, opts?: EmbedOptions): Promise<number[]> {
    return this.embedFn(text, opts);
  }

  async nearestNeighbors(
    targetId: string,
    vector: number[],
    limit: number,
  ): Promise<Neighbor[]> {
    if (limit <= 0) return [];
    const candidates = await this.store.findEmbeddedCandidates(targetId);

    const scored: Neighbor[] = [];
    for (const m of candidates) {
      if (!m.embedding) continue;
      scored.push({
        memoryId: m.id,
        similarity: cosineSimilarity(vector, m.embedding),
      });
    }

    return scored
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit);
  }
}
