import type {
  EmbedInputType,
  EmbedOptions,
  EmbeddingGateway,
  Neighbor,
  RecentWrites,
} from "./types.js";
import {
  getPineconeIndex,
  pineconeInferenceEmbed,
  type InferenceEmbed,
  type PineconeIndex,
} from "./pinecone.js";
import { assertDimension, cosineSimilarity, isZeroVector } from "./vector.js";
import { withRetry } from "../llm/retry.js";
import {
  DimensionMismatchError,
  EmbeddingUnavailableError,
  errorMessage,
} from "../errors.js";

// ── Embedding Gateway: Pinecone Inference + Index ───────

/** Inference input cap; longer text is truncated by the model anyway. */
const MAX_EMBED_CHARS = 2000;

export interface PineconeGatewayOptions {
  model: string;
  embed?: InferenceEmbed;
  index?: PineconeIndex;
  recent?: RecentWrites;
}

/**
 * Embeds with Pinecone's hosted inference (multilingual-e5-large by default)
 * and answers nearest-neighbour queries from the same index the
 * PineconeMemoryStore writes memory records to.
 */
export class PineconeGateway implements EmbeddingGateway {
  private readonly model: string;
  private readonly inferenceEmbed: InferenceEmbed;
  private readonly index: () => PineconeIndex;
  private readonly recent: RecentWrites | null;

  constructor(opts: PineconeGatewayOptions) {
    this.model = opts.model;
    this.inferenceEmbed = opts.embed ?? pineconeInferenceEmbed;
    const { index } = opts;
    this.index = index ? () => index : getPineconeIndex;
    this.recent = opts.recent ?? null;
  }

  async embed(text: string, opts: EmbedOptions = {}): Promise<number[]> {
    const inputType: EmbedInputType = opts.inputType ?? "passage";
    try {
      const result = await withRetry(
        () =>
          this.inferenceEmbed({
            model: this.model,
            inputs: [text.slice(0, MAX_EMBED_CHARS)],
            parameters: { inputType, truncate: "END" },
          }),
        { label: "embed", maxRetries: 1, baseDelayMs: 200, signal: opts.signal },
      );

      // result.data holds one embedding per input
      const embedding = result.data?.[0];
      if (
        !embedding ||
        !("values" in embedding) ||
        !Array.isArray(embedding.values)
      ) {
        throw new EmbeddingUnavailableError(
          "Pinecone inference returned no embedding",
        );
      }
      return embedding.values.map((v) => Number(v));
    } catch (err) {
      if (err instanceof EmbeddingUnavailableError) throw err;
      throw new EmbeddingUnavailableError(errorMessage(err), err);
    }
  }

  async nearestNeighbors(
    targetId: string,
    vector: number[],
    limit: number,
  ): Promise<Neighbor[]> {
    if (limit <= 0) return [];

    let matches: Neighbor[];
    try {
      const result = await this.index().query({
        vector,
        topK: limit,
        filter: {
          kind: { $eq: "memory" },
          targetId: { $eq: targetId },
          embedded: { $eq: true },
        },
      });
      matches = (result.matches ?? []).map((m) => ({
        memoryId: m.id,
        similarity: m.score ?? 0,
      }));
    } catch (err) {
      throw new EmbeddingUnavailableError(errorMessage(err), err);
    }

    // Score fresh writes locally; the index may not serve them yet
    const byId = new Map(matches.map((n) => [n.memoryId, n]));
    for (const m of this.recent?.recentWrites(targetId) ?? []) {
      if (!m.embedding) continue;
      byId.set(m.id, {
        memoryId: m.id,
        similarity: cosineSimilarity(vector, m.embedding),
      });
    }

    return [...byId.values()]
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit);
  }
}

// ── Bounded embedding call ───────────────────────────────

export interface EmbedCallOptions {
  timeoutMs: number;
  dimension: number;
  inputType?: EmbedInputType;
  signal?: AbortSignal;
}

/**
 * Embed `text` within `timeoutMs`. Anything that goes wrong becomes an
 * EmbeddingUnavailableError except a wrong-sized vector, which is a
 * DimensionMismatchError and must not be degraded around. The call is
 * aborted when the deadline passes or `opts.signal` aborts.
 */
export async function embedWithTimeout(
  gateway: EmbeddingGateway,
  text: string,
  opts: EmbedCallOptions,
): Promise<number[]> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const controller = new AbortController();
  const onAbort = () => controller.abort(opts.signal?.reason);
  if (opts.signal?.aborted) onAbort();
  else opts.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const vector = await Promise.race([
      gateway.embed(text, {
        inputType: opts.inputType,
        signal: controller.signal,
      }),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const err = new EmbeddingUnavailableError(
            `Embedding timed out after ${opts.timeoutMs}ms`,
          );
          controller.abort(err);
          reject(err);
        }, opts.timeoutMs);
      }),
    ]);

    // A zero vector is what some providers send back instead of failing
    if (vector.length > 0 && isZeroVector(vector)) {
      throw new EmbeddingUnavailableError("Embedding came back as a zero vector");
    }
    assertDimension(vector, opts.dimension);
    return vector;
  } catch (err) {
    if (
      err instanceof DimensionMismatchError ||
      err instanceof EmbeddingUnavailableError
    ) {
      throw err;
    }
    throw new EmbeddingUnavailableError(errorMessage(err), err);
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onAbort);
  }
}
