import { DimensionMismatchError } from "../errors.js";

// ── Vector Math ──────────────────────────────────────────

/**
 * Cosine similarity in [-1, 1].
 * Throws DimensionMismatchError on vectors of different length; zero-norm
 * vectors score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Throws unless `vector` has exactly `dimension` entries. */
export function assertDimension(vector: number[], dimension: number): void {
  if (vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length);
  }
}

export function isZeroVector(vector: number[]): boolean {
  return vector.every((v) => v === 0);
}
