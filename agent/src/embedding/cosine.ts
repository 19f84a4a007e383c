import type { EmbeddingVector } from "./types.js";

export function norm(vector: EmbeddingVector): number {
  let sum = 0;
  for (const x of vector) sum += x * x;
  return Math.sqrt(sum);
}

export function normalize(vector: EmbeddingVector): EmbeddingVector {
  const n = norm(vector);
  return n > 0 ? vector.map(x => x / n) : vector;
}

/**
 * Cosine similarity. Mismatched dimensions and zero vectors score 0;
 * callers treat that as "no match" rather than an error.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];

  const denom = norm(a) * norm(b);
  if (denom === 0) return 0;

  // Clamp float drift so identical inputs land exactly on 1
  return Math.max(-1, Math.min(1, dot / denom));
}
