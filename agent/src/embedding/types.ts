/**
 * Embedding Strategy
 *
 * One embedder per deployment. Vectors are tagged with the embedder's
 * modelId and only ever compared against vectors carrying the same id.
 */

export type EmbeddingVector = number[];

export interface Embedder {
  /** Scheme name, as configured by EMBEDDING_SCHEME */
  readonly scheme: string;
  /** Identifies scheme + fitted state; stored beside every vector */
  readonly modelId: string;
  readonly dimensions: number;
  /** Whether embed() produces meaningful vectors yet */
  readonly ready: boolean;
  /** Train on a corpus. Schemes without a training step ignore this. */
  fit(corpus: string[]): void;
  /** Deterministic, fixed-dimension vector; empty text gives the zero vector */
  embed(text: string): EmbeddingVector;
  /** Cosine similarity in [-1, 1]; 0 on dimension mismatch or a zero vector */
  similarity(a: EmbeddingVector, b: EmbeddingVector): number;
}
