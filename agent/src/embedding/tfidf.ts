/**
 * TF-IDF Embedder
 *
 * Corpus-dependent scheme: fit() learns a vocabulary and IDF table, after
 * which both are frozen for the life of the process. Vectors are
 * min(maxDimensions, |vocab|) long and L2-normalized.
 */

import { createHash } from "crypto";
import { createComponentLogger } from "../logging.js";
import { cosineSimilarity, normalize } from "./cosine.js";
import type { Embedder, EmbeddingVector } from "./types.js";

const log = createComponentLogger("embedding.tfidf");

const DEFAULT_MAX_DIMENSIONS = 100;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, "")
    .split(/\s+/)
    .filter(token => token.length > 0);
}

export class TfidfEmbedder implements Embedder {
  readonly scheme = "tfidf";
  private vocab = new Map<string, number>();
  private idf = new Map<string, number>();
  private fitted = false;
  private id = "tfidf:unfitted";

  constructor(private readonly maxDimensions: number = DEFAULT_MAX_DIMENSIONS) {}

  get ready(): boolean {
    return this.fitted;
  }

  get modelId(): string {
    return this.id;
  }

  get dimensions(): number {
    return Math.min(this.maxDimensions, this.vocab.size);
  }

  get vocabularySize(): number {
    return this.vocab.size;
  }

  fit(corpus: string[]): void {
    if (this.fitted) {
      log.warn("Vocabulary already fitted; ignoring refit", { vocab: this.vocab.size });
      return;
    }

    const docs = corpus.map(tokenize).filter(tokens => tokens.length > 0);
    if (docs.length === 0) {
      log.debug("Empty corpus; staying unfitted");
      return;
    }

    const docCounts = new Map<string, number>();
    for (const tokens of docs) {
      for (const token of tokens) {
        if (!this.vocab.has(token)) this.vocab.set(token, this.vocab.size);
      }
      for (const token of new Set(tokens)) {
        docCounts.set(token, (docCounts.get(token) ?? 0) + 1);
      }
    }

    // Smoothed IDF keeps every weight positive, even for tokens in every document
    const total = docs.length;
    for (const [token, df] of docCounts) {
      this.idf.set(token, Math.log((1 + total) / (1 + df)) + 1);
    }

    const fingerprint = createHash("sha1")
      .update([...this.vocab.keys()].slice(0, this.dimensions).join("\u0000"))
      .digest("hex")
      .slice(0, 12);
    this.id = `tfidf:${this.dimensions}:${fingerprint}`;
    this.fitted = true;

    log.info("Vocabulary fitted", { documents: total, vocab: this.vocab.size, dimensions: this.dimensions });
  }

  embed(text: string): EmbeddingVector {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);
    if (tokens.length === 0 || vector.length === 0) return vector;

    const counts = new Map<string, number>();
    for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1);

    for (const [token, count] of counts) {
      const index = this.vocab.get(token);
      if (index === undefined || index >= vector.length) continue;
      vector[index] = (count / tokens.length) * (this.idf.get(token) ?? 1);
    }

    return normalize(vector);
  }

  similarity(a: EmbeddingVector, b: EmbeddingVector): number {
    return cosineSimilarity(a, b);
  }
}
