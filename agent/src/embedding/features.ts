/**
 * Feature Embedder
 *
 * Corpus-free 50-dimension vector usable without a fitting step:
 * length, word count, per-letter frequency and punctuation signals.
 */

import { cosineSimilarity, normalize } from "./cosine.js";
import type { Embedder, EmbeddingVector } from "./types.js";

const DIMENSIONS = 50;
const LETTERS = "abcdefghijklmnopqrstuvwxyz";
const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

export class FeatureEmbedder implements Embedder {
  readonly scheme = "features";
  readonly modelId = `features:${DIMENSIONS}`;
  readonly dimensions = DIMENSIONS;
  readonly ready = true;

  fit(): void {
    // no training step
  }

  embed(text: string): EmbeddingVector {
    const vector = new Array<number>(DIMENSIONS).fill(0);
    if (text.length === 0) return vector;

    const lower = text.toLowerCase();
    const words = lower.split(/\s+/).filter(w => w.length > 0);

    vector[0] = Math.min(text.length / 100, 1);
    vector[1] = Math.min(words.length / 50, 1);

    let alphabetic = 0;
    const letterCounts = new Array<number>(LETTERS.length).fill(0);
    for (const ch of lower) {
      const index = LETTERS.indexOf(ch);
      if (index >= 0) {
        letterCounts[index]++;
        alphabetic++;
      }
    }
    if (alphabetic > 0) {
      for (let i = 0; i < LETTERS.length; i++) vector[2 + i] = letterCounts[i] / alphabetic;
    }

    const punctuation = text.match(PUNCTUATION)?.length ?? 0;
    vector[28] = punctuation / text.length;
    vector[29] = text.includes("?") ? 1 : 0;
    vector[30] = text.includes("!") ? 1 : 0;

    return normalize(vector);
  }

  similarity(a: EmbeddingVector, b: EmbeddingVector): number {
    return cosineSimilarity(a, b);
  }
}
