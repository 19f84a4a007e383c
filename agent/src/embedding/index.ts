import type { EmbeddingScheme } from "../core/config.js";
import { FeatureEmbedder } from "./features.js";
import { TfidfEmbedder } from "./tfidf.js";
import type { Embedder } from "./types.js";

export type { Embedder, EmbeddingVector } from "./types.js";
export { cosineSimilarity } from "./cosine.js";
export { TfidfEmbedder, tokenize } from "./tfidf.js";
export { FeatureEmbedder } from "./features.js";

export function createEmbedder(scheme: EmbeddingScheme): Embedder {
  switch (scheme) {
    case "tfidf":
      return new TfidfEmbedder();
    case "features":
      return new FeatureEmbedder();
  }
}
