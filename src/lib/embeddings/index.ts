/**
 * Embedding vector utilities
 * Similarity math and the binary encoding used for `.vec` files
 */

import { gunzipSync, gzipSync } from "zlib";

/**
 * Compute cosine similarity between two vectors.
 * Returns 0 when either vector is missing, empty, zero-norm, or the dimensions differ.
 */
export function cosineSimilarity(
  vecA: readonly number[] | null | undefined,
  vecB: readonly number[] | null | undefined
): number {
  if (!vecA || !vecB || vecA.length === 0 || vecA.length !== vecB.length) {
    return 0;
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < vecA.length; i++) {
    dotProduct += vecA[i] * vecB[i];
    magnitudeA += vecA[i] * vecA[i];
    magnitudeB += vecB[i] * vecB[i];
  }

  magnitudeA = Math.sqrt(magnitudeA);
  magnitudeB = Math.sqrt(magnitudeB);

  if (magnitudeA === 0 || magnitudeB === 0) {
    return 0;
  }

  return dotProduct / (magnitudeA * magnitudeB);
}

export interface SimilarityMatch<T> {
  item: T;
  score: number;
}

/**
 * Rank candidates by cosine similarity to the query and keep the top K.
 * Candidates without a vector are skipped.
 */
export function topKSimilar<T>(
  queryVector: readonly number[],
  candidates: ReadonlyArray<{ item: T; vector?: readonly number[] }>,
  k: number
): SimilarityMatch<T>[] {
  if (candidates.length === 0 || k <= 0) {
    return [];
  }

  const scored: SimilarityMatch<T>[] = [];
  for (const candidate of candidates) {
    if (!candidate.vector) continue;
    scored.push({ item: candidate.item, score: cosineSimilarity(queryVector, candidate.vector) });
  }

  return scored.sort((a, b) => b.score - a.score).slice(0, k);
}

/**
 * Encode an embedding as gzip-compressed little-endian float32
 */
export function encodeEmbedding(embedding: readonly number[]): Buffer {
  const raw = Buffer.alloc(embedding.length * 4);
  embedding.forEach((value, i) => raw.writeFloatLE(value, i * 4));
  return gzipSync(raw);
}

/**
 * Decode a buffer written by encodeEmbedding. Throws on corrupt input.
 */
export function decodeEmbedding(buffer: Buffer): number[] {
  const raw = gunzipSync(buffer);
  if (raw.length % 4 !== 0) {
    throw new Error(`Embedding payload is not a float32 array (${raw.length} bytes)`);
  }
  const vector: number[] = new Array(raw.length / 4);
  for (let i = 0; i < vector.length; i++) {
    vector[i] = raw.readFloatLE(i * 4);
  }
  return vector;
}
