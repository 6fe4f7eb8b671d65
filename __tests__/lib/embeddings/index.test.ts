/**
 * Tests for embedding similarity and encoding
 */

import { describe, it, expect } from "vitest";
import { gzipSync } from "zlib";
import {
  cosineSimilarity,
  decodeEmbedding,
  encodeEmbedding,
  topKSimilar,
} from "../../../src/lib/embeddings";

describe("cosineSimilarity", () => {
  it("should be 1 for parallel vectors", () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
  });

  it("should be 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("should be 0 for a zero-norm vector instead of NaN", () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
  });

  it("should be 0 for missing, empty or mismatched vectors", () => {
    expect(cosineSimilarity(undefined, [1])).toBe(0);
    expect(cosineSimilarity(null, null)).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
  });
});

describe("topKSimilar", () => {
  const candidates = [
    { item: "east", vector: [1, 0] },
    { item: "north", vector: [0, 1] },
    { item: "north-east", vector: [1, 1] },
    { item: "no-vector" },
  ];

  it("should rank by similarity and keep k", () => {
    const matches = topKSimilar([1, 0.1], candidates, 2);
    expect(matches.map((m) => m.item)).toEqual(["east", "north-east"]);
  });

  it("should skip candidates without vectors", () => {
    const matches = topKSimilar([1, 1], candidates, 10);
    expect(matches.map((m) => m.item)).not.toContain("no-vector");
    expect(matches).toHaveLength(3);
  });

  it("should return nothing for k <= 0", () => {
    expect(topKSimilar([1, 0], candidates, 0)).toEqual([]);
  });
});

describe("embedding encoding", () => {
  it("should decode what it encodes at float32 precision", () => {
    const decoded = decodeEmbedding(encodeEmbedding([0.5, -1.25, 3]));
    expect(decoded).toEqual([0.5, -1.25, 3]);
  });

  it("should reject data that is not gzip", () => {
    expect(() => decodeEmbedding(Buffer.from("not a vector"))).toThrow();
  });

  it("should reject a payload that is not a whole number of floats", () => {
    expect(() => decodeEmbedding(gzipSync(Buffer.from([1, 2, 3])))).toThrow(/not a float32 array/);
  });
});
