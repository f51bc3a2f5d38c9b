import { createHash } from "node:crypto";

import type { EmbeddingBackend, EmbeddingVector } from "../types.ts";

export interface DeterministicBackendOptions {
  modelName: string;
  dimension: number;
  normalize: boolean;
}

const UINT32_HALF = 2 ** 31;

/**
 * Hash-derived vectors: component i is taken from sha256("<text>:<i>").
 * Same text, same vector, on every call and every process.
 */
export function vectorizeText(text: string, dimension: number, normalize: boolean): EmbeddingVector {
  const values = new Float32Array(dimension);
  if (!text) { return Array.from(values); }

  for (let i = 0; i < dimension; i++) {
    const digest = createHash("sha256").update(`${text}:${i}`, "utf8").digest();
    values[i] = digest.readUInt32BE(0) / UINT32_HALF - 1;
  }

  if (normalize) {
    let sumSquares = 0;
    for (let i = 0; i < dimension; i++) {
      const v = values[i] ?? 0;
      sumSquares += v * v;
    }
    const norm = Math.sqrt(sumSquares);
    if (norm > 0) {
      for (let i = 0; i < dimension; i++) {
        values[i] = (values[i] ?? 0) / norm;
      }
    }
  }

  return Array.from(values);
}

export function createDeterministicBackend({
  modelName,
  dimension,
  normalize,
}: DeterministicBackendOptions): EmbeddingBackend {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new Error(`Deterministic backend needs a positive dimension, got ${dimension}`);
  }

  return {
    name: "deterministic",
    modelName,
    dimension,
    async embed(texts: string[]): Promise<EmbeddingVector[]> {
      return texts.map((text) => vectorizeText(text, dimension, normalize));
    },
  };
}
