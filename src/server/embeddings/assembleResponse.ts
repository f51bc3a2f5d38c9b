import { EmbeddingsError } from "./errors.ts";
import type { EmbeddingResponse, EmbeddingVector } from "./types.ts";

/** Whitespace-separated word count; same input, same number. */
export function countPromptTokens(texts: readonly string[]): number {
  let total = 0;
  for (const text of texts) {
    const trimmed = text.trim();
    if (trimmed) { total += trimmed.split(/\s+/).length; }
  }
  return total;
}

/**
 * Checks backend output against the request before it is sent. Any mismatch
 * is a backend contract violation and maps to `internal`.
 */
export function verifyVectors(
  vectors: unknown,
  inputCount: number,
  expectedDimension: number,
): EmbeddingVector[] {
  if (!Array.isArray(vectors)) {
    throw new EmbeddingsError("internal", "Embedding backend returned a non-list result");
  }
  if (vectors.length !== inputCount) {
    throw new EmbeddingsError(
      "internal",
      `Embedding backend returned ${vectors.length} vectors for ${inputCount} inputs`,
    );
  }

  const out: EmbeddingVector[] = [];
  for (let i = 0; i < vectors.length; i++) {
    const vector: unknown = vectors[i];
    if (!Array.isArray(vector)) {
      throw new EmbeddingsError("internal", `Embedding backend returned a non-vector at index ${i}`);
    }
    if (expectedDimension > 0 && vector.length !== expectedDimension) {
      throw new EmbeddingsError(
        "internal",
        `Embedding backend returned invalid vector dimension at index ${i}: expected ${expectedDimension}, got ${vector.length}`,
      );
    }
    const values: number[] = [];
    for (const v of vector) {
      if (typeof v !== "number" || !Number.isFinite(v)) {
        throw new EmbeddingsError("internal", `Embedding backend returned non-finite vector values at index ${i}`);
      }
      values.push(v);
    }
    out.push(values);
  }
  return out;
}

export function assembleEmbeddingResponse(
  model: string,
  vectors: readonly EmbeddingVector[],
  texts: readonly string[],
): EmbeddingResponse {
  const promptTokens = countPromptTokens(texts);
  return {
    object: "list",
    data: vectors.map((embedding, index) => ({ object: "embedding", index, embedding })),
    model,
    usage: { prompt_tokens: promptTokens, total_tokens: promptTokens },
  };
}
