import { z } from "zod";

import { invalidRequest } from "./errors.ts";
import type { EmbeddingLimits, EmbeddingRequest } from "./types.ts";

const requestSchema = z.object({
  model: z.string({
    required_error: "Field 'model' is required.",
    invalid_type_error: "Field 'model' must be a string.",
  }),
  input: z.unknown(),
  encoding_format: z
    .literal("float", { errorMap: () => ({ message: "Only encoding_format 'float' is supported." }) })
    .optional(),
  dimensions: z
    .number({ invalid_type_error: "Field 'dimensions' must be a positive integer." })
    .int("Field 'dimensions' must be a positive integer.")
    .positive("Field 'dimensions' must be a positive integer.")
    .optional(),
  user: z.string({ invalid_type_error: "Field 'user' must be a string." }).optional(),
});

/** Length in Unicode code points, so astral characters count once. */
export function textLength(text: string): number {
  let n = 0;
  for (const _ of text) { n++; }
  return n;
}

/**
 * Normalizes and bounds-checks a raw request body. Throws an
 * `invalid_request` EmbeddingsError on the first problem found.
 */
export function validateEmbeddingRequest(body: unknown, limits: EmbeddingLimits): EmbeddingRequest {
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    throw invalidRequest("Request body must be a JSON object.");
  }

  const parsed = requestSchema.safeParse(body);
  if (!parsed.success) {
    throw invalidRequest(parsed.error.issues[0]?.message ?? "Malformed embeddings request.");
  }

  const model = parsed.data.model.trim();
  if (!model) {
    throw invalidRequest("Field 'model' is required.");
  }

  const raw = parsed.data.input;
  if (raw === undefined || raw === null) {
    throw invalidRequest("Field 'input' is required.");
  }
  if (typeof raw !== "string" && !Array.isArray(raw)) {
    throw invalidRequest("Field 'input' must be a string or an array of strings.");
  }
  const items: unknown[] = typeof raw === "string" ? [raw] : raw;

  if (items.length === 0) {
    throw invalidRequest("Embedding input list cannot be empty.");
  }

  const input: string[] = [];
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (typeof item !== "string") {
      throw invalidRequest(`Embedding input at index ${i} must be a string.`);
    }
    input.push(item);
  }

  if (input.length > limits.maxBatchSize) {
    throw invalidRequest(
      `Embedding input batch size ${input.length} exceeds configured limit ${limits.maxBatchSize}.`,
    );
  }

  let totalChars = 0;
  for (let i = 0; i < input.length; i++) {
    const len = textLength(input[i] ?? "");
    if (len > limits.maxInputChars) {
      throw invalidRequest(
        `Embedding input at index ${i} exceeds configured character limit ${limits.maxInputChars}.`,
      );
    }
    totalChars += len;
  }

  if (totalChars > limits.maxTotalChars) {
    throw invalidRequest(
      `Total embedding input size ${totalChars} exceeds configured character limit ${limits.maxTotalChars}.`,
    );
  }

  return { model, input };
}
