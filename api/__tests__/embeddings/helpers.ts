import { vi } from "vitest";

import { loadConfig } from "../../../src/server/config/index.ts";
import type { EmbedOptions, EmbeddingBackend, EmbeddingVector } from "../../../src/server/embeddings/types.ts";
import type { EmbeddingsMetricSample, EmbeddingsMetrics } from "../../../src/server/telemetry/metrics.ts";

export const TEST_MODEL = "nomic-ai/nomic-embed-text-v1.5";

export function makeConfig(env: Record<string, string> = {}) {
  return loadConfig({ NODE_ENV: "test", ...env });
}

export function makeVec(dim: number, hotIndex = 0): number[] {
  const v = new Array<number>(dim).fill(0);
  if (dim > 0) { v[Math.max(0, Math.min(dim - 1, hotIndex))] = 1; }
  return v;
}

export type EmbedImpl = (texts: string[], options?: EmbedOptions) => Promise<EmbeddingVector[]>;

/** Backend whose `embed` is a vi.fn, returning one-hot vectors by default. */
export function makeFakeBackend(dimension = 4, impl?: EmbedImpl) {
  const oneHot: EmbedImpl = async (texts) => texts.map((_t, i) => makeVec(dimension, i));
  const embed = vi.fn(impl ?? oneHot);
  const backend: EmbeddingBackend = {
    name: "fake",
    modelName: TEST_MODEL,
    dimension,
    embed,
  };
  return { backend, embed };
}

export class RecordingMetrics implements EmbeddingsMetrics {
  readonly samples: EmbeddingsMetricSample[] = [];

  record(sample: EmbeddingsMetricSample): void {
    this.samples.push(sample);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Stubs global fetch with an Ollama `/api/embed` double that answers every input with `vectorFor`. */
export function stubOllamaEmbed(vectorFor: (text: string, index: number) => number[]) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, init?: RequestInit) => {
    const body: unknown = JSON.parse(String(init?.body ?? "{}"));
    const input = body && typeof body === "object" && "input" in body && Array.isArray(body.input) ? body.input : [];
    return jsonResponse({ embeddings: input.map((t, i) => vectorFor(String(t), i)) });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}
