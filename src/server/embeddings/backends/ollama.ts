import { createLogger, describeError } from "../../log.ts";
import { EmbeddingsError } from "../errors.ts";
import type { EmbedOptions, EmbeddingBackend, EmbeddingVector } from "../types.ts";
import { ExecutionLane } from "./executionLane.ts";

const log = createLogger("embeddings.ollama");

const PROBE_TEXT = "dimension probe";

export interface OllamaBackendOptions {
  baseUrl: string;
  modelName: string;
  normalize: boolean;
  /** How long the probe that loads the model may take. */
  loadTimeoutMs?: number;
}

function sanitizeBaseUrl(url: string): string {
  return String(url || "").trim().replace(/\/+$/, "");
}

function isFiniteNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number" && Number.isFinite(v));
}

function toOneLine(input: string): string {
  return String(input || "")
    .replace(/[\r\n\t]+/g, " ")
    .replace(/\s{2,}/g, " ")
    .trim();
}

export function l2Normalize(vec: number[]): number[] {
  let norm = 0;
  for (const v of vec) norm += v * v;
  norm = Math.sqrt(norm);
  if (norm === 0) return vec;
  return vec.map((v) => v / norm);
}

function readEmbeddings(json: unknown, expected: number, model: string): EmbeddingVector[] {
  const embeddings =
    json && typeof json === "object" && "embeddings" in json ? json.embeddings : undefined;

  if (!Array.isArray(embeddings)) {
    throw new Error(`Ollama /api/embed did not return an embeddings array for model "${model}"`);
  }
  if (embeddings.length !== expected) {
    throw new Error(`Ollama returned ${embeddings.length} vectors for ${expected} inputs`);
  }

  const vectors: EmbeddingVector[] = [];
  for (let i = 0; i < embeddings.length; i++) {
    const v: unknown = embeddings[i];
    if (!isFiniteNumberArray(v)) {
      throw new Error(`Ollama embeddings response at index ${i} is not a numeric vector`);
    }
    vectors.push(v);
  }
  return vectors;
}

/**
 * Local-model backend backed by an Ollama daemon on this host. The model is
 * pulled into memory once by a probe at startup and pinned with
 * `keep_alive: -1`. Calls share one single-flight lane because the daemon
 * runs one copy of the model; the HTTP wait itself never blocks the event
 * loop.
 */
export async function createOllamaBackend({
  baseUrl,
  modelName,
  normalize,
  loadTimeoutMs = 120_000,
}: OllamaBackendOptions): Promise<EmbeddingBackend> {
  const url = `${sanitizeBaseUrl(baseUrl)}/api/embed`;
  const lane = new ExecutionLane(`ollama:${modelName}`);

  async function encode(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
    let resp: Response;
    try {
      resp = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: modelName, input: texts, keep_alive: -1 }),
        ...(signal ? { signal } : {}),
      });
    } catch (error: unknown) {
      if (signal?.aborted) { throw error; }
      throw new EmbeddingsError("upstream_error", `Ollama is unreachable at ${url}: ${describeError(error)}`, {
        cause: error,
      });
    }

    const json: unknown = await resp.json().catch(() => null);
    if (!resp.ok) {
      const detail = json && typeof json === "object" && "error" in json ? ` ${toOneLine(String(json.error))}` : "";
      const message = `Ollama embeddings request failed (HTTP ${resp.status}) for model "${modelName}".${detail}`;
      // A 400 means Ollama rejected what we sent; anything else is the daemon or its model.
      if (resp.status === 400) { throw new Error(message); }
      throw new EmbeddingsError("upstream_error", message);
    }

    const vectors = readEmbeddings(json, texts.length, modelName);
    return normalize ? vectors.map(l2Normalize) : vectors;
  }

  const startedAt = Date.now();
  const [probe] = await lane.run(() => encode([PROBE_TEXT], AbortSignal.timeout(loadTimeoutMs)));
  const dimension = probe?.length ?? 0;
  if (dimension <= 0) {
    throw new Error(`Local model "${modelName}" returned an empty probe vector`);
  }

  log.info("model_loaded", { model: modelName, dimension, loadMs: Date.now() - startedAt });

  return {
    name: "ollama",
    modelName,
    dimension,
    async embed(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]> {
      const signal = options?.signal;
      try {
        return await lane.run(() => encode(texts, signal), signal);
      } catch (error: unknown) {
        log.debug("embed_failed", { model: modelName, queued: lane.pending, error: describeError(error) });
        throw error;
      }
    },
  };
}
