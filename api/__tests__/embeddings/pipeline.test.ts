import { afterEach, describe, expect, it, vi } from "vitest";

import { createOllamaBackend } from "../../../src/server/embeddings/backends/index.ts";
import { EmbeddingsError } from "../../../src/server/embeddings/errors.ts";
import { runEmbeddingsPipeline } from "../../../src/server/embeddings/pipeline.ts";
import type { EmbeddingsCapability } from "../../../src/server/embeddings/types.ts";
import type { EmbeddingsMetrics } from "../../../src/server/telemetry/metrics.ts";
import { makeConfig, makeFakeBackend, makeVec, RecordingMetrics, sleep, stubOllamaEmbed, TEST_MODEL } from "./helpers.ts";

function setup(env: Record<string, string> = {}, capability?: EmbeddingsCapability) {
  const config = makeConfig({ EMBEDDINGS_MAX_BATCH_SIZE: "3", ...env });
  const fake = makeFakeBackend(4);
  const metrics = new RecordingMetrics();
  let clock = 1_000;
  const deps = {
    config: config.embedding,
    capability: capability ?? { state: "ready" as const, backend: fake.backend },
    metrics,
    now: () => (clock += 5),
  };
  return { deps, fake, metrics };
}

describe("runEmbeddingsPipeline", () => {
  it("embeds a single string and records an ok sample", async () => {
    const { deps, fake, metrics } = setup();

    const result = await runEmbeddingsPipeline(deps, { model: "nomic-embed-text", input: "hello world" });

    expect(result).toEqual({
      status: 200,
      outcome: "ok",
      body: {
        object: "list",
        data: [{ object: "embedding", index: 0, embedding: makeVec(4, 0) }],
        model: "nomic-embed-text",
        usage: { prompt_tokens: 2, total_tokens: 2 },
      },
    });
    expect(fake.embed).toHaveBeenCalledTimes(1);
    expect(fake.embed.mock.calls[0]?.[0]).toEqual(["hello world"]);
    expect(metrics.samples).toEqual([
      { model: TEST_MODEL, status: "ok", inputCount: 1, promptTokens: 2, durationMs: 5 },
    ]);
  });

  it("rejects an unknown alias before any backend call", async () => {
    const { deps, fake, metrics } = setup();

    const result = await runEmbeddingsPipeline(deps, { model: "unknown-model", input: "x" });

    expect(result.status).toBe(400);
    expect(result.body).toEqual({
      error: { code: "invalid_request", message: "Unsupported embedding model 'unknown-model'." },
    });
    expect(fake.embed).not.toHaveBeenCalled();
    expect(metrics.samples).toEqual([
      { model: TEST_MODEL, status: "invalid_request", inputCount: 1, promptTokens: null, durationMs: 5 },
    ]);
  });

  it("short-circuits with upstream_error when embeddings are disabled", async () => {
    const { deps, metrics } = setup({ EMBEDDINGS_ENABLED: "false" }, { state: "disabled" });

    const result = await runEmbeddingsPipeline(deps, { model: "nomic-embed-text", input: "x" });

    expect(result).toEqual({
      status: 503,
      outcome: "upstream_error",
      body: { error: { code: "upstream_error", message: "Embedding backend is unavailable." } },
    });
    expect(metrics.samples[0]?.status).toBe("upstream_error");
  });

  it("short-circuits with upstream_error when the backend failed to load", async () => {
    const { deps } = setup({}, { state: "unavailable", backendName: "ollama" });
    const result = await runEmbeddingsPipeline(deps, { model: "nomic-embed-text", input: "x" });
    expect(result.status).toBe(503);
    expect(result.outcome).toBe("upstream_error");
  });

  it("maps a slow backend to upstream_timeout within the deadline", async () => {
    const { deps, fake } = setup({ EMBEDDINGS_BACKEND_TIMEOUT_MS: "25" });
    fake.embed.mockImplementation(async (texts) => {
      await sleep(400);
      return texts.map(() => makeVec(4));
    });

    const startedAt = Date.now();
    const result = await runEmbeddingsPipeline(deps, { model: "nomic-embed-text", input: ["a", "b"] });

    expect(Date.now() - startedAt).toBeLessThan(300);
    expect(result).toEqual({
      status: 504,
      outcome: "upstream_timeout",
      body: { error: { code: "upstream_timeout", message: "Embedding backend timed out." } },
    });
  });

  it("hides backend exception text behind the internal envelope", async () => {
    const { deps, fake, metrics } = setup();
    fake.embed.mockRejectedValue(new Error("segfault in /opt/private/model.onnx"));

    const result = await runEmbeddingsPipeline(deps, { model: "nomic-embed-text", input: "x" });

    expect(result).toEqual({
      status: 500,
      outcome: "internal",
      body: { error: { code: "internal", message: "Embedding generation failed." } },
    });
    expect(metrics.samples[0]).toEqual({
      model: TEST_MODEL,
      status: "internal",
      inputCount: 1,
      promptTokens: 1,
      durationMs: 5,
    });
  });

  it.each([
    ["too few vectors", [makeVec(4)]],
    ["wrong dimension", [makeVec(4), makeVec(3)]],
    ["non-finite values", [makeVec(4), [0, Number.POSITIVE_INFINITY, 0, 0]]],
  ])("maps %s to internal", async (_label, vectors) => {
    const { deps, fake } = setup();
    fake.embed.mockResolvedValue(vectors);

    const result = await runEmbeddingsPipeline(deps, { model: "nomic-embed-text", input: ["a", "b"] });

    expect(result.status).toBe(500);
    expect(result.outcome).toBe("internal");
  });

  it("still answers when the metrics recorder throws", async () => {
    const broken: EmbeddingsMetrics = {
      record: () => {
        throw new Error("collector down");
      },
    };
    const { deps } = setup();

    const result = await runEmbeddingsPipeline({ ...deps, metrics: broken }, { model: "nomic-embed-text", input: "x" });

    expect(result.status).toBe(200);
  });

  it("passes a backend upstream_error through as 503", async () => {
    const { deps, fake, metrics } = setup();
    fake.embed.mockRejectedValue(new EmbeddingsError("upstream_error", "daemon went away"));

    const result = await runEmbeddingsPipeline(deps, { model: "nomic-embed-text", input: "x" });

    expect(result).toEqual({
      status: 503,
      outcome: "upstream_error",
      body: { error: { code: "upstream_error", message: "Embedding backend is unavailable." } },
    });
    expect(metrics.samples[0]?.status).toBe("upstream_error");
  });

  it("still maps other typed backend failures to internal", async () => {
    const { deps, fake } = setup();
    fake.embed.mockRejectedValue(new EmbeddingsError("invalid_request", "backend-side detail"));

    const result = await runEmbeddingsPipeline(deps, { model: "nomic-embed-text", input: "x" });

    expect(result.status).toBe(500);
    expect(result.body).toEqual({ error: { code: "internal", message: "Embedding generation failed." } });
  });
});

describe("runEmbeddingsPipeline with the ollama backend", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("answers 503 when the daemon drops after startup", async () => {
    const fetchMock = stubOllamaEmbed(() => makeVec(4));
    const backend = await createOllamaBackend({ baseUrl: "http://127.0.0.1:11434", modelName: TEST_MODEL, normalize: false });
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const config = makeConfig({ EMBEDDINGS_BACKEND: "ollama" });

    const result = await runEmbeddingsPipeline(
      { config: config.embedding, capability: { state: "ready", backend }, metrics: new RecordingMetrics() },
      { model: "nomic-embed-text", input: "x" },
    );

    expect(result.status).toBe(503);
    expect(result.body).toEqual({ error: { code: "upstream_error", message: "Embedding backend is unavailable." } });
  });
});
