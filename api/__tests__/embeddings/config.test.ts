import { describe, expect, it } from "vitest";

import { ConfigError, loadConfig, parseHeaderList } from "../../../src/server/config/index.ts";

describe("loadConfig", () => {
  it("applies defaults when the environment is empty", () => {
    const config = loadConfig({});
    expect(config.serviceName).toBe("local-embeddings-server");
    expect(config.server.port).toBe(8181);
    expect(config.embedding).toEqual({
      enabled: true,
      backend: "deterministic",
      modelName: "nomic-ai/nomic-embed-text-v1.5",
      dimension: 768,
      ollamaBaseUrl: "http://127.0.0.1:11434",
      loadTimeoutMs: 120_000,
      normalize: true,
      maxBatchSize: 64,
      maxInputChars: 32_768,
      maxTotalChars: 262_144,
      backendTimeoutMs: 30_000,
    });
    expect(config.telemetry.enabled).toBe(false);
    expect(config.telemetry.sampleRatio).toBe(1);
    expect(config.telemetry.otlpHeaders).toEqual({});
  });

  it("coerces numbers, booleans and the backend name", () => {
    const config = loadConfig({
      PORT: "9000",
      EMBEDDINGS_ENABLED: "off",
      EMBEDDINGS_BACKEND: " Ollama ",
      EMBEDDINGS_NORMALIZE: "NO",
      EMBEDDINGS_MAX_BATCH_SIZE: "2",
      EMBEDDINGS_BACKEND_TIMEOUT_MS: "150",
      TELEMETRY_ENABLED: "yes",
      TELEMETRY_OTLP_HEADERS: "x-api-key=test-secret, x-team = search",
    });

    expect(config.server.port).toBe(9000);
    expect(config.embedding.enabled).toBe(false);
    expect(config.embedding.backend).toBe("ollama");
    expect(config.embedding.normalize).toBe(false);
    expect(config.embedding.maxBatchSize).toBe(2);
    expect(config.embedding.backendTimeoutMs).toBe(150);
    expect(config.telemetry.enabled).toBe(true);
    expect(config.telemetry.otlpHeaders).toEqual({ "x-api-key": "test-secret", "x-team": "search" });
  });

  it("returns a frozen snapshot", () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.embedding)).toBe(true);
    expect(Object.isFrozen(config.telemetry.otlpHeaders)).toBe(true);
  });

  it("rejects out-of-range and malformed values with every offending variable", () => {
    let caught: unknown;
    try {
      loadConfig({
        EMBEDDINGS_DIMENSION: "4",
        EMBEDDINGS_ENABLED: "maybe",
        EMBEDDINGS_BACKEND: "gpu",
      });
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues.join("\n") : "";
    expect(issues).toContain("EMBEDDINGS_DIMENSION");
    expect(issues).toContain("EMBEDDINGS_ENABLED");
    expect(issues).toContain("EMBEDDINGS_BACKEND");
  });

  it("reads the trace sample ratio within 0..1", () => {
    expect(loadConfig({ TELEMETRY_SAMPLE_RATIO: "0.25" }).telemetry.sampleRatio).toBe(0.25);
    expect(loadConfig({ TELEMETRY_SAMPLE_RATIO: "0" }).telemetry.sampleRatio).toBe(0);
    expect(() => loadConfig({ TELEMETRY_SAMPLE_RATIO: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ TELEMETRY_SAMPLE_RATIO: "-0.1" })).toThrow(ConfigError);
    expect(() => loadConfig({ TELEMETRY_SAMPLE_RATIO: "half" })).toThrow(ConfigError);
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadConfig({ EMBEDDINGS_BACKEND_TIMEOUT_MS: "soon" })).toThrow(ConfigError);
  });
});

describe("parseHeaderList", () => {
  it("skips entries without a key", () => {
    expect(parseHeaderList("=x,a=1,b,c=")).toEqual({ a: "1", c: "" });
  });
});
