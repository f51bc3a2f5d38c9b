import { z } from "zod";

export const BACKEND_KINDS = ["deterministic", "ollama"] as const;
export type BackendKind = (typeof BACKEND_KINDS)[number];

export interface ServerConfig {
  host: string;
  port: number;
  bodyLimitBytes: number;
}

export interface EmbeddingConfig {
  enabled: boolean;
  backend: BackendKind;
  modelName: string;
  /** Vector size for the deterministic backend. The local model reports its own. */
  dimension: number;
  ollamaBaseUrl: string;
  /** Upper bound on the startup probe that loads the local model. */
  loadTimeoutMs: number;
  normalize: boolean;
  maxBatchSize: number;
  maxInputChars: number;
  maxTotalChars: number;
  backendTimeoutMs: number;
}

export interface TelemetryConfig {
  enabled: boolean;
  otlpEndpoint: string;
  otlpTimeoutMs: number;
  metricsExportIntervalMs: number;
  /** Fraction of traces kept, 0..1. */
  sampleRatio: number;
  otlpHeaders: Record<string, string>;
}

export interface EmbeddingsServerConfig {
  serviceName: string;
  serviceVersion: string;
  server: ServerConfig;
  embedding: EmbeddingConfig;
  telemetry: TelemetryConfig;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const TRUE_WORDS = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "n", "off"]);

function boolFromEnv(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw == null || raw.trim() === "") { return fallback; }
      const v = raw.trim().toLowerCase();
      if (TRUE_WORDS.has(v)) { return true; }
      if (FALSE_WORDS.has(v)) { return false; }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${raw}"` });
      return z.NEVER;
    });
}

function intFromEnv(fallback: number, min: number, max: number) {
  return z
    .string()
    .optional()
    .transform((raw) => (raw == null || raw.trim() === "" ? fallback : Number(raw.trim())))
    .pipe(z.number().int().min(min).max(max));
}

function ratioFromEnv(fallback: number) {
  return z
    .string()
    .optional()
    .transform((raw) => (raw == null || raw.trim() === "" ? fallback : Number(raw.trim())))
    .pipe(z.number().min(0).max(1));
}

function stringFromEnv(fallback: string) {
  return z
    .string()
    .optional()
    .transform((raw) => String(raw ?? "").trim() || fallback);
}

/** Parses `key=value,key2=value2` into a header map. */
export function parseHeaderList(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const part of raw.split(",")) {
    const eq = part.indexOf("=");
    if (eq <= 0) { continue; }
    const key = part.slice(0, eq).trim();
    const value = part.slice(eq + 1).trim();
    if (key) { out[key] = value; }
  }
  return out;
}

const envSchema = z.object({
  EMBEDDINGS_SERVICE_NAME: stringFromEnv("local-embeddings-server"),
  EMBEDDINGS_SERVICE_VERSION: stringFromEnv("0.1.0"),
  HOST: stringFromEnv("0.0.0.0"),
  PORT: intFromEnv(8181, 1, 65_535),
  EMBEDDINGS_BODY_LIMIT_BYTES: intFromEnv(8 * 1024 * 1024, 1024, 100 * 1024 * 1024),
  EMBEDDINGS_ENABLED: boolFromEnv(true),
  EMBEDDINGS_BACKEND: stringFromEnv("deterministic")
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(BACKEND_KINDS)),
  EMBEDDINGS_MODEL: stringFromEnv("nomic-ai/nomic-embed-text-v1.5"),
  EMBEDDINGS_DIMENSION: intFromEnv(768, 8, 8192),
  OLLAMA_BASE_URL: stringFromEnv("http://127.0.0.1:11434").pipe(z.string().url()),
  EMBEDDINGS_LOAD_TIMEOUT_MS: intFromEnv(120_000, 1, 3_600_000),
  EMBEDDINGS_NORMALIZE: boolFromEnv(true),
  EMBEDDINGS_MAX_BATCH_SIZE: intFromEnv(64, 1, 2048),
  EMBEDDINGS_MAX_INPUT_CHARS: intFromEnv(32_768, 1, 1_000_000),
  EMBEDDINGS_MAX_TOTAL_CHARS: intFromEnv(262_144, 1, 5_000_000),
  EMBEDDINGS_BACKEND_TIMEOUT_MS: intFromEnv(30_000, 1, 600_000),
  TELEMETRY_ENABLED: boolFromEnv(false),
  TELEMETRY_OTLP_ENDPOINT: stringFromEnv("http://127.0.0.1:4318").pipe(z.string().url()),
  TELEMETRY_OTLP_TIMEOUT_MS: intFromEnv(10_000, 1, 120_000),
  TELEMETRY_METRICS_EXPORT_INTERVAL_MS: intFromEnv(5_000, 250, 60_000),
  TELEMETRY_SAMPLE_RATIO: ratioFromEnv(1),
  TELEMETRY_OTLP_HEADERS: stringFromEnv("").transform(parseHeaderList),
});

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === "object") {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Builds the process-lifetime configuration snapshot from environment
 * variables. The result is deeply frozen.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<EmbeddingsServerConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  const config: EmbeddingsServerConfig = {
    serviceName: e.EMBEDDINGS_SERVICE_NAME,
    serviceVersion: e.EMBEDDINGS_SERVICE_VERSION,
    server: {
      host: e.HOST,
      port: e.PORT,
      bodyLimitBytes: e.EMBEDDINGS_BODY_LIMIT_BYTES,
    },
    embedding: {
      enabled: e.EMBEDDINGS_ENABLED,
      backend: e.EMBEDDINGS_BACKEND,
      modelName: e.EMBEDDINGS_MODEL,
      dimension: e.EMBEDDINGS_DIMENSION,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
      loadTimeoutMs: e.EMBEDDINGS_LOAD_TIMEOUT_MS,
      normalize: e.EMBEDDINGS_NORMALIZE,
      maxBatchSize: e.EMBEDDINGS_MAX_BATCH_SIZE,
      maxInputChars: e.EMBEDDINGS_MAX_INPUT_CHARS,
      maxTotalChars: e.EMBEDDINGS_MAX_TOTAL_CHARS,
      backendTimeoutMs: e.EMBEDDINGS_BACKEND_TIMEOUT_MS,
    },
    telemetry: {
      enabled: e.TELEMETRY_ENABLED,
      otlpEndpoint: e.TELEMETRY_OTLP_ENDPOINT,
      otlpTimeoutMs: e.TELEMETRY_OTLP_TIMEOUT_MS,
      metricsExportIntervalMs: e.TELEMETRY_METRICS_EXPORT_INTERVAL_MS,
      sampleRatio: e.TELEMETRY_SAMPLE_RATIO,
      otlpHeaders: e.TELEMETRY_OTLP_HEADERS,
    },
  };

  return deepFreeze(config);
}
