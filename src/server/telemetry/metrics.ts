import type { Attributes, Counter, Histogram, Meter } from "@opentelemetry/api";

import { createLogger, describeError } from "../log.ts";

const log = createLogger("telemetry.metrics");

export interface EmbeddingsMetricSample {
  /** Resolved backend model. */
  model: string;
  /** `ok` or the error code the request ended with. */
  status: string;
  inputCount: number;
  promptTokens: number | null;
  durationMs: number;
}

export interface EmbeddingsMetrics {
  record(sample: EmbeddingsMetricSample): void;
}

export class NoopEmbeddingsMetrics implements EmbeddingsMetrics {
  record(_sample: EmbeddingsMetricSample): void {
    // telemetry disabled
  }
}

export const METRIC_NAMES = {
  requests: "embeddings_requests_total",
  inputTexts: "embeddings_input_texts_total",
  duration: "embeddings_duration_ms",
  promptTokens: "embeddings_prompt_tokens",
} as const;

export class OtelEmbeddingsMetrics implements EmbeddingsMetrics {
  private readonly requestCounter: Counter;
  private readonly inputTextsCounter: Counter;
  private readonly durationHistogram: Histogram;
  private readonly promptTokensHistogram: Histogram;

  constructor(meter: Meter) {
    this.requestCounter = meter.createCounter(METRIC_NAMES.requests, {
      unit: "1",
      description: "Count of /v1/embeddings requests by model and status.",
    });
    this.inputTextsCounter = meter.createCounter(METRIC_NAMES.inputTexts, {
      unit: "1",
      description: "Total number of input texts processed by /v1/embeddings.",
    });
    this.durationHistogram = meter.createHistogram(METRIC_NAMES.duration, {
      unit: "ms",
      description: "Latency of /v1/embeddings requests.",
    });
    this.promptTokensHistogram = meter.createHistogram(METRIC_NAMES.promptTokens, {
      unit: "1",
      description: "Estimated prompt token count for /v1/embeddings requests.",
    });
  }

  record({ model, status, inputCount, promptTokens, durationMs }: EmbeddingsMetricSample): void {
    const attributes: Attributes = { model, status };
    this.requestCounter.add(1, attributes);
    this.inputTextsCounter.add(Math.max(0, inputCount), attributes);
    this.durationHistogram.record(Math.max(0, durationMs), attributes);
    if (promptTokens !== null) {
      this.promptTokensHistogram.record(Math.max(0, promptTokens), attributes);
    }
  }
}

/** Telemetry never fails a request: recorder errors are logged and dropped. */
export function recordSafely(metrics: EmbeddingsMetrics, sample: EmbeddingsMetricSample): void {
  try {
    metrics.record(sample);
  } catch (error: unknown) {
    log.warn("record_failed", { status: sample.status, error: describeError(error) });
  }
}
