import { metrics as otelMetrics } from "@opentelemetry/api";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { registerInstrumentations } from "@opentelemetry/instrumentation";
import { ExpressInstrumentation } from "@opentelemetry/instrumentation-express";
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { MeterProvider, PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { BatchSpanProcessor, type Sampler, TraceIdRatioBasedSampler } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";

import type { EmbeddingsServerConfig } from "../config/index.ts";
import { createLogger, describeError } from "../log.ts";
import { type EmbeddingsMetrics, NoopEmbeddingsMetrics, OtelEmbeddingsMetrics } from "./metrics.ts";

const log = createLogger("telemetry.setup");

export interface TelemetryRuntime {
  enabled: boolean;
  embeddingsMetrics: EmbeddingsMetrics;
  meterProvider: MeterProvider | null;
  tracerProvider: NodeTracerProvider | null;
  /** Removes the HTTP and Express patches installed at setup. */
  disableInstrumentations: (() => void) | null;
}

function resolveOtlpSignalEndpoint(endpoint: string, signal: "metrics" | "traces"): string {
  const path = `/v1/${signal}`;
  const cleaned = String(endpoint || "").trim().replace(/\/+$/, "");
  if (cleaned.endsWith(path)) { return cleaned; }
  return `${cleaned}${path}`;
}

export function resolveOtlpMetricsEndpoint(endpoint: string): string {
  return resolveOtlpSignalEndpoint(endpoint, "metrics");
}

export function resolveOtlpTracesEndpoint(endpoint: string): string {
  return resolveOtlpSignalEndpoint(endpoint, "traces");
}

export function buildTraceSampler(sampleRatio: number): Sampler {
  return new TraceIdRatioBasedSampler(sampleRatio);
}

/**
 * Starts OTLP/HTTP export of traces and metrics when telemetry is enabled.
 * HTTP and Express instrumentation only patch modules loaded after this
 * call, so the bootstrap imports the app afterwards.
 */
export function setupTelemetry(
  config: Pick<EmbeddingsServerConfig, "serviceName" | "serviceVersion" | "telemetry">,
): TelemetryRuntime {
  if (!config.telemetry.enabled) {
    return {
      enabled: false,
      embeddingsMetrics: new NoopEmbeddingsMetrics(),
      meterProvider: null,
      tracerProvider: null,
      disableInstrumentations: null,
    };
  }

  const { telemetry } = config;
  const resource = resourceFromAttributes({
    "service.name": config.serviceName,
    "service.version": config.serviceVersion,
  });

  const tracesUrl = resolveOtlpTracesEndpoint(telemetry.otlpEndpoint);
  const tracerProvider = new NodeTracerProvider({
    resource,
    sampler: buildTraceSampler(telemetry.sampleRatio),
    spanProcessors: [
      new BatchSpanProcessor(
        new OTLPTraceExporter({
          url: tracesUrl,
          headers: { ...telemetry.otlpHeaders },
          timeoutMillis: telemetry.otlpTimeoutMs,
        }),
      ),
    ],
  });
  tracerProvider.register();

  const metricsUrl = resolveOtlpMetricsEndpoint(telemetry.otlpEndpoint);
  const meterProvider = new MeterProvider({
    resource,
    readers: [
      new PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter({
          url: metricsUrl,
          headers: { ...telemetry.otlpHeaders },
          timeoutMillis: telemetry.otlpTimeoutMs,
        }),
        exportIntervalMillis: telemetry.metricsExportIntervalMs,
        exportTimeoutMillis: Math.min(telemetry.otlpTimeoutMs, telemetry.metricsExportIntervalMs),
      }),
    ],
  });
  otelMetrics.setGlobalMeterProvider(meterProvider);

  const disableInstrumentations = registerInstrumentations({
    tracerProvider,
    meterProvider,
    instrumentations: [new HttpInstrumentation(), new ExpressInstrumentation()],
  });

  log.info("telemetry_enabled", {
    traces: tracesUrl,
    metrics: metricsUrl,
    sampleRatio: telemetry.sampleRatio,
    intervalMs: telemetry.metricsExportIntervalMs,
  });

  return {
    enabled: true,
    embeddingsMetrics: new OtelEmbeddingsMetrics(meterProvider.getMeter(config.serviceName, config.serviceVersion)),
    meterProvider,
    tracerProvider,
    disableInstrumentations,
  };
}

export async function shutdownTelemetry(runtime: TelemetryRuntime): Promise<void> {
  if (!runtime.enabled) { return; }

  runtime.disableInstrumentations?.();

  const providers = [
    { signal: "metrics", provider: runtime.meterProvider },
    { signal: "traces", provider: runtime.tracerProvider },
  ];
  for (const { signal, provider } of providers) {
    if (!provider) { continue; }
    try {
      await provider.shutdown();
    } catch (error: unknown) {
      log.warn("shutdown_failed", { signal, error: describeError(error) });
    }
  }
}
