import type { EmbeddingConfig } from "../config/index.ts";
import { createLogger, describeError } from "../log.ts";
import { type EmbeddingsMetrics, recordSafely } from "../telemetry/metrics.ts";
import { assembleEmbeddingResponse, countPromptTokens, verifyVectors } from "./assembleResponse.ts";
import { runWithDeadline } from "./deadline.ts";
import { EmbeddingsError, type EmbeddingsErrorCode, type ErrorEnvelope, invalidRequest, isEmbeddingsError, toErrorResponse } from "./errors.ts";
import { resolveModelAlias } from "./modelAliases.ts";
import type { EmbeddingResponse, EmbeddingsCapability } from "./types.ts";
import { validateEmbeddingRequest } from "./validateRequest.ts";

const log = createLogger("embeddings.pipeline");

export interface EmbeddingsPipelineDeps {
  config: Readonly<EmbeddingConfig>;
  capability: EmbeddingsCapability;
  metrics: EmbeddingsMetrics;
  now?: () => number;
}

export type PipelineResult =
  | { status: 200; body: EmbeddingResponse; outcome: "ok" }
  | { status: number; body: ErrorEnvelope; outcome: EmbeddingsErrorCode };

interface Progress {
  inputCount: number;
  promptTokens: number | null;
}

/**
 * Turns one raw /v1/embeddings body into a response. Never throws: every
 * failure ends as a canonical error envelope, and exactly one metrics sample
 * is recorded per call.
 */
export async function runEmbeddingsPipeline(
  deps: EmbeddingsPipelineDeps,
  body: unknown,
): Promise<PipelineResult> {
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const progress: Progress = { inputCount: 0, promptTokens: null };

  function finish(result: PipelineResult): PipelineResult {
    recordSafely(deps.metrics, {
      model: deps.config.modelName,
      status: result.outcome,
      inputCount: progress.inputCount,
      promptTokens: progress.promptTokens,
      durationMs: now() - startedAt,
    });
    return result;
  }

  try {
    const backend = deps.capability.state === "ready" ? deps.capability.backend : null;
    if (!deps.config.enabled || !backend) {
      throw new EmbeddingsError(
        "upstream_error",
        deps.capability.state === "unavailable" ? "Embedding backend failed to initialize" : "Embeddings are disabled",
      );
    }

    const request = validateEmbeddingRequest(body, deps.config);
    progress.inputCount = request.input.length;

    const resolved = resolveModelAlias(request.model, backend.modelName);
    if (!resolved) {
      throw invalidRequest(`Unsupported embedding model '${request.model}'.`);
    }

    progress.promptTokens = countPromptTokens(request.input);

    const outcome = await runWithDeadline(
      (signal) => backend.embed(request.input, { signal }),
      deps.config.backendTimeoutMs,
    );

    if (outcome.kind === "timed_out") {
      throw new EmbeddingsError("upstream_timeout", `Embedding backend exceeded ${outcome.timeoutMs}ms`);
    }
    if (outcome.kind === "failed") {
      if (isEmbeddingsError(outcome.error) && outcome.error.code === "upstream_error") {
        throw outcome.error;
      }
      throw new EmbeddingsError("internal", `Embedding backend threw: ${describeError(outcome.error)}`, {
        cause: outcome.error,
      });
    }

    const vectors = verifyVectors(outcome.value, request.input.length, backend.dimension);
    return finish({
      status: 200,
      body: assembleEmbeddingResponse(resolved.alias, vectors, request.input),
      outcome: "ok",
    });
  } catch (error: unknown) {
    const { status, body: envelope } = toErrorResponse(error);
    const code = envelope.error.code;
    if (code === "invalid_request") {
      log.debug("request_rejected", { reason: envelope.error.message });
    } else {
      log[code === "internal" ? "error" : "warn"]("request_failed", {
        code,
        inputCount: progress.inputCount,
        error: describeError(error),
      });
    }
    return finish({ status, body: envelope, outcome: code });
  }
}
