import type { EmbeddingConfig } from "../../config/index.ts";
import { createLogger, describeError } from "../../log.ts";
import type { EmbeddingBackend, EmbeddingsCapability } from "../types.ts";
import { createDeterministicBackend } from "./deterministic.ts";
import { createOllamaBackend } from "./ollama.ts";

export { createDeterministicBackend, vectorizeText } from "./deterministic.ts";
export { createOllamaBackend, l2Normalize } from "./ollama.ts";
export { ExecutionLane, LaneTaskAbortedError } from "./executionLane.ts";

const log = createLogger("embeddings.backends");

async function createEmbeddingBackend(config: EmbeddingConfig): Promise<EmbeddingBackend> {
  switch (config.backend) {
    case "deterministic":
      return createDeterministicBackend({
        modelName: config.modelName,
        dimension: config.dimension,
        normalize: config.normalize,
      });
    case "ollama":
      return createOllamaBackend({
        baseUrl: config.ollamaBaseUrl,
        modelName: config.modelName,
        normalize: config.normalize,
        loadTimeoutMs: config.loadTimeoutMs,
      });
  }
}

/**
 * Builds the process-wide embeddings capability once at startup. A backend
 * that fails to load leaves the capability unavailable for the rest of the
 * process; there is no reload.
 */
export async function initEmbeddingsCapability(config: EmbeddingConfig): Promise<EmbeddingsCapability> {
  if (!config.enabled) {
    log.info("capability_disabled");
    return { state: "disabled" };
  }

  try {
    const backend = await createEmbeddingBackend(config);
    log.info("capability_ready", {
      backend: backend.name,
      model: backend.modelName,
      dimension: backend.dimension,
    });
    return { state: "ready", backend };
  } catch (error: unknown) {
    log.error("backend_init_failed", {
      backend: config.backend,
      model: config.modelName,
      error: describeError(error),
    });
    return { state: "unavailable", backendName: config.backend };
  }
}
