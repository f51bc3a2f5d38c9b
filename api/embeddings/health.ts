import type express from "express";

import type { EmbeddingsServerConfig } from "../../src/server/config/index.ts";
import type { EmbeddingsCapability } from "../../src/server/embeddings/types.ts";

export interface HealthResponse {
  status: "ok" | "error";
  service: string;
  version: string;
  backend: string;
  model: string | null;
  dimension: number | null;
  embedding_enabled: boolean;
}

export function buildHealthResponse(
  config: Readonly<EmbeddingsServerConfig>,
  capability: EmbeddingsCapability,
): HealthResponse {
  const ready = config.embedding.enabled && capability.state === "ready";
  const backend =
    capability.state === "ready"
      ? capability.backend.name
      : capability.state === "unavailable"
        ? capability.backendName
        : "none";

  return {
    status: ready ? "ok" : "error",
    service: config.serviceName,
    version: config.serviceVersion,
    backend,
    model: capability.state === "ready" ? capability.backend.modelName : null,
    dimension: capability.state === "ready" ? capability.backend.dimension : null,
    embedding_enabled: config.embedding.enabled,
  };
}

// Read-only: never touches the backend, so it answers while a batch is running.
export function createHealthHandler(deps: {
  config: Readonly<EmbeddingsServerConfig>;
  capability: EmbeddingsCapability;
}): express.RequestHandler {
  return (_req, res) => {
    res.status(200).json(buildHealthResponse(deps.config, deps.capability));
  };
}
