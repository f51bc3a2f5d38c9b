import type express from "express";

import type { EmbeddingsServerConfig } from "../../src/server/config/index.ts";
import { publicModelIds } from "../../src/server/embeddings/modelAliases.ts";
import type { EmbeddingsCapability } from "../../src/server/embeddings/types.ts";

export interface ModelInfo {
  id: string;
  object: "model";
  created: number;
  owned_by: string;
}

export interface ModelListResponse {
  object: "list";
  data: ModelInfo[];
}

export function buildModelList(
  config: Readonly<EmbeddingsServerConfig>,
  capability: EmbeddingsCapability,
  nowMs: number = Date.now(),
): ModelListResponse {
  if (!config.embedding.enabled || capability.state !== "ready") {
    return { object: "list", data: [] };
  }

  const created = Math.floor(nowMs / 1000);
  return {
    object: "list",
    data: publicModelIds(capability.backend.modelName).map((id) => ({
      id,
      object: "model",
      created,
      owned_by: config.serviceName,
    })),
  };
}

export function createModelsHandler(deps: {
  config: Readonly<EmbeddingsServerConfig>;
  capability: EmbeddingsCapability;
}): express.RequestHandler {
  return (_req, res) => {
    res.status(200).json(buildModelList(deps.config, deps.capability));
  };
}
