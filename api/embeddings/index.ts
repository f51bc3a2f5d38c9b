import express from "express";

import type { EmbeddingsServerConfig } from "../../src/server/config/index.ts";
import { runEmbeddingsPipeline } from "../../src/server/embeddings/pipeline.ts";
import type { EmbeddingsCapability } from "../../src/server/embeddings/types.ts";
import type { EmbeddingsMetrics } from "../../src/server/telemetry/metrics.ts";
import { createHealthHandler } from "./health.ts";
import { createModelsHandler } from "./models.ts";

export interface CreateEmbeddingsRouterDeps {
  config: Readonly<EmbeddingsServerConfig>;
  capability: EmbeddingsCapability;
  metrics: EmbeddingsMetrics;
}

export function createEmbeddingsRouter(deps: CreateEmbeddingsRouterDeps): express.Router {
  const router = express.Router();

  router.get("/health", createHealthHandler(deps));
  router.get("/v1/models", createModelsHandler(deps));

  router.post("/v1/embeddings", async (req, res, next) => {
    try {
      const result = await runEmbeddingsPipeline(
        { config: deps.config.embedding, capability: deps.capability, metrics: deps.metrics },
        req.body,
      );
      res.status(result.status).json(result.body);
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
