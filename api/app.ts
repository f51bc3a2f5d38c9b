import express from "express";
import cors from "cors";

import type { EmbeddingsServerConfig } from "../src/server/config/index.ts";
import { invalidRequest, toErrorResponse } from "../src/server/embeddings/errors.ts";
import type { EmbeddingsCapability } from "../src/server/embeddings/types.ts";
import { createLogger, describeError } from "../src/server/log.ts";
import { type EmbeddingsMetrics, NoopEmbeddingsMetrics } from "../src/server/telemetry/metrics.ts";
import { createEmbeddingsRouter } from "./embeddings/index.ts";

const log = createLogger("api.app");

export interface CreateAppDeps {
  config: Readonly<EmbeddingsServerConfig>;
  capability: EmbeddingsCapability;
  metrics?: EmbeddingsMetrics;
}

function bodyParserErrorType(err: unknown): string | null {
  if (err && typeof err === "object" && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return null;
}

export function createApp(deps: CreateAppDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: deps.config.server.bodyLimitBytes }));

  app.use(
    createEmbeddingsRouter({
      config: deps.config,
      capability: deps.capability,
      metrics: deps.metrics ?? new NoopEmbeddingsMetrics(),
    }),
  );

  app.use((_req, res) => {
    res.status(404).json({ error: { code: "invalid_request", message: "Route not found." } });
  });

  // Body parser (and any other) errors still leave as a canonical envelope.
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const type = bodyParserErrorType(err);
    if (type) {
      const message =
        type === "entity.parse.failed"
          ? "Request body is not valid JSON."
          : type === "entity.too.large"
            ? "Request body exceeds the configured size limit."
            : "Request body could not be read.";
      const { status, body } = toErrorResponse(invalidRequest(message));
      return res.status(status).json(body);
    }

    log.error("unhandled_error", { error: describeError(err) });
    const { status, body } = toErrorResponse(err);
    return res.status(status).json(body);
  });

  return app;
}
