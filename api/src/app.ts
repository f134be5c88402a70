// api/src/app.ts
import express from "express";
import cors from "cors";

import { errorHandler } from "./middleware/errorHandler.js";
import { createStatisticsRouter } from "./statisticsRouter.js";
import type { ViewRegistry } from "./viewRegistry.js";

export function createApp(registry: ViewRegistry) {
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(cors({ origin: true, credentials: true }));

  // Быстрый health/ping без БД
  app.get("/health", (_req, res) => res.json({ ok: true, liveViews: registry.size }));

  app.use(createStatisticsRouter(registry));

  // error handler
  app.use(errorHandler);

  return app;
}
