import express from "express";
import { enrichRoutes } from "./routes/enrich-routes";
import { EnrichmentPipeline } from "./services/enrichment-pipeline";
import { componentLogger } from "./logger";

const log = componentLogger("http");

/**
 * Build the express application around a pipeline
 */
export function createApp(pipeline: EnrichmentPipeline): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: "1mb" }));

  // Routes
  app.use("/api/enrich", enrichRoutes(pipeline));

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "UP" });
  });

  // Error handling middleware
  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      log.error({ err }, "Unhandled request error");
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}
