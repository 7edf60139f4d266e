import { Router } from "express";
import { EnrichController } from "../controllers/enrich-controller";
import { EnrichmentPipeline } from "../services/enrichment-pipeline";

/**
 * Create the /api/enrich router around a pipeline
 */
export function enrichRoutes(pipeline: EnrichmentPipeline): Router {
  const router = Router();
  const controller = new EnrichController(pipeline);

  // GET /api/enrich?ip=x.x.x.x
  router.get("/", controller.lookup);

  // POST /api/enrich { addresses, text, exclude, sortBy, format }
  router.post("/", controller.enrich);

  // Loaded attribution datasets
  router.get("/attribution", controller.attribution);

  return router;
}
