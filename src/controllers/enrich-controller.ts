import { Request, Response } from "express";
import { EnrichmentPipeline } from "../services/enrichment-pipeline";
import { ResultFormatter } from "../services/result-formatter";
import { parseSortKey } from "../services/result-sorter";
import { describeIssues, enrichBodySchema, toFilterCriteria } from "./enrich-schema";
import { ValidationError } from "../errors";
import { componentLogger } from "../logger";

const log = componentLogger("http");

/**
 * HTTP handlers over an enrichment pipeline
 */
export class EnrichController {
  constructor(private readonly pipeline: EnrichmentPipeline) {}

  // GET /api/enrich?ip=x.x.x.x or ?ip=x.x.x.0/24
  lookup = async (req: Request, res: Response): Promise<void> => {
    const ip = typeof req.query.ip === "string" ? req.query.ip.trim() : "";
    if (!ip) {
      res.status(400).json({ error: "Missing required query parameter: ip" });
      return;
    }

    try {
      const sortBy =
        typeof req.query.sortBy === "string" ? parseSortKey(req.query.sortBy) : undefined;
      const result = await this.pipeline.run({ addresses: [ip], sortBy });
      res.status(200).json(result);
    } catch (error) {
      this.handleError(res, error);
    }
  };

  // POST /api/enrich
  enrich = async (req: Request, res: Response): Promise<void> => {
    const parsed = enrichBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    const body = parsed.data;
    try {
      const result = await this.pipeline.run({
        addresses: body.addresses,
        text: body.text,
        criteria: toFilterCriteria(body.exclude),
        sortBy: body.sortBy ? parseSortKey(body.sortBy) : undefined,
      });

      if (body.format === "csv") {
        res.status(200).type("text/csv").send(ResultFormatter.toCsv(result.records));
        return;
      }
      res.status(200).json(result);
    } catch (error) {
      this.handleError(res, error);
    }
  };

  // GET /api/enrich/attribution
  attribution = async (_req: Request, res: Response): Promise<void> => {
    try {
      res.status(200).json(await this.pipeline.describeAttribution());
    } catch (error) {
      this.handleError(res, error);
    }
  };

  private handleError(res: Response, error: unknown): void {
    if (error instanceof ValidationError) {
      res.status(400).json({ error: error.message, code: error.code });
      return;
    }
    log.error({ err: error }, "Error processing enrichment request");
    res.status(500).json({ error: "Failed to process enrichment request" });
  }
}
