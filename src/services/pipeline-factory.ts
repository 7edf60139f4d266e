import { AppConfig } from "../config";
import { AttributionStore } from "./attribution/attribution-store";
import { RedisDataset } from "./attribution/redis-dataset";
import { EnrichmentPipeline } from "./enrichment-pipeline";
import { loggingReporter, PipelineReporter } from "./pipeline-reporter";
import { redisClient } from "./redis-client";
import { LocalSourceReaderFactory } from "./sources/local-source-factory";
import { componentLogger } from "../logger";
import { errorMessage } from "../errors";

const log = componentLogger("attribution");

/**
 * Attribution store for one run: the dataset directory first, then any
 * redis-backed datasets named in the configuration
 */
export async function openAttributionStore(
  config: AppConfig
): Promise<AttributionStore> {
  const store = new AttributionStore();
  await store.load(config.attributionDir);

  const datasets = config.redis.attributionDatasets;
  if (config.redis.host && datasets.length > 0) {
    try {
      await redisClient.ensureConnection();
      for (const name of datasets) {
        store.add(new RedisDataset(name, redisClient));
      }
    } catch (error) {
      log.warn({ datasets, err: errorMessage(error) }, "Skipping redis attribution datasets");
    }
  }

  return store;
}

/**
 * Pipeline wired to the local databases named in the configuration
 */
export function createPipeline(
  config: AppConfig,
  reporter: PipelineReporter = loggingReporter(componentLogger("pipeline"))
): EnrichmentPipeline {
  return new EnrichmentPipeline({
    sources: new LocalSourceReaderFactory(config),
    attribution: () => openAttributionStore(config),
    reporter,
  });
}
