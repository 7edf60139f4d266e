import { logger } from "../logger";
import { ATTRIBUTION_KEY_PREFIX } from "../services/attribution/redis-dataset";
import { redisClient } from "../services/redis-client";
import { lastValue, parseArgs } from "./script-args";

/**
 * Delete redis attribution data, either one dataset or all of them
 */
async function clearRedisData(): Promise<number> {
  const args = parseArgs(process.argv.slice(2), [], { d: "dataset" });
  const dataset = lastValue(args, "dataset");
  const pattern = dataset
    ? `${ATTRIBUTION_KEY_PREFIX}:${dataset}:*`
    : `${ATTRIBUTION_KEY_PREFIX}:*`;

  try {
    logger.info({ pattern }, "Clearing attribution data...");
    const keys = await redisClient.scanKeys(pattern);

    let deleted = 0;
    // DEL in batches to keep individual commands small
    for (let i = 0; i < keys.length; i += 1000) {
      deleted += await redisClient.del(keys.slice(i, i + 1000));
    }

    logger.info({ deleted }, "Attribution data cleared");
    return 0;
  } catch (error) {
    logger.error({ err: error }, "Error clearing Redis data");
    return 1;
  } finally {
    await redisClient.disconnect();
  }
}

clearRedisData()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "Unhandled error");
    process.exit(1);
  });
