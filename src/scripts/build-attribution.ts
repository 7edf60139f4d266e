import path from "path";
import { errorMessage } from "../errors";
import { logger } from "../logger";
import {
  importRedisDataset,
  readAttributionCsv,
  writeBlobDataset,
  writeSqliteDataset,
} from "../services/attribution/dataset-builder";
import { redisClient } from "../services/redis-client";
import { lastValue, parseArgs } from "./script-args";

const FORMATS = ["blob", "sqlite", "redis"] as const;
type DatasetFormat = (typeof FORMATS)[number];

const isDatasetFormat = (value: string): value is DatasetFormat =>
  FORMATS.some((format) => format === value);

// Print usage information
function printUsage(): void {
  const lines = [
    "Usage: npm run build-attribution -- [options]",
    "",
    "Options:",
    "  --input, -i <file>          CSV with address,org_id,platform columns",
    "  --format <blob|sqlite|redis> Dataset encoding (default blob)",
    "  --output, -o <file>         Target file for blob and sqlite datasets",
    "  --dataset, -d <name>        Dataset name for redis",
    "",
    "Examples:",
    "  npm run build-attribution -- -i org.csv -o data/org/managed.json.gz",
    "  npm run build-attribution -- -i org.csv --format sqlite -o data/org/managed.sqlite3",
    "  npm run build-attribution -- -i org.csv --format redis -d managed",
  ];
  process.stdout.write(`${lines.join("\n")}\n`);
}

// Main function
async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2), ["help"], {
    h: "help",
    i: "input",
    o: "output",
    d: "dataset",
  });

  const input = lastValue(args, "input");
  const format = lastValue(args, "format") ?? "blob";
  if (args.flags.has("help") || !input) {
    printUsage();
    return args.flags.has("help") ? 0 : 2;
  }
  if (!isDatasetFormat(format)) {
    logger.error(`Invalid dataset format: ${format}. Valid options: ${FORMATS.join(", ")}`);
    return 2;
  }

  try {
    const rows = await readAttributionCsv(path.resolve(process.cwd(), input));

    if (format === "redis") {
      const dataset = lastValue(args, "dataset");
      if (!dataset) {
        logger.error("--dataset is required for the redis format");
        return 2;
      }
      const written = await importRedisDataset(rows, dataset, redisClient);
      logger.info({ dataset, written }, "Redis attribution dataset imported");
      return 0;
    }

    const output = lastValue(args, "output");
    if (!output) {
      logger.error(`--output is required for the ${format} format`);
      return 2;
    }
    const target = path.resolve(process.cwd(), output);
    if (format === "sqlite") {
      writeSqliteDataset(rows, target);
    } else {
      await writeBlobDataset(rows, target);
    }
    logger.info({ file: target, rows: rows.length, format }, "Attribution dataset written");
    return 0;
  } catch (error) {
    logger.error({ err: error }, `Error building dataset: ${errorMessage(error)}`);
    return 1;
  } finally {
    await redisClient.disconnect();
  }
}

// Run the script
main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "Unhandled error");
    process.exit(1);
  });
