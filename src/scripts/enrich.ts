import fs from "fs";
import path from "path";
import { loadConfig } from "../config";
import { errorMessage, ValidationError } from "../errors";
import { logger } from "../logger";
import { createPipeline } from "../services/pipeline-factory";
import { redisClient } from "../services/redis-client";
import { ResultFormatter } from "../services/result-formatter";
import { ENRICH_ALIASES, ENRICH_BOOLEAN_FLAGS, toEnrichOptions } from "./enrich-options";
import { parseArgs } from "./script-args";

// Print usage information
function printUsage(): void {
  const lines = [
    "Usage: npm run enrich -- [options]",
    "",
    "Options:",
    "  --ip, -i <address|cidr>          Address or CIDR block (repeatable)",
    "  --file, -f <file>                Text file to scan for addresses",
    "  --exclude-country <names>        Countries or ISO codes to drop",
    "  --exclude-city <names>           Cities to drop",
    "  --exclude-asn <numbers>          ASNs to drop",
    "  --exclude-org <names>            ASN organization substrings to drop",
    "  --exclude-platform <names>       Attribution platforms to drop",
    "  --exclude-org-id <ids>           Attribution org ids to drop",
    "  --exclude-org-managed            Drop attributed addresses",
    "  --exclude-not-org-managed        Drop unattributed addresses",
    "  --sort-by, -s <field>            Sort field (address, asn, country, ...)",
    "  --format <json|csv>              Output format (default json)",
    "  --output, -o <file>              Write results to a file instead of stdout",
    "",
    "Example:",
    "  npm run enrich -- -i 8.8.8.8 -i 1.1.1.0/30 --exclude-country US --sort-by asn",
  ];
  process.stdout.write(`${lines.join("\n")}\n`);
}

// Main function
async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2), ENRICH_BOOLEAN_FLAGS, ENRICH_ALIASES);

  if (args.flags.has("help")) {
    printUsage();
    return 0;
  }

  try {
    const options = toEnrichOptions(args);
    const text = options.file
      ? await fs.promises.readFile(path.resolve(process.cwd(), options.file), "utf8")
      : undefined;

    const pipeline = createPipeline(loadConfig());
    const { records } = await pipeline.run({
      addresses: options.ips,
      text,
      criteria: options.criteria,
      sortBy: options.sortBy,
    });

    const rendered = ResultFormatter.format(records, options.format);
    if (options.output) {
      const target = path.resolve(process.cwd(), options.output);
      await fs.promises.writeFile(target, rendered.length > 0 ? `${rendered}\n` : "");
      logger.info({ file: target, records: records.length }, "Results written");
    } else {
      process.stdout.write(`${rendered}\n`);
    }
    return 0;
  } catch (error) {
    if (error instanceof ValidationError) {
      logger.error({ code: error.code }, error.message);
      return 2;
    }
    logger.error({ err: error }, `Enrichment failed: ${errorMessage(error)}`);
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
