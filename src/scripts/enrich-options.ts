import { ValidationError } from "../errors";
import { EnrichmentRequest } from "../services/enrichment-pipeline";
import { FilterCriteria, MAX_ASN } from "../services/result-filter";
import { OutputFormat } from "../services/result-formatter";
import { parseSortKey } from "../services/result-sorter";
import { lastValue, listValue, ScriptArgs } from "./script-args";

export const ENRICH_BOOLEAN_FLAGS = [
  "help",
  "exclude-org-managed",
  "exclude-not-org-managed",
] as const;

export const ENRICH_ALIASES: Record<string, string> = {
  h: "help",
  i: "ip",
  f: "file",
  s: "sort-by",
  o: "output",
};

export interface EnrichOptions {
  ips: string[];
  file?: string;
  format: OutputFormat;
  output?: string;
  sortBy?: EnrichmentRequest["sortBy"];
  criteria: FilterCriteria;
}

function parseAsn(value: string): number {
  const trimmed = value.replace(/^AS/i, "");
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`Invalid ASN: ${value}`);
  }
  const asn = Number(trimmed);
  if (asn > MAX_ASN) {
    throw new ValidationError(
      `Invalid ASN number: ${value}. Must be between 0 and ${MAX_ASN}`
    );
  }
  return asn;
}

/**
 * Turn parsed command-line arguments into enrichment options
 */
export function toEnrichOptions(args: ScriptArgs): EnrichOptions {
  const format = lastValue(args, "format") ?? "json";
  if (format !== "json" && format !== "csv") {
    throw new ValidationError(`Invalid output format: ${format}. Valid options: csv, json`);
  }

  const ips = args.values.get("ip") ?? [];
  const file = lastValue(args, "file");
  if (ips.length === 0 && file === undefined) {
    throw new ValidationError("Provide at least one --ip or a --file to scan");
  }

  const sortBy = lastValue(args, "sort-by");

  return {
    ips,
    file,
    format,
    output: lastValue(args, "output"),
    sortBy: sortBy === undefined ? undefined : parseSortKey(sortBy),
    criteria: new FilterCriteria({
      excludeCountries: listValue(args, "exclude-country"),
      excludeCities: listValue(args, "exclude-city"),
      excludeAsns: listValue(args, "exclude-asn").map(parseAsn),
      excludeOrgs: listValue(args, "exclude-org"),
      excludeOrgManaged: args.flags.has("exclude-org-managed"),
      excludeNotOrgManaged: args.flags.has("exclude-not-org-managed"),
      excludePlatforms: listValue(args, "exclude-platform"),
      excludeOrgIds: listValue(args, "exclude-org-id"),
    }),
  };
}
