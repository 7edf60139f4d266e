import { EnrichedRecord } from "../models/enriched-record";

export type OutputFormat = "json" | "csv";

// Export column order and names
const CSV_COLUMNS: ReadonlyArray<[string, keyof EnrichedRecord]> = [
  ["ip", "address"],
  ["org_managed", "orgManaged"],
  ["org_id", "orgId"],
  ["platform", "platform"],
  ["proxy_type", "proxyType"],
  ["domain", "domain"],
  ["city", "city"],
  ["region", "region"],
  ["country", "country"],
  ["iso_code", "isoCode"],
  ["isp", "isp"],
  ["usage_type", "usageType"],
  ["asn", "asn"],
  ["asn_org", "asnOrg"],
  ["error", "error"],
];

const csvCell = (value: EnrichedRecord[keyof EnrichedRecord]): string =>
  `"${value === null ? "" : String(value).replace(/"/g, '""')}"`;

export class ResultFormatter {
  static toJson(records: readonly EnrichedRecord[]): string {
    return JSON.stringify(records, null, 2);
  }

  /**
   * CSV with a header row; absent values are empty cells
   */
  static toCsv(records: readonly EnrichedRecord[]): string {
    if (records.length === 0) return "";

    const lines = [CSV_COLUMNS.map(([header]) => header).join(",")];
    for (const record of records) {
      lines.push(CSV_COLUMNS.map(([, field]) => csvCell(record[field])).join(","));
    }
    return lines.join("\n");
  }

  static format(records: readonly EnrichedRecord[], format: OutputFormat): string {
    return format === "csv" ? this.toCsv(records) : this.toJson(records);
  }
}
