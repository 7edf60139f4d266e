import fs from "fs";
import csv from "csv-parser";
import { IpRange, RangeSearchUtil } from "../range-search-util";
import { ProxyReader, ProxyRecord, PROXY_UNKNOWN } from "./source-readers";
import { componentLogger } from "../../logger";

const log = componentLogger("proxy-reader");

// IP2Proxy LITE CSV files carry no header row; extra trailing columns
// (asn, as, last_seen, threat, provider) are ignored
const IP2PROXY_COLUMNS = [
  "ip_from",
  "ip_to",
  "proxy_type",
  "country_code",
  "country_name",
  "region_name",
  "city_name",
  "isp",
  "domain",
  "usage_type",
];

/**
 * Parse an IP2Proxy LITE CSV file into ranges sorted for binary search
 */
export const parseProxyCsv = async (
  filePath: string
): Promise<IpRange<ProxyRecord>[]> => {
  return new Promise((resolve, reject) => {
    const ranges: IpRange<ProxyRecord>[] = [];
    let skipped = 0;

    fs.createReadStream(filePath)
      .on("error", reject)
      .pipe(csv({ headers: IP2PROXY_COLUMNS }))
      .on("data", (row: Record<string, string | undefined>) => {
        const startIp = Number(row.ip_from);
        const endIp = Number(row.ip_to);

        if (!Number.isInteger(startIp) || !Number.isInteger(endIp)) {
          skipped++;
          return;
        }

        ranges.push({
          startIp,
          endIp,
          value: {
            countryCode: row.country_code || PROXY_UNKNOWN,
            proxyType: row.proxy_type || PROXY_UNKNOWN,
            isp: row.isp || PROXY_UNKNOWN,
            domain: row.domain || PROXY_UNKNOWN,
            usageType: row.usage_type || PROXY_UNKNOWN,
          },
        });
      })
      .on("end", () => {
        log.debug({ ranges: ranges.length, skipped }, "Parsed proxy ranges");
        resolve(RangeSearchUtil.sortIpv4Ranges(ranges));
      })
      .on("error", reject);
  });
};

/**
 * In-memory proxy database backed by sorted IPv4 ranges
 */
export class ProxyCsvReader implements ProxyReader {
  constructor(private readonly ranges: IpRange<ProxyRecord>[]) {}

  static async open(filePath: string): Promise<ProxyCsvReader> {
    return new ProxyCsvReader(await parseProxyCsv(filePath));
  }

  get size(): number {
    return this.ranges.length;
  }

  lookup(address: string): ProxyRecord | null {
    return RangeSearchUtil.findIpv4Range(address, this.ranges)?.value ?? null;
  }
}
