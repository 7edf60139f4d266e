import fs from "fs";
import path from "path";
import zlib from "zlib";
import csv from "csv-parser";
import Database from "better-sqlite3";
import { buildBlob } from "./indexed-blob-dataset";
import { attributionKey } from "./redis-dataset";
import { RedisClient } from "../redis-client";
import { IpUtil } from "../ip-util";
import { componentLogger } from "../../logger";

const log = componentLogger("dataset-builder");

export type AttributionRow = {
  address: string;
  org_id: string;
  platform: string;
};

/**
 * Read `address,org_id,platform` rows from a CSV file with a header row.
 * Rows with an invalid address are skipped.
 */
export const readAttributionCsv = async (
  filePath: string
): Promise<AttributionRow[]> => {
  return new Promise((resolve, reject) => {
    const rows: AttributionRow[] = [];
    let skipped = 0;

    fs.createReadStream(filePath)
      .on("error", reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
      .on("data", (data: Record<string, string | undefined>) => {
        const address = (data.address ?? data.ip ?? "").trim();
        if (!IpUtil.isValidIpv4(address)) {
          skipped++;
          return;
        }
        rows.push({
          address,
          org_id: (data.org_id ?? data.cfa_id ?? "").trim(),
          platform: (data.platform ?? "").trim(),
        });
      })
      .on("end", () => {
        log.info({ file: filePath, rows: rows.length, skipped }, "Read attribution CSV");
        resolve(rows);
      })
      .on("error", reject);
  });
};

/**
 * Write rows as an indexed blob; gzip-compressed when the path ends in .gz
 */
export async function writeBlobDataset(
  rows: AttributionRow[],
  filePath: string
): Promise<void> {
  const json = Buffer.from(JSON.stringify(buildBlob([...rows], ["address", "org_id", "platform"])));
  const bytes = filePath.toLowerCase().endsWith(".gz") ? zlib.gzipSync(json) : json;
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, bytes);
}

/**
 * Write rows into an `attribution` table of a new SQLite file, replacing
 * any file already at the path
 */
export function writeSqliteDataset(rows: AttributionRow[], filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.rmSync(filePath, { force: true });
  const db = new Database(filePath);
  try {
    db.exec(
      "CREATE TABLE IF NOT EXISTS attribution (address TEXT NOT NULL, org_id TEXT, platform TEXT)"
    );
    db.exec("CREATE INDEX IF NOT EXISTS idx_attribution_address ON attribution (address)");

    const insert = db.prepare<[string, string, string]>(
      "INSERT INTO attribution (address, org_id, platform) VALUES (?, ?, ?)"
    );
    const insertAll = db.transaction((batch: AttributionRow[]) => {
      for (const row of batch) {
        insert.run(row.address, row.org_id, row.platform);
      }
    });
    insertAll(rows);
  } finally {
    db.close();
  }
}

/**
 * Store rows as redis hashes under one dataset name
 */
export async function importRedisDataset(
  rows: AttributionRow[],
  dataset: string,
  redis: RedisClient
): Promise<number> {
  let written = 0;
  for (const row of rows) {
    await redis.hSet(attributionKey(dataset, row.address), {
      org_id: row.org_id,
      platform: row.platform,
    });
    written++;
  }
  return written;
}
