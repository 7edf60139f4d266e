import fs from "fs";
import zlib from "zlib";
import { z } from "zod";
import {
  ADDRESS_FIELDS,
  ORG_ID_FIELDS,
  PLATFORM_FIELD,
  AttributionBackend,
  AttributionDataset,
  attributionHit,
} from "./attribution-dataset";
import { AttributionHit } from "../../models/enriched-record";
import { DatasetLoadError, errorMessage } from "../../errors";

const rowPosition = z.number().int().nonnegative();

const blobSchema = z.object({
  rows: z.array(z.record(z.unknown())),
  indexes: z.record(
    z.record(z.union([rowPosition, z.array(rowPosition)]))
  ),
});

export type IndexedBlob = z.infer<typeof blobSchema>;
type Row = IndexedBlob["rows"][number];
type FieldIndex = IndexedBlob["indexes"][string];

/**
 * Decode blob bytes. Gzip is tried first; bytes that do not decompress are
 * read as plain JSON.
 */
export function decodeBlob(bytes: Buffer): IndexedBlob {
  let text: string;
  try {
    text = zlib.gunzipSync(bytes).toString("utf8");
  } catch {
    text = bytes.toString("utf8");
  }
  return blobSchema.parse(JSON.parse(text));
}

/**
 * Build a blob from rows, indexing the given fields. Rows sharing a value
 * are listed in row order.
 */
export function buildBlob(
  rows: Row[],
  indexedFields: string[] = ["address"]
): IndexedBlob {
  const indexes: Record<string, FieldIndex> = {};

  for (const field of indexedFields) {
    const index: Record<string, number[]> = {};
    rows.forEach((row, position) => {
      const value = row[field];
      if (typeof value !== "string" && typeof value !== "number") return;
      const key = String(value);
      (index[key] ??= []).push(position);
    });
    indexes[field] = Object.fromEntries(
      Object.entries(index).map(([key, positions]) => [
        key,
        positions.length === 1 ? positions[0] : positions,
      ])
    );
  }

  return { rows, indexes };
}

/**
 * Row list plus per-field value indexes, held in memory
 */
export class IndexedBlobDataset implements AttributionDataset {
  readonly encoding = "indexed-blob";
  private readonly addressIndex: FieldIndex | null;

  constructor(readonly name: string, private readonly blob: IndexedBlob) {
    const field = ADDRESS_FIELDS.find((f) => f in blob.indexes);
    this.addressIndex = field ? blob.indexes[field] : null;
  }

  async lookup(address: string): Promise<AttributionHit | null> {
    if (!this.addressIndex || !Object.hasOwn(this.addressIndex, address)) {
      return null;
    }

    const entry = this.addressIndex[address];
    // Several rows for one address: the earliest row wins
    const position = Array.isArray(entry)
      ? entry.length > 0
        ? Math.min(...entry)
        : undefined
      : entry;
    const row = position === undefined ? undefined : this.blob.rows[position];
    if (!row) return null;

    const orgField = ORG_ID_FIELDS.find((f) => f in row) ?? ORG_ID_FIELDS[0];
    return attributionHit(row[orgField], row[PLATFORM_FIELD]);
  }

  async close(): Promise<void> {}
}

export const indexedBlobBackend: AttributionBackend = {
  encoding: "indexed-blob",
  suffixes: [".json.gz", ".json", ".bin"],

  async open(filePath: string, name: string): Promise<AttributionDataset> {
    try {
      const bytes = await fs.promises.readFile(filePath);
      return new IndexedBlobDataset(name, decodeBlob(bytes));
    } catch (error) {
      throw new DatasetLoadError(filePath, errorMessage(error));
    }
  },
};
