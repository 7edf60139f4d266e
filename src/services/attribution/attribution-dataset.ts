import { AttributionHit } from "../../models/enriched-record";

/**
 * One loaded attribution partition (e.g. one cloud platform).
 * Datasets are read-only once opened.
 */
export interface AttributionDataset {
  readonly name: string;
  readonly encoding: string;
  lookup(address: string): Promise<AttributionHit | null>;
  close(): Promise<void>;
}

/**
 * Opens dataset files of the encodings it recognises
 */
export interface AttributionBackend {
  readonly encoding: string;
  /**
   * File-name suffixes this backend reads, lower case, longest first
   */
  readonly suffixes: readonly string[];
  open(filePath: string, name: string): Promise<AttributionDataset>;
}

// Older dataset generations used different column names
export const ADDRESS_FIELDS = ["address", "ip"] as const;
export const ORG_ID_FIELDS = ["org_id", "cfa_id"] as const;
export const PLATFORM_FIELD = "platform";

/**
 * Stored cell value as an optional string. Empty strings count as absent.
 */
export function cellValue(value: unknown): string | null {
  if (typeof value === "string") return value.length > 0 ? value : null;
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  return null;
}

export function attributionHit(
  orgId: unknown,
  platform: unknown
): AttributionHit {
  return {
    orgManaged: true,
    orgId: cellValue(orgId),
    platform: cellValue(platform),
  };
}
