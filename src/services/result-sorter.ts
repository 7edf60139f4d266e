import { EnrichedRecord } from "../models/enriched-record";
import { ValidationError } from "../errors";

export const SORT_KEYS = [
  "address",
  "domain",
  "city",
  "region",
  "country",
  "isoCode",
  "asn",
  "asnOrg",
  "platform",
  "orgId",
] as const;

export type SortKey = (typeof SORT_KEYS)[number];

// Spellings accepted from the command line and older exports
const SORT_KEY_ALIASES: Record<string, SortKey> = {
  ip: "address",
  iso_code: "isoCode",
  asn_org: "asnOrg",
  org_id: "orgId",
};

const isSortKey = (value: string): value is SortKey =>
  SORT_KEYS.some((key) => key === value);

/**
 * Validate a sort field name, resolving aliases
 */
export function parseSortKey(value: string): SortKey {
  const key = SORT_KEY_ALIASES[value] ?? value;
  if (!isSortKey(key)) {
    throw new ValidationError(
      `Invalid sort field: ${value}. Valid options: ${[...SORT_KEYS].sort().join(", ")}`
    );
  }
  return key;
}

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Stable ascending sort on one field. Records without a value come after
 * all others and keep their input order. The input array is not modified.
 */
export function sortRecords(
  records: readonly EnrichedRecord[],
  key: SortKey
): EnrichedRecord[] {
  return [...records].sort((a, b) => {
    const left = a[key];
    const right = b[key];

    if (left === null && right === null) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    return compareValues(left, right);
  });
}
