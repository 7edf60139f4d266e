/**
 * One enriched address. Absent values are always `null`.
 *
 * When `error` is set every enrichment field holds its default and the
 * record is exempt from filtering.
 */
export interface EnrichedRecord {
  address: string;
  domain: string | null;
  city: string | null;
  region: string | null;
  country: string | null;
  isoCode: string | null;
  postal: string | null;
  asn: number | null;
  asnOrg: string | null;
  proxyType: string | null;
  isp: string | null;
  usageType: string | null;
  orgManaged: boolean;
  orgId: string | null;
  platform: string | null;
  error: string | null;
}

/**
 * Organization attribution for an address found in an attribution dataset
 */
export interface AttributionHit {
  orgManaged: true;
  orgId: string | null;
  platform: string | null;
}

/**
 * A record with every enrichment field at its default
 */
export function emptyRecord(address: string): EnrichedRecord {
  return {
    address,
    domain: null,
    city: null,
    region: null,
    country: null,
    isoCode: null,
    postal: null,
    asn: null,
    asnOrg: null,
    proxyType: null,
    isp: null,
    usageType: null,
    orgManaged: false,
    orgId: null,
    platform: null,
    error: null,
  };
}

export function errorRecord(address: string, error: string): EnrichedRecord {
  return Object.freeze({ ...emptyRecord(address), error });
}

export function hasError(record: EnrichedRecord): boolean {
  return record.error !== null;
}
