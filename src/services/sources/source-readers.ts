/**
 * Contracts for the local data sources consulted while enriching an address.
 * Readers are opened once per batch and closed when the batch ends.
 */

export interface LocationFacts {
  city: string | null;
  region: string | null;
  country: string | null;
  isoCode: string | null;
  postal: string | null;
}

export interface NetworkFacts {
  asn: number | null;
  asnOrg: string | null;
}

/**
 * Outcome of a combined geolocation + ASN lookup
 */
export type GeoLookup =
  | { status: "found"; location: LocationFacts; network: NetworkFacts }
  | { status: "not_found" }
  | { status: "invalid_address" }
  | { status: "failed"; message: string };

export interface GeoReader {
  lookup(address: string): GeoLookup;
}

/**
 * Placeholder the proxy database uses for unknown values
 */
export const PROXY_UNKNOWN = "-";

/**
 * Raw proxy database row. Any field may hold the unknown placeholder.
 */
export interface ProxyRecord {
  countryCode: string;
  proxyType: string;
  isp: string;
  domain: string;
  usageType: string;
}

export interface ProxyReader {
  /**
   * Row covering the address, or null when no range contains it
   */
  lookup(address: string): ProxyRecord | null;
}

export interface DomainResolver {
  /**
   * Best-effort domain for the address; null on timeout or failure
   */
  resolve(address: string): Promise<string | null>;
}

/**
 * Reader handles held for the duration of one batch
 */
export interface SourceReaders {
  geo: GeoReader;
  proxy: ProxyReader | null;
  dns: DomainResolver | null;
  close(): Promise<void>;
}

export interface SourceReaderFactory {
  open(): Promise<SourceReaders>;
}
