import { EnrichedRecord, hasError } from "../models/enriched-record";

// ASNs are unsigned 32-bit numbers
export const MAX_ASN = 4294967295;

/**
 * Exclusion settings as supplied by a caller
 */
export interface FilterOptions {
  excludeCountries?: string[];
  excludeCities?: string[];
  excludeAsns?: number[];
  excludeOrgs?: string[];
  excludeOrgManaged?: boolean;
  excludeNotOrgManaged?: boolean;
  excludePlatforms?: string[];
  excludeOrgIds?: string[];
}

/**
 * Normalized exclusion criteria. Countries are kept upper case, every other
 * text axis lower case; ASNs compare exactly.
 */
export class FilterCriteria {
  readonly countries: ReadonlySet<string>;
  readonly cities: ReadonlySet<string>;
  readonly asns: ReadonlySet<number>;
  readonly orgs: readonly string[];
  readonly excludeOrgManaged: boolean;
  readonly excludeNotOrgManaged: boolean;
  readonly platforms: ReadonlySet<string>;
  readonly orgIds: ReadonlySet<string>;

  constructor(options: FilterOptions = {}) {
    this.countries = new Set((options.excludeCountries ?? []).map((c) => c.toUpperCase()));
    this.cities = new Set((options.excludeCities ?? []).map((c) => c.toLowerCase()));
    this.asns = new Set(options.excludeAsns ?? []);
    this.orgs = (options.excludeOrgs ?? []).map((o) => o.toLowerCase());
    this.excludeOrgManaged = options.excludeOrgManaged ?? false;
    this.excludeNotOrgManaged = options.excludeNotOrgManaged ?? false;
    this.platforms = new Set((options.excludePlatforms ?? []).map((p) => p.toLowerCase()));
    this.orgIds = new Set((options.excludeOrgIds ?? []).map((o) => o.toLowerCase()));
    Object.freeze(this);
  }
}

/**
 * Removes records matching any exclusion. Records carrying an error always
 * pass; absent fields never match.
 */
export class ResultFilter {
  constructor(private readonly criteria: FilterCriteria) {}

  shouldExclude(record: EnrichedRecord): boolean {
    if (hasError(record)) return false;

    return (
      this.excludedByLocation(record) ||
      this.excludedByNetwork(record) ||
      this.excludedByOrgStatus(record)
    );
  }

  apply(records: readonly EnrichedRecord[]): EnrichedRecord[] {
    return records.filter((record) => !this.shouldExclude(record));
  }

  private excludedByLocation(record: EnrichedRecord): boolean {
    const { countries, cities } = this.criteria;
    // An excluded country may be given by name or by ISO code
    const countryMatch = [record.country, record.isoCode].some(
      (value) => value !== null && countries.has(value.toUpperCase())
    );
    if (countryMatch) {
      return true;
    }
    return record.city !== null && cities.has(record.city.toLowerCase());
  }

  private excludedByNetwork(record: EnrichedRecord): boolean {
    if (record.asn !== null && this.criteria.asns.has(record.asn)) {
      return true;
    }

    if (record.asnOrg !== null) {
      const org = record.asnOrg.toLowerCase();
      return this.criteria.orgs.some((excluded) => org.includes(excluded));
    }

    return false;
  }

  private excludedByOrgStatus(record: EnrichedRecord): boolean {
    const { excludeOrgManaged, excludeNotOrgManaged, platforms, orgIds } = this.criteria;

    if (excludeOrgManaged && record.orgManaged) return true;
    if (excludeNotOrgManaged && !record.orgManaged) return true;

    if (record.platform !== null && platforms.has(record.platform.toLowerCase())) {
      return true;
    }
    return record.orgId !== null && orgIds.has(record.orgId.toLowerCase());
  }
}

/**
 * Shorthand for a one-off filter pass
 */
export function filterRecords(
  records: readonly EnrichedRecord[],
  criteria: FilterCriteria
): EnrichedRecord[] {
  return new ResultFilter(criteria).apply(records);
}
