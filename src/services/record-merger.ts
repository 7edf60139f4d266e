import {
  EnrichedRecord,
  emptyRecord,
  errorRecord,
} from "../models/enriched-record";
import { AttributionStore } from "./attribution/attribution-store";
import {
  GeoLookup,
  PROXY_UNKNOWN,
  ProxyRecord,
  SourceReaders,
} from "./sources/source-readers";
import { componentLogger, Logger } from "../logger";
import { errorMessage } from "../errors";

export const NOT_FOUND_ERROR = "address not found in database";
export const INVALID_ADDRESS_ERROR = "invalid address format";

const proxyValue = (value: string): string | null =>
  value === PROXY_UNKNOWN || value === "" ? null : value;

/**
 * Combines every source into one record per address
 */
export class RecordMerger {
  constructor(
    private readonly attribution: AttributionStore,
    private readonly log: Logger = componentLogger("merger")
  ) {}

  async merge(address: string, readers: SourceReaders): Promise<EnrichedRecord> {
    const geo = this.lookupGeo(address, readers);

    switch (geo.status) {
      case "not_found":
        return errorRecord(address, NOT_FOUND_ERROR);
      case "invalid_address":
        return errorRecord(address, INVALID_ADDRESS_ERROR);
      case "failed":
        return errorRecord(address, geo.message);
    }

    const record: EnrichedRecord = {
      ...emptyRecord(address),
      ...geo.location,
      ...geo.network,
    };

    const proxy = this.lookupProxy(address, readers);
    // Unknown rows from the proxy database carry "-" as the country code
    if (proxy && proxy.countryCode !== PROXY_UNKNOWN) {
      record.proxyType = proxyValue(proxy.proxyType);
      record.isp = proxyValue(proxy.isp);
      record.usageType = proxyValue(proxy.usageType);
      record.domain = proxyValue(proxy.domain);
    }

    if (record.domain === null && readers.dns) {
      record.domain = await readers.dns.resolve(address);
    }

    const hit = await this.lookupAttribution(address);
    if (hit) {
      record.orgManaged = hit.orgManaged;
      record.orgId = hit.orgId;
      record.platform = hit.platform;
    }

    return Object.freeze(record);
  }

  private lookupGeo(address: string, readers: SourceReaders): GeoLookup {
    try {
      return readers.geo.lookup(address);
    } catch (error) {
      return { status: "failed", message: errorMessage(error) };
    }
  }

  private lookupProxy(address: string, readers: SourceReaders): ProxyRecord | null {
    if (!readers.proxy) return null;
    try {
      return readers.proxy.lookup(address);
    } catch (error) {
      this.log.debug({ address, err: errorMessage(error) }, "Proxy lookup failed");
      return null;
    }
  }

  private async lookupAttribution(address: string) {
    if (!this.attribution.hasData) return null;
    try {
      return await this.attribution.lookup(address);
    } catch (error) {
      this.log.warn({ address, err: errorMessage(error) }, "Attribution lookup failed");
      return null;
    }
  }
}
