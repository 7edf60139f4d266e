import fs from "fs";
import { Reader, ReaderModel } from "@maxmind/geoip2-node";
import { IpUtil } from "../ip-util";
import { GeoLookup, GeoReader } from "./source-readers";
import { SourceUnavailableError, errorMessage } from "../../errors";

/**
 * Geolocation and ASN lookups against MaxMind GeoLite2 City and ASN databases
 */
export class MaxMindGeoReader implements GeoReader {
  constructor(
    private readonly cityReader: ReaderModel,
    private readonly asnReader: ReaderModel
  ) {}

  /**
   * Open both databases. Both are required; a missing file is a
   * configuration problem for the caller to report.
   */
  static async open(
    cityDbPath: string,
    asnDbPath: string
  ): Promise<MaxMindGeoReader> {
    for (const file of [cityDbPath, asnDbPath]) {
      if (!fs.existsSync(file)) {
        throw new SourceUnavailableError(`GeoIP database not found: ${file}`);
      }
    }

    const [cityReader, asnReader] = await Promise.all([
      Reader.open(cityDbPath),
      Reader.open(asnDbPath),
    ]);
    return new MaxMindGeoReader(cityReader, asnReader);
  }

  lookup(address: string): GeoLookup {
    if (!IpUtil.isValidIpv4(address)) {
      return { status: "invalid_address" };
    }

    try {
      const city = this.cityReader.city(address);
      const asn = this.asnReader.asn(address);

      // The most specific subdivision is the last one
      const subdivision = city.subdivisions?.[city.subdivisions.length - 1];

      return {
        status: "found",
        location: {
          city: city.city?.names.en || null,
          region: subdivision?.names.en || null,
          country: city.country?.names.en || null,
          isoCode: city.country?.isoCode || null,
          postal: city.postal?.code || null,
        },
        network: {
          asn: asn.autonomousSystemNumber || null,
          asnOrg: asn.autonomousSystemOrganization || null,
        },
      };
    } catch (error) {
      const name = error instanceof Error ? error.name : "";
      if (name === "AddressNotFoundError") {
        return { status: "not_found" };
      }
      if (name === "ValueError") {
        return { status: "invalid_address" };
      }
      return { status: "failed", message: errorMessage(error) };
    }
  }
}
