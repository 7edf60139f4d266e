import fs from "fs";
import { AppConfig } from "../../config";
import { MaxMindGeoReader } from "./maxmind-reader";
import { ProxyCsvReader } from "./proxy-csv-reader";
import { ReverseDnsResolver } from "./reverse-dns";
import { SourceReaderFactory, SourceReaders } from "./source-readers";
import { componentLogger } from "../../logger";

const log = componentLogger("sources");

interface OpenedDatabases {
  version: string;
  geo: MaxMindGeoReader;
  proxy: ProxyCsvReader | null;
}

/**
 * Modification time of a file, or null when it does not exist
 */
async function modifiedAt(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.mtimeMs;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Opens the on-disk databases named in the configuration. The proxy
 * database and reverse DNS are optional; city and ASN are required.
 *
 * Parsed databases are kept between batches and reopened only when one of
 * the files changes on disk.
 */
export class LocalSourceReaderFactory implements SourceReaderFactory {
  private cached: OpenedDatabases | null = null;

  constructor(private readonly config: AppConfig) {}

  async open(): Promise<SourceReaders> {
    const { geo, proxy } = await this.databases();

    const dns = this.config.reverseDns.enabled
      ? new ReverseDnsResolver(this.config.reverseDns.timeoutMs)
      : null;

    return {
      geo,
      proxy,
      dns,
      // Readers hold in-memory buffers only; nothing to flush or unmap
      close: async () => {
        log.debug("Source readers released");
      },
    };
  }

  private async databases(): Promise<OpenedDatabases> {
    const { cityDbPath, asnDbPath, proxyDbPath } = this.config;
    const mtimes = await Promise.all(
      [cityDbPath, asnDbPath, proxyDbPath].map(modifiedAt)
    );
    const version = mtimes.map((mtime) => mtime ?? "absent").join(":");

    if (this.cached && this.cached.version === version) {
      return this.cached;
    }

    const geo = await MaxMindGeoReader.open(cityDbPath, asnDbPath);

    let proxy: ProxyCsvReader | null = null;
    if (mtimes[2] !== null) {
      proxy = await ProxyCsvReader.open(proxyDbPath);
      log.info({ ranges: proxy.size }, "Proxy database opened");
    } else {
      log.debug({ path: proxyDbPath }, "No proxy database, skipping");
    }

    this.cached = { version, geo, proxy };
    return this.cached;
  }
}
