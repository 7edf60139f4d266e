import fs from "fs";
import path from "path";
import { AttributionBackend, AttributionDataset } from "./attribution-dataset";
import { indexedBlobBackend } from "./indexed-blob-dataset";
import { sqliteBackend } from "./sqlite-dataset";
import { AttributionHit } from "../../models/enriched-record";
import { componentLogger, Logger } from "../../logger";
import { errorMessage } from "../../errors";

export const DEFAULT_BACKENDS: readonly AttributionBackend[] = [
  indexedBlobBackend,
  sqliteBackend,
];

/**
 * In-memory organization attribution built from one or more datasets.
 *
 * Datasets are consulted in load order and the first hit wins. Files load
 * in ascending file-name order so the order is the same on every run.
 */
export class AttributionStore {
  private readonly datasets: AttributionDataset[] = [];

  constructor(
    private readonly backends: readonly AttributionBackend[] = DEFAULT_BACKENDS,
    private readonly log: Logger = componentLogger("attribution")
  ) {}

  /**
   * True once at least one dataset is available
   */
  get hasData(): boolean {
    return this.datasets.length > 0;
  }

  get datasetNames(): string[] {
    return this.datasets.map((dataset) => dataset.name);
  }

  /**
   * Load every recognised dataset file in a directory. Files that fail to
   * load are skipped. Resolves true when at least one dataset loaded.
   */
  async load(directory: string): Promise<boolean> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(directory);
    } catch (error) {
      this.log.debug(
        { directory, err: errorMessage(error) },
        "Attribution directory not readable"
      );
      return false;
    }

    let loaded = 0;
    for (const file of [...entries].sort()) {
      const match = this.backendFor(file);
      if (!match) continue;

      const filePath = path.join(directory, file);
      try {
        const dataset = await match.backend.open(filePath, match.name);
        this.datasets.push(dataset);
        loaded++;
        this.log.debug(
          { dataset: match.name, encoding: dataset.encoding },
          "Attribution dataset loaded"
        );
      } catch (error) {
        this.log.warn({ file: filePath, err: errorMessage(error) }, "Skipping attribution dataset");
      }
    }

    this.log.info({ directory, loaded }, "Attribution datasets loaded");
    return loaded > 0;
  }

  /**
   * Register an already opened dataset after those loaded so far
   */
  add(dataset: AttributionDataset): void {
    this.datasets.push(dataset);
  }

  /**
   * Exact-match lookup across datasets; null when no dataset knows the
   * address. A dataset whose lookup fails is logged and passed over.
   */
  async lookup(address: string): Promise<AttributionHit | null> {
    for (const dataset of this.datasets) {
      try {
        const hit = await dataset.lookup(address);
        if (hit) {
          return hit;
        }
      } catch (error) {
        this.log.warn(
          { dataset: dataset.name, address, err: errorMessage(error) },
          "Attribution lookup failed"
        );
      }
    }
    return null;
  }

  async close(): Promise<void> {
    const datasets = this.datasets.splice(0);
    await Promise.all(datasets.map((dataset) => dataset.close()));
  }

  private backendFor(
    file: string
  ): { backend: AttributionBackend; name: string } | null {
    const lower = file.toLowerCase();
    for (const backend of this.backends) {
      const suffix = backend.suffixes.find((s) => lower.endsWith(s));
      if (suffix) {
        return { backend, name: file.slice(0, file.length - suffix.length) };
      }
    }
    return null;
  }
}
