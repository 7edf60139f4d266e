import { EnrichedRecord, errorRecord, hasError } from "../models/enriched-record";
import { ProcessingStats, buildStats } from "../models/processing-stats";
import { AddressInput, AddressNormalizer } from "./address-normalizer";
import { AttributionStore } from "./attribution/attribution-store";
import { RecordMerger } from "./record-merger";
import { FilterCriteria, filterRecords } from "./result-filter";
import { SortKey, sortRecords } from "./result-sorter";
import { SourceReaderFactory, SourceReaders } from "./sources/source-readers";
import { PipelineReporter } from "./pipeline-reporter";
import { errorMessage } from "../errors";

export interface EnrichmentRequest extends AddressInput {
  criteria?: FilterCriteria;
  sortBy?: SortKey;
}

export interface EnrichmentResult {
  records: EnrichedRecord[];
  stats: ProcessingStats;
}

export interface PipelineDependencies {
  sources: SourceReaderFactory;
  /**
   * Opens the attribution store for one run; it is closed when the run ends
   */
  attribution: () => Promise<AttributionStore>;
  reporter?: PipelineReporter;
}

/**
 * Normalize → enrich → filter → sort, one batch at a time.
 *
 * Source readers and the attribution store are opened once per batch and
 * released on every exit path. Addresses are enriched sequentially so the
 * output keeps input order.
 */
export class EnrichmentPipeline {
  private readonly reporter: PipelineReporter;

  constructor(private readonly deps: PipelineDependencies) {
    this.reporter = deps.reporter ?? new PipelineReporter();
  }

  get events(): PipelineReporter {
    return this.reporter;
  }

  /**
   * Enrich addresses in order, one record per address
   */
  async enrich(addresses: readonly string[]): Promise<EnrichedRecord[]> {
    const store = await this.deps.attribution();
    try {
      const readers = await this.deps.sources.open();
      try {
        const merger = new RecordMerger(store);
        const records: EnrichedRecord[] = [];

        for (const address of addresses) {
          records.push(await this.enrichOne(merger, address, readers));
          this.reporter.emit("progress", {
            processed: records.length,
            total: addresses.length,
            address,
          });
        }

        return records;
      } finally {
        await readers.close();
      }
    } finally {
      await store.close();
    }
  }

  async run(request: EnrichmentRequest): Promise<EnrichmentResult> {
    const started = Date.now();
    // Invalid input and oversized blocks propagate to the caller
    const addresses = AddressNormalizer.collectAddresses(request);
    this.reporter.emit("collected", { total: addresses.length });

    const enriched = addresses.length > 0 ? await this.enrich(addresses) : [];

    const filtered = filterRecords(enriched, request.criteria ?? new FilterCriteria());
    this.reporter.emit("filtered", { before: enriched.length, after: filtered.length });

    const records = request.sortBy ? sortRecords(filtered, request.sortBy) : filtered;

    const failed = enriched.filter(hasError).length;
    const stats = buildStats({
      totalAddresses: addresses.length,
      successfulLookups: enriched.length - failed,
      failedLookups: failed,
      filteredOut: enriched.length - filtered.length,
      processingTimeMs: Date.now() - started,
    });
    this.reporter.emit("completed", stats);

    return { records, stats };
  }

  /**
   * Which attribution datasets a run would see right now
   */
  async describeAttribution(): Promise<{ hasData: boolean; datasets: string[] }> {
    const store = await this.deps.attribution();
    try {
      return { hasData: store.hasData, datasets: store.datasetNames };
    } finally {
      await store.close();
    }
  }

  private async enrichOne(
    merger: RecordMerger,
    address: string,
    readers: SourceReaders
  ): Promise<EnrichedRecord> {
    try {
      return await merger.merge(address, readers);
    } catch (error) {
      return errorRecord(address, errorMessage(error));
    }
  }
}
