import { EventEmitter } from "events";
import { ProcessingStats } from "../models/processing-stats";
import { Logger } from "../logger";

export interface PipelineEvents {
  collected: { total: number };
  progress: { processed: number; total: number; address: string };
  filtered: { before: number; after: number };
  completed: ProcessingStats;
}

export type PipelineEventName = keyof PipelineEvents;

/**
 * Structured events emitted while a batch runs. Presentation layers
 * subscribe instead of the pipeline printing anything itself.
 */
export class PipelineReporter {
  private readonly emitter = new EventEmitter();

  on<E extends PipelineEventName>(
    event: E,
    listener: (payload: PipelineEvents[E]) => void
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  emit<E extends PipelineEventName>(event: E, payload: PipelineEvents[E]): void {
    this.emitter.emit(event, payload);
  }
}

/**
 * Reporter that writes every event to a logger. Progress goes out at debug
 * level, roughly every tenth of the batch.
 */
export function loggingReporter(log: Logger): PipelineReporter {
  const reporter = new PipelineReporter();

  reporter
    .on("collected", ({ total }) => log.info({ total }, "Collected addresses"))
    .on("progress", ({ processed, total, address }) => {
      const step = Math.max(1, Math.floor(total / 10));
      if (processed === total || processed % step === 0) {
        log.debug({ processed, total, address }, "Enrichment progress");
      }
    })
    .on("filtered", ({ before, after }) => {
      if (after < before) {
        log.info({ removed: before - after }, "Filtered out addresses");
      }
    })
    .on("completed", (stats) => log.info(stats, "Enrichment completed"));

  return reporter;
}
