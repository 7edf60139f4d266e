/**
 * Counters for one pipeline run
 */
export interface ProcessingStats {
  totalAddresses: number;
  successfulLookups: number;
  failedLookups: number;
  filteredOut: number;
  processingTimeMs: number;
  successRate: number;
  filterRate: number;
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

export function buildStats(counts: {
  totalAddresses: number;
  successfulLookups: number;
  failedLookups: number;
  filteredOut: number;
  processingTimeMs: number;
}): ProcessingStats {
  const successRate =
    counts.totalAddresses === 0
      ? 0
      : (counts.successfulLookups / counts.totalAddresses) * 100;
  // Share of successful lookups removed by the filter
  const filterRate =
    counts.successfulLookups === 0
      ? 0
      : (counts.filteredOut / counts.successfulLookups) * 100;

  return {
    ...counts,
    successRate: round2(successRate),
    filterRate: round2(filterRate),
  };
}
