/**
 * Base error for everything the enrichment code raises on purpose.
 * Per-address lookup failures never surface as exceptions; they are captured
 * on the record by the merger.
 */
export class EnrichError extends Error {
  public readonly code: string;

  constructor(message: string, code = "ENRICH_ERROR") {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when caller input (an address, a CIDR block, a filter value) is malformed
 */
export class ValidationError extends EnrichError {
  constructor(message: string, code = "VALIDATION_ERROR") {
    super(message, code);
  }
}

/**
 * Raised when a CIDR block expands to more hosts than a single batch may hold
 */
export class CidrTooLargeError extends ValidationError {
  public readonly block: string;
  public readonly hostCount: number;
  public readonly limit: number;

  constructor(block: string, hostCount: number, limit: number) {
    super(
      `CIDR block ${block} too large: ${hostCount} hosts exceeds the limit of ${limit}`,
      "CIDR_TOO_LARGE"
    );
    this.block = block;
    this.hostCount = hostCount;
    this.limit = limit;
  }
}

export class ConfigurationError extends EnrichError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
  }
}

/**
 * Raised by an attribution backend that cannot open one dataset file.
 * The store catches it and moves on to the next file.
 */
export class DatasetLoadError extends EnrichError {
  public readonly file: string;

  constructor(file: string, reason: string) {
    super(`Failed to load attribution dataset ${file}: ${reason}`, "DATASET_LOAD_ERROR");
    this.file = file;
  }
}

/**
 * Raised when a required source database (city or ASN) cannot be opened
 */
export class SourceUnavailableError extends EnrichError {
  constructor(message: string) {
    super(message, "SOURCE_UNAVAILABLE");
  }
}

/**
 * Extract a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
