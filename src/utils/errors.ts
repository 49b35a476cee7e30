// ── Error Taxonomy ───────────────────────────────────────────────────────────

/**
 * Malformed thresholds, capital or misaligned input series.
 * Always thrown before any computation starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A remote data source still failed after every retry. */
export class DataFetchError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "DataFetchError";
    this.source = source;
  }
}

/** Non-fatal: a row was degraded (signal forced to HOLD, or a date gap noticed). */
export interface DataQualityWarning {
  date: string;
  field: string;
  message: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
