/**
 * Series Index SDK
 *
 * Client-side metadata index over the series ids of a wide-row time-series
 * store, used to prune candidate rows before issuing storage queries
 */

// Re-export types
export type { RawSeriesId, Series, TagSets, SeriesQuery, IndexStats, SeriesSource } from "./types.js";

export { BUCKET_DURATION_MS, TimeInterval, parseBucketDate, parseInstant } from "./time-interval.js";
export { parseSeries, parseSeriesCollection } from "./series.js";
export {
  matchesTimeInterval,
  matchesMeasurement,
  matchesField,
  matchesTagSets,
  matches,
  selectSeries,
} from "./query.js";
export { ClientSideIndex } from "./client-side-index.js";
export {
  BLESSED_TABLES,
  fetchSeriesCollection,
  buildClientSideIndex,
  MemorySeriesSource,
  DirectorySeriesSource,
} from "./fetch.js";
export { SeriesQuerySchema, TableNameSchema, parseSeriesQuery } from "./schemas.js";
export type { SeriesQueryInput } from "./schemas.js";

// Re-export observability
export { logger, formatLogEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { IndexMetrics } from "./observability/metrics.js";

// Re-export errors
export {
  SeriesIndexError,
  MalformedIdentifierError,
  EmptyIndexInputError,
  InvalidQueryError,
  SourceReadError,
} from "./errors.js";
