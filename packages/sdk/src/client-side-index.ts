/**
 * Client-side index over every known series id
 *
 * Invariants:
 * - Built once from a full snapshot, never mutated afterwards, so any number
 *   of readers may share it
 * - Buckets reference the same frozen Series objects as `rows`; nothing is
 *   copied per bucket
 * - byTimeInterval groups rows by their exact bucket, not by overlap: a query
 *   range spanning several buckets must scan bucket keys (see `select`) or
 *   apply matchesTimeInterval over `copyOfRows()`
 * - The byTimeInterval/byTag views are the index's own maps, typed read-only
 *   but not copied; likewise `Series.tags` is a live Set inside a frozen row.
 *   Callers must not mutate them (a cast or untyped caller can)
 */

import { EmptyIndexInputError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { matches, selectSeries } from "./query.js";
import { parseSeriesCollection } from "./series.js";
import type { TimeInterval } from "./time-interval.js";
import type { IndexStats, RawSeriesId, Series, SeriesQuery } from "./types.js";

const EMPTY: ReadonlySet<Series> = new Set<Series>();

export class ClientSideIndex {
  readonly #byTimeInterval = new Map<string, Set<Series>>();
  readonly #intervals = new Map<string, TimeInterval>();
  readonly #byTag = new Map<string, Set<Series>>();
  readonly #positions = new Map<Series, number>();
  readonly #rows: readonly Series[];
  readonly #ids: readonly string[];

  /**
   * @param seriesCollection - Parsed series, typically from fetchSeriesCollection
   * @throws EmptyIndexInputError if the collection is empty
   */
  constructor(seriesCollection: readonly Series[]) {
    if (seriesCollection.length === 0) {
      throw new EmptyIndexInputError();
    }

    const startTime = performance.now();
    logger.debug("index.build.start", { details: { series: seriesCollection.length } });

    const rows = [...seriesCollection];
    const ids: string[] = [];

    rows.forEach((series, position) => {
      const key = series.timeInterval.key;
      let bucket = this.#byTimeInterval.get(key);
      if (!bucket) {
        bucket = new Set();
        this.#byTimeInterval.set(key, bucket);
        this.#intervals.set(key, series.timeInterval);
      }
      bucket.add(series);

      for (const tag of series.tags) {
        let tagged = this.#byTag.get(tag);
        if (!tagged) {
          tagged = new Set();
          this.#byTag.set(tag, tagged);
        }
        tagged.add(series);
      }

      if (!this.#positions.has(series)) {
        this.#positions.set(series, position);
      }
      ids.push(series.id);
    });

    this.#rows = Object.freeze(rows);
    this.#ids = Object.freeze(ids);

    const duration = performance.now() - startTime;
    metrics.recordBuildTime(duration);
    metrics.updateSize(rows.length, this.#byTimeInterval.size, this.#byTag.size);

    logger.info("index.build.end", {
      details: {
        durationMs: duration.toFixed(2),
        rows: rows.length,
        timeIntervals: this.#byTimeInterval.size,
        tags: this.#byTag.size,
      },
    });
  }

  /**
   * Parse listed ids and build the index from them
   */
  static fromRaw(pairs: Iterable<RawSeriesId>): ClientSideIndex {
    return new ClientSideIndex(parseSeriesCollection(pairs));
  }

  get size(): number {
    return this.#rows.length;
  }

  /**
   * Every series id, in input order
   */
  get ids(): readonly string[] {
    return this.#ids;
  }

  /**
   * Exact bucket (TimeInterval.key) → series in that bucket
   */
  get byTimeInterval(): ReadonlyMap<string, ReadonlySet<Series>> {
    return this.#byTimeInterval;
  }

  /**
   * Tag token → series carrying it
   */
  get byTag(): ReadonlyMap<string, ReadonlySet<Series>> {
    return this.#byTag;
  }

  /**
   * Returns a copy of the internal series collection. The array can be
   * altered freely; the Series objects within may not.
   */
  copyOfRows(): Series[] {
    return [...this.#rows];
  }

  /**
   * Distinct buckets, ordered by start
   */
  timeIntervals(): TimeInterval[] {
    return [...this.#intervals.values()].sort((a, b) => a.startMs - b.startMs);
  }

  rowsInTimeInterval(interval: TimeInterval): ReadonlySet<Series> {
    return this.#byTimeInterval.get(interval.key) ?? EMPTY;
  }

  rowsWithTag(tag: string): ReadonlySet<Series> {
    return this.#byTag.get(tag) ?? EMPTY;
  }

  stats(): IndexStats {
    const measurements = new Set<string>();
    const fields = new Set<string>();
    const tables = new Set<string>();
    for (const series of this.#rows) {
      measurements.add(series.measurement);
      fields.add(series.field);
      tables.add(series.table);
    }

    return {
      rows: this.#rows.length,
      ids: this.#ids.length,
      timeIntervals: this.#byTimeInterval.size,
      tags: this.#byTag.size,
      measurements: measurements.size,
      fields: fields.size,
      tables: tables.size,
    };
  }

  /**
   * Candidate series for a query, in index order.
   *
   * Narrows through byTag (the tag group with the fewest rows) or through a
   * scan of bucket keys overlapping the query interval, then applies every
   * predicate. Without tags or interval every row is scanned.
   */
  select(query: SeriesQuery): Series[] {
    const startTime = performance.now();

    let result: Series[];
    const candidates = this.#candidates(query);
    if (candidates) {
      metrics.recordHit();
      result = [...candidates]
        .filter((s) => matches(s, query))
        .sort((a, b) => this.#position(a) - this.#position(b));
    } else {
      metrics.recordMiss();
      result = selectSeries(this.#rows, query);
    }

    const duration = performance.now() - startTime;
    metrics.recordSelectTime(duration);
    logger.debug("index.select", {
      details: {
        durationMs: duration.toFixed(2),
        pruned: candidates !== undefined,
        results: result.length,
      },
    });

    return result;
  }

  #candidates(query: SeriesQuery): ReadonlySet<Series> | undefined {
    if (query.tagSets && query.tagSets.length > 0) {
      // every group must match, so the smallest group bounds the result
      let smallest: Set<Series> | undefined;
      for (const tagSet of query.tagSets) {
        const union = new Set<Series>();
        for (const tag of tagSet) {
          for (const series of this.rowsWithTag(tag)) {
            union.add(series);
          }
        }
        if (!smallest || union.size < smallest.size) {
          smallest = union;
        }
      }
      return smallest;
    }

    if (query.interval) {
      const union = new Set<Series>();
      for (const [key, interval] of this.#intervals) {
        if (!interval.overlaps(query.interval)) continue;
        for (const series of this.#byTimeInterval.get(key) ?? EMPTY) {
          union.add(series);
        }
      }
      return union;
    }

    return undefined;
  }

  #position(series: Series): number {
    return this.#positions.get(series) ?? Number.MAX_SAFE_INTEGER;
  }
}
