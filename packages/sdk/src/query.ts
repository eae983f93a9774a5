/**
 * Series matching predicates used to prune candidates during query planning
 */

import type { TimeInterval } from "./time-interval.js";
import type { Series, SeriesQuery, TagSets } from "./types.js";

/**
 * Test whether the series' bucket overlaps the given interval
 */
export function matchesTimeInterval(series: Series, interval: TimeInterval): boolean {
  return series.timeInterval.overlaps(interval);
}

/**
 * Test whether the series belongs to the given measurement
 */
export function matchesMeasurement(series: Series, measurement: string): boolean {
  return series.measurement === measurement;
}

/**
 * Test whether the series carries the given field
 */
export function matchesField(series: Series, field: string): boolean {
  return series.field === field;
}

/**
 * Test whether the series satisfies every tag group.
 * Groups are ANDed, tags within a group are ORed; no groups matches anything.
 */
export function matchesTagSets(series: Series, tagSets: TagSets): boolean {
  for (const tagSet of tagSets) {
    // each group must have at least one match
    if (!tagSet.some((tag) => series.tags.has(tag))) {
      return false;
    }
  }
  return true;
}

/**
 * Test a series against every predicate the query sets
 * @param series - Series to test
 * @param query - Query predicates; undefined parts are ignored
 * @returns true if all set predicates hold
 */
export function matches(series: Series, query: SeriesQuery): boolean {
  if (query.measurement !== undefined && !matchesMeasurement(series, query.measurement)) {
    return false;
  }
  if (query.field !== undefined && !matchesField(series, query.field)) {
    return false;
  }
  if (query.interval !== undefined && !matchesTimeInterval(series, query.interval)) {
    return false;
  }
  if (query.tagSets !== undefined && !matchesTagSets(series, query.tagSets)) {
    return false;
  }
  return true;
}

/**
 * Filter a series collection down to the query's candidates, keeping order
 */
export function selectSeries(collection: readonly Series[], query: SeriesQuery): Series[] {
  return collection.filter((s) => matches(s, query));
}
