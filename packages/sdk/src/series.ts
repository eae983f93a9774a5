/**
 * Series id parsing
 *
 * Expected format:
 *   cpu,hostname=host_0,region=eu-central-1,rack=42#usage_idle#2016-01-01
 *
 * Ids come from a store that only ever holds well-formed ones, so any
 * deviation is reported as MalformedIdentifierError rather than skipped.
 */

import { MalformedIdentifierError } from "./errors.js";
import { TimeInterval, parseBucketDate } from "./time-interval.js";
import type { RawSeriesId, Series } from "./types.js";

/**
 * Parse one series id listed from `table`
 * @throws MalformedIdentifierError if the id does not have exactly three
 *   `#` sections, repeats a tag, or carries an invalid date
 */
export function parseSeries(table: string, id: string): Series {
  const sections = id.split("#");
  const [measurementAndTags, field, date] = sections;
  if (
    sections.length !== 3 ||
    measurementAndTags === undefined ||
    field === undefined ||
    date === undefined
  ) {
    throw new MalformedIdentifierError(
      table,
      id,
      `expected 3 '#'-delimited sections, got ${sections.length}`
    );
  }

  const [measurement = "", ...tagTokens] = measurementAndTags.split(",");

  const tags = new Set<string>();
  for (const tag of tagTokens) {
    if (tags.has(tag)) {
      throw new MalformedIdentifierError(table, id, `duplicate tag "${tag}"`);
    }
    tags.add(tag);
  }

  const start = parseBucketDate(date);
  if (start === undefined) {
    throw new MalformedIdentifierError(table, id, `invalid date "${date}"`);
  }

  return Object.freeze({
    table,
    id,
    measurement,
    tags,
    field,
    timeInterval: TimeInterval.forBucket(start),
  });
}

/**
 * Parse a flat collection of listed ids, preserving order
 */
export function parseSeriesCollection(pairs: Iterable<RawSeriesId>): Series[] {
  const collection: Series[] = [];
  for (const { table, id } of pairs) {
    collection.push(parseSeries(table, id));
  }
  return collection;
}
