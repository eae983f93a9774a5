/**
 * Core types for the series index
 */

import type { TimeInterval } from "./time-interval.js";

/**
 * One distinct series id as listed from a table of the store
 * @example { table: "series_double", id: "cpu,hostname=host_0#usage_idle#2016-01-01" }
 */
export interface RawSeriesId {
  table: string;
  id: string;
}

/**
 * A parsed series: one time-series "wide row" of the store.
 * Instances are frozen and shared by reference between index buckets.
 */
export interface Series {
  /** Source table, e.g. "series_double" */
  readonly table: string;
  /** Raw composite id, e.g. "cpu,hostname=host_0,region=eu-central-1#usage_idle#2016-01-01" */
  readonly id: string;
  /** e.g. "cpu" */
  readonly measurement: string;
  /** "key=value" tokens, e.g. {"hostname=host_0", "region=eu-central-1"} */
  readonly tags: ReadonlySet<string>;
  /** e.g. "usage_idle" */
  readonly field: string;
  /** The day bucket the row covers */
  readonly timeInterval: TimeInterval;
}

/**
 * Tag filter in conjunctive normal form: every group must be satisfied by at
 * least one of its tags
 * @example [["hostname=host_0", "hostname=host_1"], ["region=eu-central-1"]]
 */
export type TagSets = ReadonlyArray<ReadonlyArray<string>>;

/**
 * Predicates a query planner applies to prune candidate series. Parts left
 * undefined do not constrain the result.
 */
export interface SeriesQuery {
  measurement?: string;
  field?: string;
  interval?: TimeInterval;
  tagSets?: TagSets;
}

/**
 * Summary counts of a built index
 */
export interface IndexStats {
  rows: number;
  ids: number;
  timeIntervals: number;
  tags: number;
  measurements: number;
  fields: number;
  tables: number;
}

/**
 * Enumerates the distinct series ids stored per table
 */
export interface SeriesSource {
  listSeriesIds(table: string): AsyncIterable<string>;
  close?(): Promise<void>;
}
