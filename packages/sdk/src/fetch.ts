/**
 * Series sources: enumerate the distinct series ids stored per table and
 * hand them to the index as parsed series
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ClientSideIndex } from "./client-side-index.js";
import { SourceReadError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { parseSeries } from "./series.js";
import type { Series, SeriesSource } from "./types.js";

/**
 * Tables the benchmark data loader writes series into
 */
export const BLESSED_TABLES: readonly string[] = Object.freeze([
  "series_bigint",
  "series_float",
  "series_double",
  "series_boolean",
  "series_blob",
]);

/**
 * Fetch and parse every series of the given tables, one pass per table.
 * The source is closed afterwards, also when parsing fails.
 */
export async function fetchSeriesCollection(
  source: SeriesSource,
  tables: readonly string[] = BLESSED_TABLES
): Promise<Series[]> {
  const collection: Series[] = [];

  try {
    for (const table of tables) {
      const before = collection.length;
      for await (const id of source.listSeriesIds(table)) {
        collection.push(parseSeries(table, id));
      }
      logger.debug("series.fetch", {
        table,
        details: { series: collection.length - before },
      });
    }
  } finally {
    await source.close?.();
  }

  return collection;
}

/**
 * Fetch all series and build the client-side index from them
 */
export async function buildClientSideIndex(
  source: SeriesSource,
  tables: readonly string[] = BLESSED_TABLES
): Promise<ClientSideIndex> {
  const collection = await fetchSeriesCollection(source, tables);
  return new ClientSideIndex(collection);
}

/**
 * In-memory source: table name → ids, listed as given
 */
export class MemorySeriesSource implements SeriesSource {
  #tables: Map<string, readonly string[]>;

  constructor(tables: Record<string, readonly string[]> | Map<string, readonly string[]>) {
    this.#tables = tables instanceof Map ? new Map(tables) : new Map(Object.entries(tables));
  }

  async *listSeriesIds(table: string): AsyncIterable<string> {
    yield* this.#tables.get(table) ?? [];
  }
}

/**
 * Directory source: `<root>/<table>.txt` lists one series id per line.
 *
 * Blank lines are skipped and each id is listed once per table. A table
 * without a file has no series.
 */
export class DirectorySeriesSource implements SeriesSource {
  #root: string;

  constructor(root: string) {
    this.#root = root;
  }

  get root(): string {
    return this.#root;
  }

  async *listSeriesIds(table: string): AsyncIterable<string> {
    const filePath = path.join(this.#root, `${table}.txt`);

    let content: string;
    try {
      content = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        logger.debug("series.source.missing", { table, message: filePath });
        return;
      }
      throw new SourceReadError(filePath, { cause: err });
    }

    const seen = new Set<string>();
    for (const line of content.split(/\r?\n/)) {
      const id = line.trim();
      if (id === "" || seen.has(id)) continue;
      seen.add(id);
      yield id;
    }
  }
}
