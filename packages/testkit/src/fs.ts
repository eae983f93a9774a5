/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "seriesindex-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "seriesindex-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write one `<table>.txt` file per table, one series id per line
 * @param dir - Source directory
 * @param tables - Table name → series ids
 */
export async function writeSeriesSource(
  dir: string,
  tables: Record<string, readonly string[]>
): Promise<void> {
  for (const [table, ids] of Object.entries(tables)) {
    await writeFile(join(dir, `${table}.txt`), ids.map((id) => `${id}\n`).join(""), "utf8");
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a temp directory pre-filled as a series source
 */
export async function withSeriesSource<T>(
  tables: Record<string, readonly string[]>,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  return await withTempDir(async (dir) => {
    await writeSeriesSource(dir, tables);
    return await fn(dir);
  });
}
