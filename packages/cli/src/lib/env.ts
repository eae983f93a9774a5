/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { BLESSED_TABLES, TableNameSchema } from "@seriesindex/sdk";
import { CliError } from "./errors.js";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the series source directory
 * Priority: CLI option > SERIESINDEX_SOURCE env var > default "./series"
 */
export function resolveSource(cliSource?: string, env: NodeJS.ProcessEnv = process.env): string {
  const source = cliSource ?? env.SERIESINDEX_SOURCE ?? "./series";
  return path.resolve(expandTilde(source));
}

/**
 * Resolve the tables to read series from
 * Priority: CLI option > SERIESINDEX_TABLES env var > blessed tables
 */
export function resolveTables(cliTables?: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = cliTables ?? env.SERIESINDEX_TABLES;
  if (raw === undefined) {
    return [...BLESSED_TABLES];
  }

  const tables = raw
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);

  if (tables.length === 0) {
    throw new CliError("At least one table is required");
  }

  for (const table of tables) {
    if (!TableNameSchema.safeParse(table).success) {
      throw new CliError(
        `Invalid table name "${table}". Table names may only include letters, numbers, or underscores.`
      );
    }
  }

  return tables;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.SERIESINDEX_CLI_DEBUG === "1";
}
