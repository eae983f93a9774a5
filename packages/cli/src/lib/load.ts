/**
 * Index loader for CLI
 * Reads the configured series source and builds the client-side index once
 */

import { DirectorySeriesSource, buildClientSideIndex, logger } from "@seriesindex/sdk";
import type { ClientSideIndex } from "@seriesindex/sdk";
import { resolveSource, resolveTables } from "./env.js";
import { processIO } from "./io.js";
import type { CliIO } from "./io.js";

export interface LoadOptions {
  source?: string;
  tables?: string;
  verbose?: boolean;
}

export interface LoadedIndex {
  index: ClientSideIndex;
  source: string;
  tables: string[];
}

/**
 * Build the index from the series source named by options or environment
 */
export async function loadIndex(
  options: LoadOptions,
  io: CliIO = processIO
): Promise<LoadedIndex> {
  const source = resolveSource(options.source, io.env);
  const tables = resolveTables(options.tables, io.env);

  // SDK logs are diagnostics: verbose only, on the command's stderr
  logger.setEnabled(options.verbose === true);
  logger.setSink((line) => io.stderr(`${line}\n`));

  const index = await buildClientSideIndex(new DirectorySeriesSource(source), tables);
  return { index, source, tables };
}
