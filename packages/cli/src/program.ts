/**
 * Series index CLI commands
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { z } from "zod";
import { parseSeriesQuery } from "@seriesindex/sdk";
import type { Series, SeriesQueryInput } from "@seriesindex/sdk";
import { loadIndex } from "./lib/load.js";
import { isVerbose } from "./lib/env.js";
import { collect, parseJson, parseNonNegativeInt, parseTagSet } from "./lib/arg.js";
import { processIO } from "./lib/io.js";
import type { CliIO } from "./lib/io.js";
import { printJson, printLines, colorize } from "./lib/render.js";
import { CliError, EXIT_OK, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/ and dist/ both sit directly below package.json
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8")));

type GlobalOptions = {
  source?: string;
  tables?: string;
  verbose?: boolean;
};

interface JsonOption {
  json?: boolean;
}

interface MatchOptions extends JsonOption {
  measurement?: string;
  field?: string;
  tagSet: string[][];
  start?: string;
  end?: string;
  query?: unknown;
  limit?: number;
}

/**
 * JSON shape of a series in command output
 */
function seriesToJson(series: Series): Record<string, unknown> {
  return {
    table: series.table,
    id: series.id,
    measurement: series.measurement,
    tags: [...series.tags],
    field: series.field,
    start: series.timeInterval.start.toISOString(),
    end: series.timeInterval.end.toISOString(),
  };
}

/**
 * Turn match flags (or --query JSON) into a query specification
 */
function matchSpec(options: MatchOptions): unknown {
  const flagged =
    options.measurement !== undefined ||
    options.field !== undefined ||
    options.tagSet.length > 0 ||
    options.start !== undefined ||
    options.end !== undefined;

  if (options.query !== undefined) {
    if (flagged) {
      throw new CliError("Cannot combine --query with --measurement, --field, --tag-set, --start or --end");
    }
    return options.query;
  }

  const spec: SeriesQueryInput = {};
  if (options.measurement !== undefined) spec.measurement = options.measurement;
  if (options.field !== undefined) spec.field = options.field;
  if (options.tagSet.length > 0) spec.tagSets = options.tagSet;
  if (options.start !== undefined) spec.start = options.start;
  if (options.end !== undefined) spec.end = options.end;
  return spec;
}

/**
 * Build the commander program, writing through `io`
 */
export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  const globals = (): GlobalOptions & { verbose: boolean } => {
    const opts = program.opts<GlobalOptions>();
    return { ...opts, verbose: opts.verbose === true || isVerbose(io.env) };
  };

  const load = async () => loadIndex(globals(), io);

  // Route commander output through io; errors surface as CommanderError
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("seriesindex")
    .description("Client-side index over the series ids of a wide-row time-series store")
    .version(packageJson.version)
    .option("--source <dir>", "Directory holding one <table>.txt id listing per table")
    .option("--tables <list>", "Comma-separated tables to read")
    .option("--verbose", "Verbose diagnostics");

  // Stats command
  program
    .command("stats")
    .description("Show index statistics")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: JsonOption) => {
      await withTiming(
        io,
        "cli.stats",
        async () => {
          const { index } = await load();
          const stats = index.stats();

          if (options.json) {
            printJson(io, stats, { raw: true });
            return;
          }

          printLines(io, [
            `Series: ${stats.rows}`,
            `Time intervals: ${stats.timeIntervals}`,
            `Tags: ${stats.tags}`,
            `Measurements: ${stats.measurements}`,
            `Fields: ${stats.fields}`,
            `Tables: ${stats.tables}`,
          ]);
        },
        globals().verbose
      );
    });

  // Ids command
  program
    .command("ids")
    .description("List every series id in index order")
    .action(async () => {
      await withTiming(
        io,
        "cli.ids",
        async () => {
          const { index } = await load();
          printLines(io, index.ids);
        },
        globals().verbose
      );
    });

  // Tags command
  program
    .command("tags")
    .description("List tags with the number of series carrying each")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: JsonOption) => {
      await withTiming(
        io,
        "cli.tags",
        async () => {
          const { index } = await load();
          const tags = [...index.byTag.entries()]
            .map(([tag, rows]) => ({ tag, count: rows.size }))
            .sort((a, b) => (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0));

          if (options.json) {
            printJson(io, tags, { raw: true });
          } else {
            printLines(io, tags.map(({ tag, count }) => `${tag}\t${count}`));
          }
        },
        globals().verbose
      );
    });

  // Intervals command
  program
    .command("intervals")
    .description("List time buckets with the number of series in each")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: JsonOption) => {
      await withTiming(
        io,
        "cli.intervals",
        async () => {
          const { index } = await load();
          const buckets = index.timeIntervals().map((interval) => ({
            start: interval.start.toISOString(),
            end: interval.end.toISOString(),
            count: index.rowsInTimeInterval(interval).size,
          }));

          if (options.json) {
            printJson(io, buckets, { raw: true });
          } else {
            printLines(io, buckets.map(({ start, end, count }) => `${start}/${end}\t${count}`));
          }
        },
        globals().verbose
      );
    });

  // Match command
  program
    .command("match")
    .description("List series matching a query")
    .option("--measurement <name>", "Measurement name")
    .option("--field <name>", "Field name")
    .option(
      "--tag-set <tags>",
      "Comma-separated alternatives; repeat to require several groups",
      (value: string, previous: string[][]) => collect(parseTagSet(value), previous),
      []
    )
    .option("--start <time>", "Range start (YYYY-MM-DD or UTC date-time)")
    .option("--end <time>", "Range end, exclusive")
    .option("--query <json>", "Query as JSON instead of flags", (value: string) =>
      parseJson(value, "--query")
    )
    .option("--limit <n>", "Maximum series to list", (value: string) =>
      parseNonNegativeInt(value, "--limit")
    )
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: MatchOptions) => {
      await withTiming(
        io,
        "cli.match",
        async () => {
          const query = parseSeriesQuery(matchSpec(options));
          const { index } = await load();

          const selected = index.select(query);
          const limited = options.limit !== undefined ? selected.slice(0, options.limit) : selected;

          if (options.json) {
            printJson(io, limited.map(seriesToJson));
          } else {
            printLines(io, limited.map((s) => s.id));
          }
        },
        globals().verbose
      );
    });

  return program;
}

/**
 * Parse argv, run the command and return the process exit code
 */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv]);
    return EXIT_OK;
  } catch (err) {
    // Commander has already written its own message (or help/version)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    const verbose = opts.verbose === true || isVerbose(io.env);
    io.stderr(`Error: ${formatCliError(err, verbose)}\n`);
    return mapErrorToExitCode(err);
  }
}
