/**
 * Zod schemas for validating query and configuration input
 */

import { z } from "zod";
import { InvalidQueryError } from "./errors.js";
import { TimeInterval, parseInstant } from "./time-interval.js";
import type { SeriesQuery } from "./types.js";

const tableNamePattern = /^[A-Za-z0-9_]+$/;

export const TableNameSchema = z
  .string()
  .regex(tableNamePattern, "table names may only contain letters, numbers, and underscores");

const TagSchema = z
  .string()
  .min(1, "tags must be non-empty")
  .refine((tag) => !/[,#]/.test(tag), {
    message: "tags cannot contain ',' or '#'",
  });

const InstantSchema = z.string().transform((value, ctx) => {
  const ms = parseInstant(value);
  if (ms === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected YYYY-MM-DD or a UTC date-time, got "${value}"`,
    });
    return z.NEVER;
  }
  return ms;
});

export const SeriesQuerySchema = z
  .object({
    measurement: z.string().min(1).optional(),
    field: z.string().min(1).optional(),
    tagSets: z.array(z.array(TagSchema)).optional(),
    start: InstantSchema.optional(),
    end: InstantSchema.optional(),
  })
  .strict()
  .superRefine((spec, ctx) => {
    if ((spec.start === undefined) !== (spec.end === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [spec.start === undefined ? "start" : "end"],
        message: "start and end must be given together",
      });
    } else if (spec.start !== undefined && spec.end !== undefined && spec.start >= spec.end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["end"],
        message: "end must be after start",
      });
    }
  });

export type SeriesQueryInput = z.input<typeof SeriesQuerySchema>;

/**
 * Validate a JSON query specification and turn it into a SeriesQuery
 * @throws InvalidQueryError listing every issue found
 */
export function parseSeriesQuery(input: unknown): SeriesQuery {
  const result = SeriesQuerySchema.safeParse(input);
  if (!result.success) {
    throw new InvalidQueryError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      ),
      { cause: result.error }
    );
  }

  const { measurement, field, tagSets, start, end } = result.data;
  const query: SeriesQuery = {};
  if (measurement !== undefined) query.measurement = measurement;
  if (field !== undefined) query.field = field;
  if (tagSets !== undefined) query.tagSets = tagSets;
  if (start !== undefined && end !== undefined) {
    query.interval = new TimeInterval(start, end);
  }
  return query;
}

