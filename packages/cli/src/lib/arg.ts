/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse one tag group: alternatives separated by commas
 * @example "hostname=host_0,hostname=host_1" → ["hostname=host_0", "hostname=host_1"]
 */
export function parseTagSet(value: string): string[] {
  const tags = value
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);

  if (tags.length === 0) {
    throw new InvalidArgumentError("--tag-set needs at least one tag");
  }

  return tags;
}

/**
 * Accumulate a repeatable option
 */
export function collect<T>(value: T, previous: T[] = []): T[] {
  return [...previous, value];
}
