/**
 * Half-open UTC time ranges and the fixed-size buckets series ids encode
 */

/**
 * Size of one time bucket in a series id (one day)
 */
export const BUCKET_DURATION_MS = 24 * 60 * 60 * 1000;

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const UTC_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?Z$/;

/**
 * Immutable `[start, end)` range in epoch milliseconds.
 *
 * Intervals compare by value: two instances with the same bounds share the
 * same `key`, which is what the client-side index uses as its map key.
 */
export class TimeInterval {
  readonly startMs: number;
  readonly endMs: number;
  readonly key: string;

  constructor(startMs: number, endMs: number) {
    if (!Number.isFinite(startMs) || !Number.isFinite(endMs)) {
      throw new RangeError(`Time interval bounds must be finite: ${startMs}, ${endMs}`);
    }
    if (endMs < startMs) {
      throw new RangeError(`Time interval ends before it starts: ${startMs} > ${endMs}`);
    }

    this.startMs = startMs;
    this.endMs = endMs;
    this.key = `${new Date(startMs).toISOString()}/${new Date(endMs).toISOString()}`;
    Object.freeze(this);
  }

  /**
   * The bucket starting at `startMs`
   */
  static forBucket(startMs: number): TimeInterval {
    return new TimeInterval(startMs, startMs + BUCKET_DURATION_MS);
  }

  get start(): Date {
    return new Date(this.startMs);
  }

  get end(): Date {
    return new Date(this.endMs);
  }

  equals(other: TimeInterval): boolean {
    return this.startMs === other.startMs && this.endMs === other.endMs;
  }

  /**
   * True if the two ranges share at least one instant. Ranges that only
   * touch at a boundary do not overlap.
   */
  overlaps(other: TimeInterval): boolean {
    return this.startMs < other.endMs && other.startMs < this.endMs;
  }

  toString(): string {
    return this.key;
  }
}

/**
 * Parse a strict `YYYY-MM-DD` calendar day as UTC midnight
 * @returns Epoch milliseconds, or undefined if the text is not a real day
 */
export function parseBucketDate(text: string): number | undefined {
  const match = DAY_PATTERN.exec(text);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  // 2016-02-30 rolls over into March; reject anything that moved
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }

  return date.getTime();
}

/**
 * Parse a query bound: either a `YYYY-MM-DD` day or a UTC ISO-8601 date-time
 */
export function parseInstant(text: string): number | undefined {
  if (DAY_PATTERN.test(text)) {
    return parseBucketDate(text);
  }

  if (!UTC_DATETIME_PATTERN.test(text)) return undefined;

  const day = parseBucketDate(text.slice(0, 10));
  if (day === undefined) return undefined;

  const ms = Date.parse(text);
  if (Number.isNaN(ms)) return undefined;

  // hours and minutes must survive the round trip (no 25:00 or 24:00)
  if (new Date(ms).toISOString().slice(0, 16) !== text.slice(0, 16)) return undefined;
  return ms;
}
