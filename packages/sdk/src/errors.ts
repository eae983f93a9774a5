/**
 * Error types for series index operations
 *
 * Invariants:
 * - Every error raised while building the index is fatal to the run: the
 *   library throws, the owner of the startup sequence decides to abort
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all series index errors
 */
export abstract class SeriesIndexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a stored series id does not follow
 * `<measurement>(,<tag>)*#<field>#<YYYY-MM-DD>`
 */
export class MalformedIdentifierError extends SeriesIndexError {
  readonly code = "E_MALFORMED_ID";

  constructor(
    public readonly table: string,
    public readonly id: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Malformed series id in table "${table}" (${reason}): ${id}`, options);
  }
}

/**
 * Thrown when the client-side index is built from no series at all
 */
export class EmptyIndexInputError extends SeriesIndexError {
  readonly code = "E_EMPTY_INDEX";

  constructor(options?: ErrorOptions) {
    super("No series data to build the client-side index from", options);
  }
}

/**
 * Thrown when a query specification fails validation
 */
export class InvalidQueryError extends SeriesIndexError {
  readonly code = "E_QUERY";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid series query: ${issues.join("; ")}`, options);
  }
}

/**
 * Thrown when a series source cannot be read
 */
export class SourceReadError extends SeriesIndexError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read series source: ${filePath}`, options);
  }
}
