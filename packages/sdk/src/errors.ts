/**
 * Error types for breakprops operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Data errors (parse, overlap, capacity, packed) are fatal for the run
 */

/**
 * Base class for all breakprops errors
 */
export abstract class BreakPropsError extends Error {
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
 * Thrown when the source table cannot be read
 */
export class SourceReadError extends BreakPropsError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read property table: ${filePath}`, options);
  }
}

/**
 * Thrown when the generated module cannot be written
 */
export class ArtifactWriteError extends BreakPropsError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write generated module: ${filePath}`, options);
  }
}

/**
 * Thrown when a data line does not have the `range;property` shape
 */
export class RangeParseError extends BreakPropsError {
  readonly code = "E_PARSE";

  constructor(
    public readonly line: string,
    public readonly reason: string,
    public readonly lineNumber?: number,
    options?: ErrorOptions
  ) {
    super(
      lineNumber === undefined
        ? `Invalid property line "${line}": ${reason}`
        : `Invalid property line ${lineNumber} "${line}": ${reason}`,
      options
    );
  }
}

/**
 * Reported when two ranges of the source table intersect
 */
export class OverlapError extends BreakPropsError {
  readonly code = "E_OVERLAP";

  constructor(
    public readonly previous: { start: number; end: number; property: string },
    public readonly next: { start: number; end: number; property: string },
    options?: ErrorOptions
  ) {
    super(
      `Data contains overlapping ranges: ${describe(previous)} and ${describe(next)}`,
      options
    );
  }
}

/**
 * Thrown when a family has more property values than the one-character code can carry
 */
export class CapacityError extends BreakPropsError {
  readonly code = "E_CAPACITY";

  constructor(
    public readonly count: number,
    public readonly limit: number,
    options?: ErrorOptions
  ) {
    super(`Too many property values: ${count} (max ${limit})`, options);
  }
}

/**
 * Thrown when a packed string does not follow the record layout
 */
export class PackedDataError extends BreakPropsError {
  readonly code = "E_PACKED";

  constructor(
    public readonly offset: number,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Malformed packed data at offset ${offset}: ${reason}`, options);
  }
}

function describe(range: { start: number; end: number; property: string }): string {
  return `${hex(range.start)}..${hex(range.end)} (${range.property})`;
}

function hex(codepoint: number): string {
  return codepoint.toString(16).toUpperCase().padStart(4, "0");
}
