/**
 * Standard error classes for tablelint
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  SCHEMA_PARSE_ERROR = "SCHEMA_PARSE_ERROR",
  SCHEMA_ERROR = "SCHEMA_ERROR",
  SOURCE_ERROR = "SOURCE_ERROR",
  DATA_ERROR = "DATA_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class TablelintError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TablelintError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends TablelintError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends TablelintError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Malformed schema input: bad document shape, unknown type strings,
 * half-filled references in a control file.
 */
export class SchemaParseError extends TablelintError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_PARSE_ERROR, message, details, options);
    this.name = "SchemaParseError";
  }
}

export type SchemaErrorKind =
  | "empty-table-name"
  | "duplicate-table"
  | "empty-column-name"
  | "duplicate-column"
  | "unresolved-primary-key"
  | "unresolved-unique-column"
  | "foreign-key-arity"
  | "unresolved-foreign-table"
  | "foreign-table-without-primary-key"
  | "foreign-column-not-primary-key"
  | "unresolved-foreign-key-column"
  | "foreign-key-type-mismatch";

/**
 * Structural schema violation found before any data is read
 */
export class SchemaError extends TablelintError {
  constructor(
    public readonly kind: SchemaErrorKind,
    public readonly table: string,
    message: string,
    details?: ErrorDetails,
  ) {
    super(ErrorCode.SCHEMA_ERROR, message, { kind, table, ...details });
    this.name = "SchemaError";
  }
}

export type DataErrorKind =
  | "header-arity"
  | "header-mismatch"
  | "row-arity"
  | "type-mismatch"
  | "null-violation"
  | "duplicate-key";

export interface DataErrorLocation {
  table: string;
  /** 1-based line in the table's data; the header is line 1 */
  row: number;
  column?: string;
  value?: string;
}

/**
 * First data violation of a validation pass
 */
export class DataError extends TablelintError {
  public readonly table: string;
  public readonly row: number;
  public readonly column?: string;
  public readonly value?: string;

  constructor(
    public readonly kind: DataErrorKind,
    location: DataErrorLocation,
    message: string,
  ) {
    super(ErrorCode.DATA_ERROR, message, { kind, ...location });
    this.name = "DataError";
    this.table = location.table;
    this.row = location.row;
    this.column = location.column;
    this.value = location.value;
  }
}

/**
 * Row source failure: table missing, unreadable, or not a well-formed file
 */
export class SourceError extends TablelintError {
  constructor(
    public readonly table: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.SOURCE_ERROR, message, { table }, options);
    this.name = "SourceError";
  }
}

/**
 * Process exit status for an error raised anywhere in a run
 */
export function exitCodeFor(error: TablelintError): number {
  switch (error.code) {
    case ErrorCode.DATA_ERROR:
      return 1;
    case ErrorCode.SCHEMA_ERROR:
      return 2;
    case ErrorCode.SCHEMA_PARSE_ERROR:
    case ErrorCode.CONFIG_ERROR:
      return 3;
    case ErrorCode.SOURCE_ERROR:
    case ErrorCode.FILE_IO_ERROR:
      return 4;
    default:
      return 1;
  }
}
