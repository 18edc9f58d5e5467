/** Fatal import failures: the whole run is aborted. */
export abstract class ImportError extends Error {
  protected constructor(message: string, readonly filePath: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The CSV file is missing or cannot be read or parsed. */
export class FileError extends ImportError {
  constructor(message: string, filePath: string) {
    super(message, filePath);
  }

  static fromFsError(filePath: string, error: unknown): FileError {
    const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      return new FileError(`File not found: ${filePath}`, filePath);
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new FileError(`Unable to read CSV file ${filePath}: ${reason}`, filePath);
  }
}

/** The header row does not match the expected columns. */
export class SchemaError extends ImportError {
  constructor(message: string, filePath: string) {
    super(message, filePath);
  }
}

/** A single row failed validation; the row is skipped and the import goes on. */
export class RowValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RowValidationError';
  }
}

/** Bad command-line invocation. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
