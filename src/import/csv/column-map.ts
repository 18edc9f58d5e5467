import { RowValidationError, SchemaError } from '../errors/import.errors';
import { CsvDocument, CsvRow } from './csv-reader';

export interface ColumnSpec {
  required: readonly string[];
  optional: readonly string[];
}

/** Header positions by column name, plus the row accessor the row parsers use. */
export class ColumnMap {
  private constructor(
    private readonly positions: ReadonlyMap<string, number>,
    readonly width: number,
    readonly unknownColumns: readonly string[],
  ) { }

  static fromDocument(document: CsvDocument, layout: ColumnSpec): ColumnMap {
    const positions = new Map<string, number>();
    const duplicates: string[] = [];

    document.header.forEach((name, index) => {
      if (positions.has(name)) duplicates.push(name);
      else positions.set(name, index);
    });

    if (duplicates.length > 0) {
      throw new SchemaError(`Duplicate column(s) in header: ${duplicates.join(', ')}`, document.filePath);
    }

    const missing = layout.required.filter((name) => !positions.has(name));
    if (missing.length > 0) {
      throw new SchemaError(
        `Missing required column(s): ${missing.join(', ')}. Found: ${document.header.join(', ')}`,
        document.filePath,
      );
    }

    const known = new Set([...layout.required, ...layout.optional]);
    const unknownColumns = document.header.filter((name) => !known.has(name));

    return new ColumnMap(positions, document.header.length, unknownColumns);
  }

  has(column: string): boolean {
    return this.positions.has(column);
  }

  /** Accessor for one row; absent optional columns read as ''. */
  reader(row: CsvRow): (column: string) => string {
    if (row.values.length !== this.width) {
      throw new RowValidationError(`Expected ${this.width} columns, found ${row.values.length}`);
    }
    return (column) => {
      const index = this.positions.get(column);
      return index === undefined ? '' : row.values[index] ?? '';
    };
  }
}
