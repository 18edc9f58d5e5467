import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { FileError, SchemaError } from '../errors/import.errors';

export interface CsvRow {
  line: number;
  values: string[];
}

/** A record the parser could not read, such as one with a stray quote. */
export interface MalformedRecord {
  line: number;
  reason: string;
}

export interface CsvDocument {
  filePath: string;
  header: string[];
  rows: CsvRow[];
  malformed: MalformedRecord[];
}

interface ParsedRecord {
  line: number;
  values: string[];
}

function toParsedRecord(value: unknown): ParsedRecord | null {
  if (typeof value !== 'object' || value === null || !('record' in value) || !('info' in value)) return null;
  const { record, info } = value;
  if (!Array.isArray(record) || !record.every((cell): cell is string => typeof cell === 'string')) return null;
  if (typeof info !== 'object' || info === null || !('lines' in info) || typeof info.lines !== 'number') return null;
  return { line: info.lines, values: record };
}

function errorLine(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('lines' in error)) return null;
  return typeof error.lines === 'number' ? error.lines : null;
}

const isBlank = (values: string[]) => values.every((value) => value === '');

/**
 * Reads a whole CSV file. Rows carry the line they end on, the header being line 1;
 * blank lines produce no row. Records the parser rejects are returned in `malformed`
 * instead of failing the file.
 */
export async function readCsvFile(filePath: string): Promise<CsvDocument> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw FileError.fromFsError(filePath, error);
  }

  // The parser may report several errors for one record
  const malformed = new Map<number, string>();
  let output: unknown;
  try {
    output = parse(content, {
      bom: true,
      trim: true,
      info: true,
      relax_column_count: true,
      skip_empty_lines: false,
      skip_records_with_error: true,
      on_skip: (error) => {
        const line = errorLine(error);
        if (line !== null && !malformed.has(line)) {
          malformed.set(line, error?.message ?? 'Malformed record');
        }
      },
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FileError(`Unable to parse CSV file ${filePath}: ${reason}`, filePath);
  }

  const records = Array.isArray(output) ? output.map(toParsedRecord) : [null];
  if (records.some((record) => record === null)) {
    throw new FileError(`Unable to parse CSV file ${filePath}: unexpected parser output`, filePath);
  }
  const parsed = records.filter((record): record is ParsedRecord => record !== null);

  const [header, ...body] = parsed;
  if (!header || isBlank(header.values)) {
    throw new SchemaError(`CSV file ${filePath} has no header row`, filePath);
  }
  const beforeHeader = [...malformed.keys()].find((line) => line <= header.line);
  if (beforeHeader !== undefined) {
    throw new SchemaError(`CSV file ${filePath} has a malformed header row: ${malformed.get(beforeHeader)}`, filePath);
  }

  return {
    filePath,
    header: header.values.map((name) => name.trim().toLowerCase()),
    rows: body.filter((record) => !isBlank(record.values)),
    malformed: [...malformed].map(([line, reason]) => ({ line, reason })),
  };
}
