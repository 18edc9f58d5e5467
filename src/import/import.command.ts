import { Injectable, Logger } from '@nestjs/common';
import { ImportService } from './import.service';
import { ImportError, UsageError } from './errors/import.errors';
import { ImportReport, ImportRowResult } from './interface/import-report.interface';
import { IMPORT_USAGE, ImportInvocation, parseImportArgs } from './utils/import-args';
import { createDetachedContext } from '../common/request-context';

export interface CommandOutput {
  write(line: string): void;
  error(line: string): void;
}

export const EXIT_CODES = {
  OK: 0,
  IMPORT_FAILED: 1,
  USAGE: 2,
} as const;

export const consoleOutput: CommandOutput = {
  write: (line) => process.stdout.write(`${line}\n`),
  error: (line) => process.stderr.write(`${line}\n`),
};

const RULE = '='.repeat(50);

@Injectable()
export class ImportCommand {
  private readonly logger = new Logger(ImportCommand.name);

  constructor(private readonly importService: ImportService) { }

  /** Runs one import command and resolves to the process exit code. */
  async run(argv: readonly string[], output: CommandOutput = consoleOutput): Promise<number> {
    let invocation: ImportInvocation;
    try {
      invocation = parseImportArgs(argv);
    } catch (error) {
      if (!(error instanceof UsageError)) throw error;
      output.error(error.message);
      output.error(IMPORT_USAGE);
      return EXIT_CODES.USAGE;
    }

    const ctx = createDetachedContext(invocation.command);
    output.write(`Starting import from ${invocation.filePath}...`);

    let report: ImportReport;
    try {
      if (invocation.command === 'import_locations') {
        report = await this.importService.importLocations(invocation.filePath, ctx);
      } else {
        if (invocation.skipLocation) {
          output.write('Location resolution skipped. Assign locations through the API.');
        }
        report = await this.importService.importProperties(
          invocation.filePath,
          { skipLocation: invocation.skipLocation, matchOn: invocation.matchOn },
          ctx,
        );
      }
    } catch (error) {
      if (!(error instanceof ImportError)) throw error;
      this.logger.error(`[${ctx.requestId}] ${error.name}: ${error.message}`);
      output.error(error.message);
      return EXIT_CODES.IMPORT_FAILED;
    }

    report.rows.forEach((row) => output.write(describeRow(row)));

    const { created, updated, skipped, failed } = report.summary;
    output.write('');
    output.write(RULE);
    output.write('Import Summary:');
    output.write(`Created: ${created}`);
    output.write(`Updated: ${updated}`);
    output.write(`Skipped: ${skipped}`);
    output.write(`Failed: ${failed}`);
    output.write(RULE);

    return EXIT_CODES.OK;
  }
}

export function describeRow(row: ImportRowResult): string {
  const subject = row.label ? ` "${row.label}"` : '';
  const reason = row.reason ? ` - ${row.reason}` : '';
  return `Row ${row.line}: ${row.outcome}${subject}${reason}`;
}
