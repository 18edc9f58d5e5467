import { Test, TestingModule } from '@nestjs/testing';
import { ImportCommand, CommandOutput, EXIT_CODES } from '../import.command';
import { ImportService } from '../import.service';
import { FileError, SchemaError } from '../errors/import.errors';
import { ImportReport } from '../interface/import-report.interface';

describe('ImportCommand', () => {
  let command: ImportCommand;
  let lines: string[];
  let errors: string[];

  const output: CommandOutput = {
    write: (line) => lines.push(line),
    error: (line) => errors.push(line),
  };

  const mockImportService = {
    importLocations: jest.fn(),
    importProperties: jest.fn(),
  };

  const report: ImportReport = {
    filePath: 'locations.csv',
    summary: { created: 1, updated: 1, skipped: 1, failed: 0 },
    rows: [
      { line: 2, outcome: 'created', label: 'Aspen' },
      { line: 3, outcome: 'updated', label: 'Miami Beach' },
      { line: 4, outcome: 'skipped', reason: 'Missing city' },
    ],
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ImportCommand,
        {
          provide: ImportService,
          useValue: mockImportService,
        },
      ],
    }).compile();

    command = module.get<ImportCommand>(ImportCommand);
    lines = [];
    errors = [];
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should print each row and the summary', async () => {
    mockImportService.importLocations.mockResolvedValue(report);

    const exitCode = await command.run(['import_locations', 'locations.csv'], output);

    expect(exitCode).toBe(EXIT_CODES.OK);
    expect(mockImportService.importLocations).toHaveBeenCalledWith(
      'locations.csv',
      expect.objectContaining({ path: 'import_locations' }),
    );
    expect(lines).toEqual([
      'Starting import from locations.csv...',
      'Row 2: created "Aspen"',
      'Row 3: updated "Miami Beach"',
      'Row 4: skipped - Missing city',
      '',
      '='.repeat(50),
      'Import Summary:',
      'Created: 1',
      'Updated: 1',
      'Skipped: 1',
      'Failed: 0',
      '='.repeat(50),
    ]);
  });

  it('should pass the property flags through', async () => {
    mockImportService.importProperties.mockResolvedValue({ ...report, rows: [] });

    await command.run(['import_properties', 'p.csv', '--skip-location', '--match-on', 'address'], output);

    expect(mockImportService.importProperties).toHaveBeenCalledWith(
      'p.csv',
      { skipLocation: true, matchOn: 'address' },
      expect.objectContaining({ path: 'import_properties' }),
    );
    expect(lines[1]).toBe('Location resolution skipped. Assign locations through the API.');
  });

  it('should exit with 1 on a file error', async () => {
    mockImportService.importLocations.mockRejectedValue(new FileError('File not found: x.csv', 'x.csv'));

    const exitCode = await command.run(['import_locations', 'x.csv'], output);

    expect(exitCode).toBe(EXIT_CODES.IMPORT_FAILED);
    expect(errors).toEqual(['File not found: x.csv']);
  });

  it('should exit with 1 on a schema error', async () => {
    mockImportService.importProperties.mockRejectedValue(new SchemaError('Missing required column(s): title', 'p.csv'));

    await expect(command.run(['import_properties', 'p.csv'], output)).resolves.toBe(EXIT_CODES.IMPORT_FAILED);
  });

  it('should exit with 2 and print usage on bad arguments', async () => {
    const exitCode = await command.run(['import_properties'], output);

    expect(exitCode).toBe(EXIT_CODES.USAGE);
    expect(errors[0]).toBe('import_properties expects exactly one CSV path');
    expect(errors[1]).toContain('import_properties <csv-path> [--skip-location] [--match-on title|address]');
    expect(mockImportService.importProperties).not.toHaveBeenCalled();
  });

  it('should rethrow unexpected errors', async () => {
    mockImportService.importLocations.mockRejectedValue(new Error('disk on fire'));

    await expect(command.run(['import_locations', 'a.csv'], output)).rejects.toThrow('disk on fire');
  });
});
