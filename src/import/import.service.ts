import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager } from 'typeorm';
import { Location } from '../location/entities/location.entity';
import { Property } from '../property/entities/property.entity';
import { CsvDocument, CsvRow, readCsvFile } from './csv/csv-reader';
import { ColumnMap, ColumnSpec } from './csv/column-map';
import { RowValidationError } from './errors/import.errors';
import { IMPORT_CONSTANTS, isPropertyMatchKey, PropertyMatchKey } from './constants/import.constants';
import {
  BooleanTokens,
  ImportPropertiesOptions,
  ImportReport,
  ImportRowResult,
} from './interface/import-report.interface';
import { LocationRecord, toLocationRecord } from './rows/location.row';
import { PropertyRecord, toPropertyRecord } from './rows/property.row';
import { summarize } from './utils/import-summary';
import { RequestContext } from '../common/request-context';
import { readTokenList } from '../common/utils/config.util';

type WriteOutcome = 'created' | 'updated';

interface RowHandler<T> {
  parse: (row: CsvRow) => T;
  label: (record: T) => string;
  write: (record: T) => Promise<WriteOutcome>;
}

@Injectable()
export class ImportService {
  private readonly logger = new Logger(ImportService.name);
  private readonly booleans: BooleanTokens;
  private readonly defaultMatchKey: PropertyMatchKey;

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {
    this.booleans = {
      truthy: readTokenList(this.config, 'IMPORT_TRUE_TOKENS', IMPORT_CONSTANTS.DEFAULT_TRUE_TOKENS),
      falsy: readTokenList(this.config, 'IMPORT_FALSE_TOKENS', IMPORT_CONSTANTS.DEFAULT_FALSE_TOKENS),
    };

    const key = this.config.get<string>('IMPORT_PROPERTY_KEY')?.trim().toLowerCase() || IMPORT_CONSTANTS.DEFAULT_PROPERTY_KEY;
    if (!isPropertyMatchKey(key)) {
      throw new Error(`IMPORT_PROPERTY_KEY must be "title" or "address", got "${key}"`);
    }
    this.defaultMatchKey = key;
  }

  async importLocations(filePath: string, ctx: RequestContext): Promise<ImportReport> {
    const document = await readCsvFile(filePath);
    const columns = ColumnMap.fromDocument(document, {
      required: IMPORT_CONSTANTS.LOCATION_COLUMNS.REQUIRED,
      optional: IMPORT_CONSTANTS.LOCATION_COLUMNS.OPTIONAL,
    });
    this.warnUnknownColumns(columns, ctx);

    const rows = await this.processRows(document, ctx, {
      parse: (row) => toLocationRecord(columns, row),
      label: (record) => record.name,
      write: (record) => this.dataSource.transaction((manager) => this.upsertLocation(manager, record)),
    });

    return this.finish(filePath, rows, ctx);
  }

  async importProperties(
    filePath: string,
    options: ImportPropertiesOptions,
    ctx: RequestContext,
  ): Promise<ImportReport> {
    const skipLocation = options.skipLocation ?? false;
    const matchOn = options.matchOn ?? this.defaultMatchKey;

    if (skipLocation) {
      this.logger.warn(`[${ctx.requestId}] location resolution skipped; assign locations through the API`);
    }

    const document = await readCsvFile(filePath);
    const columns = ColumnMap.fromDocument(document, propertyColumns(skipLocation, matchOn));
    this.warnUnknownColumns(columns, ctx);

    const rows = await this.processRows(document, ctx, {
      parse: (row) => {
        const record = toPropertyRecord(columns, row, { resolveLocation: !skipLocation, booleans: this.booleans });
        if (matchOn === 'address' && !record.address) {
          throw new RowValidationError('Missing address');
        }
        return record;
      },
      label: (record) => record.title,
      write: (record) =>
        this.dataSource.transaction((manager) => this.upsertProperty(manager, record, matchOn)),
    });

    return this.finish(filePath, rows, ctx);
  }

  private async processRows<T>(document: CsvDocument, ctx: RequestContext, handler: RowHandler<T>) {
    const results: ImportRowResult[] = document.malformed.map(({ line, reason }): ImportRowResult => {
      this.logger.warn(`[${ctx.requestId}] line ${line}: skipped (${reason})`);
      return { line, outcome: 'skipped', reason };
    });
    // Sequential: a row may create the location a later row refers to
    for (const row of document.rows) {
      results.push(await this.processRow(row, ctx, handler));
    }
    return results.sort((a, b) => a.line - b.line);
  }

  private async processRow<T>(row: CsvRow, ctx: RequestContext, handler: RowHandler<T>): Promise<ImportRowResult> {
    let record: T;
    try {
      record = handler.parse(row);
    } catch (error) {
      if (!(error instanceof RowValidationError)) throw error;
      this.logger.warn(`[${ctx.requestId}] line ${row.line}: skipped (${error.message})`);
      return { line: row.line, outcome: 'skipped', reason: error.message };
    }

    const label = handler.label(record);
    try {
      const outcome = await handler.write(record);
      this.logger.debug(`[${ctx.requestId}] line ${row.line}: ${outcome} "${label}"`);
      return { line: row.line, outcome, label };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`[${ctx.requestId}] line ${row.line}: failed "${label}" (${reason})`);
      return { line: row.line, outcome: 'failed', label, reason };
    }
  }

  private async upsertLocation(manager: EntityManager, record: LocationRecord): Promise<WriteOutcome> {
    const repository = manager.getRepository(Location);
    const existing = await findLocation(manager, record);

    if (existing) {
      existing.state = record.state;
      existing.country = record.country;
      existing.description = record.description;
      await repository.save(existing);
      return 'updated';
    }

    await repository.save(repository.create(record));
    return 'created';
  }

  private async upsertProperty(
    manager: EntityManager,
    record: PropertyRecord,
    matchOn: PropertyMatchKey,
  ): Promise<WriteOutcome> {
    const repository = manager.getRepository(Property);
    const location = record.location ? await this.resolveLocation(manager, record.location) : null;

    const existing = await repository.findOne({
      where: matchOn === 'address' ? { address: record.address ?? '' } : { title: record.title },
      order: { id: 'ASC' },
    });

    const target = existing ?? repository.create({ locationId: null, location: null });
    target.title = record.title;
    target.description = record.description;
    target.propertyType = record.propertyType;
    target.bedrooms = record.bedrooms;
    target.bathrooms = record.bathrooms;
    target.maxGuests = record.maxGuests;
    target.pricePerNight = record.pricePerNight;
    target.address = record.address;
    target.amenities = record.amenities;
    target.isAvailable = record.isAvailable;

    // Without resolution an existing assignment is kept
    if (location) {
      target.location = location;
      target.locationId = location.id;
    }

    await repository.save(target);
    return existing ? 'updated' : 'created';
  }

  private async resolveLocation(manager: EntityManager, record: LocationRecord): Promise<Location> {
    const existing = await findLocation(manager, record);
    if (existing) return existing;

    const repository = manager.getRepository(Location);
    return repository.save(repository.create(record));
  }

  private warnUnknownColumns(columns: ColumnMap, ctx: RequestContext) {
    if (columns.unknownColumns.length > 0) {
      this.logger.warn(`[${ctx.requestId}] ignoring unknown column(s): ${columns.unknownColumns.join(', ')}`);
    }
  }

  private finish(filePath: string, rows: ImportRowResult[], ctx: RequestContext): ImportReport {
    const summary = summarize(rows);
    this.logger.log(
      `[${ctx.requestId}] imported ${filePath}: ${summary.created} created, ${summary.updated} updated, ` +
        `${summary.skipped} skipped, ${summary.failed} failed`,
    );
    return { filePath, summary, rows };
  }
}

function propertyColumns(skipLocation: boolean, matchOn: PropertyMatchKey): ColumnSpec {
  const { REQUIRED, LOCATION, OPTIONAL } = IMPORT_CONSTANTS.PROPERTY_COLUMNS;
  const required: string[] = [...REQUIRED];
  const optional: string[] = [...OPTIONAL];

  if (skipLocation) optional.push(...LOCATION);
  else required.push(...LOCATION);

  if (!required.includes(matchOn)) {
    required.push(matchOn);
  }

  return { required, optional: optional.filter((column) => !required.includes(column)) };
}

// Name + city, case-insensitive; a location in the same country wins over the others
async function findLocation(manager: EntityManager, record: LocationRecord): Promise<Location | null> {
  const candidates = await manager
    .getRepository(Location)
    .createQueryBuilder('location')
    .where('LOWER(location.name) = LOWER(:name)', { name: record.name })
    .andWhere('LOWER(location.city) = LOWER(:city)', { city: record.city })
    .orderBy('location.id', 'ASC')
    .getMany();

  const country = record.country.toLowerCase();
  return candidates.find((location) => location.country.toLowerCase() === country) ?? candidates[0] ?? null;
}
