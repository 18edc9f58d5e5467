import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ImportService } from '../import.service';
import { FileError, SchemaError } from '../errors/import.errors';
import { Location } from '../../location/entities/location.entity';
import { Property } from '../../property/entities/property.entity';
import { sqliteTestingImports } from '../../database/test/sqlite-testing.module';
import { RequestContext } from '../../common/request-context';

const PROPERTY_HEADER =
  'title,description,property_type,bedrooms,bathrooms,max_guests,price_per_night,address,amenities,is_available,location,city,state,country';

describe('ImportService', () => {
  let module: TestingModule;
  let service: ImportService;
  let locations: Repository<Location>;
  let properties: Repository<Property>;
  let dir: string;

  const ctx: RequestContext = { requestId: 'import-1', path: 'import_properties' };

  const csv = async (name: string, lines: string[]) => {
    const filePath = join(dir, name);
    await writeFile(filePath, `${lines.join('\n')}\n`, 'utf-8');
    return filePath;
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'import-'));

    module = await Test.createTestingModule({
      imports: sqliteTestingImports(),
      providers: [
        ImportService,
        {
          provide: ConfigService,
          useValue: new ConfigService({}),
        },
      ],
    }).compile();

    service = module.get<ImportService>(ImportService);
    locations = module.get<Repository<Location>>(getRepositoryToken(Location));
    properties = module.get<Repository<Property>>(getRepositoryToken(Property));
  });

  afterEach(async () => {
    await module.close();
    await rm(dir, { recursive: true, force: true });
  });

  describe('importLocations', () => {
    const rows = [
      'name,city,state,country,description',
      'Miami Beach,Miami,Florida,USA,Sunny',
      'Aspen,Aspen,Colorado,,',
    ];

    it('should create locations and default the country', async () => {
      const report = await service.importLocations(await csv('locations.csv', rows), ctx);

      expect(report.summary).toEqual({ created: 2, updated: 0, skipped: 0, failed: 0 });
      expect(report.rows).toEqual([
        { line: 2, outcome: 'created', label: 'Miami Beach' },
        { line: 3, outcome: 'created', label: 'Aspen' },
      ]);
      const aspen = await locations.findOneByOrFail({ name: 'Aspen' });
      expect(aspen.country).toBe('USA');
      expect(aspen.description).toBeNull();
    });

    it('should be idempotent when the same file is imported twice', async () => {
      const filePath = await csv('locations.csv', rows);

      await service.importLocations(filePath, ctx);
      const second = await service.importLocations(filePath, ctx);

      expect(second.summary).toEqual({ created: 0, updated: 2, skipped: 0, failed: 0 });
      expect(await locations.count()).toBe(2);
    });

    it('should skip rows with missing required values and keep going', async () => {
      const report = await service.importLocations(
        await csv('locations.csv', ['name,city,state', 'Aspen,,Colorado', 'Vail,Vail,Colorado']),
        ctx,
      );

      expect(report.summary).toEqual({ created: 1, updated: 0, skipped: 1, failed: 0 });
      expect(report.rows[0]).toEqual({ line: 2, outcome: 'skipped', reason: 'Missing city' });
    });

    it('should record a failed row when the write fails and keep going', async () => {
      const dataSource = module.get(DataSource);
      jest.spyOn(dataSource, 'transaction').mockRejectedValueOnce(new Error('database is locked'));

      const report = await service.importLocations(
        await csv('locations.csv', ['name,city,state', 'Aspen,Aspen,Colorado', 'Vail,Vail,Colorado']),
        ctx,
      );

      expect(report.summary).toEqual({ created: 1, updated: 0, skipped: 0, failed: 1 });
      expect(report.rows[0]).toEqual({ line: 2, outcome: 'failed', label: 'Aspen', reason: 'database is locked' });
      expect(await locations.findOneBy({ name: 'Aspen' })).toBeNull();
    });

    it('should skip a record with a stray quote and import the rows around it', async () => {
      const report = await service.importLocations(
        await csv('locations.csv', [
          'name,city,state',
          'Aspen,Aspen,Colorado',
          'Joe\'s "Place",Miami,Florida',
          'Miami Beach,Miami,Florida',
        ]),
        ctx,
      );

      expect(report.summary).toEqual({ created: 2, updated: 0, skipped: 1, failed: 0 });
      expect(report.rows.map((row) => [row.line, row.outcome])).toEqual([
        [2, 'created'],
        [3, 'skipped'],
        [4, 'created'],
      ]);
      expect(report.rows[1].reason).toContain('Invalid Opening Quote');
      expect(await locations.count()).toBe(2);
    });

    it('should prefer the location in the same country over a name and city match elsewhere', async () => {
      const france = await locations.save(
        locations.create({ name: 'Paris', city: 'Paris', state: 'Île-de-France', country: 'France' }),
      );
      const texas = await locations.save(
        locations.create({ name: 'Paris', city: 'Paris', state: 'Texas', country: 'USA' }),
      );

      const report = await service.importLocations(
        await csv('locations.csv', ['name,city,state,country', 'Paris,Paris,TX,usa']),
        ctx,
      );

      expect(report.rows).toEqual([{ line: 2, outcome: 'updated', label: 'Paris' }]);
      expect(await locations.findOneByOrFail({ id: texas.id })).toMatchObject({ state: 'TX', country: 'usa' });
      expect(await locations.findOneByOrFail({ id: france.id })).toMatchObject({
        state: 'Île-de-France',
        country: 'France',
      });
    });

    it('should throw FileError when the file does not exist', async () => {
      await expect(service.importLocations(join(dir, 'missing.csv'), ctx)).rejects.toBeInstanceOf(FileError);
    });

    it('should throw SchemaError when a required column is missing', async () => {
      const filePath = await csv('locations.csv', ['name,city', 'Aspen,Aspen']);

      await expect(service.importLocations(filePath, ctx)).rejects.toThrow(SchemaError);
      expect(await locations.count()).toBe(0);
    });
  });

  describe('importProperties', () => {
    it('should import N valid rows and skip exactly the malformed one', async () => {
      const filePath = await csv('properties.csv', [
        PROPERTY_HEADER,
        'Ocean Villa,On the sand,Villa,4,2.5,8,450.00,1 Ocean Dr,"WiFi, Pool",true,Miami Beach,Miami,Florida,USA',
        'Bay Condo,,Condo,,,,180,,,,Miami Beach,Miami,Florida,',
        'Broken Loft,,Loft,2,1,4,cheap,,,true,Miami Beach,Miami,Florida,USA',
        'Ski Chalet,,Chalet,3,2,6,320,,Fireplace,no,Aspen,Aspen,Colorado,USA',
      ]);

      const report = await service.importProperties(filePath, {}, ctx);

      expect(report.summary).toEqual({ created: 3, updated: 0, skipped: 1, failed: 0 });
      expect(report.rows[2]).toEqual({
        line: 4,
        outcome: 'skipped',
        reason: 'Invalid price_per_night "cheap": expected a non-negative number',
      });

      expect(await locations.count()).toBe(2);
      const villa = await properties.findOneOrFail({ where: { title: 'Ocean Villa' }, relations: { location: true } });
      expect(villa).toMatchObject({
        bedrooms: 4,
        bathrooms: 2.5,
        maxGuests: 8,
        pricePerNight: 450,
        address: '1 Ocean Dr',
        amenities: ['WiFi', 'Pool'],
        isAvailable: true,
      });
      expect(villa.location?.name).toBe('Miami Beach');

      const condo = await properties.findOneByOrFail({ title: 'Bay Condo' });
      expect(condo).toMatchObject({ bedrooms: 1, bathrooms: 1, maxGuests: 2, address: null, amenities: [] });
      expect(condo.locationId).toBe(villa.locationId);

      const chalet = await properties.findOneByOrFail({ title: 'Ski Chalet' });
      expect(chalet.isAvailable).toBe(false);
    });

    it('should update a property matched by title on re-import', async () => {
      const first = await csv('v1.csv', [PROPERTY_HEADER, 'Ocean Villa,,,2,,,300,,,,Miami Beach,Miami,Florida,']);
      const second = await csv('v2.csv', [PROPERTY_HEADER, 'Ocean Villa,,,5,,,350,,,,Miami Beach,Miami,Florida,']);

      await service.importProperties(first, {}, ctx);
      const report = await service.importProperties(second, {}, ctx);

      expect(report.rows).toEqual([{ line: 2, outcome: 'updated', label: 'Ocean Villa' }]);
      expect(await properties.count()).toBe(1);
      expect(await properties.findOneByOrFail({ title: 'Ocean Villa' })).toMatchObject({
        bedrooms: 5,
        pricePerNight: 350,
      });
    });

    it('should skip a row whose column count differs from the header', async () => {
      const filePath = await csv('properties.csv', [
        'title,price_per_night',
        'Ocean Villa,450,extra',
        'Bay Condo,180',
      ]);

      const report = await service.importProperties(filePath, { skipLocation: true }, ctx);

      expect(report.rows[0]).toEqual({ line: 2, outcome: 'skipped', reason: 'Expected 2 columns, found 3' });
      expect(report.summary.created).toBe(1);
    });

    it('should leave locations unset with skipLocation and keep an existing assignment on update', async () => {
      const aspen = await locations.save(locations.create({ name: 'Aspen', city: 'Aspen', state: 'Colorado' }));
      await properties.save(
        properties.create({ title: 'Ski Chalet', description: '', pricePerNight: 100, locationId: aspen.id }),
      );
      const filePath = await csv('no-location.csv', [
        'title,price_per_night,bedrooms',
        'Ski Chalet,250,3',
        'Desert Casita,90,1',
      ]);

      const report = await service.importProperties(filePath, { skipLocation: true }, ctx);

      expect(report.summary).toEqual({ created: 1, updated: 1, skipped: 0, failed: 0 });
      expect(await properties.findOneByOrFail({ title: 'Ski Chalet' })).toMatchObject({
        locationId: aspen.id,
        pricePerNight: 250,
      });
      expect((await properties.findOneByOrFail({ title: 'Desert Casita' })).locationId).toBeNull();
      expect(await locations.count()).toBe(1);
    });

    it('should require the location columns unless location resolution is skipped', async () => {
      const filePath = await csv('no-location.csv', ['title,price_per_night', 'Desert Casita,90']);

      await expect(service.importProperties(filePath, {}, ctx)).rejects.toThrow(
        'Missing required column(s): location, city, state. Found: title, price_per_night',
      );
    });

    it('should match on address when asked to', async () => {
      const filePath = await csv('by-address.csv', [
        'title,price_per_night,address',
        'Ocean Villa,450,1 Ocean Dr',
        'Ocean Villa (renamed),470,1 Ocean Dr',
        'No Address,100,',
      ]);

      const report = await service.importProperties(filePath, { skipLocation: true, matchOn: 'address' }, ctx);

      expect(report.rows.map((row) => row.outcome)).toEqual(['created', 'updated', 'skipped']);
      expect(report.rows[2].reason).toBe('Missing address');
      expect(await properties.findOneByOrFail({ address: '1 Ocean Dr' })).toMatchObject({
        title: 'Ocean Villa (renamed)',
        pricePerNight: 470,
      });
    });

    it('should honour configured boolean tokens', async () => {
      const custom = new ImportService(
        module.get(DataSource),
        new ConfigService({ IMPORT_TRUE_TOKENS: 'si', IMPORT_FALSE_TOKENS: 'non' }),
      );
      const filePath = await csv('tokens.csv', [
        'title,price_per_night,is_available',
        'Casa,80,si',
        'Maison,90,non',
        'House,95,true',
      ]);

      const report = await custom.importProperties(filePath, { skipLocation: true }, ctx);

      expect(report.rows.map((row) => row.outcome)).toEqual(['created', 'created', 'skipped']);
      expect((await properties.findOneByOrFail({ title: 'Maison' })).isAvailable).toBe(false);
    });
  });
});
