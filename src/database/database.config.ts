import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { Location } from '../location/entities/location.entity';
import { Property } from '../property/entities/property.entity';
import { PropertyImage } from '../image/entities/property-image.entity';
import { readBoolean } from '../common/utils/config.util';
import { registerSqliteFunctions } from './sqlite-functions';

export const ENTITIES = [Location, Property, PropertyImage];

export function buildTypeOrmOptions(config: ConfigService): TypeOrmModuleOptions {
  return {
    type: 'better-sqlite3',
    database: config.get<string>('DATABASE_PATH') || 'db.sqlite',
    entities: ENTITIES,
    // Schema migrations are not managed by this service
    synchronize: readBoolean(config, 'DATABASE_SYNCHRONIZE', true),
    logging: readBoolean(config, 'DATABASE_LOGGING', false),
    prepareDatabase: registerSqliteFunctions,
  };
}
