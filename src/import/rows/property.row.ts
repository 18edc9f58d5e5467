import { ColumnMap } from '../csv/column-map';
import { CsvRow } from '../csv/csv-reader';
import { BooleanTokens } from '../interface/import-report.interface';
import { parseBooleanToken, parseDecimal, parseInteger, optionalText, requireText } from '../utils/row-parsers';
import { LocationRecord } from './location.row';
import { PROPERTY_CONSTANTS } from '../../property/constants/property.constants';
import { LOCATION_CONSTANTS } from '../../location/constants/location.constants';
import { parseAmenities } from '../../property/utils/amenities.util';

export interface PropertyRecord {
  title: string;
  description: string;
  propertyType: string | null;
  bedrooms: number;
  bathrooms: number;
  maxGuests: number;
  pricePerNight: number;
  address: string | null;
  amenities: string[];
  isAvailable: boolean;
  // null when location resolution is skipped
  location: LocationRecord | null;
}

export interface PropertyRowOptions {
  resolveLocation: boolean;
  booleans: BooleanTokens;
}

export function toPropertyRecord(columns: ColumnMap, row: CsvRow, options: PropertyRowOptions): PropertyRecord {
  const cell = columns.reader(row);

  const location = options.resolveLocation
    ? {
        name: requireText(cell('location'), 'location', LOCATION_CONSTANTS.NAME.MAX_LENGTH),
        city: requireText(cell('city'), 'city', LOCATION_CONSTANTS.CITY.MAX_LENGTH),
        state: requireText(cell('state'), 'state', LOCATION_CONSTANTS.STATE.MAX_LENGTH),
        country:
          optionalText(cell('country'), 'country', LOCATION_CONSTANTS.COUNTRY.MAX_LENGTH) ??
          LOCATION_CONSTANTS.DEFAULT_COUNTRY,
        description: null,
      }
    : null;

  return {
    title: requireText(cell('title'), 'title', PROPERTY_CONSTANTS.TITLE.MAX_LENGTH),
    description: cell('description').trim(),
    propertyType: optionalText(cell('property_type'), 'property_type', PROPERTY_CONSTANTS.PROPERTY_TYPE.MAX_LENGTH),
    bedrooms: parseInteger(cell('bedrooms'), 'bedrooms', {
      min: PROPERTY_CONSTANTS.BEDROOMS.MIN,
      fallback: PROPERTY_CONSTANTS.BEDROOMS.DEFAULT,
    }),
    bathrooms: parseDecimal(cell('bathrooms'), 'bathrooms', {
      max: PROPERTY_CONSTANTS.BATHROOMS.MAX,
      decimalPlaces: PROPERTY_CONSTANTS.BATHROOMS.DECIMAL_PLACES,
      fallback: PROPERTY_CONSTANTS.BATHROOMS.DEFAULT,
    }),
    maxGuests: parseInteger(cell('max_guests'), 'max_guests', {
      min: PROPERTY_CONSTANTS.GUESTS.MIN,
      fallback: PROPERTY_CONSTANTS.GUESTS.DEFAULT,
    }),
    pricePerNight: parseDecimal(cell('price_per_night'), 'price_per_night', {
      max: PROPERTY_CONSTANTS.PRICE.MAX,
      decimalPlaces: PROPERTY_CONSTANTS.PRICE.DECIMAL_PLACES,
    }),
    address: optionalText(cell('address'), 'address', PROPERTY_CONSTANTS.ADDRESS.MAX_LENGTH),
    amenities: parseAmenities(cell('amenities')),
    isAvailable: parseBooleanToken(cell('is_available'), 'is_available', options.booleans, true),
    location,
  };
}
