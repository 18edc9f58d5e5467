import { ColumnMap } from '../csv/column-map';
import { CsvRow } from '../csv/csv-reader';
import { optionalText, requireText } from '../utils/row-parsers';
import { LOCATION_CONSTANTS } from '../../location/constants/location.constants';

export interface LocationRecord {
  name: string;
  city: string;
  state: string;
  country: string;
  description: string | null;
}

export function toLocationRecord(columns: ColumnMap, row: CsvRow): LocationRecord {
  const cell = columns.reader(row);

  return {
    name: requireText(cell('name'), 'name', LOCATION_CONSTANTS.NAME.MAX_LENGTH),
    city: requireText(cell('city'), 'city', LOCATION_CONSTANTS.CITY.MAX_LENGTH),
    state: requireText(cell('state'), 'state', LOCATION_CONSTANTS.STATE.MAX_LENGTH),
    country:
      optionalText(cell('country'), 'country', LOCATION_CONSTANTS.COUNTRY.MAX_LENGTH) ??
      LOCATION_CONSTANTS.DEFAULT_COUNTRY,
    description: optionalText(cell('description'), 'description'),
  };
}
