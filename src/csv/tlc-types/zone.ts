import { requiredInteger, requiredString } from '../helpers/zod-helpers.ts';

export const zoneFields = {
  location_id: requiredInteger,
  zone_name: requiredString,
  borough: requiredString,
  service_zone: requiredString,
};

/**
 * column names in the published taxi+_zone_lookup.csv
 */
export const ZONE_CSV_COLUMNS: Record<keyof typeof zoneFields, string> = {
  location_id: 'LocationID',
  zone_name: 'Zone',
  borough: 'Borough',
  service_zone: 'service_zone',
};
