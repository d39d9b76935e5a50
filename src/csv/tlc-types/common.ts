export const TLC_DATA_PAGE_URL = 'https://www.nyc.gov/site/tlc/about/tlc-trip-record-data.page';

export const ZONE_LOOKUP_URL = 'https://d37ci6vzurychx.cloudfront.net/misc/taxi+_zone_lookup.csv';

export const TRIP_DATA_BASE_URL = 'https://d37ci6vzurychx.cloudfront.net/trip-data';

/**
 * yellow taxi files are published monthly from 2009 onwards. training sets start here.
 */
export const REFERENCE_MONTH = {
  year: 2024,
  month: 1,
} as const;

export const MONTH_COUNT = {
  MIN: 1,
  MAX: 12,
  DEFAULT: 3,
} as const;

export const ROW_LIMITS = {
  FIRST_FILE: 100_000,
  APPEND: 50_000,
} as const;

export const TaxiTableName = {
  ZONES: 'zones',
  TRIPS: 'trips',
} as const;
export type TaxiTableName = (typeof TaxiTableName)[keyof typeof TaxiTableName];

export const DEFAULT_DB_PATH = 'nyc_taxi.duckdb';

export const DEFAULT_MEMORY_LIMIT = '2GB';

export const ZONE_DOWNLOAD_TIMEOUT_MS = 30_000;
