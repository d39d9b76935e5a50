import * as os from 'os';
import * as path from 'path';
import { z } from 'zod/v4';

import {
  DEFAULT_DB_PATH,
  DEFAULT_MEMORY_LIMIT,
  TRIP_DATA_BASE_URL,
  ZONE_DOWNLOAD_TIMEOUT_MS,
  ZONE_LOOKUP_URL,
} from './csv/tlc-types/common.ts';
import { ConfigError } from './csv/schema/errors.ts';

const MEMORY_LIMIT_REGEXP = /^\d+(\.\d+)?\s*(KB|MB|GB|TB|KiB|MiB|GiB|TiB)$/i;

const configParser = z.object({
  TAXI_DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  TAXI_ZONE_LOOKUP_URL: z.url().default(ZONE_LOOKUP_URL),
  TAXI_TRIP_DATA_BASE_URL: z.string().min(1).default(TRIP_DATA_BASE_URL),
  TAXI_MEMORY_LIMIT: z
    .string()
    .regex(MEMORY_LIMIT_REGEXP, { message: `must match regex ${MEMORY_LIMIT_REGEXP.toString()}` })
    .default(DEFAULT_MEMORY_LIMIT),
  TAXI_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(ZONE_DOWNLOAD_TIMEOUT_MS),
});

export type TaxiConfig = {
  dbPath: string;
  zoneLookupUrl: string;
  tripDataBaseUrl: string;
  memoryLimit: string;
  downloadTimeoutMs: number;
  zoneCsvTempPath: string;
};

/**
 * read configuration from the environment. unset variables fall back to the published TLC locations.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): TaxiConfig {
  // empty variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = configParser.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error);
  }
  return {
    dbPath: parsed.data.TAXI_DB_PATH,
    zoneLookupUrl: parsed.data.TAXI_ZONE_LOOKUP_URL,
    tripDataBaseUrl: parsed.data.TAXI_TRIP_DATA_BASE_URL,
    memoryLimit: parsed.data.TAXI_MEMORY_LIMIT,
    downloadTimeoutMs: parsed.data.TAXI_DOWNLOAD_TIMEOUT_MS,
    zoneCsvTempPath: path.join(os.tmpdir(), 'taxi_zone_lookup.csv'),
  };
}
