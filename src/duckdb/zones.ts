import type { DuckDBConnection } from '@duckdb/node-api';
import * as fs from 'fs-extra';

import { downloadZoneLookup, type FetchLike } from '../csv/zone-lookup.ts';
import { fallbackZones, zoneParser } from '../csv/schema/zones.ts';
import { TaxiTableName } from '../csv/tlc-types/common.ts';
import { ZONE_CSV_COLUMNS } from '../csv/tlc-types/zone.ts';
import {
  quoteIdentifier,
  quoteLiteral,
  zodTableDefToDuckdbCreateTable,
  zodTableDefToSelectList,
} from '../duckdb-schema-gen.ts';
import { errorMessage, type Logger } from '../logger.ts';
import { countRows } from './database.ts';

const TABLE_NAME = TaxiTableName.ZONES;

export type ZoneSource = 'lookup' | 'fallback';

/**
 * create the zones table from a downloaded taxi+_zone_lookup.csv, renaming its columns
 */
export async function loadZones(connection: DuckDBConnection, csvPath: string): Promise<number> {
  const expressions = Object.fromEntries(
    Object.entries(ZONE_CSV_COLUMNS).map(([column, source]) => [column, quoteIdentifier(source)]),
  );
  await connection.run(`
    CREATE TABLE ${TABLE_NAME} AS
    SELECT
      ${zodTableDefToSelectList(zoneParser, expressions)}
    FROM read_csv_auto(${quoteLiteral(csvPath)}, header = true)
  `);
  return countRows(connection, TABLE_NAME);
}

/**
 * create the zones table from the bundled subset of well-known zones
 */
export async function createFallbackZones(connection: DuckDBConnection): Promise<number> {
  const zones = fallbackZones();

  await connection.run(zodTableDefToDuckdbCreateTable(zoneParser, TABLE_NAME, 'location_id'));

  const appender = await connection.createAppender(TABLE_NAME);
  for (const zone of zones) {
    appender.appendInteger(zone.location_id);
    appender.appendVarchar(zone.zone_name);
    appender.appendVarchar(zone.borough);
    appender.appendVarchar(zone.service_zone);
    appender.endRow();
  }
  appender.closeSync();

  return countRows(connection, TABLE_NAME);
}

export type SetupZonesOptions = {
  url: string;
  tempPath: string;
  timeoutMs: number;
  fetch?: FetchLike;
  logger?: Logger;
};

/**
 * (re)create the zones table. any download or load failure falls back to the bundled zones.
 */
export async function setupZones(
  connection: DuckDBConnection,
  { url, tempPath, timeoutMs, fetch, logger = console }: SetupZonesOptions,
): Promise<{ source: ZoneSource; count: number }> {
  const downloaded = await downloadZoneLookup({ url, destination: tempPath, timeoutMs, fetch, logger });

  logger.log('\n📍 Creating zones table...');
  await connection.run(`DROP TABLE IF EXISTS ${TABLE_NAME}`);

  if (downloaded) {
    try {
      const count = await loadZones(connection, tempPath);
      logger.log(`   ✓ Loaded ${count} zones from official TLC data`);
      return { source: 'lookup', count };
    } catch (err) {
      logger.warn(`   ⚠️  Error loading zones: ${errorMessage(err)}`);
      await connection.run(`DROP TABLE IF EXISTS ${TABLE_NAME}`);
    } finally {
      await fs.remove(tempPath);
    }
  }

  logger.log('\n📍 Creating minimal zone data...');
  const count = await createFallbackZones(connection);
  logger.log(`   ✓ Created ${count} zones`);
  return { source: 'fallback', count };
}
