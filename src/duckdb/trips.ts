import type { DuckDBConnection } from '@duckdb/node-api';

import { tripParser } from '../csv/schema/trips.ts';
import { TripLoadError } from '../csv/schema/errors.ts';
import { ROW_LIMITS, TaxiTableName } from '../csv/tlc-types/common.ts';
import type { TripSource } from '../csv/tlc-types/source.ts';
import { TRIP_PARQUET_COLUMNS, TRIP_QUALITY_BOUNDS } from '../csv/tlc-types/trip.ts';
import { quoteIdentifier, quoteLiteral, zodTableDefToSelectList } from '../duckdb-schema-gen.ts';
import { errorMessage, type Logger } from '../logger.ts';

const TABLE_NAME = TaxiTableName.TRIPS;

export type TripRowLimits = {
  firstFile: number;
  append: number;
};

export type TripLoadResult = {
  loaded: TripSource[];
  failed: { source: TripSource; error: unknown }[];
};

export const TRIP_QUALITY_FILTER = Object.entries(TRIP_QUALITY_BOUNDS)
  .flatMap(([column, bounds]) => [
    `${column} > ${bounds.gt}`,
    'lt' in bounds ? `${column} < ${bounds.lt}` : `${column} <= ${bounds.lte}`,
  ])
  .join('\n  AND ');

function tripSelect(source: TripSource, tripIdExpression: string, limit: number): string {
  const expressions: Record<string, string> = { trip_id: tripIdExpression };
  for (const [column, sourceColumn] of Object.entries(TRIP_PARQUET_COLUMNS)) {
    expressions[column] = quoteIdentifier(sourceColumn);
  }
  return `
    SELECT
      ${zodTableDefToSelectList(tripParser, expressions)}
    FROM read_parquet(${quoteLiteral(source.url)})
    WHERE ${TRIP_QUALITY_FILTER}
    LIMIT ${limit}
  `;
}

export function createTripsSql(source: TripSource, limit: number = ROW_LIMITS.FIRST_FILE): string {
  return `CREATE TABLE ${TABLE_NAME} AS ${tripSelect(source, 'ROW_NUMBER() OVER ()', limit)}`;
}

/**
 * the offset is re-read from the table on every insert, so sources must be appended one at a time
 */
export function appendTripsSql(source: TripSource, limit: number = ROW_LIMITS.APPEND): string {
  const offset = `(SELECT COALESCE(MAX(trip_id), 0) FROM ${TABLE_NAME})`;
  return `INSERT INTO ${TABLE_NAME} ${tripSelect(source, `ROW_NUMBER() OVER () + ${offset}`, limit)}`;
}

/**
 * (re)create the trips table from the first source and append the rest.
 * a failing first source throws TripLoadError and leaves no trips table; later failures are skipped.
 */
export async function loadTrips(
  connection: DuckDBConnection,
  sources: TripSource[],
  { limits = { firstFile: ROW_LIMITS.FIRST_FILE, append: ROW_LIMITS.APPEND }, logger = console }: {
    limits?: TripRowLimits;
    logger?: Logger;
  } = {},
): Promise<TripLoadResult> {
  const [first, ...rest] = sources;
  if (!first) {
    throw new Error('No trip data sources to load');
  }

  logger.log('\n   Creating trips table structure...');
  await connection.run(`DROP TABLE IF EXISTS ${TABLE_NAME}`);

  logger.log('\n   📊 Loading data (this may take a few minutes)...');
  logger.log(`   ⏳ Reading ${first.fileName}...`);
  try {
    await connection.run(createTripsSql(first, limits.firstFile));
  } catch (err) {
    throw new TripLoadError(first, err);
  }
  logger.log(`      ✓ Loaded data from ${first.fileName}`);

  const result: TripLoadResult = { loaded: [first], failed: [] };

  for (const source of rest) {
    logger.log(`   ⏳ Reading ${source.fileName}...`);
    try {
      await connection.run(appendTripsSql(source, limits.append));
      logger.log(`      ✓ Loaded data from ${source.fileName}`);
      result.loaded.push(source);
    } catch (err) {
      logger.warn(`      ⚠️  Could not load ${source.fileName}: ${errorMessage(err)}`);
      logger.warn('      ℹ️  Continuing with available data...');
      result.failed.push({ source, error: err });
    }
  }

  return result;
}
