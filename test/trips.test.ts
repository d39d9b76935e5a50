import type { DuckDBConnection, DuckDBInstance } from '@duckdb/node-api';
import * as fs from 'fs-extra';
import { afterAll, beforeAll, beforeEach, describe, expect, test } from 'vitest';
import { z } from 'zod/v4';

import { requiredInteger, requiredString } from '../src/csv/helpers/zod-helpers.ts';
import { TripLoadError } from '../src/csv/schema/errors.ts';
import { countRows, queryRows, tableExists } from '../src/duckdb/database.ts';
import { appendTripsSql, createTripsSql, loadTrips, TRIP_QUALITY_FILTER } from '../src/duckdb/trips.ts';
import {
  captureLogger,
  FEBRUARY_TRIPS,
  JANUARY_TRIPS,
  makeTempDir,
  memoryConnection,
  monthSource,
  writeTripParquet,
} from './fixtures.ts';

let instance: DuckDBInstance;
let connection: DuckDBConnection;

// january and february exist, march does not
const dataDir = makeTempDir();
const january = monthSource(dataDir, 1);
const february = monthSource(dataDir, 2);
const march = monthSource(dataDir, 3);

beforeAll(async () => {
  ({ instance, connection } = await memoryConnection());
  await writeTripParquet(connection, january.url, JANUARY_TRIPS);
  await writeTripParquet(connection, february.url, FEBRUARY_TRIPS);
});

afterAll(async () => {
  connection?.closeSync();
  instance?.closeSync();
  await fs.remove(dataDir);
});

beforeEach(async () => {
  await connection.run('DROP TABLE IF EXISTS trips');
});

const idRow = z.object({ trip_id: requiredInteger, month: requiredInteger });

async function tripIds() {
  return queryRows(
    connection,
    'trips',
    'SELECT trip_id, month(pickup_datetime) AS month FROM trips ORDER BY trip_id',
    idRow,
  );
}

test('quality filter', () => {
  expect(TRIP_QUALITY_FILTER).toBe(
    [
      'fare_amount > 0',
      'fare_amount < 500',
      'trip_distance > 0',
      'trip_distance < 100',
      'passenger_count > 0',
      'passenger_count <= 6',
    ].join('\n  AND '),
  );
});

describe('load statements', () => {
  test('the first file creates the table with the row cap', () => {
    const sql = createTripsSql(january);
    expect(sql).toMatch(/^CREATE TABLE trips AS/);
    expect(sql).toContain('CAST(ROW_NUMBER() OVER () AS BIGINT) AS trip_id');
    expect(sql).toContain('CAST("tpep_pickup_datetime" AS TIMESTAMP) AS pickup_datetime');
    expect(sql).toContain('CAST("PULocationID" AS INTEGER) AS pickup_location_id');
    expect(sql).toContain(`FROM read_parquet('${january.url}')`);
    expect(sql).toContain('LIMIT 100000');
  });

  test('later files append after the current maximum id', () => {
    const sql = appendTripsSql(february);
    expect(sql).toMatch(/^INSERT INTO trips/);
    expect(sql).toContain(
      'CAST(ROW_NUMBER() OVER () + (SELECT COALESCE(MAX(trip_id), 0) FROM trips) AS BIGINT) AS trip_id',
    );
    expect(sql).toContain('LIMIT 50000');
  });
});

describe('loadTrips', () => {
  test('keeps only rows that pass the quality filters', async () => {
    const result = await loadTrips(connection, [january, february], { logger: captureLogger() });

    expect(result).toEqual({ loaded: [january, february], failed: [] });
    expect(await countRows(connection, 'trips')).toBe(6);

    const [violations] = await queryRows(
      connection,
      'trips',
      `SELECT COUNT(*) AS count FROM trips WHERE NOT (${TRIP_QUALITY_FILTER})`,
      z.object({ count: requiredInteger }),
    );
    expect(violations?.count).toBe(0);
  });

  test('trip ids are unique and grow across files', async () => {
    await loadTrips(connection, [january, february], { logger: captureLogger() });

    const rows = await tripIds();
    const ids = rows.map((r) => r.trip_id);
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids).toEqual([1, 2, 3, 4, 5, 6]);

    const januaryIds = rows.filter((r) => r.month === 1).map((r) => r.trip_id);
    const februaryIds = rows.filter((r) => r.month === 2).map((r) => r.trip_id);
    expect(Math.max(...januaryIds)).toBeLessThan(Math.min(...februaryIds));
  });

  test('stores the declared column types', async () => {
    await loadTrips(connection, [january], { logger: captureLogger() });

    const columns = await queryRows(
      connection,
      'information_schema.columns',
      `SELECT column_name, data_type FROM information_schema.columns
       WHERE table_name = 'trips' ORDER BY ordinal_position`,
      z.object({ column_name: requiredString, data_type: requiredString }),
    );
    expect(columns).toEqual([
      { column_name: 'trip_id', data_type: 'BIGINT' },
      { column_name: 'pickup_datetime', data_type: 'TIMESTAMP' },
      { column_name: 'dropoff_datetime', data_type: 'TIMESTAMP' },
      { column_name: 'pickup_location_id', data_type: 'INTEGER' },
      { column_name: 'dropoff_location_id', data_type: 'INTEGER' },
      { column_name: 'passenger_count', data_type: 'INTEGER' },
      { column_name: 'trip_distance', data_type: 'DOUBLE' },
      { column_name: 'fare_amount', data_type: 'DOUBLE' },
      { column_name: 'tip_amount', data_type: 'DOUBLE' },
      { column_name: 'total_amount', data_type: 'DOUBLE' },
      { column_name: 'payment_type', data_type: 'INTEGER' },
    ]);
  });

  test('caps the rows taken from each file', async () => {
    await loadTrips(connection, [january, february], {
      limits: { firstFile: 2, append: 1 },
      logger: captureLogger(),
    });

    const rows = await tripIds();
    expect(rows.filter((r) => r.month === 1)).toHaveLength(2);
    expect(rows.filter((r) => r.month === 2)).toHaveLength(1);
  });

  test('skips a later file that cannot be read', async () => {
    const logger = captureLogger();
    const result = await loadTrips(connection, [january, march, february], { logger });

    expect(result.loaded).toEqual([january, february]);
    expect(result.failed.map(({ source }) => source)).toEqual([march]);
    expect(await countRows(connection, 'trips')).toBe(6);
    expect(logger.warn).toHaveBeenCalledWith('      ℹ️  Continuing with available data...');
  });

  test('fails when the first file cannot be read and leaves no trips table', async () => {
    await loadTrips(connection, [january], { logger: captureLogger() });
    expect(await tableExists(connection, 'trips')).toBe(true);

    const loading = loadTrips(connection, [march, january], { logger: captureLogger() });

    await expect(loading).rejects.toBeInstanceOf(TripLoadError);
    await expect(loading).rejects.toThrow(/^loading yellow_tripdata_2024-03\.parquet failed: /);
    expect(await tableExists(connection, 'trips')).toBe(false);
  });

  test('needs at least one source', async () => {
    await expect(loadTrips(connection, [], { logger: captureLogger() })).rejects.toThrow(
      'No trip data sources to load',
    );
  });
});
