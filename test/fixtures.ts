import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';

import { buildTripSources, type TripSource } from '../src/csv/tlc-types/source.ts';
import { quoteLiteral } from '../src/duckdb-schema-gen.ts';

export type RawTrip = {
  pickup: string;
  dropoff: string;
  puLocation: number;
  doLocation: number;
  passengers: number | null;
  distance: number;
  fare: number;
  tip: number;
  total: number;
  paymentType: number;
};

// three rows pass the quality filters
export const JANUARY_TRIPS: RawTrip[] = [
  { pickup: '2024-01-03 08:00:00', dropoff: '2024-01-03 08:20:00', puLocation: 161, doLocation: 236, passengers: 1, distance: 2.5, fare: 14.2, tip: 3, total: 21, paymentType: 1 },
  { pickup: '2024-01-04 09:00:00', dropoff: '2024-01-04 09:05:00', puLocation: 161, doLocation: 161, passengers: 1, distance: 0.4, fare: 0, tip: 0, total: 3.5, paymentType: 3 },
  { pickup: '2024-01-05 12:30:00', dropoff: '2024-01-05 12:41:00', puLocation: 161, doLocation: 43, passengers: 2, distance: 1.2, fare: 8.6, tip: 0, total: 12.1, paymentType: 2 },
  { pickup: '2024-01-06 10:00:00', dropoff: '2024-01-06 13:00:00', puLocation: 132, doLocation: 1, passengers: 1, distance: 150, fare: 300, tip: 0, total: 310, paymentType: 1 },
  { pickup: '2024-01-07 11:00:00', dropoff: '2024-01-07 11:15:00', puLocation: 236, doLocation: 237, passengers: 7, distance: 1.9, fare: 11, tip: 2, total: 16.5, paymentType: 1 },
  { pickup: '2024-01-09 18:45:00', dropoff: '2024-01-09 19:30:00', puLocation: 132, doLocation: 161, passengers: 6, distance: 17.8, fare: 70, tip: 15, total: 95.5, paymentType: 1 },
  { pickup: '2024-01-10 07:00:00', dropoff: '2024-01-10 07:10:00', puLocation: 79, doLocation: 4, passengers: null, distance: 1.1, fare: 7.9, tip: 1, total: 11.4, paymentType: 1 },
  { pickup: '2024-01-11 22:00:00', dropoff: '2024-01-11 23:00:00', puLocation: 1, doLocation: 161, passengers: 2, distance: 20, fare: 500, tip: 0, total: 520, paymentType: 2 },
];

// three rows pass the quality filters
export const FEBRUARY_TRIPS: RawTrip[] = [
  { pickup: '2024-02-01 07:10:00', dropoff: '2024-02-01 07:30:00', puLocation: 236, doLocation: 161, passengers: 1, distance: 3.1, fare: 17, tip: 4, total: 25.4, paymentType: 1 },
  { pickup: '2024-02-14 21:05:00', dropoff: '2024-02-14 21:12:00', puLocation: 161, doLocation: 79, passengers: 3, distance: 0.9, fare: 7.2, tip: 0, total: 11.7, paymentType: 4 },
  { pickup: '2024-02-15 06:00:00', dropoff: '2024-02-15 08:00:00', puLocation: 1, doLocation: 132, passengers: 1, distance: 100, fare: 250, tip: 0, total: 260, paymentType: 1 },
  { pickup: '2024-02-20 16:20:00', dropoff: '2024-02-20 16:48:00', puLocation: 237, doLocation: 100, passengers: 4, distance: 5.5, fare: 24.7, tip: 0, total: 29, paymentType: 3 },
];

function tripValues(trip: RawTrip): string {
  return [
    `CAST(${quoteLiteral(trip.pickup)} AS TIMESTAMP)`,
    `CAST(${quoteLiteral(trip.dropoff)} AS TIMESTAMP)`,
    `CAST(${trip.puLocation} AS INTEGER)`,
    `CAST(${trip.doLocation} AS INTEGER)`,
    `CAST(${trip.passengers ?? 'NULL'} AS BIGINT)`,
    `CAST(${trip.distance} AS DOUBLE)`,
    `CAST(${trip.fare} AS DOUBLE)`,
    `CAST(${trip.tip} AS DOUBLE)`,
    `CAST(${trip.total} AS DOUBLE)`,
    `CAST(${trip.paymentType} AS BIGINT)`,
  ].join(', ');
}

/**
 * write trips with the column names of the published yellow_tripdata files
 */
export async function writeTripParquet(connection: DuckDBConnection, filePath: string, trips: RawTrip[]) {
  await connection.run(`
    COPY (
      SELECT * FROM (VALUES ${trips.map((t) => `(${tripValues(t)})`).join(',\n')})
      AS t(tpep_pickup_datetime, tpep_dropoff_datetime, PULocationID, DOLocationID, passenger_count,
           trip_distance, fare_amount, tip_amount, total_amount, payment_type)
    ) TO ${quoteLiteral(filePath)} (FORMAT parquet)
  `);
}

export const ZONE_LOOKUP_CSV = [
  '"LocationID","Borough","Zone","service_zone"',
  '1,"EWR","Newark Airport","EWR"',
  '2,"Queens","Jamaica Bay","Boro Zone"',
  '3,"Bronx","Allerton/Pelham Gardens","Boro Zone"',
  '4,"Manhattan","Alphabet City","Yellow Zone"',
  '',
].join('\n');

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'nyc-taxi-'));
}

export async function memoryConnection(): Promise<{ instance: DuckDBInstance; connection: DuckDBConnection }> {
  const instance = await DuckDBInstance.create(':memory:', { threads: '1' });
  const connection = await instance.connect();
  return { instance, connection };
}

export function captureLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn(), table: vi.fn() };
}

export function monthSource(baseUrl: string, month: number): TripSource {
  const [source] = buildTripSources(1, { baseUrl, start: { year: 2024, month } });
  if (!source) throw new Error(`no source for month ${month}`);
  return source;
}
