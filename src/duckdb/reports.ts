import type { DuckDBConnection } from '@duckdb/node-api';
import { z } from 'zod/v4';

import { nullableNumber, requiredInteger, requiredString } from '../csv/helpers/zod-helpers.ts';
import { tripParser } from '../csv/schema/trips.ts';
import { TaxiTableName } from '../csv/tlc-types/common.ts';
import { PAYMENT_TYPE_LABELS, UNKNOWN_PAYMENT_LABEL } from '../csv/tlc-types/trip.ts';
import { quoteLiteral } from '../duckdb-schema-gen.ts';
import type { Logger } from '../logger.ts';
import { countRows, queryRows } from './database.ts';

const { TRIPS, ZONES } = TaxiTableName;

type PrintableRow = Record<string, string | number | null>;

export type Report = {
  title: string;
  run(connection: DuckDBConnection): Promise<PrintableRow[]>;
};

function defineReport<T extends z.ZodType>(config: {
  title: string;
  name: string;
  sql: string;
  row: T;
  format: (row: z.output<T>) => PrintableRow;
}): Report {
  return {
    title: config.title,
    async run(connection) {
      const rows = await queryRows(connection, config.name, config.sql, config.row);
      return rows.map(config.format);
    },
  };
}

function formatTimestamp(date: Date | null): string | null {
  return date ? date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, '') : null;
}

const paymentMethodCase = [
  'CASE',
  ...Object.entries(PAYMENT_TYPE_LABELS).map(
    ([code, label]) => `  WHEN payment_type = ${code} THEN ${quoteLiteral(label)}`,
  ),
  `  ELSE ${quoteLiteral(UNKNOWN_PAYMENT_LABEL)}`,
  'END',
].join('\n');

export const sampleTrips = defineReport({
  title: '🔍 Sample trip data:',
  name: 'sample_trips',
  sql: `
    SELECT
      pickup_datetime,
      passenger_count,
      trip_distance,
      fare_amount,
      tip_amount,
      payment_type
    FROM ${TRIPS}
    LIMIT 5
  `,
  row: z.object({
    pickup_datetime: tripParser.shape.pickup_datetime.nullable(),
    passenger_count: tripParser.shape.passenger_count,
    trip_distance: tripParser.shape.trip_distance,
    fare_amount: tripParser.shape.fare_amount,
    tip_amount: tripParser.shape.tip_amount,
    payment_type: tripParser.shape.payment_type,
  }),
  format: (row) => ({ ...row, pickup_datetime: formatTimestamp(row.pickup_datetime) }),
});

export const dateRange = defineReport({
  title: '📅 Data date range:',
  name: 'date_range',
  sql: `
    SELECT
      MIN(pickup_datetime) AS earliest_trip,
      MAX(pickup_datetime) AS latest_trip,
      COUNT(DISTINCT DATE_TRUNC('day', pickup_datetime)) AS days_of_data
    FROM ${TRIPS}
  `,
  row: z.object({
    earliest_trip: z.date().nullable(),
    latest_trip: z.date().nullable(),
    days_of_data: requiredInteger,
  }),
  format: (row) => ({
    earliest_trip: formatTimestamp(row.earliest_trip),
    latest_trip: formatTimestamp(row.latest_trip),
    days_of_data: row.days_of_data,
  }),
});

export const tripStatistics = defineReport({
  title: '📈 Trip statistics:',
  name: 'trip_statistics',
  sql: `
    SELECT
      COUNT(*) AS total_trips,
      ROUND(AVG(fare_amount), 2) AS avg_fare,
      ROUND(SUM(fare_amount), 2) AS total_revenue,
      ROUND(AVG(trip_distance), 2) AS avg_distance,
      ROUND(AVG(tip_amount), 2) AS avg_tip
    FROM ${TRIPS}
  `,
  row: z.object({
    total_trips: requiredInteger,
    avg_fare: nullableNumber,
    total_revenue: nullableNumber,
    avg_distance: nullableNumber,
    avg_tip: nullableNumber,
  }),
  format: (row) => row,
});

export const topPickupZones = defineReport({
  title: '🏙️  Top 5 pickup zones:',
  name: 'top_pickup_zones',
  sql: `
    SELECT
      z.zone_name,
      z.borough,
      COUNT(*) AS num_pickups
    FROM ${TRIPS} t
    INNER JOIN ${ZONES} z ON t.pickup_location_id = z.location_id
    GROUP BY z.zone_name, z.borough
    ORDER BY num_pickups DESC, z.zone_name
    LIMIT 5
  `,
  row: z.object({
    zone_name: z.string().nullable(),
    borough: z.string().nullable(),
    num_pickups: requiredInteger,
  }),
  format: (row) => row,
});

export const paymentTypes = defineReport({
  title: '💳 Payment types:',
  name: 'payment_types',
  sql: `
    SELECT
      ${paymentMethodCase} AS payment_method,
      COUNT(*) AS num_trips,
      ROUND(COUNT(*) * 100.0 / SUM(COUNT(*)) OVER (), 2) AS percentage
    FROM ${TRIPS}
    GROUP BY payment_type
    ORDER BY num_trips DESC, payment_method
  `,
  row: z.object({
    payment_method: requiredString,
    num_trips: requiredInteger,
    percentage: nullableNumber,
  }),
  format: (row) => row,
});

export const REPORTS: Report[] = [sampleTrips, dateRange, tripStatistics, topPickupZones, paymentTypes];

export async function printVerification(
  connection: DuckDBConnection,
  logger: Logger = console,
): Promise<{ tripCount: number; zoneCount: number }> {
  logger.log('\n📊 Verifying data...');
  const tripCount = await countRows(connection, TRIPS);
  const zoneCount = await countRows(connection, ZONES);
  logger.log(`   ✓ Trips table: ${tripCount.toLocaleString('en-US')} rows`);
  logger.log(`   ✓ Zones table: ${zoneCount} rows`);
  return { tripCount, zoneCount };
}

export async function runReports(
  connection: DuckDBConnection,
  logger: Logger = console,
  reports: Report[] = REPORTS,
): Promise<void> {
  for (const report of reports) {
    const rows = await report.run(connection);
    logger.log(`\n${report.title}`);
    logger.table(rows);
  }
}
