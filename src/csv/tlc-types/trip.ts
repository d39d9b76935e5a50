import { z } from 'zod/v4';

export const PAYMENT_TYPE = {
  CREDIT_CARD: 1,
  CASH: 2,
  NO_CHARGE: 3,
  DISPUTE: 4,
} as const;

export const PAYMENT_TYPE_LABELS: Record<(typeof PAYMENT_TYPE)[keyof typeof PAYMENT_TYPE], string> = {
  [PAYMENT_TYPE.CREDIT_CARD]: 'Credit Card',
  [PAYMENT_TYPE.CASH]: 'Cash',
  [PAYMENT_TYPE.NO_CHARGE]: 'No Charge',
  [PAYMENT_TYPE.DISPUTE]: 'Dispute',
};

export const UNKNOWN_PAYMENT_LABEL = 'Unknown';

/**
 * rows outside these bounds are dropped while loading. upper bounds are exclusive
 * except for passenger_count.
 */
export const TRIP_QUALITY_BOUNDS = {
  fare_amount: { gt: 0, lt: 500 },
  trip_distance: { gt: 0, lt: 100 },
  passenger_count: { gt: 0, lte: 6 },
} as const;

export const tripFields = {
  trip_id: z.bigint().positive(),
  pickup_datetime: z.date(),
  dropoff_datetime: z.date(),
  pickup_location_id: z.number().int().nullable(),
  dropoff_location_id: z.number().int().nullable(),
  passenger_count: z
    .number()
    .int()
    .gt(TRIP_QUALITY_BOUNDS.passenger_count.gt)
    .lte(TRIP_QUALITY_BOUNDS.passenger_count.lte),
  trip_distance: z.number().gt(TRIP_QUALITY_BOUNDS.trip_distance.gt).lt(TRIP_QUALITY_BOUNDS.trip_distance.lt),
  fare_amount: z.number().gt(TRIP_QUALITY_BOUNDS.fare_amount.gt).lt(TRIP_QUALITY_BOUNDS.fare_amount.lt),
  tip_amount: z.number().nullable(),
  total_amount: z.number().nullable(),
  payment_type: z.number().int().nullable(),
};

/**
 * source expressions in the published yellow_tripdata parquet files, keyed by our column name.
 * trip_id is assigned while loading.
 */
export const TRIP_PARQUET_COLUMNS: Record<Exclude<keyof typeof tripFields, 'trip_id'>, string> = {
  pickup_datetime: 'tpep_pickup_datetime',
  dropoff_datetime: 'tpep_dropoff_datetime',
  pickup_location_id: 'PULocationID',
  dropoff_location_id: 'DOLocationID',
  passenger_count: 'passenger_count',
  trip_distance: 'trip_distance',
  fare_amount: 'fare_amount',
  tip_amount: 'tip_amount',
  total_amount: 'total_amount',
  payment_type: 'payment_type',
};
