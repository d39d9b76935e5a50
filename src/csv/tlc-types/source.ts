import { MONTH_COUNT, REFERENCE_MONTH, TRIP_DATA_BASE_URL } from './common.ts';

export type YearMonth = {
  year: number;
  /** 1-based */
  month: number;
};

export type TripSource = YearMonth & {
  fileName: string;
  url: string;
};

export function clampMonthCount(count: number): number {
  if (!Number.isFinite(count)) return MONTH_COUNT.DEFAULT;
  return Math.min(MONTH_COUNT.MAX, Math.max(MONTH_COUNT.MIN, Math.trunc(count)));
}

export function addMonths({ year, month }: YearMonth, offset: number): YearMonth {
  const index = year * 12 + (month - 1) + offset;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

export function tripFileName({ year, month }: YearMonth): string {
  return `yellow_tripdata_${year}-${String(month).padStart(2, '0')}.parquet`;
}

/**
 * one source per consecutive calendar month, starting at `start`.
 * `baseUrl` may also be a local directory.
 */
export function buildTripSources(
  count: number,
  { baseUrl = TRIP_DATA_BASE_URL, start = REFERENCE_MONTH }: { baseUrl?: string; start?: YearMonth } = {},
): TripSource[] {
  const base = baseUrl.replace(/\/+$/, '');
  return Array.from({ length: clampMonthCount(count) }, (_, i) => {
    const yearMonth = addMonths(start, i);
    const fileName = tripFileName(yearMonth);
    return { ...yearMonth, fileName, url: `${base}/${fileName}` };
  });
}
