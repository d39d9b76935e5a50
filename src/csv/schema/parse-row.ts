import { z } from 'zod/v4';

import { RowParsingError } from './errors.ts';

export function parseRow<T extends z.ZodType>(schema: T, tableName: string, row: unknown): z.output<T> {
  const parsed = schema.safeParse(row);

  if (parsed.success) {
    return parsed.data;
  }
  throw new RowParsingError(tableName, parsed.error, row);
}

export function parseRows<T extends z.ZodType>(schema: T, tableName: string, rows: Iterable<unknown>): z.output<T>[] {
  const toReturn: z.output<T>[] = [];
  for (const row of rows) {
    toReturn.push(parseRow(schema, tableName, row));
  }
  return toReturn;
}
