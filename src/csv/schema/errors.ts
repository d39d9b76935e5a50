import { z } from 'zod/v4';

import type { TripSource } from '../tlc-types/source.ts';

export class RowParsingError extends Error {
  tableName: string;
  override cause: z.ZodError;
  obj: unknown;
  constructor(tableName: string, err: z.ZodError, obj: unknown) {
    super(
      [
        `reading a row of ${tableName} failed with the following ${err.issues.length > 1 ? 'errors' : 'error'}:`,
        err.issues.map((e) => `${e.path.join('.') || '(row)'}: ${e.message}`).join('\n'),
        '',
        'for the following row:',
        JSON.stringify(obj, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value), 2),
      ].join('\n'),
    );
    this.name = this.constructor.name;
    this.tableName = tableName;
    this.cause = err;
    this.obj = obj;
  }
}

export class TripLoadError extends Error {
  source: TripSource;
  override cause: unknown;
  constructor(source: TripSource, err: unknown) {
    super(`loading ${source.fileName} failed: ${err instanceof Error ? err.message : String(err)}`);
    this.name = this.constructor.name;
    this.source = source;
    this.cause = err;
  }
}

export class ConfigError extends Error {
  override cause: z.ZodError;
  constructor(err: z.ZodError) {
    super(
      [
        'invalid configuration:',
        ...err.issues.map((e) => `  ${e.path.join('.')}: ${e.message}`),
      ].join('\n'),
    );
    this.name = this.constructor.name;
    this.cause = err;
  }
}
