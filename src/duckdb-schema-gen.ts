import { z } from 'zod/v4';

type ColumnType = {
  type: string;
  nullable: boolean;
};

function zodTypeToColumnType(schema: z.core.$ZodType, nullable = false): ColumnType {
  if (schema instanceof z.ZodString) {
    return { type: 'VARCHAR', nullable };
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return zodTypeToColumnType(schema._zod.def.innerType, true);
  }
  if (schema instanceof z.ZodNumber) {
    const format = schema._zod.bag.format;
    if (typeof format === 'string' && format.includes('int')) return { type: 'INTEGER', nullable };
    return { type: 'DOUBLE', nullable };
  }
  if (schema instanceof z.ZodBigInt) {
    return { type: 'BIGINT', nullable };
  }
  if (schema instanceof z.ZodDate) {
    return { type: 'TIMESTAMP', nullable };
  }
  if (schema instanceof z.ZodBoolean) {
    return { type: 'BOOLEAN', nullable };
  }
  if (schema instanceof z.ZodPipe) {
    // preprocessed fields: the stored type is whatever comes out of the pipe
    return zodTypeToColumnType(schema._zod.def.out, nullable);
  }
  throw new Error('Unsupported zod type found in table schema.');
}

export function zodTypeToDuckDbType(schema: z.core.$ZodType): string {
  return zodTypeToColumnType(schema).type;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

export function escapeSingleQuote(str: string): string {
  return str.replaceAll("'", "''");
}

export function quoteLiteral(str: string): string {
  return `'${escapeSingleQuote(str)}'`;
}

export function zodTableDefToDuckdbColumns(def: z.ZodObject, primaryKey?: string): string {
  return Object.entries(def.shape)
    .map(([key, schema]) => {
      const { type, nullable } = zodTypeToColumnType(schema);
      if (key === primaryKey) return `${key} ${type} PRIMARY KEY`;
      return `${key} ${type}${nullable ? '' : ' NOT NULL'}`;
    })
    .join(',\n');
}

export function zodTableDefToDuckdbCreateTable(def: z.ZodObject, name: string, primaryKey?: string): string {
  return `CREATE TABLE ${name} (\n${zodTableDefToDuckdbColumns(def, primaryKey)}\n);`;
}

/**
 * `CAST(<expression> AS <type>) AS <column>` for every column of the table, in schema order.
 * expressions are raw sql; quote source column names with `quoteIdentifier`.
 */
export function zodTableDefToSelectList(def: z.ZodObject, expressions: Record<string, string>): string {
  return Object.entries(def.shape)
    .map(([key, schema]) => {
      const expression = expressions[key];
      if (expression === undefined) {
        throw new Error(`No source expression for column ${key}`);
      }
      return `CAST(${expression} AS ${zodTypeToDuckDbType(schema)}) AS ${key}`;
    })
    .join(',\n');
}
