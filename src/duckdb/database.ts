import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod/v4';

import { parseRows } from '../csv/schema/parse-row.ts';
import { requiredInteger } from '../csv/helpers/zod-helpers.ts';
import { quoteLiteral } from '../duckdb-schema-gen.ts';

export type TaxiDatabase = {
  instance: DuckDBInstance;
  connection: DuckDBConnection;
  path: string;
};

const IN_MEMORY = ':memory:';

export async function openDatabase(
  dbPath: string,
  { memoryLimit, threads }: { memoryLimit?: string; threads?: number } = {},
): Promise<TaxiDatabase> {
  if (dbPath !== IN_MEMORY) {
    await fs.ensureDir(path.dirname(path.resolve(dbPath)));
  }
  const instance = await DuckDBInstance.create(
    dbPath,
    threads === undefined ? undefined : { threads: String(threads) },
  );
  const connection = await instance.connect();
  if (memoryLimit) {
    await connection.run(`SET memory_limit = ${quoteLiteral(memoryLimit)}`);
  }
  return { instance, connection, path: dbPath };
}

export function closeDatabase({ instance, connection }: TaxiDatabase): void {
  connection.closeSync();
  instance.closeSync();
}

/**
 * run a read query and parse every row with `schema`
 */
export async function queryRows<T extends z.ZodType>(
  connection: DuckDBConnection,
  name: string,
  sql: string,
  schema: T,
): Promise<z.output<T>[]> {
  const reader = await connection.runAndReadAll(sql);
  return parseRows(schema, name, reader.getRowObjectsJS());
}

const countRow = z.object({ count: requiredInteger });

export async function countRows(connection: DuckDBConnection, table: string): Promise<number> {
  const [row] = await queryRows(connection, table, `SELECT COUNT(*) AS count FROM ${table}`, countRow);
  return row?.count ?? 0;
}

export async function tableExists(connection: DuckDBConnection, table: string): Promise<boolean> {
  const [row] = await queryRows(
    connection,
    'duckdb_tables',
    `SELECT COUNT(*) AS count FROM duckdb_tables() WHERE table_name = ${quoteLiteral(table)}`,
    countRow,
  );
  return (row?.count ?? 0) > 0;
}
