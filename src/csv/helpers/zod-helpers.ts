import { z } from 'zod/v4';

export const requiredString = z.string().min(1);

/**
 * duckdb hands back BIGINT and HUGEINT columns (COUNT(*), SUM over integers) as bigint
 * and DECIMAL columns as number. report rows mix both.
 */
export const numberPreprocess = (num: unknown) => {
  switch (typeof num) {
    case 'number':
      return num;
    case 'bigint':
      if (num > BigInt(Number.MAX_SAFE_INTEGER) || num < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new Error(`cannot represent ${num} as a safe integer`);
      }
      return Number(num);
    case 'string':
      if (num.trim() === '' || Number.isNaN(Number(num))) throw new Error(`cannot parse number from string ${num}`);
      return Number(num);
    case 'undefined':
      return undefined;
    case 'object':
      if (num === null) return null;
      throw new Error(`cannot parse number from object: ${JSON.stringify(num)} passed`);
    default:
      throw new Error(`cannot parse number from type ${typeof num}: ${String(num)} passed`);
  }
};

export const requiredInteger = z.preprocess(numberPreprocess, z.number().int());
export const nullableNumber = z.preprocess(numberPreprocess, z.number().nullable());
