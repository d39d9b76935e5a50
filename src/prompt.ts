import * as readline from 'readline/promises';

import { MONTH_COUNT } from './csv/tlc-types/common.ts';
import { clampMonthCount } from './csv/tlc-types/source.ts';
import type { Logger } from './logger.ts';

const { MIN, MAX, DEFAULT } = MONTH_COUNT;

export const MONTH_PROMPT = `How many months of data to load? (${MIN}-${MAX}, default=${DEFAULT}): `;

const INTEGER_REGEXP = /^[+-]?\d+$/;

export type MonthCountAnswer = {
  count: number;
  /** true when the answer was not a number and the default was used */
  defaulted: boolean;
};

export function parseMonthCount(input: string): MonthCountAnswer {
  const trimmed = input.trim();
  if (trimmed === '') {
    return { count: MONTH_COUNT.DEFAULT, defaulted: false };
  }
  if (!INTEGER_REGEXP.test(trimmed)) {
    return { count: MONTH_COUNT.DEFAULT, defaulted: true };
  }
  return { count: clampMonthCount(Number(trimmed)), defaulted: false };
}

/**
 * ask for the month count on stdin. ctrl+c or a closed stdin answers with the default.
 */
export async function promptMonthCount(
  {
    input = process.stdin,
    output = process.stdout,
    logger = console,
  }: { input?: NodeJS.ReadableStream; output?: NodeJS.WritableStream; logger?: Logger } = {},
): Promise<number> {
  const controller = new AbortController();
  const rl = readline.createInterface({ input, output });
  rl.on('SIGINT', () => controller.abort());
  rl.on('close', () => controller.abort());

  let answer: MonthCountAnswer;
  try {
    answer = parseMonthCount(await rl.question(MONTH_PROMPT, { signal: controller.signal }));
  } catch (err) {
    if (!controller.signal.aborted) throw err;
    answer = { count: MONTH_COUNT.DEFAULT, defaulted: true };
  } finally {
    rl.close();
  }

  if (answer.defaulted) {
    logger.log(`\nUsing default: ${answer.count} months`);
  }
  return answer.count;
}

export type CliArgs = {
  months?: number;
  dbPath?: string;
};

/**
 * `--months=N` and `--db=PATH`. anything else is rejected.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) throw new Error(`Unknown argument: ${arg}`);
    const eq = arg.indexOf('=');
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const rawValue = eq === -1 ? '' : arg.slice(eq + 1);
    switch (key) {
      case 'months': {
        const { count, defaulted } = parseMonthCount(rawValue);
        if (defaulted || rawValue.trim() === '') throw new Error(`--months expects an integer, received "${rawValue}"`);
        args.months = count;
        break;
      }
      case 'db':
        if (rawValue.trim() === '') throw new Error('--db expects a path');
        args.dbPath = rawValue.trim();
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return args;
}
