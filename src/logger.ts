export type Logger = Pick<Console, 'log' | 'warn' | 'error' | 'table'>;

export const RULE = '='.repeat(70);

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
