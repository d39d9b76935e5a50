import * as fs from 'fs-extra';

import { errorMessage, type Logger } from '../logger.ts';

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type ZoneLookupDownload = {
  url: string;
  destination: string;
  timeoutMs: number;
  fetch?: FetchLike;
  logger?: Logger;
};

/**
 * download the zone lookup csv to `destination`.
 * resolves false on any transport or http error so the caller can fall back; never retries.
 */
export async function downloadZoneLookup({
  url,
  destination,
  timeoutMs,
  fetch = globalThis.fetch,
  logger = console,
}: ZoneLookupDownload): Promise<boolean> {
  logger.log('📥 Downloading NYC Taxi Zone Lookup...');

  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trimEnd());
    }
    const body = Buffer.from(await response.arrayBuffer());
    await fs.outputFile(destination, body);

    logger.log('   ✓ Zone lookup downloaded');
    return true;
  } catch (err) {
    logger.warn(`   ⚠️  Could not download zone lookup: ${errorMessage(err)}`);
    logger.warn('   ℹ️  Will create minimal zone data');
    return false;
  }
}
