import { z } from 'zod/v4';

import { zoneFields } from '../tlc-types/zone.ts';
import fallbackZoneRows from '../../../data/fallback-zones.json';
import { parseRow } from './parse-row.ts';
import { TaxiTableName } from '../tlc-types/common.ts';

export const zoneParser = z.object(zoneFields);

export type Zone = z.infer<typeof zoneParser>;

/**
 * a subset of well-known zones, used when the published lookup cannot be downloaded
 */
export function fallbackZones(): Zone[] {
  return fallbackZoneRows.map((row) => parseRow(zoneParser, TaxiTableName.ZONES, row));
}
