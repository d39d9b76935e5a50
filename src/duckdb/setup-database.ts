import type { TaxiConfig } from '../config.ts';
import type { FetchLike } from '../csv/zone-lookup.ts';
import { TLC_DATA_PAGE_URL } from '../csv/tlc-types/common.ts';
import { buildTripSources } from '../csv/tlc-types/source.ts';
import { errorMessage, RULE, type Logger } from '../logger.ts';
import { closeDatabase, openDatabase, type TaxiDatabase } from './database.ts';
import { printVerification, runReports } from './reports.ts';
import { loadTrips, type TripRowLimits } from './trips.ts';
import { setupZones } from './zones.ts';

export type SetupOptions = {
  config: TaxiConfig;
  monthCount: number;
  fetch?: FetchLike;
  logger?: Logger;
  limits?: TripRowLimits;
  threads?: number;
};

export type SetupResult =
  | { success: true; dbPath: string; tripCount: number; zoneCount: number; failedMonths: string[] }
  | { success: false; dbPath: string; error: unknown };

export type SetupStage = 'zones' | 'trips' | 'reports';

const STAGE_HEADLINES: Record<SetupStage, string> = {
  zones: 'Error creating zones',
  trips: 'Error loading trip data',
  reports: 'Error running reports',
};

/**
 * build the training database: zones, then trips month by month, then the summary reports
 */
export async function setupDatabase({
  config,
  monthCount,
  fetch,
  logger = console,
  limits,
  threads,
}: SetupOptions): Promise<SetupResult> {
  const dbPath = config.dbPath;

  logger.log(`\n${RULE}`);
  logger.log('NYC Yellow Taxi SQL Training - Database Setup');
  logger.log('Using REAL data from NYC Taxi & Limousine Commission');
  logger.log(`${RULE}\n`);

  logger.log(`🗄️  Creating DuckDB database: ${dbPath}`);
  const db = await openDatabase(dbPath, { memoryLimit: config.memoryLimit, threads });

  let counts: { tripCount: number; zoneCount: number };
  let failedMonths: string[];
  let stage: SetupStage = 'zones';
  try {
    await setupZones(db.connection, {
      url: config.zoneLookupUrl,
      tempPath: config.zoneCsvTempPath,
      timeoutMs: config.downloadTimeoutMs,
      fetch,
      logger,
    });

    stage = 'trips';
    const sources = buildTripSources(monthCount, { baseUrl: config.tripDataBaseUrl });
    logger.log('\n🚕 Loading Yellow Taxi trip data...');
    logger.log(`   Months to load: ${sources.length}`);
    for (const source of sources) {
      logger.log(`   📦 ${source.year}-${String(source.month).padStart(2, '0')}`);
    }

    const loadResult = await loadTrips(db.connection, sources, { limits, logger });
    failedMonths = loadResult.failed.map(({ source }) => source.fileName);

    stage = 'reports';
    counts = await printVerification(db.connection, logger);
    await runReports(db.connection, logger);
  } catch (err) {
    reportFailure(stage, err, logger);
    return { success: false, dbPath, error: err };
  } finally {
    closeDatabase(db);
  }

  printCompletion(db, counts, logger);
  return { success: true, dbPath, ...counts, failedMonths };
}

export function reportFailure(stage: SetupStage, err: unknown, logger: Logger = console): void {
  logger.error(`\n❌ ${STAGE_HEADLINES[stage]}: ${errorMessage(err)}`);
  logger.error('\n⚠️  This could be due to:');
  logger.error('   • Network connectivity issues');
  logger.error('   • NYC TLC server temporarily unavailable');
  logger.error('   • Data format changes');
  logger.error(`\n💡 Try again later or check: ${TLC_DATA_PAGE_URL}`);
}

function printCompletion(
  { path }: TaxiDatabase,
  { tripCount, zoneCount }: { tripCount: number; zoneCount: number },
  logger: Logger,
) {
  logger.log(`\n${RULE}`);
  logger.log('✅ Database setup complete!');
  logger.log(RULE);
  logger.log(`\n📁 Database file: ${path}`);
  logger.log(`📊 Total trips: ${tripCount.toLocaleString('en-US')}`);
  logger.log(`🗺️  Total zones: ${zoneCount}`);

  logger.log('\n🚀 Next steps:');
  logger.log('1. Open DBeaver');
  logger.log('2. Create new DuckDB connection');
  logger.log(`3. Point to: ${path}`);
  logger.log('4. Start querying with real NYC taxi data!\n');

  logger.log('💡 Example query to try:');
  logger.log('   SELECT z.zone_name, COUNT(*) as trips');
  logger.log('   FROM trips t');
  logger.log('   JOIN zones z ON t.pickup_location_id = z.location_id');
  logger.log('   GROUP BY z.zone_name');
  logger.log('   ORDER BY trips DESC');
  logger.log('   LIMIT 10;\n');
}
