import { loadConfig } from '../config.ts';
import { TLC_DATA_PAGE_URL } from '../csv/tlc-types/common.ts';
import { errorMessage, RULE } from '../logger.ts';
import { parseCliArgs, promptMonthCount } from '../prompt.ts';
import { setupDatabase } from './setup-database.ts';

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadConfig();
  if (args.dbPath) config.dbPath = args.dbPath;

  console.log(`\n${RULE}`);
  console.log('NYC Yellow Taxi Data Loader');
  console.log(RULE);
  console.log('\nThis script downloads REAL NYC Yellow Taxi data from the');
  console.log('NYC Taxi & Limousine Commission (TLC) official data source.');
  console.log(`\nData source: ${TLC_DATA_PAGE_URL}`);
  console.log('\nℹ️  Note: This will download data from the internet.');
  console.log('   Depending on your connection, this may take a few minutes.');
  console.log(`${RULE}\n`);

  const monthCount = args.months ?? (await promptMonthCount());

  console.log(`\n📅 Will load ${monthCount} month(s) of data`);
  console.log('   (Limited to ~100K trips per month for training purposes)\n');

  const result = await setupDatabase({ config, monthCount });

  if (result.success) {
    console.log('\n✨ Success! Your database is ready for SQL training!');
    return 0;
  }
  console.log('\n⚠️  Setup encountered issues. Please try again.');
  return 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`\n❌ ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
