/**
 * Matchflow — Export Tracked Items
 *
 * Usage:
 *   npm run export -- --format csv --out data/tracked.csv
 *   npm run export -- --format json --status new
 *   npm run export -- --format csv --status rejected --purge
 */

import 'dotenv/config';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';
import { applyLoggingConfig, loadConfig } from '../src/config';
import { createTracker } from '../src/tracker';
import {
  ExportFormatSchema,
  TrackedStatusSchema,
  type ExportFormat,
  type TrackedStatus,
} from '../src/types';

interface ExportOptions {
  format: ExportFormat;
  status?: TrackedStatus;
  out?: string;
  configPath?: string;
  purge: boolean;
}

function parseArgs(): ExportOptions {
  const args = process.argv.slice(2);
  const options: ExportOptions = { format: 'csv', purge: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--format' && args[i + 1]) {
      options.format = ExportFormatSchema.parse(args[i + 1]);
      i++;
    } else if (args[i] === '--status' && args[i + 1]) {
      options.status = TrackedStatusSchema.parse(args[i + 1]);
      i++;
    } else if (args[i] === '--out' && args[i + 1]) {
      options.out = args[i + 1];
      i++;
    } else if (args[i] === '--config' && args[i + 1]) {
      options.configPath = args[i + 1];
      i++;
    } else if (args[i] === '--purge') {
      options.purge = true;
    }
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseArgs();
  const config = await loadConfig(options.configPath);
  applyLoggingConfig(config);

  const tracker = await createTracker(config);

  if (options.out) {
    const count = await tracker.exportToFile(options.out, options.format, options.status);
    console.log(`Exported ${count} records to ${options.out}`);
  } else {
    process.stdout.write(tracker.export(options.format, options.status));
  }

  if (options.purge) {
    const removed = await tracker.purge(options.status);
    console.error(`Purged ${removed.length} records`);
  }

  const stats = tracker.stats();
  logger.info('Tracker stats', { ...stats });
}

main().catch((error: unknown) => {
  logger.error('Export failed', { error: errorMessage(error) });
  console.error('\nExport failed:', errorMessage(error));
  process.exit(1);
});
