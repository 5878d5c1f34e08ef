/**
 * Matchflow — Run Pipeline Script
 *
 * Search → Evaluate → Threshold → Track
 *
 * Usage:
 *   npm run pipeline -- --query "rust jobs"           # Default count (20)
 *   npm run pipeline -- --query "rust" --count 50
 *   npm run pipeline -- --query "rust" --dry-run      # Don't track anything
 *   npm run pipeline -- --query "rust" --export csv   # Print tracked records
 *   npm run pipeline -- --config ./my-config.json
 */

import 'dotenv/config';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';
import { applyLoggingConfig, loadConfig } from '../src/config';
import { createAggregator } from '../src/aggregator';
import { createEvaluator } from '../src/evaluation';
import { createTracker } from '../src/tracker';
import { runPipeline } from '../src/pipeline';
import { ExportFormatSchema, type ExportFormat } from '../src/types';

// ============================================================
// CONFIGURATION
// ============================================================

interface ScriptOptions {
  query?: string;
  count: number;
  configPath?: string;
  dryRun: boolean;
  exportFormat?: ExportFormat;
}

function parseArgs(): ScriptOptions {
  const args = process.argv.slice(2);
  const options: ScriptOptions = {
    count: 20,
    dryRun: false,
  };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--query' && args[i + 1]) {
      options.query = args[i + 1];
      i++;
    } else if (args[i] === '--count' && args[i + 1]) {
      options.count = parseInt(args[i + 1], 10);
      i++;
    } else if (args[i] === '--config' && args[i + 1]) {
      options.configPath = args[i + 1];
      i++;
    } else if (args[i] === '--dry-run') {
      options.dryRun = true;
    } else if (args[i] === '--export' && args[i + 1]) {
      const format = ExportFormatSchema.safeParse(args[i + 1]);
      if (!format.success) {
        throw new Error(`--export must be csv or json, got ${args[i + 1]}`);
      }
      options.exportFormat = format.data;
      i++;
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const options = parseArgs();

  if (!options.query) {
    console.error('Usage: npm run pipeline -- --query <text> [--count N] [--dry-run] [--export csv|json]');
    process.exit(1);
  }
  if (!Number.isInteger(options.count) || options.count < 1) {
    console.error('--count must be a positive integer');
    process.exit(1);
  }

  const config = await loadConfig(options.configPath);
  applyLoggingConfig(config);

  console.log('\n' + '='.repeat(60));
  console.log('MATCHFLOW PIPELINE');
  console.log('='.repeat(60));
  console.log(`Query: ${options.query}`);
  console.log(`Count: ${options.count}`);
  console.log(`Dry Run: ${options.dryRun}`);
  console.log(`Threshold: ${config.evaluation.score_threshold}`);
  console.log('='.repeat(60) + '\n');

  const aggregator = createAggregator(config);
  const evaluator = createEvaluator(config);
  const tracker = options.dryRun ? undefined : await createTracker(config);

  const report = await runPipeline({ aggregator, evaluator, tracker }, config, {
    query: options.query,
    count: options.count,
    dryRun: options.dryRun,
  });

  console.log('\n' + '='.repeat(60));
  console.log('PIPELINE COMPLETE');
  console.log('='.repeat(60));
  console.log(`Run: ${report.runId}`);
  console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
  console.log(`Fetched: ${report.search.fetched} (duplicates ${report.search.duplicates}, blocked ${report.search.blocked})`);
  if (report.search.failedProviders.length > 0) {
    console.log(`Failed providers: ${report.search.failedProviders.join(', ')}`);
  }
  console.log(`Scored: ${report.evaluation.scored}, unscored: ${report.evaluation.unscored}`);
  console.log(`Accepted: ${report.evaluation.accepted}`);
  console.log(`Newly tracked: ${report.tracked.filter(t => t.created).length}`);
  console.log('='.repeat(60) + '\n');

  for (const result of report.accepted) {
    console.log(`  ${result.score?.toFixed(2)}  ${result.item.title}`);
    console.log(`        ${result.item.link}`);
  }

  if (options.exportFormat && tracker) {
    console.log('\n' + tracker.export(options.exportFormat));
  }
}

main().catch((error: unknown) => {
  logger.error('Pipeline failed', { error: errorMessage(error) });
  console.error('\nPipeline failed:', errorMessage(error));
  process.exit(1);
});
