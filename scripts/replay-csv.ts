#!/usr/bin/env ts-node
/**
 * CLI script to replay a recorded readings CSV through the spoilage engine
 *
 * Usage:
 *   npm run replay -- --file data/readings.csv
 *   npm run replay -- --file data/readings.csv --mode simple --window 20 --out exports/replay.csv
 */

import path from 'path';
import { SpoilageEngine, isEngineMode } from '@/services/spoilage-engine.service';
import { replayCsvFile, summarizeReplay } from '@/services/csv-replay.service';
import { writeResultsCsv } from '@/services/result-export.service';
import { formatResultSummary } from '@/utils/result-format.utils';
import { logger } from '@/utils/logger';

interface CLIArgs {
  file?: string;
  mode: string;
  product: string;
  window?: number;
  out?: string;
  quiet: boolean;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = {
    mode: 'adaptive',
    product: 'vaccine',
    quiet: false
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--file':
        parsed.file = args[++i];
        break;
      case '--mode':
        parsed.mode = args[++i];
        break;
      case '--product':
        parsed.product = args[++i];
        break;
      case '--window':
        parsed.window = Number(args[++i]);
        break;
      case '--out':
        parsed.out = args[++i];
        break;
      case '--quiet':
        parsed.quiet = true;
        break;
    }
  }

  return parsed;
}

function printUsage() {
  console.log(`
Usage:
  npm run replay -- --file <csv_file> [--mode adaptive|simple] [--product <name>] [--window <n>] [--out <csv>] [--quiet]

Options:
  --file <path>     Readings CSV (ts,product,temp_inside_c,temp_outside_c,humidity_pct,door_open,gas_ppm)
  --mode <mode>     adaptive (default) or simple
  --product <name>  Default product for rows without one (default: vaccine)
  --window <n>      Rolling window size (default: the product's adaptive window)
  --out <path>      Write the scored results to a CSV file
  --quiet           Only print the final summary
  `);
}

async function main() {
  try {
    const args = parseArgs();

    if (!args.file) {
      console.error('Error: --file is required');
      printUsage();
      process.exit(1);
    }

    if (!isEngineMode(args.mode)) {
      console.error(`Error: --mode must be adaptive or simple, got ${args.mode}`);
      printUsage();
      process.exit(1);
    }

    const engine = new SpoilageEngine(args.product, args.window, args.mode);
    const quiet = args.quiet;
    const result = await replayCsvFile(path.resolve(args.file), engine, {
      onResult: (scored) => {
        if (!quiet) console.log(formatResultSummary(scored));
      }
    });

    if (!result.success) {
      console.error(`Replay failed: ${result.errors.join('; ')}`);
      process.exit(1);
    }

    const summary = summarizeReplay(result);
    console.log('\n=== Replay Summary ===');
    console.log(`File: ${result.file}`);
    console.log(`Total Rows: ${summary.total_rows}`);
    console.log(`Scored: ${summary.processed}`);
    console.log(`Rejected: ${summary.rejected}`);
    console.log(`Risk: ok=${summary.risk_counts.ok} warning=${summary.risk_counts.warning} critical=${summary.risk_counts.critical}`);
    console.log(`Anomalies: zscore=${summary.anomaly_counts.zscore} ewma=${summary.anomaly_counts.ewma}`);
    console.log(`Peak Instant: ${summary.peak_instant_pct.toFixed(2)} %`);
    console.log(`Final Cumulative: ${summary.final_cumulative_pct.toFixed(2)} %`);
    console.log(`Processing Time: ${result.processing_time_ms}ms`);

    if (result.errors.length > 0) {
      console.log('\nErrors:');
      result.errors.slice(0, 10).forEach(err => console.log(`  - ${err}`));
      if (result.errors.length > 10) {
        console.log(`  ... and ${result.errors.length - 10} more errors`);
      }
    }

    if (args.out) {
      const written = await writeResultsCsv(result.results, args.out);
      console.log(`\n✓ Results written to ${written}`);
    }

    process.exit(0);

  } catch (error) {
    logger.error('Replay failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined
    });
    process.exit(1);
  }
}

void main();
