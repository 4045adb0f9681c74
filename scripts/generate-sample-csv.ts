#!/usr/bin/env ts-node
/**
 * Write a synthetic four-phase readings CSV for replay
 *
 * Usage:
 *   npm run generate-sample -- --out data/readings.csv --steps 40
 */

import { promises as fsp } from 'fs';
import path from 'path';
import { generateSampleReadings, readingsToCsv } from '@/utils/sample-data.utils';
import { logger } from '@/utils/logger';

interface CLIArgs {
  out: string;
  steps: number;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = { out: 'readings.csv', steps: 40 };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--out':
        parsed.out = args[++i];
        break;
      case '--steps':
        parsed.steps = Number(args[++i]);
        break;
    }
  }

  return parsed;
}

async function main() {
  const args = parseArgs();
  if (!Number.isInteger(args.steps) || args.steps < 1) {
    console.error(`Error: --steps must be a positive integer, got ${args.steps}`);
    process.exit(1);
  }

  try {
    const target = path.resolve(args.out);
    await fsp.mkdir(path.dirname(target), { recursive: true });
    await fsp.writeFile(target, readingsToCsv(generateSampleReadings(args.steps)), 'utf8');
    console.log(`✓ Sample CSV written to ${target}`);
  } catch (error) {
    logger.error('Sample generation failed', {
      error: error instanceof Error ? error.message : 'Unknown error'
    });
    process.exit(1);
  }
}

void main();
