#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../config';
import { CLI_USAGE, parseCliArgs } from '../config/run-options';
import { closePool } from '../db/client';
import { createDigestRunner, deliveryFailedEverywhere } from '../services/digest-runner';
import { logger } from '../utils/logger';

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(CLI_USAGE);
    return 0;
  }

  const options = parseCliArgs(argv);
  const config = loadConfig({ dryRun: options.dryRun });
  const runner = createDigestRunner(config);

  try {
    const summary = await runner.run({ ...options, dryRun: config.dryRun });

    if (config.dryRun) {
      console.log(`\n${summary.digest.text}\n`);
    }
    for (const warning of summary.warnings) {
      logger.warn(warning);
    }

    return deliveryFailedEverywhere(summary) ? 1 : 0;
  } finally {
    await closePool();
  }
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error('Digest run failed', error);
    process.exit(1);
  });
