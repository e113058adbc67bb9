#!/usr/bin/env node
// Entry point — one batch run of the team product reporter

import * as path from 'node:path';
import Logger, { getErrorMessage } from './logger';
import { runFromEnvironment } from './report-pipeline';

// Data directory: config.json and reporter.log (and directory-mode reports) live here
const dataDir = path.resolve(process.env.REPORTER_DATA_DIR || 'data');

Logger.init(dataDir);
Logger.setLevel(process.env.REPORTER_DEBUG === '1' ? 'DEBUG' : 'INFO');

async function main(): Promise<void> {
  const startedAt = new Date();
  Logger.info(`Process started at: ${startedAt.toISOString()}`);

  try {
    const summary = await runFromEnvironment(dataDir);
    if (summary.failedSeeds.length > 0 || summary.reportsFailed > 0) {
      Logger.warn(`Completed with ${summary.failedSeeds.length} failed seeds and ${summary.reportsFailed} failed reports`);
    }
  } catch (error) {
    Logger.error('Report generation aborted:', getErrorMessage(error));
    process.exitCode = 1;
  } finally {
    const finishedAt = new Date();
    const seconds = (finishedAt.getTime() - startedAt.getTime()) / 1000;
    Logger.info(`Process completed at: ${finishedAt.toISOString()}`);
    Logger.info(`Total execution time: ${seconds.toFixed(1)} seconds`);
    Logger.close();
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected failure:', error);
  process.exitCode = 1;
});
