#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadDatabaseConfig, parseCliOptions, resolveAction, DEFAULT_MONITOR_OPTIONS } from './config.js';
import type { MonitorCliOptions } from './schemas/config.js';
import { WebMonitor } from './monitor/web-monitor.js';
import { createLogger, parseLogLevel, type Logger } from './utils/logger.js';

const EXAMPLES = `
Examples:
  $ webmon --db-config db.json --sites-csv sites.csv --number-healthchecks 5
  $ webmon --db-config db.json --sites-table --number-healthchecks -1 --log-level DEBUG
  $ webmon --db-config db.json --drop-tables`;

function buildProgram(): Command {
  return new Command()
    .name('webmon')
    .description('Periodically checks websites and stores every result in a database')
    .version('0.1.0')
    .requiredOption('--db-config <file>', 'JSON file with the database connection settings')
    .option('--sites-csv <file>', 'CSV of host,interval[,pattern] rows to add before monitoring')
    .option('--sites-table [anything]', 'monitor the websites already stored in the database')
    .option('--number-healthchecks <n>', 'checks per website, -1 for no limit')
    .option('--drop-tables', 'drop the website and healthcheck tables and exit')
    .option('--log-level <level>', 'DEBUG, INFO, WARNING, ERROR or CRITICAL', 'INFO')
    .option('--log-file <file>', 'also write logs to this file')
    .option('--concurrency <n>', 'maximum simultaneous requests', String(DEFAULT_MONITOR_OPTIONS.concurrency))
    .option('--timeout <seconds>', 'request timeout, including time spent queued', String(DEFAULT_MONITOR_OPTIONS.timeoutMs / 1000))
    .addHelpText('after', EXAMPLES)
    .allowExcessArguments(false);
}

async function run(options: MonitorCliOptions, logger: Logger): Promise<number> {
  const action = resolveAction(options);
  const database = await loadDatabaseConfig(options.dbConfig);

  const monitor = new WebMonitor({
    database,
    logger,
    sitesCsv: options.sitesCsv,
    numberHealthchecks: options.numberHealthchecks,
    concurrency: options.concurrency,
    timeoutMs: options.timeout * 1000,
  });

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await monitor.run(action, controller.signal);
    return 0;
  } catch (error) {
    if (controller.signal.aborted) {
      logger.info('Stopped before completion');
      return 0;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
  }
}

async function main(argv: string[]): Promise<number> {
  const program = buildProgram();
  if (argv.length <= 2) {
    program.outputHelp();
    return 1;
  }
  program.parse(argv);

  let logger: Logger;
  let options: MonitorCliOptions;
  try {
    options = parseCliOptions(program.opts());
    logger = createLogger({ name: 'webmon', level: parseLogLevel(options.logLevel), logFile: options.logFile });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${errorMessage}`);
    return 1;
  }

  try {
    return await run(options, logger);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error('Fatal error', { error: errorMessage, type: error instanceof Error ? error.name : typeof error });
    return 1;
  }
}

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
