#!/usr/bin/env node
/**
 * Main entry point for the CDR/CMR exception report
 */
import { parseArgs } from 'node:util';
import { join } from 'node:path';
import {
  logger,
  LogLevel,
  parseLogLevel,
  parseUtcDateTime,
  formatUtcDateTime,
  SettingsError,
  NoInputError,
} from './utils/index.js';
import { ReportWriter } from './services/index.js';
import { ExceptionProcessor } from './processors/exceptionProcessor.js';
import { loadCauseCodes, loadExceptionSettings } from './config/settings.js';
import { env } from './config/env.js';

async function main() {
  const { values: args } = parseArgs({
    options: {
      start: { type: 'string' },
      end: { type: 'string' },
      dir: { type: 'string' },
      file: { type: 'string', multiple: true },
      output: { type: 'string', short: 'o' },
      settings: { type: 'string' },
      'cause-codes': { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (args.help) {
    showHelp();
    return;
  }

  logger.setLevel(args.verbose ? LogLevel.DEBUG : parseLogLevel(env.logLevel));

  const start = args.start ? parseUtcDateTime(args.start) : null;
  const end = args.end ? parseUtcDateTime(args.end) : null;
  if (!start || !end) {
    logger.error('Start and end must be given as "YYYY-MM-DD HH:MM:SS" (UTC)');
    showHelp();
    process.exit(1);
  }
  if (start.getTime() > end.getTime()) {
    logger.error('Start date/time is after end date/time');
    process.exit(1);
  }
  if (!args.dir && !args.file?.length) {
    logger.error('Provide --dir <path> or --file <path>');
    showHelp();
    process.exit(1);
  }

  const settingsFile = args.settings ?? env.settingsFile;
  const causeCodesFile = args['cause-codes'] ?? env.causeCodesFile;
  const outputPath = args.output ?? join(env.outputDir, 'exception_report.json');

  const separator = '='.repeat(60);
  logger.info(`\n${separator}`);
  logger.info('CDR/CMR EXCEPTION REPORT');
  logger.info(separator);
  logger.info(`Window: ${formatUtcDateTime(start)} to ${formatUtcDateTime(end)} UTC`);
  logger.info(`Input directory: ${args.dir ?? '(none)'}`);
  logger.info(`Settings: ${settingsFile}`);
  logger.info(`Cause codes: ${causeCodesFile}`);
  logger.info(`Output: ${outputPath}`);
  logger.info(`${separator}\n`);

  try {
    const settings = await loadExceptionSettings(settingsFile);
    const causeCodes = await loadCauseCodes(causeCodesFile);

    const processor = new ExceptionProcessor(settings);
    const report = await processor.run({
      window: { start, end },
      inputDir: args.dir,
      files: args.file,
    });

    await new ReportWriter(causeCodes).write(report, outputPath);

    if (report.empty) {
      logger.warn('No CDR/CMR exceptions found');
    } else {
      logger.success(
        `${report.exceptions.length} exceptions: ${report.redCount} red, ${report.amberCount} amber`
      );
    }
  } catch (error) {
    if (error instanceof SettingsError || error instanceof NoInputError) {
      logger.error(error.message);
    } else {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('\nFatal error:', err.message);
      if (args.verbose && err.stack) {
        logger.error(err.stack);
      }
    }
    process.exit(1);
  }
}

function showHelp() {
  console.log(`
CDR/CMR Exception Report

Usage:
  cdr-exceptions --start <date/time> --end <date/time> --dir <path> [options]

Options:
  --start <date/time>            Window start, "YYYY-MM-DD HH:MM:SS" (UTC, inclusive)
  --end <date/time>              Window end, "YYYY-MM-DD HH:MM:SS" (UTC, inclusive)
  --dir <path>                   Directory of CDR and CMR .csv exports
  --file <path>                  A single export file (repeatable)
  --output, -o <path>            Report file (default: ${join(env.outputDir, 'exception_report.json')})
  --settings <path>              Threshold settings JSON (default: ${env.settingsFile})
  --cause-codes <path>           Cause code descriptions JSON (default: ${env.causeCodesFile})
  --verbose, -v                  Enable verbose logging
  --help, -h                     Show this help message

Examples:
  cdr-exceptions --start "2024-03-01 00:00:00" --end "2024-03-07 23:59:59" --dir ./exports
  npm start -- --start "2024-03-01 00:00:00" --end "2024-03-01 12:00:00" --file ./exports/cdr_001.csv

Environment Variables:
  SETTINGS_FILE, CAUSE_CODES_FILE, OUTPUT_DIR, LOG_LEVEL (see .env.example)
`);
}

main().catch((error: unknown) => {
  logger.error('Unhandled error:', error);
  process.exit(1);
});
