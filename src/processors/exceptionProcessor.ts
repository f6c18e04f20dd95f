/**
 * Exception processor - Runs the CDR/CMR exception pipeline for one window
 *
 * read → parse → correlate → filter by date → classify + summarise
 */
import {
  logger,
  FileManager,
  compareText,
  NoInputError,
  UnrecognisedHeaderError,
} from '../utils/index.js';
import {
  CallIndex,
  readRecords,
  filterByDateRange,
  classifyExceptions,
  aggregateSummary,
} from '../services/index.js';
import type {
  DateWindow,
  ExceptionReport,
  ExceptionSettings,
  ParseResult,
  ProcessingDiagnostics,
} from '../types/index.js';

export type RecordSource = Iterable<ParseResult> | AsyncIterable<ParseResult>;
export type RecordReader = (filePath: string) => AsyncIterable<ParseResult>;

export interface RunOptions {
  window: DateWindow;
  /** Directory searched for .csv exports */
  inputDir?: string;
  /** Explicit export files, used in addition to inputDir */
  files?: string[];
}

function emptyDiagnostics(): ProcessingDiagnostics {
  return {
    filesRead: 0,
    filesSkipped: 0,
    rowsRead: 0,
    parseErrors: 0,
    callRecords: 0,
    qualityRecords: 0,
    orphanQualityRecords: 0,
    callsCorrelated: 0,
    callsInRange: 0,
  };
}

/**
 * Feed parse results into the index in the order they arrive. Returns the
 * number of rows that failed to parse.
 */
async function ingest(
  index: CallIndex,
  source: RecordSource,
  diagnostics: ProcessingDiagnostics,
  label: string
): Promise<number> {
  let failed = 0;
  for await (const result of source) {
    diagnostics.rowsRead++;
    if (result.kind === 'error') {
      failed++;
      diagnostics.parseErrors++;
      logger.debug(`Unable to parse ${label}, row ${result.rowNumber}: ${result.reason}`);
      continue;
    }
    index.ingest(result);
  }
  return failed;
}

function buildReport(
  index: CallIndex,
  settings: ExceptionSettings,
  window: DateWindow,
  diagnostics: ProcessingDiagnostics
): ExceptionReport {
  const stats = index.getStats();
  const { calls, orphanCount } = index.finalize();
  const inRange = filterByDateRange(calls, window);

  diagnostics.callRecords = stats.callRecords;
  diagnostics.qualityRecords = stats.qualityRecords;
  diagnostics.orphanQualityRecords = orphanCount;
  diagnostics.callsCorrelated = calls.length;
  diagnostics.callsInRange = inRange.length;

  return {
    window,
    ...classifyExceptions(inRange, settings),
    summary: aggregateSummary(inRange, settings),
    diagnostics,
    empty: inRange.length === 0,
  };
}

/**
 * Engine entry point: correlate, filter and classify an already-ordered
 * sequence of parse results
 */
export async function analyzeRecords(
  source: RecordSource,
  settings: ExceptionSettings,
  window: DateWindow
): Promise<ExceptionReport> {
  const diagnostics = emptyDiagnostics();
  const index = new CallIndex();
  await ingest(index, source, diagnostics, 'input');
  return buildReport(index, settings, window, diagnostics);
}

export class ExceptionProcessor {
  private settings: ExceptionSettings;
  private reader: RecordReader;

  constructor(settings: ExceptionSettings, reader: RecordReader = readRecords) {
    this.settings = settings;
    this.reader = reader;
  }

  /**
   * Process every export file in file name order into one report
   */
  async run(options: RunOptions): Promise<ExceptionReport> {
    const files = await this.resolveFiles(options);
    if (files.length === 0) {
      throw new NoInputError(0);
    }

    logger.info(`Processing ${files.length} input file(s)...`);
    const diagnostics = emptyDiagnostics();
    const index = new CallIndex();

    for (const file of files) {
      const rowsBefore = diagnostics.rowsRead;
      try {
        const failed = await ingest(index, this.reader(file), diagnostics, file);
        diagnostics.filesRead++;
        if (failed > 0) {
          logger.warn(`Skipped ${failed} unparseable row(s) in ${file}`);
        }
      } catch (error) {
        const rowsKept = diagnostics.rowsRead - rowsBefore;
        if (error instanceof UnrecognisedHeaderError) {
          logger.warn(`Skipping ${file}: not a CDR or CMR export`);
        } else {
          const message = error instanceof Error ? error.message : String(error);
          logger.error(`Unable to load file ${file}:`, message);
        }
        // Rows already ingested stay in the run
        if (rowsKept > 0) {
          diagnostics.filesRead++;
          logger.warn(`Kept ${rowsKept} row(s) read from ${file} before it failed`);
        } else {
          diagnostics.filesSkipped++;
        }
      }
    }

    if (diagnostics.filesRead === 0) {
      throw new NoInputError(files.length);
    }

    const report = buildReport(index, this.settings, options.window, diagnostics);
    this.logStats(report);
    return report;
  }

  private async resolveFiles(options: RunOptions): Promise<string[]> {
    const files = new Set<string>(options.files ?? []);
    if (options.inputDir) {
      for (const file of await FileManager.listCsvFiles(options.inputDir)) {
        files.add(file);
      }
    }
    return Array.from(files).sort(compareText);
  }

  private logStats(report: ExceptionReport): void {
    const d = report.diagnostics;
    const separator = '='.repeat(60);
    logger.info(`\n${separator}`);
    logger.info('PROCESSING COMPLETE');
    logger.info(separator);
    logger.info(`Files read: ${d.filesRead} (skipped ${d.filesSkipped})`);
    logger.info(`Rows read: ${d.rowsRead} (unparseable ${d.parseErrors})`);
    logger.info(`CDRs: ${d.callRecords}, CMRs: ${d.qualityRecords}, orphan CMRs: ${d.orphanQualityRecords}`);
    logger.info(`Calls correlated: ${d.callsCorrelated}, in range: ${d.callsInRange}`);

    if (report.empty) {
      logger.warn('No calls found in the requested window');
    } else {
      logger.info(
        `CDR exceptions: ${report.counts.cause.red} red, ${report.counts.cause.amber} amber`
      );
      logger.info(
        `CMR exceptions: ${report.counts.quality.red} red, ${report.counts.quality.amber} amber`
      );
    }
    logger.info(separator);
  }
}
