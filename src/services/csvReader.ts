/**
 * CSV record reader - Streams CDR/CMR export files through the record parser
 */
import { createReadStream } from 'fs';
import { pipeline } from 'stream';
import { parse } from 'csv-parse';
import { logger } from '../utils/logger.js';
import { UnrecognisedHeaderError } from '../utils/errors.js';
import { detectSchema, parseRow } from './recordParser.js';
import type { RowSchema } from './recordParser.js';
import type { ParseResult } from '../types/index.js';

interface SourceRow {
  cells: string[];
  /** Line of the file the record ends on, blank lines included */
  line: number;
}

// With `info: true` csv-parse emits { record, info } for every row
function toSourceRow(chunk: unknown): SourceRow {
  if (typeof chunk !== 'object' || chunk === null || !('record' in chunk) || !('info' in chunk)) {
    return { cells: [], line: 0 };
  }
  const { record, info } = chunk;
  const cells = Array.isArray(record) ? record.map((value) => String(value)) : [];
  const line =
    typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number'
      ? info.lines
      : 0;
  return { cells, line };
}

// Call-manager exports follow the header with a row of column types
// ("INTEGER,VARCHAR(64),...")
const COLUMN_TYPE = /^[A-Z]+(\(\d+\))?$/;

export function isColumnTypeRow(cells: readonly string[]): boolean {
  return cells.length > 0 && cells.every((value) => COLUMN_TYPE.test(value.trim()));
}

function describe(schema: RowSchema): string {
  return schema.kind === 'cdr' ? 'CDR' : 'CMR';
}

/**
 * Lazily read one export file. The header picks the layout for the whole
 * file; rows are numbered by their line in the file. A column type row
 * directly under the header is skipped.
 *
 * Throws UnrecognisedHeaderError before yielding anything when the header is
 * neither a CDR nor a CMR header, and passes I/O and CSV syntax errors through.
 */
export async function* readRecords(filePath: string): AsyncGenerator<ParseResult, void, undefined> {
  const parser = parse({
    bom: true,
    info: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  // pipeline destroys the parser with the read error, which ends the loop below
  pipeline(createReadStream(filePath), parser, (error) => {
    if (error) {
      logger.debug(`Stopped reading ${filePath}: ${error.message}`);
    }
  });

  let schema: RowSchema | null = null;
  let firstDataRow = true;

  try {
    for await (const chunk of parser) {
      const { cells, line } = toSourceRow(chunk);
      if (!schema) {
        schema = detectSchema(cells);
        if (!schema) {
          throw new UnrecognisedHeaderError(filePath);
        }
        logger.info(`Loading ${describe(schema)} file: ${filePath}`);
        continue;
      }
      if (firstDataRow) {
        firstDataRow = false;
        if (isColumnTypeRow(cells)) continue;
      }
      yield parseRow(cells, schema, line);
    }
  } finally {
    parser.destroy();
  }

  if (!schema) {
    throw new UnrecognisedHeaderError(filePath);
  }
}
