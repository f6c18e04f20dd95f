/**
 * Record parser - Turns CDR and CMR export rows into typed records
 *
 * The layout is decided once per file from its header; every row of the file
 * is then read under that layout.
 */
import { extractQualityMetrics } from './vqMetrics.js';
import type {
  CallRecord,
  ParseResult,
  QualityRecord,
  RowParseError,
} from '../types/index.js';

const CDR_FIELDS = [
  'globalCallID_callManagerId',
  'globalCallID_callId',
  'dateTimeOrigination',
  'origIpv4v6Addr',
  'destIpv4v6Addr',
  'callingPartyNumber',
  'originalCalledPartyNumber',
  'finalCalledPartyNumber',
  'origCause_value',
  'destCause_value',
  'origDeviceName',
  'destDeviceName',
  'duration',
] as const;

const CDR_OPTIONAL_FIELDS = ['origVarVQMetrics', 'destVarVQMetrics'] as const;

const CMR_FIELDS = [
  'globalCallID_callManagerId',
  'globalCallID_callId',
  'dateTimeStamp',
  'deviceName',
  'varVQMetrics',
  'duration',
] as const;

// Shorter names some export tools write for the same columns
const COLUMN_ALIASES: Record<string, string> = {
  callmanagerid: 'globalcallid_callmanagerid',
};

type ColumnIndex<K extends string> = Record<K, number>;

export type CdrSchema = {
  kind: 'cdr';
  width: number;
  columns: ColumnIndex<(typeof CDR_FIELDS)[number]>;
  optional: Partial<ColumnIndex<(typeof CDR_OPTIONAL_FIELDS)[number]>>;
};

export type CmrSchema = {
  kind: 'cmr';
  width: number;
  columns: ColumnIndex<(typeof CMR_FIELDS)[number]>;
};

export type RowSchema = CdrSchema | CmrSchema;

function locate<K extends string>(
  positions: Map<string, number>,
  fields: readonly K[]
): Partial<ColumnIndex<K>> {
  const found: Partial<ColumnIndex<K>> = {};
  for (const field of fields) {
    const index = positions.get(field.toLowerCase());
    if (index !== undefined) {
      found[field] = index;
    }
  }
  return found;
}

function isComplete<K extends string>(
  found: Partial<ColumnIndex<K>>,
  fields: readonly K[]
): found is ColumnIndex<K> {
  return fields.every((field) => found[field] !== undefined);
}

function widthOf(index: Partial<Record<string, number>>): number {
  let max = -1;
  for (const value of Object.values(index)) {
    if (value !== undefined && value > max) max = value;
  }
  return max + 1;
}

/**
 * Decide whether a header belongs to a call-detail or a call-quality export.
 * Column names are matched case-insensitively; the first occurrence wins.
 */
export function detectSchema(header: readonly string[]): RowSchema | null {
  const positions = new Map<string, number>();
  header.forEach((name, index) => {
    const lower = name.trim().toLowerCase();
    const key = COLUMN_ALIASES[lower] ?? lower;
    if (!positions.has(key)) positions.set(key, index);
  });

  const cdr = locate(positions, CDR_FIELDS);
  if (isComplete(cdr, CDR_FIELDS)) {
    const optional = locate(positions, CDR_OPTIONAL_FIELDS);
    return { kind: 'cdr', width: widthOf(cdr), columns: cdr, optional };
  }

  const cmr = locate(positions, CMR_FIELDS);
  if (isComplete(cmr, CMR_FIELDS)) {
    return { kind: 'cmr', width: widthOf(cmr), columns: cmr };
  }

  return null;
}

class FieldError extends Error {}

function cell(row: readonly string[], index: number): string {
  return (row[index] ?? '').trim();
}

function optionalCell(row: readonly string[], index: number): string | undefined {
  const value = cell(row, index);
  return value === '' ? undefined : value;
}

function requiredCell(row: readonly string[], index: number, field: string): string {
  const value = cell(row, index);
  if (value === '') {
    throw new FieldError(`missing ${field}`);
  }
  return value;
}

function parseEpochSeconds(value: string, field: string): Date {
  if (!/^\d+$/.test(value)) {
    throw new FieldError(`${field} is not a timestamp: "${value}"`);
  }
  const time = new Date(Number(value) * 1000);
  if (Number.isNaN(time.getTime())) {
    throw new FieldError(`${field} is out of range: "${value}"`);
  }
  return time;
}

function parseCauseCode(value: string | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new FieldError(`${field} is not numeric: "${value}"`);
  }
  return Number(value);
}

function parseDuration(value: string | undefined): number {
  if (value === undefined) return 0;
  if (!/^\d+$/.test(value)) {
    throw new FieldError(`duration is not numeric: "${value}"`);
  }
  return Number(value);
}

function callIdOf(row: readonly string[], callManagerIdx: number, globalCallIdx: number): string {
  const callManagerId = requiredCell(row, callManagerIdx, 'call manager id');
  const globalCallId = requiredCell(row, globalCallIdx, 'global call id');
  return `${callManagerId}:${globalCallId}`;
}

function toCallRecord(row: readonly string[], schema: CdrSchema): CallRecord {
  const c = schema.columns;
  const origDeviceName = optionalCell(row, c.origDeviceName);
  const destDeviceName = optionalCell(row, c.destDeviceName);

  const record: CallRecord = {
    kind: 'call',
    callId: callIdOf(row, c.globalCallID_callManagerId, c.globalCallID_callId),
    originationTime: parseEpochSeconds(
      requiredCell(row, c.dateTimeOrigination, 'dateTimeOrigination'),
      'dateTimeOrigination'
    ),
    origIp: cell(row, c.origIpv4v6Addr),
    destIp: cell(row, c.destIpv4v6Addr),
    callingNumber: cell(row, c.callingPartyNumber),
    originalCalledNumber: cell(row, c.originalCalledPartyNumber),
    finalCalledNumber: cell(row, c.finalCalledPartyNumber),
    origCauseCode: parseCauseCode(optionalCell(row, c.origCause_value), 'origCause_value'),
    destCauseCode: parseCauseCode(optionalCell(row, c.destCause_value), 'destCause_value'),
    origDeviceName,
    destDeviceName,
    duration: parseDuration(optionalCell(row, c.duration)),
  };

  const { origVarVQMetrics, destVarVQMetrics } = schema.optional;
  if (origVarVQMetrics !== undefined) {
    record.origQuality = extractQualityMetrics(cell(row, origVarVQMetrics), origDeviceName);
  }
  if (destVarVQMetrics !== undefined) {
    record.destQuality = extractQualityMetrics(cell(row, destVarVQMetrics), destDeviceName);
  }
  return record;
}

function toQualityRecord(row: readonly string[], schema: CmrSchema): QualityRecord {
  const c = schema.columns;
  const deviceName = optionalCell(row, c.deviceName);
  const metrics = extractQualityMetrics(cell(row, c.varVQMetrics), deviceName);

  return {
    kind: 'quality',
    callId: callIdOf(row, c.globalCallID_callManagerId, c.globalCallID_callId),
    timestamp: parseEpochSeconds(requiredCell(row, c.dateTimeStamp, 'dateTimeStamp'), 'dateTimeStamp'),
    deviceName,
    avgMos: metrics?.avgMos,
    ccr: metrics?.ccr,
    duration: parseDuration(optionalCell(row, c.duration)),
  };
}

/**
 * Parse one data row. Never throws: malformed rows come back as RowParseError.
 */
export function parseRow(row: readonly string[], schema: RowSchema, rowNumber: number): ParseResult {
  const fail = (reason: string): RowParseError => ({ kind: 'error', rowNumber, row, reason });

  if (row.length < schema.width) {
    return fail(`expected at least ${schema.width} fields, found ${row.length}`);
  }

  try {
    return schema.kind === 'cdr' ? toCallRecord(row, schema) : toQualityRecord(row, schema);
  } catch (error) {
    if (error instanceof FieldError) {
      return fail(error.message);
    }
    throw error;
  }
}
