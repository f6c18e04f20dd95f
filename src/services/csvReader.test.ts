import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { isColumnTypeRow, readRecords } from './csvReader.js';
import { UnrecognisedHeaderError } from '../utils/errors.js';
import type { ParseResult } from '../types/index.js';

const CDR_HEADER =
  'cdrRecordType,globalCallID_callManagerId,globalCallID_callId,dateTimeOrigination,origIpv4v6Addr,destIpv4v6Addr,callingPartyNumber,originalCalledPartyNumber,finalCalledPartyNumber,origCause_value,destCause_value,origDeviceName,destDeviceName,duration';

async function collect(source: AsyncIterable<ParseResult>): Promise<ParseResult[]> {
  const results: ParseResult[] = [];
  for await (const result of source) {
    results.push(result);
  }
  return results;
}

describe('readRecords', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cdr-reader-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses a CDR export, skipping the BOM and the column type row and numbering rows by file line', async () => {
    const file = join(dir, 'cdr.csv');
    await writeFile(
      file,
      '\uFEFF' +
        [
          CDR_HEADER,
          'INTEGER,INTEGER,INTEGER,INTEGER,VARCHAR(64),VARCHAR(64),VARCHAR(50),VARCHAR(50),VARCHAR(50),INTEGER,INTEGER,VARCHAR(129),VARCHAR(129),INTEGER',
          '1,2,1001,1709294400,10.0.0.1,10.0.0.2,1000,2000,2000,0,41,"SEPAAA","GW-1",65',
          '',
          '1,2,1002,1709294460,10.0.0.1,10.0.0.2,1000,2001,2001,16,0,"SEPAAA","GW-1",12',
          '1,2,,1709294520,10.0.0.1,10.0.0.2,1000,2002,2002,16,0,"SEPAAA","GW-1",3',
        ].join('\r\n') +
        '\r\n',
      'utf-8'
    );

    const results = await collect(readRecords(file));
    expect(results.map((r) => r.kind)).toEqual(['call', 'call', 'error']);
    expect(results[0]).toMatchObject({ kind: 'call', callId: '2:1001', destCauseCode: 41, destDeviceName: 'GW-1' });
    expect(results[1]).toMatchObject({ kind: 'call', callId: '2:1002', duration: 12 });
    // line 4 is blank
    expect(results[2]).toMatchObject({ kind: 'error', rowNumber: 6, reason: 'missing global call id' });
  });

  it('recognises a row of column type names', () => {
    expect(isColumnTypeRow(['INTEGER', 'VARCHAR(64)', 'UNIQUEIDENTIFIER'])).toBe(true);
    expect(isColumnTypeRow(['1', '2', '1001'])).toBe(false);
    expect(isColumnTypeRow([])).toBe(false);
  });

  it('parses a CMR export', async () => {
    const file = join(dir, 'cmr.csv');
    await writeFile(
      file,
      [
        'cdrRecordType,globalCallID_callManagerId,globalCallID_callId,dateTimeStamp,deviceName,varVQMetrics,duration',
        '2,2,1001,1709294465,SEPAAA,"MLQK=3.5000;MLQKav=3.4000;CCR=0.0300;",65',
      ].join('\n'),
      'utf-8'
    );

    const results = await collect(readRecords(file));
    expect(results).toEqual([
      {
        kind: 'quality',
        callId: '2:1001',
        timestamp: new Date('2024-03-01T12:01:05Z'),
        deviceName: 'SEPAAA',
        avgMos: 3.4,
        ccr: 0.03,
        duration: 65,
      },
    ]);
  });

  it('rejects files that are not CDR or CMR exports', async () => {
    const file = join(dir, 'other.csv');
    await writeFile(file, 'name,number\nalice,1000\n', 'utf-8');
    await expect(collect(readRecords(file))).rejects.toBeInstanceOf(UnrecognisedHeaderError);
  });

  it('rejects an empty file', async () => {
    const file = join(dir, 'empty.csv');
    await writeFile(file, '', 'utf-8');
    await expect(collect(readRecords(file))).rejects.toBeInstanceOf(UnrecognisedHeaderError);
  });

  it('passes through errors opening the file', async () => {
    await expect(collect(readRecords(join(dir, 'missing.csv')))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
