import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { analyzeRecords, ExceptionProcessor } from './exceptionProcessor.js';
import type { RecordReader } from './exceptionProcessor.js';
import { NoInputError } from '../utils/errors.js';
import { makeCall, makeQuality, repeat, TEST_SETTINGS, TEST_WINDOW } from '../test-utils/fixtures.js';
import type { ExceptionGroup, ParseResult } from '../types/index.js';

function keyOf(group: ExceptionGroup): [string, string, string, number | string, string] {
  return [group.key.deviceName, group.key.role, group.key.dimension, group.key.value, group.classification];
}

describe('analyzeRecords', () => {
  it('drops calls outside the window before classification', async () => {
    const phoneA = { origDeviceName: 'Phone-A', origCauseCode: 58 };
    const report = await analyzeRecords(
      [
        makeCall({ ...phoneA, originationTime: new Date('2024-02-29T23:59:59Z') }),
        makeCall({ ...phoneA, originationTime: new Date('2024-03-01T00:00:00Z') }),
        makeCall({ ...phoneA, originationTime: new Date('2024-03-01T12:00:00Z') }),
        makeCall({ ...phoneA, originationTime: new Date('2024-03-01T23:59:59Z') }),
        makeCall({ ...phoneA, originationTime: new Date('2024-03-02T00:00:00Z') }),
      ],
      TEST_SETTINGS,
      TEST_WINDOW
    );

    expect(report.exceptions.map(keyOf)).toEqual([['Phone-A', 'source', 'orig_cause', 58, 'amber']]);
    expect(report.summary.dateHistogram).toEqual([{ key: '2024-03-01', count: 3 }]);
    expect(report.summary.deviceTotals).toEqual([{ key: 'Phone-A', count: 3 }]);
    expect(report.diagnostics).toMatchObject({ callsCorrelated: 5, callsInRange: 3 });
  });

  it('counts a quality record without a call as an orphan only', async () => {
    const report = await analyzeRecords(
      [
        makeCall({ callId: '1:10', origDeviceName: 'Phone-A' }),
        makeQuality({ callId: '1:99', deviceName: 'Phone-A', avgMos: 2.1 }),
      ],
      TEST_SETTINGS,
      TEST_WINDOW
    );

    expect(report.diagnostics).toMatchObject({ qualityRecords: 1, orphanQualityRecords: 1 });
    expect(report.exceptions).toEqual([]);
    expect(report.summary.qualityDeviceTotals).toEqual([]);
    expect(report.summary.deviceTotals).toEqual([]);
  });

  it('keeps a quality record stamped outside the window when its call is inside', async () => {
    const report = await analyzeRecords(
      [
        makeQuality({
          callId: '1:20',
          deviceName: 'Phone-B',
          timestamp: new Date('2024-03-05T09:00:00Z'),
          avgMos: 3.5,
        }),
        makeCall({ callId: '1:20', origDeviceName: 'Phone-B', destDeviceName: 'GW-1' }),
      ],
      TEST_SETTINGS,
      TEST_WINDOW
    );

    expect(report.summary.qualityDeviceTotals).toEqual([{ key: 'Phone-B', count: 1 }]);
    expect(report.diagnostics.orphanQualityRecords).toBe(0);
  });

  it('puts a CMR without a device name in no quality group', async () => {
    const report = await analyzeRecords(
      [
        makeCall({ callId: '1:40', origDeviceName: 'Phone-A', destDeviceName: 'Phone-B' }),
        ...repeat(3, () => makeQuality({ callId: '1:40', avgMos: 2.0 })),
      ],
      TEST_SETTINGS,
      TEST_WINDOW
    );

    expect(report.exceptions).toEqual([]);
    expect(report.summary.qualityDeviceTotals).toEqual([]);
    expect(report.summary.deviceTotals).toEqual([]);
  });

  it('counts unparseable rows and carries on', async () => {
    const error: ParseResult = { kind: 'error', rowNumber: 3, row: ['x'], reason: 'expected at least 13 fields, found 1' };
    const report = await analyzeRecords(
      [error, ...repeat(5, () => makeCall({ destDeviceName: 'GW-1', destCauseCode: 41 }))],
      TEST_SETTINGS,
      TEST_WINDOW
    );

    expect(report.diagnostics).toMatchObject({ rowsRead: 6, parseErrors: 1, callRecords: 5 });
    expect(report.exceptions.map(keyOf)).toEqual([['GW-1', 'destination', 'dest_cause', 41, 'red']]);
    expect(report.counts.cause).toEqual({ amber: 0, red: 1 });
  });

  it('reads an async source', async () => {
    async function* source(): AsyncGenerator<ParseResult> {
      yield makeCall({ callId: '1:30', origDeviceName: 'Phone-A', origCauseCode: 58 });
    }
    const report = await analyzeRecords(source(), TEST_SETTINGS, TEST_WINDOW);
    expect(report.summary.causeTotals).toEqual([{ key: 58, count: 1 }]);
  });

  it('returns an empty report when no call is left', async () => {
    const report = await analyzeRecords([], TEST_SETTINGS, TEST_WINDOW);
    expect(report.empty).toBe(true);
    expect(report.exceptions).toEqual([]);
    expect(report.amberCount).toBe(0);
    expect(report.redCount).toBe(0);
  });

  it('gives the same report for the same input', async () => {
    const records = (): ParseResult[] => [
      ...['2:1', '2:2', '2:3'].map((callId) =>
        makeCall({ callId, origDeviceName: 'Phone-A', destDeviceName: 'GW-1', destCauseCode: 41 })
      ),
      makeQuality({ callId: '2:2', deviceName: 'GW-1', ccr: 0.05 }),
    ];
    const first = await analyzeRecords(records(), TEST_SETTINGS, TEST_WINDOW);
    const second = await analyzeRecords(records(), TEST_SETTINGS, TEST_WINDOW);
    expect(second).toEqual(first);
  });
});

const HEADER =
  'globalCallID_callManagerId,globalCallID_callId,dateTimeOrigination,origIpv4v6Addr,destIpv4v6Addr,callingPartyNumber,originalCalledPartyNumber,finalCalledPartyNumber,origCause_value,destCause_value,origDeviceName,destDeviceName,duration';

function cdrRow(callId: number, destCause: number): string {
  return `2,${callId},1709294400,10.0.0.1,10.0.0.2,1000,2000,2000,0,${destCause},SEPAAA,GW-1,30`;
}

describe('ExceptionProcessor', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cdr-processor-'));
    // Written out of name order; b_ must still be read after a_
    await writeFile(join(dir, 'b_cdr.csv'), [HEADER, cdrRow(1, 16)].join('\n') + '\n');
    await writeFile(
      join(dir, 'a_cdr.csv'),
      [HEADER, ...[1, 2, 3, 4, 5].map((id) => cdrRow(id, 41))].join('\n') + '\n'
    );
    await writeFile(join(dir, 'c_other.csv'), 'name,value\nfoo,1\n');
    await writeFile(join(dir, 'notes.txt'), 'not an export\n');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads files in name order so the later duplicate wins', async () => {
    const report = await new ExceptionProcessor(TEST_SETTINGS).run({ window: TEST_WINDOW, inputDir: dir });

    expect(report.exceptions.map(keyOf)).toEqual([
      ['GW-1', 'destination', 'dest_cause', 41, 'amber'],
      ['SEPAAA', 'source', 'dest_cause', 41, 'amber'],
    ]);
    expect(report.diagnostics).toEqual({
      filesRead: 2,
      filesSkipped: 1,
      rowsRead: 6,
      parseErrors: 0,
      callRecords: 6,
      qualityRecords: 0,
      orphanQualityRecords: 0,
      callsCorrelated: 5,
      callsInRange: 5,
    });
  });

  it('reads a file named explicitly and found in the directory once', async () => {
    const report = await new ExceptionProcessor(TEST_SETTINGS).run({
      window: TEST_WINDOW,
      inputDir: dir,
      files: [join(dir, 'b_cdr.csv')],
    });
    expect(report.diagnostics).toMatchObject({ filesRead: 2, callRecords: 6 });
  });

  it('keeps the rows read before a file fails', async () => {
    const reader: RecordReader = async function* (file) {
      yield makeCall({ callId: `9:${file}`, origDeviceName: 'Phone-A', origCauseCode: 58 });
      if (file === 'broken.csv') {
        throw new Error('connection reset');
      }
    };
    const report = await new ExceptionProcessor(TEST_SETTINGS, reader).run({
      window: TEST_WINDOW,
      files: ['good.csv', 'broken.csv'],
    });

    expect(report.diagnostics).toMatchObject({ filesRead: 2, filesSkipped: 0, callsInRange: 2 });
    expect(report.summary.causeTotals).toEqual([{ key: 58, count: 2 }]);
  });

  it('reports the rows of a single file that fails part way', async () => {
    const reader: RecordReader = async function* () {
      yield makeCall({ callId: '9:1', origDeviceName: 'Phone-A', origCauseCode: 58 });
      throw new Error('connection reset');
    };
    const report = await new ExceptionProcessor(TEST_SETTINGS, reader).run({
      window: TEST_WINDOW,
      files: ['only.csv'],
    });

    expect(report.empty).toBe(false);
    expect(report.diagnostics).toMatchObject({ filesRead: 1, filesSkipped: 0, rowsRead: 1, callsInRange: 1 });
  });

  it('fails when no file can be read', async () => {
    const reader: RecordReader = async function* () {
      yield* [];
      throw new Error('disk unavailable');
    };
    const run = new ExceptionProcessor(TEST_SETTINGS, reader).run({
      window: TEST_WINDOW,
      files: ['x.csv', 'y.csv'],
    });
    await expect(run).rejects.toBeInstanceOf(NoInputError);
    await expect(run).rejects.toThrow('None of the 2 input files could be read');
  });

  it('fails when there are no input files', async () => {
    await expect(new ExceptionProcessor(TEST_SETTINGS).run({ window: TEST_WINDOW, files: [] })).rejects.toThrow(
      'No CSV input files found'
    );
  });
});
