import { describe, expect, it } from 'vitest';
import { extractQualityMetrics, parseVqPairs } from './vqMetrics.js';

describe('parseVqPairs', () => {
  it('splits key=value pairs and drops malformed parts', () => {
    expect(Array.from(parseVqPairs('a=1;;=2;b = 3 ;c'))).toEqual([
      ['a', '1'],
      ['b', '3'],
    ]);
  });
});

describe('extractQualityMetrics', () => {
  it('reads average MoS and CCR from a full metrics string', () => {
    const raw =
      'MLQK=4.0000;MLQKav=3.9520;MLQKmn=3.8000;MLQKmx=4.1000;ICR=0.0000;CCR=0.0021;ICRmx=0.0000;CS=0;SCS=0;MLQKvr=0.95';
    expect(extractQualityMetrics(raw, 'SEP001122334455')).toEqual({
      deviceName: 'SEP001122334455',
      avgMos: 3.952,
      ccr: 0.0021,
    });
  });

  it('ignores the worst-case fields', () => {
    expect(extractQualityMetrics('MLQKmn=1.0000;ICRmx=0.9000;CCR=0.0000')).toEqual({ ccr: 0 });
  });

  it('keeps whichever statistic is present', () => {
    expect(extractQualityMetrics('MLQKav=n/a;CCR=0.0500')).toEqual({ ccr: 0.05 });
    expect(extractQualityMetrics('MLQKav=3.1000')).toEqual({ avgMos: 3.1 });
  });

  it('returns undefined when neither statistic can be read', () => {
    expect(extractQualityMetrics('MLQK=4.0000;CS=0')).toBeUndefined();
    expect(extractQualityMetrics('')).toBeUndefined();
    expect(extractQualityMetrics(undefined)).toBeUndefined();
  });
});
