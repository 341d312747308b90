import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { filterSamples } from './filter';
import { distinctSampleTypes, parseSampleCsv } from './parser';
import { ELEMENTS } from './constants';
import type { SampleRecord } from './types';

function sample(sampleType: string, li?: string): SampleRecord {
  return {
    latitude: 1,
    longitude: 2,
    sampleType,
    municipality: null,
    concentrations: li === undefined ? {} : { Li: li },
  };
}

describe('filterSamples', () => {
  it('keeps only selected, numeric, non-negative samples', () => {
    const records = [sample('core', '5'), sample('soil', '-1'), sample('core', 'bad')];

    const result = filterSamples(records, 'Li', ['core']);

    expect(result).toEqual({
      kind: 'rows',
      rows: [{ ...sample('core', '5'), value: 5 }],
    });
  });

  it('drops negative values even when every type is selected', () => {
    const records = [sample('core', '5'), sample('soil', '-1'), sample('core', 'bad')];

    const result = filterSamples(records, 'Li', ['core', 'soil']);

    expect(result.kind === 'rows' && result.rows.map(r => r.value)).toEqual([5]);
  });

  it('keeps zero and preserves input order', () => {
    const records = [sample('core', '3'), sample('core', '0'), sample('soil', '1'), sample('core', '2')];

    const result = filterSamples(records, 'Li', ['core', 'soil']);

    expect(result.kind === 'rows' && result.rows.map(r => r.value)).toEqual([3, 0, 1, 2]);
  });

  it('treats an absent element cell as non-numeric', () => {
    const result = filterSamples([sample('core')], 'Li', ['core']);

    expect(result).toEqual({ kind: 'empty' });
  });

  it('reports an empty result when nothing survives', () => {
    const records = [sample('core', '5'), sample('soil', '-1')];

    expect(filterSamples(records, 'Li', ['soil'])).toEqual({ kind: 'empty' });
  });

  it('does not modify the input records', () => {
    const records = [sample('core', '5')];

    filterSamples(records, 'Li', ['core']);

    expect(records).toEqual([sample('core', '5')]);
  });

  it('refuses an empty sample type selection', () => {
    expect(() => filterSamples([sample('core', '5')], 'Li', [])).toThrow(
      'filterSamples needs at least one sample type'
    );
  });

  it('holds its guarantees for every element of the bundled dataset', () => {
    const csv = readFileSync(path.join(process.cwd(), 'data', 'df_transicion.csv'), 'utf8');
    const { records } = parseSampleCsv(csv);
    const types = distinctSampleTypes(records);

    for (const element of ELEMENTS) {
      for (const selection of [types, types.slice(0, 1)]) {
        const result = filterSamples(records, element, selection);
        if (result.kind === 'empty') continue;

        expect(result.rows.length).toBeLessThanOrEqual(records.length);
        for (const row of result.rows) {
          expect(selection).toContain(row.sampleType);
          expect(Number.isFinite(row.value)).toBe(true);
          expect(row.value).toBeGreaterThanOrEqual(0);
        }
      }
    }
  });
});
