import type { FilteredSample, FilterResult, SampleRecord } from './types';
import type { ElementSymbol } from './constants';
import { toNumeric } from './parser';

/**
 * Keep samples of the selected types whose element value is a non-negative number.
 * Input order is preserved.
 */
export function filterSamples(
  records: SampleRecord[],
  element: ElementSymbol,
  sampleTypes: readonly string[]
): FilterResult {
  if (sampleTypes.length === 0) {
    throw new Error('filterSamples needs at least one sample type');
  }

  const selected = new Set(sampleTypes);
  const rows: FilteredSample[] = [];

  for (const record of records) {
    if (!selected.has(record.sampleType)) continue;

    const value = toNumeric(record.concentrations[element]);
    if (value === null || value < 0) continue;

    rows.push({ ...record, value });
  }

  return rows.length > 0 ? { kind: 'rows', rows } : { kind: 'empty' };
}
