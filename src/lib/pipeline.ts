import type { MapView, SampleRecord } from './types';
import type { ElementSymbol } from './constants';
import { filterSamples } from './filter';
import { buildColorScale } from './colorScale';
import { computeCenter } from './geo';

/**
 * Run filter, colour scale and centring for the current selection.
 * Recomputed from scratch on every selection change.
 */
export function buildMapView(
  records: SampleRecord[],
  element: ElementSymbol,
  sampleTypes: readonly string[]
): MapView {
  if (records.length === 0) {
    return { status: 'empty-table' };
  }

  if (sampleTypes.length === 0) {
    return { status: 'no-sample-types' };
  }

  const filtered = filterSamples(records, element, sampleTypes);
  if (filtered.kind === 'empty') {
    return { status: 'no-data', element };
  }

  const { rows } = filtered;
  return {
    status: 'ready',
    element,
    rows,
    scale: buildColorScale(rows.map(r => r.value), element),
    center: computeCenter(rows),
  };
}
