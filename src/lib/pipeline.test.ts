import { describe, it, expect } from 'vitest';
import { buildMapView } from './pipeline';
import { FALLBACK_COLOR } from './constants';
import type { SampleRecord } from './types';

function sample(sampleType: string, li: string, latitude = 0, longitude = 0): SampleRecord {
  return { latitude, longitude, sampleType, municipality: 'Alpha', concentrations: { Li: li } };
}

describe('buildMapView', () => {
  it('stops before filtering when the table is empty', () => {
    expect(buildMapView([], 'Li', ['core'])).toEqual({ status: 'empty-table' });
  });

  it('asks for a sample type when none is selected', () => {
    expect(buildMapView([sample('core', '5')], 'Li', [])).toEqual({ status: 'no-sample-types' });
  });

  it('reports when no valid data remains', () => {
    const records = [sample('core', 'bad'), sample('soil', '-1')];

    expect(buildMapView(records, 'Li', ['core', 'soil'])).toEqual({ status: 'no-data', element: 'Li' });
  });

  it('builds rows, colour scale and centre for a valid selection', () => {
    const records = [sample('core', '5', 1, 10), sample('soil', '-1', 50, 50), sample('core', '15', 3, 20)];

    const view = buildMapView(records, 'Li', ['core', 'soil']);

    expect(view.status).toBe('ready');
    if (view.status !== 'ready') return;

    expect(view.element).toBe('Li');
    expect(view.rows.map(r => r.value)).toEqual([5, 15]);
    expect(view.center).toEqual([2, 15]);
    expect(view.scale).toMatchObject({ kind: 'gradient', min: 5, max: 15, caption: 'Concentration of Li (ppm)' });
  });

  it('uses the constant colour for a single surviving sample', () => {
    const view = buildMapView([sample('core', '5', 1, 10)], 'Li', ['core']);

    expect(view.status === 'ready' && view.scale.colorFor(5)).toBe(FALLBACK_COLOR);
  });
});
