import { describe, it, expect } from 'vitest';
import { distinctSampleTypes, parseSampleCsv, presentCell, toNumeric } from './parser';
import { LoadError } from './errors';

const HEADER = 'latitude,longitude,tipo_muestra,Municipio,Li_ppm2,Cu_ppm2';

describe('toNumeric', () => {
  it('parses decimal and exponent notation', () => {
    expect(toNumeric('12')).toBe(12);
    expect(toNumeric(' 3.5 ')).toBe(3.5);
    expect(toNumeric('-2')).toBe(-2);
    expect(toNumeric('.5')).toBe(0.5);
    expect(toNumeric('1e3')).toBe(1000);
  });

  it('returns null for missing or non-numeric cells', () => {
    expect(toNumeric(undefined)).toBeNull();
    expect(toNumeric('')).toBeNull();
    expect(toNumeric('NaN')).toBeNull();
    expect(toNumeric('abc')).toBeNull();
    expect(toNumeric('0x10')).toBeNull();
    expect(toNumeric('Infinity')).toBeNull();
    expect(toNumeric('<LD')).toBeNull();
  });
});

describe('presentCell', () => {
  it('treats NA markers as missing', () => {
    expect(presentCell('NA')).toBeNull();
    expect(presentCell('null')).toBeNull();
    expect(presentCell('')).toBeNull();
    expect(presentCell('core')).toBe('core');
  });
});

describe('parseSampleCsv', () => {
  it('drops rows without coordinates or sample type and keeps order', () => {
    const csv = [
      HEADER,
      '1.5,-70.25,core,Alpha,5,0.3',
      'abc,-70,core,Beta,1,1',
      '2,,soil,Gamma,1,1',
      '3,-71,,Delta,1,1',
      '4,-72,NA,Epsilon,1,1',
      ' 4.5 ,-72.5,soil,,bad,-1',
    ].join('\n');

    const { records, droppedRows } = parseSampleCsv(csv);

    expect(droppedRows).toBe(4);
    expect(records).toEqual([
      {
        latitude: 1.5,
        longitude: -70.25,
        sampleType: 'core',
        municipality: 'Alpha',
        concentrations: { Li: '5', Cu: '0.3' },
      },
      {
        latitude: 4.5,
        longitude: -72.5,
        sampleType: 'soil',
        municipality: null,
        concentrations: { Li: 'bad', Cu: '-1' },
      },
    ]);
  });

  it('returns an empty table when every latitude is missing', () => {
    const csv = [HEADER, ',-70,core,Alpha,5,1', 'n/a,-71,soil,Beta,2,2'].join('\n');

    const { records, droppedRows } = parseSampleCsv(csv);

    expect(records).toEqual([]);
    expect(droppedRows).toBe(2);
  });

  it('only keeps element columns that exist in the file', () => {
    const csv = ['latitude,longitude,tipo_muestra,Y_ppm2,Foo', '1,2,core,7.5,x'].join('\n');

    const { records } = parseSampleCsv(csv);

    expect(records[0].concentrations).toEqual({ Y: '7.5' });
    expect(records[0].municipality).toBeNull();
  });

  it('rejects a file without the required columns', () => {
    const csv = ['lat,longitude,tipo_muestra', '1,2,core'].join('\n');

    expect(() => parseSampleCsv(csv)).toThrow(LoadError);
    try {
      parseSampleCsv(csv);
    } catch (err) {
      expect(err).toBeInstanceOf(LoadError);
      if (err instanceof LoadError) {
        expect(err.kind).toBe('MissingColumns');
        expect(err.message).toBe('Sample file is missing required column(s): latitude');
      }
    }
  });
});

describe('distinctSampleTypes', () => {
  it('returns each type once in code-unit order', () => {
    const records = ['soil', 'core', 'soil', 'Rock'].map(sampleType => ({
      latitude: 0,
      longitude: 0,
      sampleType,
      municipality: null,
      concentrations: {},
    }));

    expect(distinctSampleTypes(records)).toEqual(['Rock', 'core', 'soil']);
  });
});
