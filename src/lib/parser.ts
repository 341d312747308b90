import Papa from 'papaparse';
import type { SampleRecord } from './types';
import { COLUMNS, ELEMENTS, ELEMENT_COLUMNS, NA_VALUES, REQUIRED_COLUMNS, type ElementSymbol } from './constants';
import { LoadError } from './errors';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Raw cell text, or null when the cell is absent or an NA marker
 */
export function presentCell(cell: string | undefined): string | null {
  if (cell === undefined || NA_VALUES.has(cell)) return null;
  return cell;
}

/**
 * Coerce a raw cell to a number; anything unparseable becomes null
 */
export function toNumeric(cell: string | undefined): number | null {
  const present = presentCell(cell);
  if (present === null) return null;

  const trimmed = present.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse sample CSV text and drop rows without coordinates or sample type.
 * Row order is preserved.
 */
export function parseSampleCsv(csvText: string): { records: SampleRecord[]; droppedRows: number } {
  const result = Papa.parse<Record<string, string | undefined>>(csvText, {
    header: true,
    skipEmptyLines: true,
  });

  const headers = result.meta.fields ?? [];
  const missingColumns = REQUIRED_COLUMNS.filter(c => !headers.includes(c));
  if (missingColumns.length > 0) {
    throw new LoadError(
      'MissingColumns',
      `Sample file is missing required column(s): ${missingColumns.join(', ')}`
    );
  }

  const elementColumns = ELEMENTS.filter(e => headers.includes(ELEMENT_COLUMNS[e]));

  const records: SampleRecord[] = [];
  let droppedRows = 0;

  for (const row of result.data) {
    const latitude = toNumeric(row[COLUMNS.latitude]);
    const longitude = toNumeric(row[COLUMNS.longitude]);
    const sampleType = presentCell(row[COLUMNS.sampleType]);

    if (latitude === null || longitude === null || sampleType === null) {
      droppedRows++;
      continue;
    }

    const concentrations: Partial<Record<ElementSymbol, string>> = {};
    for (const element of elementColumns) {
      const cell = row[ELEMENT_COLUMNS[element]];
      if (cell !== undefined) {
        concentrations[element] = cell;
      }
    }

    records.push({
      latitude,
      longitude,
      sampleType,
      municipality: presentCell(row[COLUMNS.municipality]),
      concentrations,
    });
  }

  return { records, droppedRows };
}

/**
 * Distinct sample types, sorted
 */
export function distinctSampleTypes(records: SampleRecord[]): string[] {
  return Array.from(new Set(records.map(r => r.sampleType))).sort();
}
