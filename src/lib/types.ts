import type { ElementSymbol } from './constants';

// One cleaned row of the sample file
export interface SampleRecord {
  latitude: number;
  longitude: number;
  sampleType: string;
  municipality: string | null;
  concentrations: Partial<Record<ElementSymbol, string>>; // raw cell text, ppm
}

// Loaded and cleaned sample file
export interface SampleTable {
  source: string;
  records: SampleRecord[];
  droppedRows: number;
}

// Sample kept by the filter, with the selected element coerced to a number
export interface FilteredSample extends SampleRecord {
  value: number;
}

export type FilterResult =
  | { kind: 'rows'; rows: FilteredSample[] }
  | { kind: 'empty' };

export interface GradientScale {
  kind: 'gradient';
  min: number;
  max: number;
  stops: string[];
  caption: string;
  colorFor: (value: number) => string;
}

export interface ConstantScale {
  kind: 'constant';
  color: string;
  colorFor: (value: number) => string;
}

export type ColorScale = GradientScale | ConstantScale;

export type LatLng = [number, number];

// What the viewer shows for the current selection
export type MapView =
  | { status: 'empty-table' }
  | { status: 'no-sample-types' }
  | { status: 'no-data'; element: ElementSymbol }
  | {
      status: 'ready';
      element: ElementSymbol;
      rows: FilteredSample[];
      scale: ColorScale;
      center: LatLng;
    };
