// Tracked trace elements, in the order they appear in the selector
export const ELEMENTS = [
  'Li', 'Cu', 'Co', 'Ni', 'La', 'Ce', 'Pr', 'Nd', 'Sm', 'Eu',
  'Gd', 'Tb', 'Dy', 'Ho', 'Er', 'Tm', 'Yb', 'Lu', 'Sc', 'Y',
] as const;

export type ElementSymbol = (typeof ELEMENTS)[number];

// Source column holding each element's concentration (ppm)
export const ELEMENT_COLUMNS: Record<ElementSymbol, string> = {
  Li: 'Li_ppm2',
  Cu: 'Cu_ppm2',
  Co: 'Co_ppm2',
  Ni: 'Ni_ppm2',
  La: 'La_ppm2',
  Ce: 'Ce_ppm2',
  Pr: 'Pr_ppm2',
  Nd: 'Nd_ppm2',
  Sm: 'Sm_ppm2',
  Eu: 'Eu_ppm2',
  Gd: 'Gd_ppm2',
  Tb: 'Tb_ppm2',
  Dy: 'Dy_ppm2',
  Ho: 'Ho_ppm2',
  Er: 'Er_ppm2',
  Tm: 'Tm_ppm2',
  Yb: 'Yb_ppm2',
  Lu: 'Lu_ppm2',
  Sc: 'Sc_ppm2',
  Y: 'Y_ppm2',
};

export const DEFAULT_ELEMENT: ElementSymbol = ELEMENTS[0];

// Non-element columns read from the sample file
export const COLUMNS = {
  latitude: 'latitude',
  longitude: 'longitude',
  sampleType: 'tipo_muestra',
  municipality: 'Municipio',
} as const;

export const REQUIRED_COLUMNS = [COLUMNS.latitude, COLUMNS.longitude, COLUMNS.sampleType];

// Cell values read as missing, same set as the usual CSV readers treat as NA
export const NA_VALUES = new Set([
  '', '#N/A', '#N/A N/A', '#NA', '-1.#IND', '-1.#QNAN', '-NaN', '-nan',
  '1.#IND', '1.#QNAN', '<NA>', 'N/A', 'NA', 'NULL', 'NaN', 'None',
  'n/a', 'nan', 'null',
]);

// YlOrRd, 9 classes (ColorBrewer)
export const YL_OR_RD_9 = [
  '#ffffcc',
  '#ffeda0',
  '#fed976',
  '#feb24c',
  '#fd8d3c',
  '#fc4e2a',
  '#e31a1c',
  '#bd0026',
  '#800026',
];

// Marker colour when every filtered value is identical
export const FALLBACK_COLOR = '#0000ff';

export function isElementSymbol(value: string): value is ElementSymbol {
  return ELEMENTS.some(e => e === value);
}
