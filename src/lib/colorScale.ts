import type { ColorScale } from './types';
import { FALLBACK_COLOR, YL_OR_RD_9 } from './constants';
import { InvalidRangeError } from './errors';

function parseHex(hex: string): [number, number, number] {
  return [
    parseInt(hex.slice(1, 3), 16),
    parseInt(hex.slice(3, 5), 16),
    parseInt(hex.slice(5, 7), 16),
  ];
}

function toHex(channel: number): string {
  return Math.round(channel).toString(16).padStart(2, '0');
}

/**
 * Linear interpolation between two #rrggbb colours
 */
export function lerpColor(a: string, b: string, t: number): string {
  const [r1, g1, b1] = parseHex(a);
  const [r2, g2, b2] = parseHex(b);
  return `#${toHex(r1 + (r2 - r1) * t)}${toHex(g1 + (g2 - g1) * t)}${toHex(b1 + (b2 - b1) * t)}`;
}

/**
 * Colour for a value on evenly spaced stops across [min, max], clamped at both ends
 */
export function gradientColor(value: number, min: number, max: number, stops: string[]): string {
  const t = Math.max(0, Math.min(1, (value - min) / (max - min)));
  const segCount = stops.length - 1;
  const seg = Math.min(Math.floor(t * segCount), segCount - 1);
  const segT = t * segCount - seg;
  return lerpColor(stops[seg], stops[seg + 1], segT);
}

export function legendCaption(element: string): string {
  return `Concentration of ${element} (ppm)`;
}

/**
 * Build the marker colour scale for the filtered values of one element.
 * Falls back to a single colour when every value is the same.
 */
export function buildColorScale(values: number[], element: string): ColorScale {
  if (values.length === 0) {
    throw new Error('Cannot build a colour scale without values');
  }

  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }

  if (max > min) {
    const stops = [...YL_OR_RD_9];
    return {
      kind: 'gradient',
      min,
      max,
      stops,
      caption: legendCaption(element),
      colorFor: value => gradientColor(value, min, max, stops),
    };
  }

  if (max === min) {
    return {
      kind: 'constant',
      color: FALLBACK_COLOR,
      colorFor: () => FALLBACK_COLOR,
    };
  }

  // NaN bounds end up here
  throw new InvalidRangeError(min, max);
}
