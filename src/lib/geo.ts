import type { LatLng } from './types';

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Map centre as the arithmetic mean of the points' coordinates
 */
export function computeCenter(points: { latitude: number; longitude: number }[]): LatLng {
  if (points.length === 0) {
    throw new Error('Cannot compute a map centre without points');
  }
  return [mean(points.map(p => p.latitude)), mean(points.map(p => p.longitude))];
}

/**
 * Two decimals, with exact ties rounded half to even (0.125 -> "0.12")
 */
export function formatConcentration(value: number): string {
  // With two decimals, the only exact binary ties are odd multiples of 1/8
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(value * 100);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return (even / 100).toFixed(2);
  }
  return value.toFixed(2);
}
