import type { LatLng } from './types';
import { MAP_DEFAULTS } from './mapConfig';

interface ViewTarget {
  setView: (center: LatLng, zoom: number) => unknown;
}

/**
 * Label of the sample overlay in the layer control.
 * Also used as the overlay's key: the control only reads the name when a layer is added.
 */
export function samplesLayerName(element: string, count: number): string {
  return `${element} samples (${count})`;
}

/**
 * Back to the default zoom, centred on the current samples
 */
export function resetView(map: ViewTarget, center: LatLng): void {
  map.setView(center, MAP_DEFAULTS.zoom);
}
