'use client';

import { useEffect } from 'react';
import { MapContainer, TileLayer, CircleMarker, Popup, LayersControl, FeatureGroup, useMap } from 'react-leaflet';
import 'leaflet/dist/leaflet.css';
import type { ElementSymbol } from '@/lib/constants';
import type { FilteredSample, GradientScale, ColorScale, LatLng } from '@/lib/types';
import { formatConcentration } from '@/lib/geo';
import { BASE_LAYER, GEOLOGY_LAYER, MAP_DEFAULTS } from '@/lib/mapConfig';
import { resetView, samplesLayerName } from '@/lib/mapView';

interface SampleMapProps {
  element: ElementSymbol;
  rows: FilteredSample[];
  scale: ColorScale;
  center: LatLng;
}

// MapContainer only reads `center` on mount
function Recenter({ center }: { center: LatLng }) {
  const map = useMap();

  useEffect(() => {
    resetView(map, center);
  }, [map, center]);

  return null;
}

function ConcentrationLegend({ scale }: { scale: GradientScale }) {
  return (
    <div className="absolute bottom-4 left-4 z-[1000] bg-white/95 rounded-lg shadow-md border border-gray-200 px-3 py-2">
      <p className="text-xs font-semibold text-gray-800 mb-1">{scale.caption}</p>
      <div className="flex items-center gap-1.5">
        <span className="text-[10px] text-gray-500 w-12 text-right">{formatConcentration(scale.min)}</span>
        <div
          className="h-2.5 rounded-full flex-1"
          style={{
            minWidth: 140,
            background: `linear-gradient(to right, ${scale.stops.join(', ')})`,
          }}
        />
        <span className="text-[10px] text-gray-500 w-12">{formatConcentration(scale.max)}</span>
      </div>
    </div>
  );
}

export default function SampleMap({ element, rows, scale, center }: SampleMapProps) {
  const samplesName = samplesLayerName(element, rows.length);

  return (
    <div
      className="relative rounded-lg overflow-hidden border border-gray-200"
      style={{ height: `${MAP_DEFAULTS.height}px` }}
    >
      <MapContainer center={center} zoom={MAP_DEFAULTS.zoom} className="h-full w-full" scrollWheelZoom={true}>
        <LayersControl position="topright">
          <LayersControl.BaseLayer checked name={BASE_LAYER.name}>
            <TileLayer attribution={BASE_LAYER.attribution} url={BASE_LAYER.url} />
          </LayersControl.BaseLayer>

          <LayersControl.Overlay checked name={GEOLOGY_LAYER.name}>
            <TileLayer
              attribution={GEOLOGY_LAYER.attribution}
              url={GEOLOGY_LAYER.url}
              opacity={GEOLOGY_LAYER.opacity}
            />
          </LayersControl.Overlay>

          <LayersControl.Overlay key={samplesName} checked name={samplesName}>
            <FeatureGroup>
              {rows.map((row, i) => {
                const color = scale.colorFor(row.value);
                return (
                  <CircleMarker
                    key={i}
                    center={[row.latitude, row.longitude]}
                    radius={MAP_DEFAULTS.markerRadius}
                    pathOptions={{ color, fillColor: color, fillOpacity: MAP_DEFAULTS.markerFillOpacity }}
                  >
                    <Popup maxWidth={MAP_DEFAULTS.popupMaxWidth}>
                      <div className="text-sm">
                        <p>
                          <b>Municipality:</b> {row.municipality ?? 'Unknown'}
                        </p>
                        <p>
                          <b>Sample type:</b> {row.sampleType}
                        </p>
                        <p>
                          <b>{element} (ppm):</b>{' '}
                          <span className="font-mono">{formatConcentration(row.value)}</span>
                        </p>
                      </div>
                    </Popup>
                  </CircleMarker>
                );
              })}
            </FeatureGroup>
          </LayersControl.Overlay>
        </LayersControl>

        <Recenter center={center} />
      </MapContainer>

      {scale.kind === 'gradient' && <ConcentrationLegend scale={scale} />}
    </div>
  );
}
