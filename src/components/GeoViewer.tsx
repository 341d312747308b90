'use client';

import { useEffect, useMemo } from 'react';
import dynamic from 'next/dynamic';
import { AlertCircle, AlertTriangle, Loader2 } from 'lucide-react';
import { useViewerStore } from '@/store/useViewerStore';
import { buildMapView } from '@/lib/pipeline';
import type { SampleTable } from '@/lib/types';
import { MAP_DEFAULTS } from '@/lib/mapConfig';
import { Sidebar } from './Sidebar';
import { DataUploader } from './DataUploader';

// Leaflet touches `window` on import
const SampleMap = dynamic(() => import('./SampleMap'), {
  ssr: false,
  loading: () => (
    <div
      className="flex items-center justify-center rounded-lg border border-gray-200 bg-gray-50"
      style={{ height: `${MAP_DEFAULTS.height}px` }}
    >
      <div className="flex items-center gap-2 text-gray-500 text-sm">
        <Loader2 className="w-4 h-4 animate-spin" />
        Loading map...
      </div>
    </div>
  ),
});

export type InitialData = { table: SampleTable } | { error: string };

function Warning({ children }: { children: React.ReactNode }) {
  return (
    <div className="p-4 bg-yellow-50 border border-yellow-200 rounded-lg flex items-center gap-3">
      <AlertTriangle className="w-5 h-5 text-yellow-600 flex-shrink-0" />
      <p className="text-yellow-800">{children}</p>
    </div>
  );
}

function MapPanel() {
  const { table, selectedElement, selectedSampleTypes } = useViewerStore();

  const view = useMemo(
    () => (table ? buildMapView(table.records, selectedElement, selectedSampleTypes) : null),
    [table, selectedElement, selectedSampleTypes]
  );

  if (!view) return null;

  switch (view.status) {
    case 'empty-table':
      return <Warning>The sample file has no rows with valid coordinates and sample type.</Warning>;
    case 'no-sample-types':
      return <Warning>Please select at least one sample type.</Warning>;
    case 'no-data':
      return (
        <Warning>
          No valid data for element &apos;{view.element}&apos; with the selected filters.
        </Warning>
      );
    case 'ready':
      return <SampleMap element={view.element} rows={view.rows} scale={view.scale} center={view.center} />;
  }
}

export function GeoViewer({ initial }: { initial: InitialData }) {
  const { table, sampleTypes, loadTable } = useViewerStore();

  useEffect(() => {
    if ('table' in initial) {
      loadTable(initial.table);
    }
  }, [initial, loadTable]);

  if (!table) {
    return (
      <main className="flex-1 flex flex-col items-center justify-center gap-6 p-8">
        {'error' in initial ? (
          <>
            <div className="w-full max-w-2xl p-4 bg-red-50 border border-red-200 rounded-lg flex items-center gap-3">
              <AlertCircle className="w-5 h-5 text-red-500 flex-shrink-0" />
              <p className="text-red-700">{initial.error}</p>
            </div>
            <DataUploader />
          </>
        ) : (
          <div className="flex items-center gap-2 text-gray-500 text-sm">
            <Loader2 className="w-4 h-4 animate-spin" />
            Loading samples...
          </div>
        )}
      </main>
    );
  }

  return (
    <>
      <div className="bg-white border-b border-gray-200 px-6 py-2 flex items-center justify-between">
        <p className="text-sm text-gray-600">
          {table.source} - {table.records.length} samples, {sampleTypes.length} sample types
        </p>
        <DataUploader compact />
      </div>

      <div className="flex-1 flex overflow-hidden">
        <Sidebar />

        <main className="flex-1 overflow-auto p-6 bg-white">
          <MapPanel />
        </main>
      </div>
    </>
  );
}
