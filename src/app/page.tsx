import { GeoViewer, type InitialData } from '@/components/GeoViewer';
import { loadSampleTable } from '@/lib/loader';
import { LoadError } from '@/lib/errors';
import { DATA_FILE } from '@/lib/config';

// Read the sample file per request instead of at build time
export const dynamic = 'force-dynamic';

async function loadInitialData(): Promise<InitialData> {
  try {
    return { table: await loadSampleTable(DATA_FILE) };
  } catch (err) {
    if (err instanceof LoadError) {
      console.error(`Sample file not loaded (${err.kind}): ${err.message}`);
      return { error: `Error: ${err.message}` };
    }
    throw err;
  }
}

export default async function Home() {
  const initial = await loadInitialData();

  return (
    <div className="min-h-screen bg-gray-100 flex flex-col">
      <header className="bg-white border-b border-gray-200 px-6 py-4">
        <h1 className="text-xl font-bold text-gray-900">Geological Element Concentration Viewer</h1>
        <p className="text-sm text-gray-600">
          Use the filters on the left to pick an element and the sample types to display.
        </p>
      </header>

      <GeoViewer initial={initial} />
    </div>
  );
}
