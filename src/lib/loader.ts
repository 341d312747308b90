import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { SampleTable } from './types';
import { parseSampleCsv } from './parser';
import { LoadError } from './errors';

// The sample file is static for the lifetime of the process, so entries are never invalidated
const tableCache = new Map<string, Promise<SampleTable>>();

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readSampleTable(filePath: string): Promise<SampleTable> {
  let csvText: string;
  try {
    csvText = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) {
      throw new LoadError(
        'NotFound',
        `The file '${filePath}' was not found. Make sure it sits in the application's data folder.`
      );
    }
    throw err;
  }

  const { records, droppedRows } = parseSampleCsv(csvText);

  console.info(
    `Loaded ${records.length} samples from ${path.basename(filePath)} (${droppedRows} rows dropped)`
  );
  if (records.length === 0) {
    console.warn(`No usable samples in ${filePath}: every row lacks coordinates or a sample type`);
  }

  return { source: path.basename(filePath), records, droppedRows };
}

/**
 * Load and clean the sample file, memoised by absolute path.
 * A failed load is not cached.
 */
export function loadSampleTable(filePath: string): Promise<SampleTable> {
  const key = path.resolve(filePath);

  const cached = tableCache.get(key);
  if (cached) return cached;

  const pending = readSampleTable(key);
  tableCache.set(key, pending);
  pending.catch(() => tableCache.delete(key));

  return pending;
}

export function clearSampleTableCache(): void {
  tableCache.clear();
}
