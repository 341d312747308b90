'use client';

import { create } from 'zustand';
import type { SampleTable } from '@/lib/types';
import { DEFAULT_ELEMENT, type ElementSymbol } from '@/lib/constants';
import { distinctSampleTypes, parseSampleCsv } from '@/lib/parser';

interface ViewerStore {
  // Data
  table: SampleTable | null;
  sampleTypes: string[];

  // Selection
  selectedElement: ElementSymbol;
  selectedSampleTypes: string[];

  // Actions
  loadTable: (table: SampleTable) => void;
  loadCSV: (csvText: string, source: string) => void;
  setSelectedElement: (element: ElementSymbol) => void;
  toggleSampleType: (sampleType: string) => void;
  selectAllSampleTypes: () => void;
  deselectAllSampleTypes: () => void;
}

export const useViewerStore = create<ViewerStore>((set, get) => ({
  table: null,
  sampleTypes: [],
  selectedElement: DEFAULT_ELEMENT,
  selectedSampleTypes: [],

  loadTable: (table: SampleTable) => {
    const sampleTypes = distinctSampleTypes(table.records);
    set({
      table,
      sampleTypes,
      selectedElement: DEFAULT_ELEMENT,
      selectedSampleTypes: sampleTypes,
    });
  },

  loadCSV: (csvText: string, source: string) => {
    const { records, droppedRows } = parseSampleCsv(csvText);
    get().loadTable({ source, records, droppedRows });
  },

  setSelectedElement: (element: ElementSymbol) => {
    set({ selectedElement: element });
  },

  toggleSampleType: (sampleType: string) => {
    const { sampleTypes, selectedSampleTypes } = get();
    if (selectedSampleTypes.includes(sampleType)) {
      set({ selectedSampleTypes: selectedSampleTypes.filter(t => t !== sampleType) });
    } else {
      // Keep the selection in the same order as the option list
      set({
        selectedSampleTypes: sampleTypes.filter(
          t => t === sampleType || selectedSampleTypes.includes(t)
        ),
      });
    }
  },

  selectAllSampleTypes: () => {
    set({ selectedSampleTypes: get().sampleTypes });
  },

  deselectAllSampleTypes: () => {
    set({ selectedSampleTypes: [] });
  },
}));
