'use client';

import { useState } from 'react';
import { ChevronDown, ChevronRight, Info } from 'lucide-react';
import { useViewerStore } from '@/store/useViewerStore';
import { ELEMENTS, isElementSymbol } from '@/lib/constants';

export function Sidebar() {
  const {
    table,
    sampleTypes,
    selectedElement,
    selectedSampleTypes,
    setSelectedElement,
    toggleSampleType,
    selectAllSampleTypes,
    deselectAllSampleTypes,
  } = useViewerStore();

  const [typesExpanded, setTypesExpanded] = useState(true);

  if (!table) return null;

  return (
    <div className="w-64 border-r border-gray-200 bg-gray-50 p-4 overflow-y-auto">
      <h3 className="font-semibold text-gray-700 mb-3">Display Filters</h3>

      {/* Element */}
      <div className="mb-6">
        <label className="block text-sm text-gray-600 mb-1">Element</label>
        <select
          value={selectedElement}
          onChange={e => {
            if (isElementSymbol(e.target.value)) setSelectedElement(e.target.value);
          }}
          className="w-full px-2 py-1 border border-gray-300 rounded text-sm"
        >
          {ELEMENTS.map(element => (
            <option key={element} value={element}>
              {element}
            </option>
          ))}
        </select>
      </div>

      {/* Sample types */}
      <div className="mb-6">
        <button
          onClick={() => setTypesExpanded(!typesExpanded)}
          className="flex items-center gap-1 font-semibold text-gray-700 mb-2 hover:text-gray-900"
        >
          {typesExpanded ? (
            <ChevronDown className="w-4 h-4" />
          ) : (
            <ChevronRight className="w-4 h-4" />
          )}
          Sample types ({selectedSampleTypes.length}/{sampleTypes.length})
        </button>

        {typesExpanded && (
          <div className="space-y-2">
            <div className="flex gap-2 text-xs">
              <button
                onClick={selectAllSampleTypes}
                className="text-blue-600 hover:underline"
              >
                All
              </button>
              <button
                onClick={deselectAllSampleTypes}
                className="text-blue-600 hover:underline"
              >
                None
              </button>
            </div>

            <div className="space-y-1 max-h-64 overflow-y-auto">
              {sampleTypes.map(sampleType => (
                <label
                  key={sampleType}
                  className="flex items-center gap-2 cursor-pointer text-sm p-1 rounded hover:bg-gray-100"
                >
                  <input
                    type="checkbox"
                    checked={selectedSampleTypes.includes(sampleType)}
                    onChange={() => toggleSampleType(sampleType)}
                    className="rounded"
                  />
                  <span className="truncate" title={sampleType}>
                    {sampleType}
                  </span>
                </label>
              ))}
            </div>
          </div>
        )}
      </div>

      <div className="p-3 bg-blue-50 border border-blue-200 rounded-lg flex gap-2 text-xs text-blue-800">
        <Info className="w-4 h-4 flex-shrink-0" />
        <span>The colour scale follows the minimum and maximum of the selected element on the map.</span>
      </div>
    </div>
  );
}
