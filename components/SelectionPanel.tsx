import React from 'react';
import { Search } from 'lucide-react';
import type { CatalogEntry, Selection, SelectionField } from '../types';
import { SELECTION_FIELDS, optionsFor } from '../utils/catalog';

interface SelectionPanelProps {
  catalog: CatalogEntry[];
  selection: Selection;
  onChange: (field: SelectionField, value: string) => void;
  onSubmit: () => void;
  isLoading: boolean;
}

const LABELS: Record<SelectionField, string> = {
  species: 'Select Species:',
  tissue: 'Select Tissue:',
  cell_line: 'Select Cell Line:',
  condition: 'Select Condition:',
};

const SelectionPanel: React.FC<SelectionPanelProps> = ({ catalog, selection, onChange, onSubmit, isLoading }) => (
  <div className="bg-white p-5 rounded-xl shadow-sm border border-slate-200 space-y-4">
    {SELECTION_FIELDS.map(field => (
      <label key={field} className="block">
        <span className="text-xs font-semibold text-slate-500 uppercase">{LABELS[field]}</span>
        <select
          name={field}
          value={selection[field]}
          onChange={(e) => onChange(field, e.target.value)}
          className="mt-1 w-full text-sm border border-slate-300 rounded-md px-3 py-2 bg-white focus:outline-none focus:ring-2 focus:ring-indigo-500"
        >
          {optionsFor(catalog, selection, field).map(option => (
            <option key={option} value={option}>{option}</option>
          ))}
        </select>
      </label>
    ))}
    <button
      onClick={onSubmit}
      disabled={isLoading}
      className="w-full px-4 py-2 bg-indigo-600 text-white rounded-lg hover:bg-indigo-700 font-medium flex items-center justify-center gap-2 disabled:opacity-50"
    >
      {isLoading ? <span className="animate-spin">⌛</span> : <Search size={18} />}
      Submit
    </button>
  </div>
);

export default SelectionPanel;
