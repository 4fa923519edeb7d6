import React, { useState } from 'react';
import type { CatalogEntry } from '../types';
import { CATALOG_COLUMNS, DISPLAY_CONFIG } from '../constants';
import { pageCount, paginate } from '../utils/table';
import Pagination from './Pagination';

interface CatalogTableProps {
  catalog: CatalogEntry[];
  selected: ReadonlySet<number>; // catalog row indices
  onToggle: (indices: number[], checked: boolean) => void;
}

const CatalogTable: React.FC<CatalogTableProps> = ({ catalog, selected, onToggle }) => {
  const [page, setPage] = useState(0);
  const pages = pageCount(catalog.length, DISPLAY_CONFIG.pageSize);
  const indices = paginate(catalog.map((_, i) => i), page, DISPLAY_CONFIG.pageSize);
  const allOnPage = indices.length > 0 && indices.every(i => selected.has(i));

  return (
    <div className="bg-white rounded-xl shadow-sm border border-slate-200 overflow-hidden">
      <div className="overflow-auto">
        <table className="w-full text-sm text-left">
          <thead className="text-xs text-slate-500 uppercase bg-slate-50">
            <tr>
              <th className="px-4 py-3 w-10">
                <input
                  type="checkbox"
                  aria-label="Select page"
                  checked={allOnPage}
                  onChange={(e) => onToggle(indices, e.target.checked)}
                />
              </th>
              {CATALOG_COLUMNS.map(col => <th key={col} className="px-6 py-3">{col}</th>)}
            </tr>
          </thead>
          <tbody>
            {indices.map(i => {
              const entry = catalog[i];
              const isSelected = selected.has(i);
              return (
                <tr
                  key={`${entry.data_id}-${i}`}
                  className={`border-b transition-colors ${isSelected ? 'bg-indigo-50' : 'bg-white hover:bg-slate-50'}`}
                >
                  <td className="px-4 py-3">
                    <input
                      type="checkbox"
                      aria-label={`Select ${entry.data_id}`}
                      checked={isSelected}
                      onChange={(e) => onToggle([i], e.target.checked)}
                    />
                  </td>
                  {CATALOG_COLUMNS.map(col => (
                    <td key={col} className="px-6 py-3 text-slate-700">{entry[col]}</td>
                  ))}
                </tr>
              );
            })}
          </tbody>
        </table>
      </div>
      <Pagination page={page} pages={pages} total={catalog.length} onChange={setPage} />
    </div>
  );
};

export default CatalogTable;
