import React from 'react';
import { Database, Globe, Gauge } from 'lucide-react';
import type { CatalogSummary } from '../types';

interface CatalogStatsProps {
  summary: CatalogSummary;
}

const CatalogStats: React.FC<CatalogStatsProps> = ({ summary }) => {
  const boxes = [
    { label: 'Datasets', value: summary.datasets, Icon: Database, color: '#10b981' },
    { label: 'Species', value: summary.species, Icon: Globe, color: '#f59e0b' },
    { label: 'Tissue Types/Cell Lines', value: summary.tissueAndCellLineTypes, Icon: Gauge, color: '#ef4444' },
  ];

  return (
    <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
      {boxes.map(({ label, value, Icon, color }) => (
        <div key={label} className="bg-white p-4 rounded-xl shadow-sm border border-slate-200 flex items-center relative overflow-hidden">
          <div className="absolute top-0 left-0 w-1 h-full" style={{ backgroundColor: color }}></div>
          <div className="flex-1">
            <span className="text-2xl font-bold text-slate-800">{value}</span>
            <h4 className="text-sm font-semibold text-slate-600 uppercase tracking-wide">{label}</h4>
          </div>
          <Icon size={36} style={{ color }} />
        </div>
      ))}
    </div>
  );
};

export default CatalogStats;
