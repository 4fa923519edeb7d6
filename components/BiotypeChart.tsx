import React from 'react';
import {
  BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, LabelList
} from 'recharts';
import type { BiotypeShare } from '../types';
import { CHART_CONFIG, DISPLAY_CONFIG } from '../constants';
import { totalCount } from '../utils/stats';

interface BiotypeChartProps {
  data: BiotypeShare[];
}

export const chartTitle = (data: BiotypeShare[]) => `Gene Types (n = ${totalCount(data)})`;

// Large bars speak for themselves; only the small ones get a value label
export const smallBarLabel = (value: unknown) =>
  typeof value === 'number' && value < DISPLAY_CONFIG.smallBarPct ? value : '';

const BiotypeChart: React.FC<BiotypeChartProps> = ({ data }) => {
  if (data.length === 0) return null;

  return (
    <div>
      <h4 className="text-sm font-semibold text-slate-700 mb-2 text-center">{chartTitle(data)}</h4>
      <ResponsiveContainer width="100%" height={CHART_CONFIG.height}>
        <BarChart data={data} margin={{ top: 20, right: 10, bottom: 40, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} />
          <XAxis
            dataKey="label"
            interval={0}
            angle={-45}
            textAnchor="end"
            tick={{ fontSize: 10, fill: '#000' }}
          />
          <YAxis
            tick={{ fontSize: 10, fill: '#000' }}
            label={{ value: 'Percentage (%)', angle: -90, position: 'insideLeft', fontSize: 11 }}
          />
          <Tooltip formatter={(value) => [`${value}%`, 'Share']} />
          <Bar dataKey="pct" fill={CHART_CONFIG.barColor} name="Percentage">
            <LabelList dataKey="pct" position="top" fontSize={10} formatter={smallBarLabel} />
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
};

export default BiotypeChart;
