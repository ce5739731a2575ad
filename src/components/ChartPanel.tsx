/**
 * ChartPanel: one aggregate chart on the dashboard canvas.
 * Rows are reshaped by the binding layer and drawn with uPlot; clicking a point on a
 * drill-down panel dispatches `dashboard:drillDown` on window.
 */

import React, { useCallback, useMemo, useRef } from 'react';
import uPlot from 'uplot';
import 'uplot/dist/uPlot.min.css';

import {
  buildDrillDownDatum,
  expandSeriesRecords,
  toAlignedSeries,
} from '../engine/chartBinding';
import {
  DASHBOARD_EVENT_DRILL_DOWN,
  useUPlotChart,
  type ChartPointClick,
} from '../hooks/useUPlotChart';
import type { ChartClickEvent, ChartPanelBinding, DrillDownDatum, RowTuple } from '../types/dashboard';

const COLORS = ['#10B981', '#8B5CF6', '#F59E0B', '#3B82F6', '#EF4444', '#06B6D4'];

export interface ChartPanelProps {
  binding: ChartPanelBinding;
  rows: readonly RowTuple[];
  /** Drill-down keys shared by every point, e.g. the page's location. */
  scope?: DrillDownDatum;
}

export const ChartPanel: React.FC<ChartPanelProps> = ({ binding, rows, scope }) => {
  const containerRef = useRef<HTMLDivElement>(null);

  const aligned = useMemo(
    () => toAlignedSeries(expandSeriesRecords(rows, binding.series), binding.series),
    [rows, binding.series]
  );

  const plotData = useMemo<uPlot.AlignedData>(
    () => [aligned.categories.map((_, i) => i), ...aligned.values],
    [aligned]
  );

  const uPlotOptions = useMemo<uPlot.Options>(() => {
    const { categories } = aligned;
    const isBar = binding.chart === 'bar';
    const series: uPlot.Series[] = [{}];
    binding.series.forEach((name, idx) => {
      const color = COLORS[idx % COLORS.length];
      series.push({
        label: name,
        stroke: color,
        width: 2,
        fill: isBar ? `${color}88` : undefined,
        paths: isBar ? uPlot.paths.bars?.({ size: [0.6, 48] }) : uPlot.paths.spline?.(),
        spanGaps: true,
      });
    });
    return {
      width: 0,
      height: 0,
      scales: { x: { time: false } },
      cursor: { drag: { x: false, y: false } },
      series,
      axes: [
        {
          stroke: '#cbd5e1',
          grid: { show: false },
          incrs: [1],
          values: (_u, splits) => splits.map((i) => categories[i] ?? ''),
        },
        { stroke: '#cbd5e1', grid: { stroke: '#334155' } },
      ],
    };
  }, [aligned, binding.chart, binding.series]);

  const drillDown = binding.drillDown;
  const onPointClick = useCallback(
    ({ dataIndex, seriesIndex }: ChartPointClick) => {
      if (!drillDown) return;
      const row = rows[dataIndex];
      const seriesName = binding.series[seriesIndex];
      if (!row || seriesName === undefined) return;
      window.dispatchEvent(
        new CustomEvent<ChartClickEvent>(DASHBOARD_EVENT_DRILL_DOWN, {
          detail: {
            panelId: binding.id,
            category: aligned.categories[dataIndex] ?? '',
            seriesName,
            datum: buildDrillDownDatum(row, drillDown, scope),
          },
        })
      );
    },
    [drillDown, rows, scope, binding.id, binding.series, aligned.categories]
  );

  useUPlotChart({
    chartContainerRef: containerRef,
    options: uPlotOptions,
    data: plotData,
    onPointClick,
  });

  return (
    <div className={`relative w-full h-full ${drillDown ? 'cursor-pointer' : ''}`}>
      {rows.length === 0 && (
        <div className="absolute inset-0 flex items-center justify-center z-10 text-slate-400 font-mono">
          [ NO DATA ]
        </div>
      )}
      <div ref={containerRef} className="uplot-container w-full h-full" />
    </div>
  );
};

export const ChartPanelMemo = React.memo(ChartPanel);
