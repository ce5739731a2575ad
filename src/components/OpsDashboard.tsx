/**
 * OpsDashboard: the full-screen operations canvas.
 * Loads the aggregate payload once, places every panel of PANEL_BINDINGS on a fixed grid
 * and hosts the drill-down overlay that chart clicks feed.
 */

import React, { useEffect, useMemo, useState } from 'react';
import { useQuery } from '@tanstack/react-query';
import { Loader2 } from 'lucide-react';

import { getDashboardConfig } from '../config';
import { PANEL_BINDINGS, readPanelRows } from '../engine/chartBinding';
import { DrillDownResolver } from '../engine/drillDownResolver';
import { PanelCarouselEngine } from '../engine/panelCarousel';
import { DASHBOARD_EVENT_DRILL_DOWN, isChartClickEvent } from '../hooks/useUPlotChart';
import { moduleLogger } from '../lib/logger';
import { fetchAggregatePayload, fetchDrillDownRecords } from '../services/dashboardApi';
import type { AggregatePayload, DrillDownDatum, PanelBinding, RowTuple } from '../types/dashboard';
import { ChartPanelMemo } from './ChartPanel';
import { DashboardHeader } from './DashboardHeader';
import { DrillDownOverlay } from './DrillDownOverlay';
import { ScaleBox } from './ScaleBox';
import { ScrollListPanel } from './ScrollListPanel';

const log = moduleLogger('dashboard');

export interface OpsDashboardProps {
  title?: string;
  /** Data source for the panels; defaults to GET /api/bi_data. */
  loadPayload?: (signal: AbortSignal) => Promise<AggregatePayload>;
  resolver?: DrillDownResolver;
  panels?: readonly PanelBinding[];
  /** Location the page is opened for; fills the drill-down location of charts whose rows lack one. */
  location?: string;
}

const PanelBody: React.FC<{
  binding: PanelBinding;
  rows: RowTuple[];
  engine: PanelCarouselEngine<RowTuple>;
  scope: DrillDownDatum;
}> = ({ binding, rows, engine, scope }) => {
  if (binding.kind === 'list') {
    return (
      <ScrollListPanel
        binding={binding}
        rows={rows}
        engine={engine}
        options={getDashboardConfig().carousel}
      />
    );
  }
  return <ChartPanelMemo binding={binding} rows={rows} scope={scope} />;
};

export const OpsDashboard: React.FC<OpsDashboardProps> = ({
  title = '运维指标大屏',
  loadPayload = fetchAggregatePayload,
  resolver: resolverProp,
  panels = PANEL_BINDINGS,
  location,
}) => {
  const [engine] = useState(() => new PanelCarouselEngine<RowTuple>());
  const [resolver] = useState(() => resolverProp ?? new DrillDownResolver(fetchDrillDownRecords));
  const scope = useMemo<DrillDownDatum>(() => (location ? { location } : {}), [location]);

  const { data: payload, error, isLoading } = useQuery({
    queryKey: ['dashboard', 'aggregate'],
    queryFn: ({ signal }) => loadPayload(signal),
    staleTime: Infinity,
    refetchOnWindowFocus: false,
    retry: false,
  });

  useEffect(() => () => engine.stopAll(), [engine]);

  useEffect(() => {
    const handleDrillDown = (e: Event) => {
      const d = (e as CustomEvent).detail;
      if (!isChartClickEvent(d)) return;
      void resolver.resolve(d);
    };
    window.addEventListener(DASHBOARD_EVENT_DRILL_DOWN, handleDrillDown);
    return () => window.removeEventListener(DASHBOARD_EVENT_DRILL_DOWN, handleDrillDown);
  }, [resolver]);

  useEffect(() => {
    if (!payload) return;
    for (const binding of panels) {
      if (!readPanelRows(payload, binding.dataKey)) {
        log.warn({ panel: binding.id, dataKey: binding.dataKey }, 'panel data missing, panel not initialised');
      }
    }
  }, [payload, panels]);

  return (
    <ScaleBox>
      <div className="w-full h-full bg-slate-950 flex flex-col overflow-hidden">
        <DashboardHeader title={title} />
        {error && (
          <div className="px-8 py-2 text-red-400 text-sm" role="alert">
            数据加载失败：{error instanceof Error ? error.message : String(error)}
          </div>
        )}
        <main
          className="flex-1 min-h-0 grid gap-4 p-4"
          style={{ gridTemplateColumns: 'repeat(12, minmax(0, 1fr))', gridTemplateRows: 'repeat(3, minmax(0, 1fr))' }}
        >
          {panels.map((binding) => {
            const rows = payload ? readPanelRows(payload, binding.dataKey) : null;
            return (
              <section
                key={binding.id}
                id={binding.id}
                aria-label={binding.title}
                className="flex flex-col bg-slate-900 border border-slate-800 rounded-lg overflow-hidden"
                style={{ gridColumn: binding.area.column, gridRow: binding.area.row }}
              >
                <div className="h-8 shrink-0 flex items-center px-3 bg-slate-800 text-xs text-slate-300 font-mono">
                  {binding.title}
                </div>
                <div className="panelContent flex-1 relative min-h-0">
                  {isLoading && (
                    <div className="absolute inset-0 flex items-center justify-center text-emerald-500">
                      <Loader2 size={20} className="animate-spin" />
                    </div>
                  )}
                  {rows && <PanelBody binding={binding} rows={rows} engine={engine} scope={scope} />}
                </div>
              </section>
            );
          })}
        </main>
      </div>
      <DrillDownOverlay resolver={resolver} />
    </ScaleBox>
  );
};
