/**
 * Hook: create a uPlot instance for a panel, feed it data and report point clicks.
 * Charts stay agnostic of drill-down: the panel turns a click into a DOM CustomEvent
 * ({@link DASHBOARD_EVENT_DRILL_DOWN}) and whoever owns the overlay listens for it.
 */

import { useEffect, useRef, RefObject } from 'react';
import uPlot from 'uplot';
import type { ChartClickEvent } from '../types/dashboard';

/** Event dispatched on window when the user clicks a chart point. Detail: {@link ChartClickEvent}. */
export const DASHBOARD_EVENT_DRILL_DOWN = 'dashboard:drillDown';

/** Clicked point: category column and 0-based series index. */
export interface ChartPointClick {
  dataIndex: number;
  seriesIndex: number;
}

export interface UseUPlotChartProps {
  chartContainerRef: RefObject<HTMLDivElement | null>;
  options: uPlot.Options;
  data: uPlot.AlignedData | null;
  onPointClick?: (click: ChartPointClick) => void;
}

function emptyDataForSeriesCount(seriesCount: number): uPlot.AlignedData {
  const ys = Array.from({ length: Math.max(0, seriesCount - 1) }, (): number[] => []);
  return [[], ...ys];
}

/** Index of the value closest to `target`, skipping gaps. */
export function nearestSeriesIndex(
  values: readonly (number | null | undefined)[],
  target: number
): number | null {
  let best: number | null = null;
  let bestDistance = Infinity;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v == null || !Number.isFinite(v)) continue;
    const d = Math.abs(v - target);
    if (d < bestDistance) {
      best = i;
      bestDistance = d;
    }
  }
  return best;
}

export function isChartClickEvent(d: unknown): d is ChartClickEvent {
  return (
    typeof d === 'object' &&
    d !== null &&
    typeof (d as ChartClickEvent).panelId === 'string' &&
    typeof (d as ChartClickEvent).category === 'string' &&
    typeof (d as ChartClickEvent).seriesName === 'string' &&
    typeof (d as ChartClickEvent).datum === 'object' &&
    (d as ChartClickEvent).datum !== null
  );
}

export function useUPlotChart({
  chartContainerRef,
  options,
  data,
  onPointClick,
}: UseUPlotChartProps): void {
  const uplotRef = useRef<uPlot | null>(null);
  const onPointClickRef = useRef(onPointClick);
  onPointClickRef.current = onPointClick;

  useEffect(() => {
    const container = chartContainerRef.current;
    if (!container) return;

    const opts: uPlot.Options = {
      ...options,
      width: options.width || container.offsetWidth || 400,
      height: options.height || container.offsetHeight || 240,
    };

    const u = new uPlot(opts, emptyDataForSeriesCount(opts.series.length), container);
    uplotRef.current = u;

    const ro = new ResizeObserver(() => {
      if (uplotRef.current && container) {
        const w = container.offsetWidth || opts.width;
        const h = container.offsetHeight || opts.height;
        uplotRef.current.setSize({ width: w, height: h });
      }
    });
    ro.observe(container);

    const onClick = () => {
      const idx = u.cursor.idx;
      const top = u.cursor.top;
      if (idx == null || top == null || top < 0) return;
      const target = u.posToVal(top, 'y');
      const column = u.data.slice(1).map((series) => series[idx]);
      const seriesIndex = nearestSeriesIndex(column, target);
      if (seriesIndex === null) return;
      onPointClickRef.current?.({ dataIndex: idx, seriesIndex });
    };
    u.over.addEventListener('click', onClick);

    return () => {
      ro.disconnect();
      u.over.removeEventListener('click', onClick);
      u.destroy();
      uplotRef.current = null;
    };
  }, [chartContainerRef, options]);

  useEffect(() => {
    if (uplotRef.current && data && data.length >= 2) {
      uplotRef.current.setData(data);
    }
  }, [data, options]);
}
