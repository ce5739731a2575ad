import { useCallback, useEffect, useMemo, useRef, type RefObject } from 'react';
import {
  buildLoopRows,
  createElementSurface,
  type CarouselOptions,
  type PanelCarouselEngine,
} from '../engine/panelCarousel';

export interface UsePanelCarouselResult<Row> {
  listRef: RefObject<HTMLUListElement>;
  loopRows: Row[];
  pause: () => void;
  resume: () => void;
}

/**
 * Render-side half of a scrolling list: the rows to render and the ref the engine measures.
 * The carousel starts after the duplicated rows are in the DOM and restarts when the rows change.
 */
export function usePanelCarousel<Row>(
  engine: PanelCarouselEngine<Row>,
  panelId: string,
  rows: readonly Row[],
  options: CarouselOptions
): UsePanelCarouselResult<Row> {
  const listRef = useRef<HTMLUListElement>(null);
  const loopRows = useMemo(() => buildLoopRows(rows), [rows]);
  const { distance, intervalSeconds, durationSeconds } = options;

  useEffect(() => {
    const list = listRef.current;
    if (!list) return;
    engine.start(panelId, rows, createElementSurface(list), {
      distance,
      intervalSeconds,
      durationSeconds,
    });
    return () => engine.stop(panelId);
  }, [engine, panelId, rows, distance, intervalSeconds, durationSeconds]);

  const pause = useCallback(() => engine.stop(panelId), [engine, panelId]);
  const resume = useCallback(() => {
    engine.resume(panelId);
  }, [engine, panelId]);

  return { listRef, loopRows, pause, resume };
}
