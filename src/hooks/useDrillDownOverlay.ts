import { useEffect, useSyncExternalStore } from 'react';
import type { DrillDownOverlayState, DrillDownResolver } from '../engine/drillDownResolver';

/** Overlay state of a resolver; Escape closes the top-most overlay. */
export function useDrillDownOverlay(resolver: DrillDownResolver): DrillDownOverlayState {
  const state = useSyncExternalStore(resolver.subscribe, resolver.getSnapshot);
  const open = state.list !== null;

  useEffect(() => {
    if (!open) return;
    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key !== 'Escape') return;
      if (resolver.getSnapshot().detail) resolver.closeDetail();
      else resolver.close();
    };
    document.addEventListener('keydown', onKeyDown);
    return () => document.removeEventListener('keydown', onKeyDown);
  }, [resolver, open]);

  return state;
}
