import { useEffect, RefObject } from 'react';
import { getViewportScaleAdapter } from '../engine/viewportScale';

/** Bind the page-wide scale adapter to the design canvas element for the component's lifetime. */
export function useViewportScale(targetRef: RefObject<HTMLElement | null>): void {
  useEffect(() => {
    const adapter = getViewportScaleAdapter();
    adapter.setTarget(() => targetRef.current);
    return adapter.bind();
  }, [targetRef]);
}
