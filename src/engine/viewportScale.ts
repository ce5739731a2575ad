/**
 * Fit-to-window scaling for the fixed-size design canvas.
 *
 * The canvas is laid out at its design resolution (1920x1080) and scaled uniformly by
 * the smaller of the two axis ratios, so nothing is clipped and the larger axis
 * letterboxes. The scale is written to the `--scale` CSS custom property of the target
 * element, which its `transform` consumes.
 */

import { DEFAULT_RESIZE_DEBOUNCE_MS, DESIGN_HEIGHT, DESIGN_WIDTH, getDashboardConfig } from '../config';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('scale');

export interface Size {
  width: number;
  height: number;
}

export const DEFAULT_DESIGN: Size = { width: DESIGN_WIDTH, height: DESIGN_HEIGHT };

export const SCALE_PROPERTY = '--scale';

export function computeScale(viewport: Size, design: Size = DEFAULT_DESIGN): number {
  return Math.min(viewport.width / design.width, viewport.height / design.height);
}

export interface Debounced<A extends unknown[]> {
  (...args: A): void;
  cancel(): void;
}

/** Trailing-edge debounce: a burst of calls collapses into one, fired `ms` after the last. */
export function debounce<A extends unknown[]>(
  fn: (...args: A) => void,
  ms: number = DEFAULT_RESIZE_DEBOUNCE_MS
): Debounced<A> {
  let timer: ReturnType<typeof setTimeout> | null = null;
  const debounced = (...args: A) => {
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      fn(...args);
    }, ms);
  };
  debounced.cancel = () => {
    if (timer) clearTimeout(timer);
    timer = null;
  };
  return debounced;
}

export interface ViewportScaleOptions {
  /** Resolved on every apply; the page may not contain a canvas at all. */
  target: () => HTMLElement | null;
  design?: Size;
  debounceMs?: number;
  /** Window to measure and listen on. */
  view?: Window;
}

export interface ScaleState {
  designWidth: number;
  designHeight: number;
  currentScale: number | null;
}

export class ViewportScaleAdapter {
  private readonly design: Size;
  private readonly debounceMs: number;
  private readonly view: Window;
  private target: () => HTMLElement | null;
  private currentScale: number | null = null;

  constructor(options: ViewportScaleOptions) {
    this.target = options.target;
    this.design = options.design ?? DEFAULT_DESIGN;
    this.debounceMs = options.debounceMs ?? DEFAULT_RESIZE_DEBOUNCE_MS;
    this.view = options.view ?? window;
  }

  get state(): ScaleState {
    return {
      designWidth: this.design.width,
      designHeight: this.design.height,
      currentScale: this.currentScale,
    };
  }

  setTarget(target: () => HTMLElement | null): void {
    this.target = target;
  }

  computeScale(): number {
    return computeScale(
      { width: this.view.innerWidth, height: this.view.innerHeight },
      this.design
    );
  }

  /** Write the current scale onto the target. Returns null when there is no target. */
  applyScale(): number | null {
    const el = this.target();
    if (!el) return null;
    const scale = this.computeScale();
    el.style.setProperty(SCALE_PROPERTY, String(scale));
    this.currentScale = scale;
    log.debug({ scale }, 'applied viewport scale');
    return scale;
  }

  /**
   * Apply now, then again after every quiet `resize`/`load` burst.
   * Returns a function that removes the listeners and drops a pending apply.
   */
  bind(): () => void {
    const onChange = debounce(() => {
      this.applyScale();
    }, this.debounceMs);
    this.view.addEventListener('resize', onChange);
    this.view.addEventListener('load', onChange);
    this.applyScale();
    return () => {
      onChange.cancel();
      this.view.removeEventListener('resize', onChange);
      this.view.removeEventListener('load', onChange);
    };
  }
}

let shared: ViewportScaleAdapter | null = null;

/** Page-wide adapter, created on first use from the dashboard config. */
export function getViewportScaleAdapter(): ViewportScaleAdapter {
  if (!shared) {
    const config = getDashboardConfig();
    shared = new ViewportScaleAdapter({
      target: () => null,
      design: config.design,
      debounceMs: config.resizeDebounceMs,
    });
  }
  return shared;
}
