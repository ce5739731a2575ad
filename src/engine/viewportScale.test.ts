import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { computeScale, debounce, SCALE_PROPERTY, ViewportScaleAdapter } from './viewportScale';

const DESIGN = { width: 1920, height: 1080 };

function setViewport(width: number, height: number): void {
  Object.defineProperty(window, 'innerWidth', { configurable: true, value: width });
  Object.defineProperty(window, 'innerHeight', { configurable: true, value: height });
}

describe('computeScale', () => {
  it.each([
    [1920, 1080, 1],
    [960, 540, 0.5],
    [3840, 1080, 1],
    [1920, 2160, 1],
    [1280, 1024, 1280 / 1920],
    [800, 300, 300 / 1080],
  ])('%i x %i -> %f', (w, h, expected) => {
    expect(computeScale({ width: w, height: h }, DESIGN)).toBeCloseTo(expected, 10);
  });

  it('never renders the design larger than the viewport', () => {
    for (let w = 100; w <= 4000; w += 370) {
      for (let h = 100; h <= 3000; h += 290) {
        const scale = computeScale({ width: w, height: h }, DESIGN);
        expect(scale).toBeGreaterThan(0);
        expect(scale).toBe(Math.min(w / DESIGN.width, h / DESIGN.height));
        expect(DESIGN.width * scale).toBeLessThanOrEqual(w + 1e-9);
        expect(DESIGN.height * scale).toBeLessThanOrEqual(h + 1e-9);
      }
    }
  });
});

describe('debounce', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });
  afterEach(() => {
    vi.useRealTimers();
  });

  it('collapses a burst into one trailing call', () => {
    const fn = vi.fn();
    const d = debounce(fn, 200);
    d();
    vi.advanceTimersByTime(150);
    d();
    vi.advanceTimersByTime(150);
    d();
    expect(fn).not.toHaveBeenCalled();
    vi.advanceTimersByTime(199);
    expect(fn).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('cancel drops the pending call', () => {
    const fn = vi.fn();
    const d = debounce(fn, 200);
    d();
    d.cancel();
    vi.advanceTimersByTime(500);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('ViewportScaleAdapter', () => {
  let el: HTMLDivElement;

  beforeEach(() => {
    vi.useFakeTimers();
    el = document.createElement('div');
    setViewport(960, 540);
  });
  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes the scale onto the target', () => {
    const adapter = new ViewportScaleAdapter({ target: () => el, design: DESIGN });
    expect(adapter.applyScale()).toBe(0.5);
    expect(el.style.getPropertyValue(SCALE_PROPERTY)).toBe('0.5');
    expect(adapter.state).toEqual({ designWidth: 1920, designHeight: 1080, currentScale: 0.5 });
  });

  it('is a no-op without a target', () => {
    const adapter = new ViewportScaleAdapter({ target: () => null, design: DESIGN });
    expect(adapter.applyScale()).toBeNull();
    expect(adapter.state.currentScale).toBeNull();
  });

  it('applies once on bind and once per resize burst', () => {
    const adapter = new ViewportScaleAdapter({ target: () => el, design: DESIGN, debounceMs: 200 });
    const apply = vi.spyOn(adapter, 'applyScale');
    const unbind = adapter.bind();
    expect(apply).toHaveBeenCalledTimes(1);

    setViewport(1920, 1080);
    for (let i = 0; i < 5; i++) {
      window.dispatchEvent(new Event('resize'));
      vi.advanceTimersByTime(50);
    }
    expect(apply).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(150);
    expect(apply).toHaveBeenCalledTimes(2);
    expect(el.style.getPropertyValue(SCALE_PROPERTY)).toBe('1');

    unbind();
    window.dispatchEvent(new Event('resize'));
    vi.advanceTimersByTime(500);
    expect(apply).toHaveBeenCalledTimes(2);
  });

  it('handles load the same way as resize', () => {
    const adapter = new ViewportScaleAdapter({ target: () => el, design: DESIGN, debounceMs: 200 });
    const unbind = adapter.bind();
    const apply = vi.spyOn(adapter, 'applyScale');
    window.dispatchEvent(new Event('load'));
    vi.advanceTimersByTime(200);
    expect(apply).toHaveBeenCalledTimes(1);
    unbind();
  });
});
