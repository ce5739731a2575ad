/**
 * Continuous vertical scrolling for list panels.
 *
 * Each panel renders its rows four times over and is translated upward one step per
 * interval. Once the travel passes the middle of the rendered list the offset snaps back
 * to 0 with no transition; the content at 0 is identical to the content half a list
 * further down, so the loop has no visible seam.
 *
 * State lives in one {@link PanelState} per panel id; panels never touch each other's
 * timers or offsets.
 */

import { moduleLogger } from '../lib/logger';

const log = moduleLogger('carousel');

export const LOOP_COPIES = 4;

export interface CarouselFrame {
  translateY: number;
  transitionMs: number;
}

/** Layout side channel: the realized list height and the element the frames land on. */
export interface ScrollSurface {
  measureHeight(): number;
  applyFrame(frame: CarouselFrame): void;
}

export interface CarouselOptions {
  /** Pixels per step. */
  distance: number;
  intervalSeconds: number;
  durationSeconds: number;
}

type TimerHandle = ReturnType<typeof setInterval>;

export interface PanelState<Row> {
  sourceRows: readonly Row[];
  offsetIndex: number;
  stepDistance: number;
  stepIntervalMs: number;
  transitionDurationMs: number;
  timerHandle: TimerHandle | null;
  surface: ScrollSurface;
}

export function buildLoopRows<Row>(rows: readonly Row[]): Row[] {
  const loop: Row[] = [];
  for (let i = 0; i < LOOP_COPIES; i++) loop.push(...rows);
  return loop;
}

/** Surface over a DOM list: height from `clientHeight`, frames as transform + transition. */
export function createElementSurface(el: HTMLElement): ScrollSurface {
  return {
    measureHeight: () => el.clientHeight,
    applyFrame: ({ translateY, transitionMs }) => {
      el.style.transform = `translate3d(0,-${translateY}px,0)`;
      el.style.transition = `all ${transitionMs / 1000}s ease 0s`;
    },
  };
}

export class PanelCarouselEngine<Row = unknown> {
  private readonly panels = new Map<string, PanelState<Row>>();

  /**
   * Start (or restart) a panel from offset 0. Any running timer for the id is cancelled first.
   * The caller renders {@link buildLoopRows} of the same rows before starting.
   */
  start(
    panelId: string,
    rows: readonly Row[],
    surface: ScrollSurface,
    options: CarouselOptions
  ): void {
    this.stop(panelId);
    const state: PanelState<Row> = {
      sourceRows: rows,
      offsetIndex: 0,
      stepDistance: options.distance,
      stepIntervalMs: options.intervalSeconds * 1000,
      transitionDurationMs: options.durationSeconds * 1000,
      timerHandle: null,
      surface,
    };
    this.panels.set(panelId, state);
    this.schedule(panelId, state);
    log.debug({ panelId, rows: rows.length }, 'carousel started');
  }

  /** Cancel the panel's timer. The offset and the on-screen position stay where they are. */
  stop(panelId: string): void {
    const state = this.panels.get(panelId);
    if (!state?.timerHandle) return;
    clearInterval(state.timerHandle);
    state.timerHandle = null;
  }

  /** Restart a stopped panel's timer from its current offset. */
  resume(panelId: string): boolean {
    const state = this.panels.get(panelId);
    if (!state) return false;
    if (!state.timerHandle) this.schedule(panelId, state);
    return true;
  }

  stopAll(): void {
    for (const panelId of this.panels.keys()) this.stop(panelId);
  }

  isRunning(panelId: string): boolean {
    return this.panels.get(panelId)?.timerHandle != null;
  }

  getState(panelId: string): Readonly<PanelState<Row>> | undefined {
    return this.panels.get(panelId);
  }

  private schedule(panelId: string, state: PanelState<Row>): void {
    state.timerHandle = setInterval(() => this.tick(panelId, state), state.stepIntervalMs);
  }

  private tick(panelId: string, state: PanelState<Row>): void {
    const traveled = state.offsetIndex * state.stepDistance;
    const threshold = state.surface.measureHeight() / 2 + state.stepDistance;
    if (traveled >= threshold) {
      state.offsetIndex = 0;
      // Snap to the top, not to `traveled`: the next eased step then starts from row 0.
      state.surface.applyFrame({ translateY: 0, transitionMs: 0 });
      log.trace({ panelId, traveled }, 'carousel wrapped');
    } else {
      state.surface.applyFrame({
        translateY: traveled,
        transitionMs: state.transitionDurationMs,
      });
    }
    state.offsetIndex += 1;
  }
}
