/**
 * Turns a chart point click into a drill-down query and owns the overlay state.
 *
 * One list overlay is shared by every chart. A new query leaves an open list untouched
 * (marked `pending`) until its own result is in, then replaces the content in place.
 * Each `resolve` takes a generation token and only the latest token may write the
 * overlay, so a fast double click always shows the second click's data.
 */

import { moduleLogger } from '../lib/logger';
import type {
  ChartClickEvent,
  DrillDownQuery,
  DrillDownRecord,
  DrillDownResult,
  RowCell,
} from '../types/dashboard';

const log = moduleLogger('drill-down');

export type DrillDownFetcher = (query: DrillDownQuery) => Promise<DrillDownResult>;

export type DrillDownList =
  | { status: 'loading'; query: DrillDownQuery }
  | { status: 'ready'; query: DrillDownQuery; result: DrillDownResult }
  | { status: 'empty'; query: DrillDownQuery }
  | { status: 'error'; query: DrillDownQuery; message: string };

export interface DrillDownOverlayState {
  /** null when the overlay is closed. */
  list: DrillDownList | null;
  /** A newer query is in flight behind the list shown. */
  pending: boolean;
  /** Nested single-record view, stacked over the list. */
  detail: DrillDownRecord | null;
}

export const CLOSED_OVERLAY: DrillDownOverlayState = { list: null, pending: false, detail: null };

function cellText(cell: RowCell | undefined): string | undefined {
  if (cell === null || cell === undefined) return undefined;
  const text = String(cell).trim();
  return text === '' ? undefined : text;
}

/** "01", "1月", "2025-01" -> "1". Keys without digits pass through trimmed. */
function normalizeMonth(cell: RowCell | undefined): string | undefined {
  const text = cellText(cell);
  if (!text) return undefined;
  const groups = text.match(/\d+/g);
  if (!groups) return text;
  const last = groups[groups.length - 1];
  return String(parseInt(last, 10));
}

function normalizeYear(cell: RowCell | undefined): string | undefined {
  const text = cellText(cell);
  if (!text) return undefined;
  return text.match(/\d{4}/)?.[0] ?? text;
}

export function extractDrillDownQuery(event: ChartClickEvent): DrillDownQuery {
  const query: DrillDownQuery = {};
  const location = cellText(event.datum.location);
  const month = normalizeMonth(event.datum.month);
  const year = normalizeYear(event.datum.year);
  if (location) query.location = location;
  if (month) query.month = month;
  if (year) query.year = year;
  return query;
}

type Listener = () => void;

export class DrillDownResolver {
  private state: DrillDownOverlayState = CLOSED_OVERLAY;
  private generation = 0;
  private readonly listeners = new Set<Listener>();

  constructor(private readonly fetcher: DrillDownFetcher) {}

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): DrillDownOverlayState => this.state;

  /**
   * Query the records behind a clicked point. Resolves to null when the query failed;
   * failures end up in the overlay, never as a rejection.
   */
  async resolve(event: ChartClickEvent): Promise<DrillDownResult | null> {
    return this.resolveQuery(extractDrillDownQuery(event));
  }

  async resolveQuery(query: DrillDownQuery): Promise<DrillDownResult | null> {
    const token = ++this.generation;
    if (this.state.list) {
      this.setState({ ...this.state, pending: true });
    } else {
      this.setState({ list: { status: 'loading', query }, pending: false, detail: null });
    }

    let next: DrillDownList;
    let result: DrillDownResult | null = null;
    try {
      result = await this.fetcher(query);
      next =
        result.records.length === 0
          ? { status: 'empty', query }
          : { status: 'ready', query, result };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn({ query, err: message }, 'drill-down query failed');
      next = { status: 'error', query, message };
    }

    if (token !== this.generation) {
      log.debug({ query, token, latest: this.generation }, 'dropping superseded drill-down result');
      return result;
    }
    this.setState({ list: next, pending: false, detail: null });
    return result;
  }

  openDetail(record: DrillDownRecord): void {
    if (this.state.list?.status !== 'ready') return;
    this.setState({ ...this.state, detail: record });
  }

  closeDetail(): void {
    if (!this.state.detail) return;
    this.setState({ ...this.state, detail: null });
  }

  /** Close everything; queries still in flight no longer reach the overlay. */
  close(): void {
    this.generation++;
    this.setState(CLOSED_OVERLAY);
  }

  private setState(next: DrillDownOverlayState): void {
    this.state = next;
    for (const listener of this.listeners) listener();
  }
}
