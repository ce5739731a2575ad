import { describe, expect, it, vi } from 'vitest';
import type { ChartClickEvent, DrillDownQuery, DrillDownRecord, DrillDownResult } from '../types/dashboard';
import { DrillDownResolver, extractDrillDownQuery, type DrillDownFetcher } from './drillDownResolver';

function click(datum: ChartClickEvent['datum']): ChartClickEvent {
  return { panelId: 'leftTop', category: '1月', seriesName: '指标', datum };
}

function records(count: number, location = '深圳宝安区宝城'): DrillDownRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    location,
    month: '1',
    year: '2025',
    sequence_no: i + 1,
    work_type: '巡检',
    executor: `执行人${i + 1}`,
  }));
}

/** Fetcher whose calls stay pending until the test settles them. */
function deferredFetcher() {
  const calls: Array<{
    query: DrillDownQuery;
    resolve: (r: DrillDownResult) => void;
    reject: (e: Error) => void;
  }> = [];
  const fetcher: DrillDownFetcher = (query) =>
    new Promise<DrillDownResult>((resolve, reject) => {
      calls.push({ query, resolve, reject });
    });
  return { fetcher, calls };
}

describe('extractDrillDownQuery', () => {
  it('takes all three keys', () => {
    expect(extractDrillDownQuery(click({ location: '深圳宝安区宝城', month: '1', year: '2025' }))).toEqual({
      location: '深圳宝安区宝城',
      month: '1',
      year: '2025',
    });
  });

  it('drops blank and missing keys', () => {
    expect(extractDrillDownQuery(click({ location: '  ', month: null }))).toEqual({});
  });

  it.each([
    ['1月', '1'],
    ['01', '1'],
    ['2025-03', '3'],
    [12, '12'],
  ])('normalises month %s -> %s', (month, expected) => {
    expect(extractDrillDownQuery(click({ month })).month).toBe(expected);
  });

  it('keeps the four-digit year', () => {
    expect(extractDrillDownQuery(click({ year: '2025年' })).year).toBe('2025');
    expect(extractDrillDownQuery(click({ year: 2024 })).year).toBe('2024');
  });
});

describe('DrillDownResolver', () => {
  const query = { location: '深圳宝安区宝城', month: '1', year: '2025' };

  it('opens in loading, then shows every record', async () => {
    const { fetcher, calls } = deferredFetcher();
    const resolver = new DrillDownResolver(fetcher);
    const pending = resolver.resolve(click(query));

    expect(resolver.getSnapshot().list).toEqual({ status: 'loading', query });
    expect(calls[0].query).toEqual(query);

    calls[0].resolve({ records: records(57), total: 57 });
    const result = await pending;

    expect(result?.total).toBe(57);
    const list = resolver.getSnapshot().list;
    expect(list?.status).toBe('ready');
    if (list?.status === 'ready') {
      expect(list.result.records).toHaveLength(57);
      expect(list.result.total).toBe(57);
    }
  });

  it('shows the empty state for zero records', async () => {
    const resolver = new DrillDownResolver(async () => ({ records: [], total: 0 }));
    await resolver.resolve(click({ location: '无此机房' }));
    expect(resolver.getSnapshot().list).toEqual({ status: 'empty', query: { location: '无此机房' } });
  });

  it('turns a failure into the error state without rejecting', async () => {
    const resolver = new DrillDownResolver(async () => {
      throw new Error('Drill-down: 500 boom');
    });
    await expect(resolver.resolve(click(query))).resolves.toBeNull();
    expect(resolver.getSnapshot().list).toEqual({
      status: 'error',
      query,
      message: 'Drill-down: 500 boom',
    });
  });

  it('keeps an open list in place until the next result arrives', async () => {
    const { fetcher, calls } = deferredFetcher();
    const resolver = new DrillDownResolver(fetcher);
    const first = resolver.resolve(click(query));
    calls[0].resolve({ records: records(3), total: 3 });
    await first;
    const shown = resolver.getSnapshot().list;

    const second = resolver.resolve(click({ location: '深圳南山区' }));
    expect(resolver.getSnapshot().list).toBe(shown);
    expect(resolver.getSnapshot().pending).toBe(true);

    calls[1].reject(new Error('network down'));
    await second;
    expect(resolver.getSnapshot()).toEqual({
      list: { status: 'error', query: { location: '深圳南山区' }, message: 'network down' },
      pending: false,
      detail: null,
    });
  });

  it('lets only the latest click write the overlay', async () => {
    const { fetcher, calls } = deferredFetcher();
    const resolver = new DrillDownResolver(fetcher);
    const first = resolver.resolve(click({ location: 'A' }));
    const second = resolver.resolve(click({ location: 'B' }));

    calls[1].resolve({ records: records(2, 'B'), total: 2 });
    await second;
    calls[0].resolve({ records: records(5, 'A'), total: 5 });
    await first;

    const list = resolver.getSnapshot().list;
    expect(list?.status).toBe('ready');
    expect(list?.query).toEqual({ location: 'B' });
  });

  it('shows the later click when it also finishes last', async () => {
    const { fetcher, calls } = deferredFetcher();
    const resolver = new DrillDownResolver(fetcher);
    const first = resolver.resolve(click({ location: 'A' }));
    const second = resolver.resolve(click({ location: 'B' }));

    calls[0].resolve({ records: records(5, 'A'), total: 5 });
    await first;
    expect(resolver.getSnapshot().list).toEqual({ status: 'loading', query: { location: 'A' } });

    calls[1].resolve({ records: records(2, 'B'), total: 2 });
    await second;
    const list = resolver.getSnapshot().list;
    expect(list?.status === 'ready' && list.result.total).toBe(2);
  });

  it('stacks a detail view over the list and pops it', async () => {
    const resolver = new DrillDownResolver(async () => ({ records: records(2), total: 2 }));
    await resolver.resolve(click(query));
    const list = resolver.getSnapshot().list;
    const record = list?.status === 'ready' ? list.result.records[1] : null;
    expect(record).not.toBeNull();
    if (!record) return;

    resolver.openDetail(record);
    expect(resolver.getSnapshot().detail).toBe(record);
    expect(resolver.getSnapshot().list).toBe(list);

    resolver.closeDetail();
    expect(resolver.getSnapshot().detail).toBeNull();
    expect(resolver.getSnapshot().list).toBe(list);
  });

  it('ignores results that arrive after close', async () => {
    const { fetcher, calls } = deferredFetcher();
    const resolver = new DrillDownResolver(fetcher);
    const pending = resolver.resolve(click(query));
    resolver.close();
    calls[0].resolve({ records: records(1), total: 1 });
    await pending;
    expect(resolver.getSnapshot().list).toBeNull();
  });

  it('notifies subscribers on every change', async () => {
    const resolver = new DrillDownResolver(async () => ({ records: records(1), total: 1 }));
    const listener = vi.fn();
    const unsubscribe = resolver.subscribe(listener);
    await resolver.resolve(click(query));
    expect(listener).toHaveBeenCalledTimes(2);
    unsubscribe();
    resolver.close();
    expect(listener).toHaveBeenCalledTimes(2);
  });
});
