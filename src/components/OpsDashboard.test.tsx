import { QueryClient, QueryClientProvider } from '@tanstack/react-query';
import { fireEvent, render, screen } from '@testing-library/react';
import React from 'react';
import { describe, expect, it, vi } from 'vitest';
import { DrillDownResolver } from '../engine/drillDownResolver';
import { KPI_PANEL_BINDINGS } from '../engine/chartBinding';
import type {
  AggregatePayload,
  ChartPanelBinding,
  DrillDownDatum,
  DrillDownQuery,
  DrillDownRecord,
  RowTuple,
} from '../types/dashboard';
import { OpsDashboard } from './OpsDashboard';

vi.mock('uplot', () => ({ default: vi.fn() }));

// Stand-in for the uPlot panel: a button that clicks the first point of its first series,
// with the drill-down keys the real binding builds.
vi.mock('./ChartPanel', async () => {
  const react = await vi.importActual<typeof import('react')>('react');
  const binding = await vi.importActual<typeof import('../engine/chartBinding')>('../engine/chartBinding');
  const ChartPanelMemo = ({
    binding: panel,
    rows,
    scope,
  }: {
    binding: ChartPanelBinding;
    rows: readonly RowTuple[];
    scope?: DrillDownDatum;
  }) =>
    react.createElement(
      'button',
      {
        type: 'button',
        onClick: () => {
          if (!panel.drillDown || rows.length === 0) return;
          window.dispatchEvent(
            new CustomEvent('dashboard:drillDown', {
              detail: {
                panelId: panel.id,
                category: String(rows[0][0]),
                seriesName: panel.series[0],
                datum: binding.buildDrillDownDatum(rows[0], panel.drillDown, scope),
              },
            })
          );
        },
      },
      `chart ${panel.id}`
    );
  return { ChartPanelMemo };
});

const PAYLOAD: AggregatePayload = {
  leftTopData: [
    ['1月', 0.9, 0.95, 0.93],
    ['2月', 0.9, 0.95, 0.91],
  ],
  centerTopTopData: [
    ['故障', '处理中'],
    ['巡检', '已完成'],
  ],
};

const RECORDS: DrillDownRecord[] = Array.from({ length: 57 }, (_, i) => ({
  id: i + 1,
  sequence_no: i + 1,
  work_type: '巡检',
  executor: `执行人${i + 1}`,
}));

function renderDashboard(
  loadPayload: () => Promise<AggregatePayload>,
  resolver?: DrillDownResolver,
  page: Pick<React.ComponentProps<typeof OpsDashboard>, 'panels' | 'location'> = {}
) {
  const client = new QueryClient({ defaultOptions: { queries: { retry: false } } });
  return render(
    <QueryClientProvider client={client}>
      <OpsDashboard loadPayload={loadPayload} resolver={resolver} {...page} />
    </QueryClientProvider>
  );
}

describe('OpsDashboard', () => {
  it('initialises only the panels whose data is present', async () => {
    renderDashboard(async () => PAYLOAD);

    const list = await screen.findByTestId('scroll-list-centerTopTop');
    expect(list.querySelectorAll('li')).toHaveLength(8);
    expect(screen.getByRole('button', { name: 'chart leftTop' })).toBeInTheDocument();
    expect(screen.queryByRole('button', { name: 'chart rightTop' })).toBeNull();
    expect(screen.getByRole('region', { name: '汇聚机房 PUE' })).toBeInTheDocument();
  });

  it('opens the drill-down list for a chart click', async () => {
    const queries: DrillDownQuery[] = [];
    const resolver = new DrillDownResolver(async (query) => {
      queries.push(query);
      return { records: RECORDS, total: RECORDS.length };
    });
    const { container } = renderDashboard(async () => PAYLOAD, resolver);

    fireEvent.click(await screen.findByRole('button', { name: 'chart leftTop' }));

    expect(await screen.findByText('共 57 条')).toBeInTheDocument();
    expect(container.querySelectorAll('tbody tr')).toHaveLength(57);
    expect(queries).toEqual([{ month: '1' }]);
    expect(screen.queryByRole('button', { name: '导出 Excel' })).toBeNull();
  });

  it('drills down by location, month and year on the KPI page', async () => {
    const queries: DrillDownQuery[] = [];
    const resolver = new DrillDownResolver(async (query) => {
      queries.push(query);
      return { records: RECORDS, total: RECORDS.length };
    });
    renderDashboard(
      async () => ({
        topData: [['宽带提速', '进行中', '2025']],
        centerMiddleData: [['1月', 0.9, 0.95, 0.91, 0.97, '2025']],
      }),
      resolver,
      { panels: KPI_PANEL_BINDINGS, location: '深圳宝安区宝城' }
    );

    expect(await screen.findByTestId('scroll-list-top')).toBeInTheDocument();
    fireEvent.click(screen.getByRole('button', { name: 'chart centerMiddle' }));

    expect(await screen.findByText('共 57 条')).toBeInTheDocument();
    expect(queries).toEqual([{ location: '深圳宝安区宝城', month: '1', year: '2025' }]);
    expect(screen.getByRole('button', { name: '导出 Excel' })).toBeInTheDocument();
  });

  it('reports a failed load', async () => {
    renderDashboard(async () => {
      throw new Error('Aggregate: 503 down');
    });
    expect(await screen.findByRole('alert')).toHaveTextContent('数据加载失败：Aggregate: 503 down');
  });
});
