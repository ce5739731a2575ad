/**
 * Pure reshaping of aggregate rows into what the chart sink consumes.
 *
 * Rows are positional: `[category, value_0, value_1, ...]`. Each chart panel names its
 * series in column order; expansion yields one record per (row, series) pair, row-major.
 */

import type {
  AggregatePayload,
  AlignedSeries,
  DrillDownDatum,
  DrillDownKeys,
  PanelBinding,
  RowCell,
  RowTuple,
  SeriesRecord,
} from '../types/dashboard';

const KPI_SERIES = ['基准值', '挑战值', '指标'] as const;

export const PANEL_BINDINGS: readonly PanelBinding[] = [
  {
    kind: 'chart',
    id: 'leftTop',
    dataKey: 'leftTopData',
    title: 'PUE 月度达标率',
    chart: 'line',
    series: KPI_SERIES,
    drillDown: { month: 0 },
    area: { column: '1 / 4', row: '1 / 2' },
  },
  {
    kind: 'chart',
    id: 'leftMiddle',
    dataKey: 'leftMiddleData',
    title: '故障处理及时率',
    chart: 'bar',
    series: KPI_SERIES,
    area: { column: '1 / 4', row: '2 / 3' },
  },
  {
    kind: 'list',
    id: 'centerTopTop',
    dataKey: 'centerTopTopData',
    title: '运维工单动态',
    columns: ['类型', '状态'],
    area: { column: '4 / 10', row: '1 / 2' },
  },
  {
    kind: 'chart',
    id: 'centerTopBottom',
    dataKey: 'centerTopBottomData',
    title: '区域 PUE',
    chart: 'bar',
    series: ['数值', '比例'],
    drillDown: { location: 0 },
    area: { column: '4 / 10', row: '2 / 3' },
  },
  {
    kind: 'chart',
    id: 'rightTop',
    dataKey: 'rightTopData',
    title: '汇聚机房 PUE',
    chart: 'line',
    series: KPI_SERIES,
    drillDown: { month: 0 },
    area: { column: '10 / 13', row: '1 / 2' },
  },
  {
    kind: 'chart',
    id: 'rightMiddle',
    dataKey: 'rightMiddleData',
    title: '网络 KPI 完成率',
    chart: 'bar',
    series: KPI_SERIES,
    area: { column: '10 / 13', row: '2 / 3' },
  },
  {
    kind: 'chart',
    id: 'bottom',
    dataKey: 'bottomData',
    title: '动环采集率',
    chart: 'line',
    series: [
      '基准值',
      '挑战值',
      '蓄电池组总电压采集率',
      '开关电源负载电流采集率',
      'UPS负载电流采集率',
      '动环关键信号采集完整率',
    ],
    area: { column: '1 / 13', row: '3 / 4' },
  },
];

/** Second page: KPI completion panels. Every chart except leftBottom carries a year column. */
export const KPI_PANEL_BINDINGS: readonly PanelBinding[] = [
  {
    kind: 'list',
    id: 'top',
    dataKey: 'topData',
    title: '重点工作进展',
    columns: ['类型', '状态'],
    area: { column: '1 / 13', row: '1 / 2' },
  },
  {
    kind: 'chart',
    id: 'leftMiddle',
    dataKey: 'leftMiddleData',
    title: '故障处理及时率',
    chart: 'line',
    series: KPI_SERIES,
    area: { column: '1 / 5', row: '2 / 3' },
  },
  {
    kind: 'chart',
    id: 'centerMiddle',
    dataKey: 'centerMiddleData',
    title: '宽带交付指标',
    chart: 'bar',
    series: ['基准值', '挑战值', '家企宽回单率', '到企网络侧交付率'],
    drillDown: { month: 0, year: 5 },
    area: { column: '5 / 9', row: '2 / 3' },
  },
  {
    kind: 'chart',
    id: 'rightMiddle',
    dataKey: 'rightMiddleKPIData',
    title: '研发投入完成度',
    chart: 'line',
    series: ['基准值', '挑战值', '研发投入完成度'],
    drillDown: { month: 0, year: 4 },
    area: { column: '9 / 13', row: '2 / 3' },
  },
  {
    kind: 'chart',
    id: 'leftBottom',
    dataKey: 'leftBottomData',
    title: '重点指标完成情况',
    chart: 'bar',
    series: ['基准值', '挑战值', '当前值'],
    area: { column: '1 / 7', row: '3 / 4' },
  },
  {
    kind: 'chart',
    id: 'rightBottom',
    dataKey: 'rightBottomData',
    title: '家企宽回单率',
    chart: 'line',
    series: ['基准值', '挑战值', '家企宽回单率'],
    drillDown: { month: 0, year: 4 },
    area: { column: '7 / 13', row: '3 / 4' },
  },
];

export type DashboardPageId = 'overview' | 'kpi';

export interface DashboardPageDefinition {
  title: string;
  panels: readonly PanelBinding[];
}

export const DASHBOARD_PAGES: Record<DashboardPageId, DashboardPageDefinition> = {
  overview: { title: '运维指标大屏', panels: PANEL_BINDINGS },
  kpi: { title: '重点KPI指标', panels: KPI_PANEL_BINDINGS },
};

function toNumber(cell: RowCell | undefined): number | null {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;
  if (typeof cell === 'string' && cell.trim() !== '') {
    const n = Number(cell);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function expandSeriesRecords(
  rows: readonly RowTuple[],
  seriesNames: readonly string[],
  valueOffset = 1
): SeriesRecord[] {
  return rows.flatMap((row, rowIndex) =>
    seriesNames.map((seriesName, k) => ({
      category: String(row[0] ?? ''),
      seriesName,
      value: toNumber(row[valueOffset + k]),
      rowIndex,
    }))
  );
}

/** Regroup expanded records by series, one column per category, in first-seen row order. */
export function toAlignedSeries(
  records: readonly SeriesRecord[],
  seriesNames: readonly string[]
): AlignedSeries {
  const categories: string[] = [];
  const columnOf = new Map<number, number>();
  for (const r of records) {
    if (!columnOf.has(r.rowIndex)) {
      columnOf.set(r.rowIndex, categories.length);
      categories.push(r.category);
    }
  }
  const values = seriesNames.map(() => new Array<number | null>(categories.length).fill(null));
  const seriesIndex = new Map(seriesNames.map((name, k) => [name, k]));
  for (const r of records) {
    const k = seriesIndex.get(r.seriesName);
    const n = columnOf.get(r.rowIndex);
    if (k === undefined || n === undefined) continue;
    values[k][n] = r.value;
  }
  return { categories, values };
}

/**
 * Drill-down keys for one row. `scope` supplies keys the row has no column for,
 * such as the location a page is opened for; a key the binding maps always wins.
 */
export function buildDrillDownDatum(
  row: RowTuple,
  keys: DrillDownKeys,
  scope: DrillDownDatum = {}
): DrillDownDatum {
  const datum: DrillDownDatum = { ...scope };
  if (keys.location !== undefined) datum.location = row[keys.location] ?? null;
  if (keys.month !== undefined) datum.month = row[keys.month] ?? null;
  if (keys.year !== undefined) datum.year = row[keys.year] ?? null;
  return datum;
}

/** The panel's rows, or null when the payload lacks its key. */
export function readPanelRows(payload: AggregatePayload, dataKey: string): RowTuple[] | null {
  const rows = payload[dataKey];
  return Array.isArray(rows) ? rows : null;
}
