/**
 * Dashboard data shapes shared by the engine, services and components.
 */

/** One positional row as served by the aggregate endpoint, e.g. ["1月", 0.9, 0.95, 0.93]. */
export type RowCell = string | number | null;
export type RowTuple = readonly RowCell[];

/** Panel data key -> rows. Fetched once per page load. */
export type AggregatePayload = Record<string, RowTuple[]>;

export type ChartKind = 'line' | 'bar';

/** Row tuple indices that carry drill-down keys for a chart panel. */
export interface DrillDownKeys {
  location?: number;
  month?: number;
  year?: number;
}

/** Grid placement on the 1920x1080 design canvas (12 columns, 3 rows). */
export interface GridArea {
  column: string;
  row: string;
}

export interface ChartPanelBinding {
  kind: 'chart';
  id: string;
  dataKey: string;
  title: string;
  chart: ChartKind;
  /** Series names in column order, starting at row[1]. */
  series: readonly string[];
  drillDown?: DrillDownKeys;
  area: GridArea;
}

export interface ListPanelBinding {
  kind: 'list';
  id: string;
  dataKey: string;
  title: string;
  columns: readonly string[];
  area: GridArea;
}

export type PanelBinding = ChartPanelBinding | ListPanelBinding;

export interface SeriesRecord {
  category: string;
  seriesName: string;
  value: number | null;
  rowIndex: number;
}

export interface AlignedSeries {
  categories: string[];
  /** values[k][n]: series k at category n. */
  values: (number | null)[][];
}

export interface DrillDownQuery {
  location?: string;
  month?: string;
  year?: string;
}

/** Raw drill-down keys attached to a clicked chart point, before normalisation. */
export interface DrillDownDatum {
  location?: RowCell;
  month?: RowCell;
  year?: RowCell;
}

/** Detail of the `dashboard:drillDown` CustomEvent a chart dispatches on point click. */
export interface ChartClickEvent {
  panelId: string;
  category: string;
  seriesName: string;
  datum: DrillDownDatum;
}

/** Work record returned by the drill-down endpoint. Field set is open-ended. */
export type DrillDownRecord = Record<string, string | number | null>;

export interface DrillDownResult {
  records: DrillDownRecord[];
  total: number;
}
