import type { DrillDownRecord } from '../types/dashboard';

/** Display labels for the known work-record fields, in detail-view order. */
export const FIELD_LABELS: Record<string, string> = {
  sequence_no: '序号',
  location: '地点/机房',
  year: '年份',
  month: '月份',
  work_type: '作业形式',
  work_category: '作业分类',
  work_object: '作业对象',
  check_item: '检查项',
  operation_method: '操作方法及建议值',
  benchmark_value: '标杆值',
  execution_standard: '执行标准',
  execution_status: '执行情况',
  detailed_situation: '详细情况',
  quantification_standard: '量化标准',
  last_month_standard: '上月量化标准',
  quantification_unit: '量化单位',
  executor: '执行人',
};

/** Columns of the list overlay table. */
export const LIST_COLUMNS = [
  'sequence_no',
  'work_type',
  'work_category',
  'work_object',
  'execution_standard',
  'execution_status',
  'executor',
] as const;

export function fieldText(value: DrillDownRecord[string] | undefined): string {
  if (value === null || value === undefined || value === '') return '—';
  return String(value);
}

/** Known fields first in label order, then any extra fields the server sent. `id` is internal. */
export function detailFields(record: DrillDownRecord): Array<{ key: string; label: string; value: string }> {
  const known = Object.keys(FIELD_LABELS).filter((key) => key in record);
  const extra = Object.keys(record).filter((key) => !(key in FIELD_LABELS) && key !== 'id');
  return [...known, ...extra].map((key) => ({
    key,
    label: FIELD_LABELS[key] ?? key,
    value: fieldText(record[key]),
  }));
}
