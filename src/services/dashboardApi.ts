/**
 * Metrics API client.
 * Same-origin by default; `VITE_API_URL` in `window.__ENV__` points it elsewhere.
 */

import { z } from 'zod';
import { apiUrl } from '../config';
import type {
  AggregatePayload,
  DrillDownQuery,
  DrillDownRecord,
  DrillDownResult,
} from '../types/dashboard';

const cellSchema = z.union([z.string(), z.number(), z.null()]);
const rowsSchema = z.array(z.array(cellSchema));

const drillDownResponseSchema = z.object({
  success: z.boolean(),
  data: z.array(z.record(cellSchema)).default([]),
  total: z.number().int().nonnegative().optional(),
});

export type DrillDownResponse = z.infer<typeof drillDownResponseSchema>;

/**
 * Keep only the panel entries that are row arrays. A malformed entry is dropped so
 * only its own panel fails to initialise.
 */
export function parseAggregatePayload(raw: unknown): AggregatePayload {
  const payload: AggregatePayload = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return payload;
  for (const [key, value] of Object.entries(raw)) {
    const rows = rowsSchema.safeParse(value);
    if (rows.success) payload[key] = rows.data;
  }
  return payload;
}

/** GET /api/bi_data: aggregate rows for every panel. */
export async function fetchAggregatePayload(signal?: AbortSignal): Promise<AggregatePayload> {
  const res = await fetch(apiUrl('/api/bi_data'), {
    headers: { Accept: 'application/json' },
    signal,
  });
  if (!res.ok) throw new Error(`Aggregate: ${res.status} ${await res.text()}`);
  return parseAggregatePayload(await res.json());
}

/** Query string with only the keys that are set; an omitted key widens the filter. */
export function drillDownSearchParams(query: DrillDownQuery): URLSearchParams {
  const params = new URLSearchParams();
  if (query.location) params.set('location', query.location);
  if (query.month) params.set('month', query.month);
  if (query.year) params.set('year', query.year);
  return params;
}

/** GET /pue_drill_down_data: work records behind one chart point. */
export async function fetchDrillDownRecords(query: DrillDownQuery): Promise<DrillDownResult> {
  const params = drillDownSearchParams(query);
  const qs = params.toString();
  const res = await fetch(apiUrl(`/pue_drill_down_data${qs ? `?${qs}` : ''}`), {
    headers: { Accept: 'application/json' },
  });
  if (!res.ok) throw new Error(`Drill-down: ${res.status} ${await res.text()}`);

  const body = drillDownResponseSchema.safeParse(await res.json());
  if (!body.success) throw new Error('Drill-down: malformed response');
  if (!body.data.success) throw new Error('Drill-down: query reported failure');

  const records: DrillDownRecord[] = body.data.data;
  return { records, total: body.data.total ?? records.length };
}

/** Export needs all three keys; the endpoint matches them exactly. */
export function canExportDrillDown(
  query: DrillDownQuery
): query is Required<DrillDownQuery> {
  return Boolean(query.location && query.month && query.year);
}

/** GET /pue_drill_down_excel: xlsx of the records for one location and month. */
export async function requestDrillDownExport(query: Required<DrillDownQuery>): Promise<Blob> {
  const params = new URLSearchParams({
    location: query.location,
    year: query.year,
    month: query.month,
  });
  const res = await fetch(apiUrl(`/pue_drill_down_excel?${params}`));
  if (!res.ok) throw new Error(`Export: ${res.status} ${await res.text()}`);
  return res.blob();
}
