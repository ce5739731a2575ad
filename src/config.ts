/**
 * Runtime configuration for the dashboard.
 * Read once from `window.__ENV__` (injected by the serving page) and validated with zod.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  VITE_API_URL: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  RESIZE_DEBOUNCE_MS: z.coerce.number().int().nonnegative().optional(),
});

export type DashboardEnv = z.infer<typeof envSchema>;

export interface CarouselDefaults {
  /** Pixels moved per step; matches the list row height. */
  distance: number;
  intervalSeconds: number;
  durationSeconds: number;
}

export interface DashboardConfig {
  apiBaseUrl: string;
  logLevel: LogLevel;
  design: { width: number; height: number };
  resizeDebounceMs: number;
  carousel: CarouselDefaults;
}

export const DESIGN_WIDTH = 1920;
export const DESIGN_HEIGHT = 1080;
export const DEFAULT_RESIZE_DEBOUNCE_MS = 200;

declare global {
  interface Window {
    __ENV__?: unknown;
  }
}

function readWindowEnv(): unknown {
  if (typeof window === 'undefined') return {};
  return window.__ENV__ ?? {};
}

/** Build a config from a raw env object. An env that fails validation yields the defaults. */
export function parseDashboardConfig(raw: unknown): DashboardConfig {
  const parsed = envSchema.safeParse(raw);
  const env: DashboardEnv = parsed.success ? parsed.data : {};
  return {
    apiBaseUrl: (env.VITE_API_URL ?? '').replace(/\/$/, ''),
    logLevel: env.LOG_LEVEL ?? 'info',
    design: { width: DESIGN_WIDTH, height: DESIGN_HEIGHT },
    resizeDebounceMs: env.RESIZE_DEBOUNCE_MS ?? DEFAULT_RESIZE_DEBOUNCE_MS,
    carousel: { distance: 40, intervalSeconds: 2, durationSeconds: 1 },
  };
}

let cached: DashboardConfig | null = null;

export function getDashboardConfig(): DashboardConfig {
  if (!cached) cached = parseDashboardConfig(readWindowEnv());
  return cached;
}

/** Join an API path onto the configured base (same origin when no base is set). */
export function apiUrl(path: string): string {
  const base = getDashboardConfig().apiBaseUrl;
  return base ? `${base}${path}` : path;
}

const pageSelectionSchema = z.object({
  page: z.enum(['overview', 'kpi']).catch('overview'),
  location: z
    .string()
    .trim()
    .min(1)
    .optional()
    .catch(undefined),
});

export type PageSelection = z.infer<typeof pageSelectionSchema>;

/** `?page=kpi&location=...` from the page URL. Unknown pages open the overview. */
export function parsePageSelection(search: string): PageSelection {
  const params = new URLSearchParams(search);
  return pageSelectionSchema.parse({
    page: params.get('page') ?? undefined,
    location: params.get('location') ?? undefined,
  });
}
