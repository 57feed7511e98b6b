import { clampInt, clamp } from './math';
import { readLocalStorageJson, removeLocalStorageItem, writeLocalStorageJson } from './persistence';
import { RENDER_SETTINGS_STORAGE_KEY } from './storageKeys';

export type RenderSettings = {
  width: number;
  height: number;
  fovDegrees: number;
  /** Rows per band handed to a runner. */
  bandRows: number;
  /** Worker pool size; 1 renders on the main thread. */
  workerCount: number;
};

export const RENDER_LIMITS = {
  WIDTH: { MIN: 16, MAX: 1920, STEP: 16 },
  HEIGHT: { MIN: 16, MAX: 1080, STEP: 16 },
  FOV_DEGREES: { MIN: 10, MAX: 150, STEP: 5 },
  BAND_ROWS: { MIN: 1, MAX: 256 },
  WORKERS: { MIN: 1, MAX: 16, STEP: 1 },
} as const;

const MAX_DEFAULT_WORKERS = 4;

/** Up to four workers, fewer on machines that report fewer cores. */
export function defaultWorkerCount(hardwareConcurrency?: number): number {
  const cores =
    typeof hardwareConcurrency === 'number' && Number.isFinite(hardwareConcurrency) && hardwareConcurrency >= 1
      ? Math.floor(hardwareConcurrency)
      : MAX_DEFAULT_WORKERS;
  return Math.min(MAX_DEFAULT_WORKERS, cores);
}

export const DEFAULT_RENDER_SETTINGS: RenderSettings = {
  width: 640,
  height: 480,
  fovDegrees: 60,
  bandRows: 16,
  workerCount: defaultWorkerCount(typeof navigator === 'undefined' ? undefined : navigator.hardwareConcurrency),
};

export function fovDegreesToRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Coerce an untrusted value (e.g. parsed storage) into settings, clamping each field into RENDER_LIMITS
 * and falling back per field to the defaults.
 */
export function parseRenderSettings(value: unknown): RenderSettings {
  const obj: Record<string, unknown> = value && typeof value === 'object' ? (value as Record<string, unknown>) : {};
  const d = DEFAULT_RENDER_SETTINGS;

  return {
    width: clampInt(numberOr(obj.width, d.width), RENDER_LIMITS.WIDTH.MIN, RENDER_LIMITS.WIDTH.MAX),
    height: clampInt(numberOr(obj.height, d.height), RENDER_LIMITS.HEIGHT.MIN, RENDER_LIMITS.HEIGHT.MAX),
    fovDegrees: clamp(
      numberOr(obj.fovDegrees, d.fovDegrees),
      RENDER_LIMITS.FOV_DEGREES.MIN,
      RENDER_LIMITS.FOV_DEGREES.MAX,
    ),
    bandRows: clampInt(numberOr(obj.bandRows, d.bandRows), RENDER_LIMITS.BAND_ROWS.MIN, RENDER_LIMITS.BAND_ROWS.MAX),
    workerCount: clampInt(
      numberOr(obj.workerCount, d.workerCount),
      RENDER_LIMITS.WORKERS.MIN,
      RENDER_LIMITS.WORKERS.MAX,
    ),
  };
}

export function readRenderSettings(): RenderSettings {
  const raw = readLocalStorageJson(RENDER_SETTINGS_STORAGE_KEY);
  return raw === null ? DEFAULT_RENDER_SETTINGS : parseRenderSettings(raw);
}

export function writeRenderSettings(settings: RenderSettings): void {
  writeLocalStorageJson(RENDER_SETTINGS_STORAGE_KEY, settings);
}

export function clearRenderSettings(): void {
  removeLocalStorageItem(RENDER_SETTINGS_STORAGE_KEY);
}
