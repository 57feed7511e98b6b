import { beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_RENDER_SETTINGS,
  clearRenderSettings,
  defaultWorkerCount,
  fovDegreesToRadians,
  parseRenderSettings,
  readRenderSettings,
  writeRenderSettings,
} from '../src/utils/renderSettings';
import { RENDER_SETTINGS_STORAGE_KEY } from '../src/utils/storageKeys';

beforeEach(() => {
  localStorage.clear();
});

describe('renderSettings', () => {
  it('parseRenderSettings falls back per field to the defaults', () => {
    expect(parseRenderSettings(null)).toEqual(DEFAULT_RENDER_SETTINGS);
    expect(parseRenderSettings('nope')).toEqual(DEFAULT_RENDER_SETTINGS);
    expect(parseRenderSettings({ width: 320, height: 'tall', fovDegrees: Number.NaN })).toEqual({
      ...DEFAULT_RENDER_SETTINGS,
      width: 320,
    });
  });

  it('parseRenderSettings clamps into the allowed ranges', () => {
    expect(
      parseRenderSettings({ width: 5, height: 99999, fovDegrees: 179, bandRows: 0, workerCount: 2.7 }),
    ).toEqual({ width: 16, height: 1080, fovDegrees: 150, bandRows: 1, workerCount: 2 });
  });

  it('round-trips through localStorage', () => {
    expect(readRenderSettings()).toEqual(DEFAULT_RENDER_SETTINGS);

    const s = { width: 128, height: 96, fovDegrees: 45, bandRows: 8, workerCount: 2 };
    writeRenderSettings(s);
    expect(JSON.parse(localStorage.getItem(RENDER_SETTINGS_STORAGE_KEY) ?? 'null')).toEqual(s);
    expect(readRenderSettings()).toEqual(s);

    clearRenderSettings();
    expect(readRenderSettings()).toEqual(DEFAULT_RENDER_SETTINGS);
  });

  it('ignores corrupt storage', () => {
    localStorage.setItem(RENDER_SETTINGS_STORAGE_KEY, '{');
    expect(readRenderSettings()).toEqual(DEFAULT_RENDER_SETTINGS);
  });

  it('defaults to at most four workers', () => {
    expect(defaultWorkerCount(16)).toBe(4);
    expect(defaultWorkerCount(2)).toBe(2);
    expect(defaultWorkerCount(1)).toBe(1);
    expect(defaultWorkerCount(undefined)).toBe(4);
    expect(defaultWorkerCount(0)).toBe(4);
    expect(DEFAULT_RENDER_SETTINGS.workerCount).toBe(defaultWorkerCount(navigator.hardwareConcurrency));
  });

  it('converts degrees to radians', () => {
    expect(fovDegreesToRadians(60)).toBeCloseTo(Math.PI / 3, 12);
    expect(fovDegreesToRadians(180)).toBeCloseTo(Math.PI, 12);
  });
});
