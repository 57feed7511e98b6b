/**
 * Debug logging for the renderer.
 *
 * On by default in DEV builds, opt-in otherwise. Override via localStorage:
 *   localStorage.setItem('sphere-tracer:debug-trace', '1') // force on
 *   localStorage.setItem('sphere-tracer:debug-trace', '0') // force off
 */

import { DEBUG_TRACE_STORAGE_KEY } from './storageKeys';

export function isDebugTraceEnabled(): boolean {
  if (typeof window === 'undefined') return false;

  try {
    const v = window.localStorage.getItem(DEBUG_TRACE_STORAGE_KEY);
    if (v === '1') return true;
    if (v === '0') return false;

    return !!import.meta.env.DEV;
  } catch {
    return false;
  }
}

export function debugTraceLog(step: string, details: Record<string, unknown>, enabled: boolean): void {
  if (!enabled) return;
  console.log(`[trace] ${step}`, details);
}
