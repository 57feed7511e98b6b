/**
 * Centralized localStorage keys.
 *
 * Everything the viewer persists is listed here so it can be found (and cleared) in one place.
 */

/** Persisted render settings (size, fov, band size, worker count). */
export const RENDER_SETTINGS_STORAGE_KEY = 'sphere-tracer:render-settings:v1';

/** '1' / '0' to force renderer debug logging on or off. */
export const DEBUG_TRACE_STORAGE_KEY = 'sphere-tracer:debug-trace';
