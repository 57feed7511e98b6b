/**
 * Clamp a number to a range.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Clamp and truncate to an integer.
 */
export function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

export function clamp01(value: number): number {
  return value < 0 ? 0 : value > 1 ? 1 : value;
}

/**
 * Linear interpolation between `a` and `b`.
 *
 * `t` is clamped to [0, 1] first, so out-of-range weights never extrapolate. Callers that need
 * extrapolation must not use this helper.
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * clamp01(t);
}

/**
 * Hermite weight `t² (3 - 2t)` for a fractional offset in [0, 1].
 */
export function smoothstepWeight(t: number): number {
  return t * t * (3 - 2 * t);
}
