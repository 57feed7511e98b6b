import { valueNoise } from './valueNoise';
import type { Vec3 } from './vec3';
import { dot, scale } from './vec3';

// Orthonormal rows; rotating the sample point breaks up axis-aligned lattice artifacts.
const ROTATION_ROWS: readonly [Vec3, Vec3, Vec3] = [
  { x: 0.0, y: 0.8, z: 0.6 },
  { x: -0.8, y: 0.36, z: -0.48 },
  { x: -0.6, y: -0.48, z: 0.64 },
];

/** Octave weights, halving each step. */
export const FBM_WEIGHTS = [0.5, 0.25, 0.125, 0.0625] as const;

/** Frequency multipliers applied between consecutive octaves. Deliberately not powers of two. */
const FBM_LACUNARITY = [2.32, 3.03, 2.61] as const;

const FBM_WEIGHT_SUM = FBM_WEIGHTS.reduce((a, b) => a + b, 0);

export function rotate(v: Vec3): Vec3 {
  const [r0, r1, r2] = ROTATION_ROWS;
  return { x: dot(r0, v), y: dot(r1, v), z: dot(r2, v) };
}

/**
 * Four octaves of value noise, normalized by the weight sum so the output stays near [0, 1].
 */
export function fractalBrownianMotion(x: Vec3): number {
  let p = rotate(x);
  let f = 0;

  for (let octave = 0; octave < FBM_WEIGHTS.length; octave++) {
    f += FBM_WEIGHTS[octave] * valueNoise(p);

    if (octave < FBM_LACUNARITY.length) {
      p = scale(p, FBM_LACUNARITY[octave]);
    }
  }

  return f / FBM_WEIGHT_SUM;
}
