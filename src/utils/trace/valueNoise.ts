import { lerp, smoothstepWeight } from '../math';
import type { Vec3 } from './vec3';

/** Seed strides for linearizing a lattice cell (x, y, z) into one scalar. */
const LATTICE_STRIDES = { x: 1, y: 57, z: 113 } as const;

/**
 * Sine-based pseudo-random value in [0, 1).
 *
 * NOTE: precision of `Math.sin` degrades for large |n|, so neighbouring seeds far from the origin
 * decorrelate poorly. Kept as-is so the surface matches the classic formulation.
 */
export function hash(n: number): number {
  const s = Math.sin(n) * 43758.5453;
  return s - Math.floor(s);
}

/**
 * Smoothed value noise: trilinear blend of hashed lattice values around `p`.
 *
 * The blend runs along x, then y, then z. Output is continuous in `p` and stays in [0, 1].
 */
export function valueNoise(p: Vec3): number {
  const cx = Math.floor(p.x);
  const cy = Math.floor(p.y);
  const cz = Math.floor(p.z);

  const fx = smoothstepWeight(p.x - cx);
  const fy = smoothstepWeight(p.y - cy);
  const fz = smoothstepWeight(p.z - cz);

  const n = cx * LATTICE_STRIDES.x + cy * LATTICE_STRIDES.y + cz * LATTICE_STRIDES.z;

  const sy = LATTICE_STRIDES.y;
  const sz = LATTICE_STRIDES.z;

  const near = lerp(lerp(hash(n), hash(n + 1), fx), lerp(hash(n + sy), hash(n + sy + 1), fx), fy);
  const far = lerp(
    lerp(hash(n + sz), hash(n + sz + 1), fx),
    lerp(hash(n + sz + sy), hash(n + sz + sy + 1), fx),
    fy,
  );

  return lerp(near, far, fz);
}
