export type Vec3 = { readonly x: number; readonly y: number; readonly z: number };

export const ZERO: Vec3 = { x: 0, y: 0, z: 0 };

export function v3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(a: Vec3, s: number): Vec3 {
  return { x: a.x * s, y: a.y * s, z: a.z * s };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function norm(a: Vec3): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Unit vector in the direction of `a`.
 *
 * Zero-length input returns the zero vector; callers must accept a zero-length result.
 */
export function normalize(a: Vec3): Vec3 {
  const n = norm(a);
  if (!Number.isFinite(n) || n <= 0) return ZERO;
  return { x: a.x / n, y: a.y / n, z: a.z / n };
}
