import { describe, expect, it } from 'vitest';
import { add, dot, norm, normalize, scale, sub, v3 } from '../src/utils/trace/vec3';

describe('trace/vec3', () => {
  it('adds, subtracts and scales componentwise', () => {
    expect(add(v3(1, 2, 3), v3(4, 5, 6))).toEqual({ x: 5, y: 7, z: 9 });
    expect(sub(v3(1, 2, 3), v3(4, 5, 6))).toEqual({ x: -3, y: -3, z: -3 });
    expect(scale(v3(1, -2, 3), 2)).toEqual({ x: 2, y: -4, z: 6 });
  });

  it('dot and norm', () => {
    expect(dot(v3(1, 2, 3), v3(4, 5, 6))).toBe(32);
    expect(norm(v3(3, 4, 12))).toBe(13);
  });

  it('normalize returns a unit vector', () => {
    const n = normalize(v3(0, 3, 4));
    expect(n.x).toBe(0);
    expect(n.y).toBeCloseTo(0.6, 12);
    expect(n.z).toBeCloseTo(0.8, 12);
    expect(norm(n)).toBeCloseTo(1, 12);
  });

  it('normalize maps the zero vector to the zero vector', () => {
    expect(normalize(v3(0, 0, 0))).toEqual({ x: 0, y: 0, z: 0 });
  });

  it('never mutates its inputs', () => {
    const a = v3(1, 1, 1);
    add(a, v3(1, 1, 1));
    scale(a, 5);
    normalize(a);
    expect(a).toEqual({ x: 1, y: 1, z: 1 });
  });
});
