import { describe, expect, it } from 'vitest';
import { lerp, smoothstepWeight } from '../src/utils/math';
import { hash, valueNoise } from '../src/utils/trace/valueNoise';
import { v3 } from '../src/utils/trace/vec3';

describe('math/lerp', () => {
  it('blends inside [0, 1]', () => {
    expect(lerp(2, 4, 0.5)).toBe(3);
    expect(lerp(2, 4, 0)).toBe(2);
    expect(lerp(2, 4, 1)).toBe(4);
  });

  it('clamps t instead of extrapolating', () => {
    expect(lerp(0, 10, -1)).toBe(0);
    expect(lerp(0, 10, 2)).toBe(10);
  });

  it('smoothstepWeight fixes the endpoints and the midpoint', () => {
    expect(smoothstepWeight(0)).toBe(0);
    expect(smoothstepWeight(1)).toBe(1);
    expect(smoothstepWeight(0.5)).toBe(0.5);
    expect(smoothstepWeight(0.25)).toBeCloseTo(0.15625, 12);
  });
});

describe('trace/valueNoise', () => {
  it('hash is deterministic', () => {
    for (const n of [0, 1, 57, 113.5, -42, 1e4]) {
      expect(Object.is(hash(n), hash(n))).toBe(true);
    }
  });

  it('hash matches the sine formula', () => {
    expect(hash(0)).toBe(0);
    expect(hash(1)).toBeCloseTo(0.5462073519520345, 8);
  });

  it('hash stays in [0, 1)', () => {
    for (let n = -500; n <= 500; n += 7.3) {
      const h = hash(n);
      expect(h).toBeGreaterThanOrEqual(0);
      expect(h).toBeLessThan(1);
    }
  });

  it('returns the lattice hash exactly on lattice points', () => {
    // n = 2 + 3*57 + 4*113
    expect(valueNoise(v3(2, 3, 4))).toBe(hash(625));
    expect(valueNoise(v3(0, 0, 0))).toBe(hash(0));
  });

  it('samples the cell centre', () => {
    expect(valueNoise(v3(0.5, 0.5, 0.5))).toBeCloseTo(0.534607360232485, 8);
  });

  it('is continuous across cell boundaries on every axis', () => {
    const eps = 1e-9;
    const cases = [
      [v3(1 - eps, 0.3, 0.7), v3(1, 0.3, 0.7)],
      [v3(0.3, 2 - eps, 0.7), v3(0.3, 2, 0.7)],
      [v3(0.3, 0.7, -1 - eps), v3(0.3, 0.7, -1)],
    ] as const;

    for (const [left, right] of cases) {
      expect(valueNoise(left)).toBeCloseTo(valueNoise(right), 6);
    }
  });

  it('stays within [0, 1]', () => {
    for (let i = 0; i < 200; i++) {
      const p = v3(i * 0.37 - 20, i * 0.11 + 3, -i * 0.23);
      const n = valueNoise(p);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThanOrEqual(1);
    }
  });
});
