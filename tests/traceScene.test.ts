import { describe, expect, it } from 'vitest';
import { DEFAULT_SCENE, resolveSceneConfig, validateRenderRequest } from '../src/utils/trace/scene';
import { v3 } from '../src/utils/trace/vec3';

describe('trace/scene', () => {
  it('defaults reproduce the classic scene', () => {
    expect(DEFAULT_SCENE).toEqual({
      sphereRadius: 1.5,
      noiseAmplitude: 1,
      noiseFrequency: 3.4,
      eye: { x: 0, y: 0, z: 3 },
      lightPosition: { x: 0, y: 10, z: 10 },
      ambient: 0.4,
      surfaceColor: { x: 1, y: 1, z: 1 },
      backgroundColor: { x: 0.3, y: 0.9, z: 0.2 },
      maxSteps: 128,
      stepScale: 0.1,
      minStep: 0.01,
      normalEpsilon: 0.1,
    });
    expect(Object.isFrozen(DEFAULT_SCENE)).toBe(true);
  });

  it('resolveSceneConfig merges overrides without touching the defaults', () => {
    const scene = resolveSceneConfig({ sphereRadius: 2, eye: v3(0, 1, 4) });
    expect(scene.sphereRadius).toBe(2);
    expect(scene.eye).toEqual({ x: 0, y: 1, z: 4 });
    expect(scene.noiseAmplitude).toBe(1);
    expect(DEFAULT_SCENE.sphereRadius).toBe(1.5);
  });

  it('resolveSceneConfig rejects values the tracer cannot use', () => {
    expect(() => resolveSceneConfig({ noiseFrequency: Number.NaN })).toThrow('Invalid scene noiseFrequency: NaN');
    expect(() => resolveSceneConfig({ sphereRadius: 0 })).toThrow('Invalid scene sphereRadius: 0');
    expect(() => resolveSceneConfig({ maxSteps: 0 })).toThrow('Invalid scene maxSteps: 0');
    expect(() => resolveSceneConfig({ maxSteps: 1.5 })).toThrow('Invalid scene maxSteps: 1.5');
    expect(() => resolveSceneConfig({ minStep: 0 })).toThrow('Invalid scene minStep: 0');
    expect(() => resolveSceneConfig({ stepScale: -1 })).toThrow('Invalid scene stepScale: -1');
    expect(() => resolveSceneConfig({ normalEpsilon: 0 })).toThrow('Invalid scene normalEpsilon: 0');
    expect(() => resolveSceneConfig({ lightPosition: v3(0, Number.POSITIVE_INFINITY, 0) })).toThrow(
      'Invalid scene lightPosition: (0, Infinity, 0)',
    );
  });

  it('validateRenderRequest accepts the default frame', () => {
    expect(() => validateRenderRequest({ width: 640, height: 480, fov: Math.PI / 3 })).not.toThrow();
  });

  it('validateRenderRequest rejects a field of view outside (0, π)', () => {
    expect(() => validateRenderRequest({ width: 1, height: 1, fov: 0 })).toThrow(
      'Invalid field of view: 0 (expected radians in (0, π))',
    );
    expect(() => validateRenderRequest({ width: 1, height: 1, fov: 4 })).toThrow('Invalid field of view: 4');
  });
});
