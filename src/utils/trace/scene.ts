import type { Vec3 } from './vec3';
import { v3 } from './vec3';

/**
 * Everything a render reads besides the image size.
 *
 * Passed explicitly into each entry point so concurrent renders with different scenes never interfere.
 */
export type SceneConfig = {
  /** Radius of the undisplaced sphere. */
  sphereRadius: number;
  /** Depth of the fbm displacement (pushes the surface inward). */
  noiseAmplitude: number;
  /** Spatial frequency the fbm is sampled at. Higher is rougher. */
  noiseFrequency: number;

  eye: Vec3;
  lightPosition: Vec3;

  /** Lower bound on the diffuse term so unlit faces never go fully black. */
  ambient: number;
  surfaceColor: Vec3;
  backgroundColor: Vec3;

  /** Step budget per ray. */
  maxSteps: number;
  /** Fraction of the distance estimate advanced per step (the field is not a true Euclidean distance). */
  stepScale: number;
  /** Smallest advance per step. Guarantees forward progress where the field is shallow. */
  minStep: number;

  /** Forward-difference offset for surface normals. */
  normalEpsilon: number;
};

export const DEFAULT_SCENE: Readonly<SceneConfig> = Object.freeze({
  sphereRadius: 1.5,
  noiseAmplitude: 1.0,
  noiseFrequency: 3.4,
  eye: v3(0, 0, 3),
  lightPosition: v3(0, 10, 10),
  ambient: 0.4,
  surfaceColor: v3(1, 1, 1),
  backgroundColor: v3(0.3, 0.9, 0.2),
  maxSteps: 128,
  stepScale: 0.1,
  minStep: 0.01,
  normalEpsilon: 0.1,
});

export type RenderRequest = { width: number; height: number; fov: number };

function isFiniteVec3(v: Vec3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

/**
 * Reject image sizes and field-of-view values the renderer has no meaning for.
 */
export function validateRenderRequest(req: RenderRequest): void {
  const { width, height, fov } = req;

  if (!Number.isInteger(width) || width <= 0) {
    throw new Error(`Invalid render width: ${width} (expected a positive integer)`);
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw new Error(`Invalid render height: ${height} (expected a positive integer)`);
  }
  if (!Number.isFinite(fov) || fov <= 0 || fov >= Math.PI) {
    throw new Error(`Invalid field of view: ${fov} (expected radians in (0, π))`);
  }
}

/**
 * Merge overrides onto DEFAULT_SCENE and validate the result.
 */
export function resolveSceneConfig(overrides?: Partial<SceneConfig>): SceneConfig {
  const scene: SceneConfig = { ...DEFAULT_SCENE, ...(overrides ?? {}) };

  const scalars: Array<[keyof SceneConfig, number]> = [
    ['sphereRadius', scene.sphereRadius],
    ['noiseAmplitude', scene.noiseAmplitude],
    ['noiseFrequency', scene.noiseFrequency],
    ['ambient', scene.ambient],
    ['maxSteps', scene.maxSteps],
    ['stepScale', scene.stepScale],
    ['minStep', scene.minStep],
    ['normalEpsilon', scene.normalEpsilon],
  ];
  for (const [key, value] of scalars) {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid scene ${key}: ${value}`);
    }
  }

  const vectors: Array<[keyof SceneConfig, Vec3]> = [
    ['eye', scene.eye],
    ['lightPosition', scene.lightPosition],
    ['surfaceColor', scene.surfaceColor],
    ['backgroundColor', scene.backgroundColor],
  ];
  for (const [key, value] of vectors) {
    if (!isFiniteVec3(value)) {
      throw new Error(`Invalid scene ${key}: (${value.x}, ${value.y}, ${value.z})`);
    }
  }

  if (scene.sphereRadius <= 0) throw new Error(`Invalid scene sphereRadius: ${scene.sphereRadius}`);
  if (!Number.isInteger(scene.maxSteps) || scene.maxSteps < 1) {
    throw new Error(`Invalid scene maxSteps: ${scene.maxSteps}`);
  }
  if (scene.stepScale <= 0) throw new Error(`Invalid scene stepScale: ${scene.stepScale}`);
  if (scene.minStep <= 0) throw new Error(`Invalid scene minStep: ${scene.minStep}`);
  if (scene.normalEpsilon <= 0) throw new Error(`Invalid scene normalEpsilon: ${scene.normalEpsilon}`);

  return scene;
}
