import { signedDistance } from './distanceField';
import type { SceneConfig } from './scene';
import { DEFAULT_SCENE } from './scene';
import type { Vec3 } from './vec3';
import { add, scale } from './vec3';

export type TraceHit = { kind: 'hit'; position: Vec3; steps: number };
export type TraceMiss = { kind: 'miss'; steps: number };

/** Outcome of marching one ray. A miss is a regular result, not a failure. */
export type TraceResult = TraceHit | TraceMiss;

/**
 * March from `origin` along the unit vector `dir` until the field goes negative.
 *
 * Returns the first sample past the crossing; there is no bisection back to the exact root,
 * so silhouettes show some stair-stepping at grazing angles.
 */
export function sphereTrace(origin: Vec3, dir: Vec3, scene: SceneConfig = DEFAULT_SCENE): TraceResult {
  let pos = origin;

  for (let i = 0; i < scene.maxSteps; i++) {
    const d = signedDistance(pos, scene);
    if (d < 0) {
      return { kind: 'hit', position: pos, steps: i + 1 };
    }
    pos = add(pos, scale(dir, Math.max(d * scene.stepScale, scene.minStep)));
  }

  return { kind: 'miss', steps: scene.maxSteps };
}
