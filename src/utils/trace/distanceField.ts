import { fractalBrownianMotion } from './fbm';
import type { SceneConfig } from './scene';
import { DEFAULT_SCENE } from './scene';
import type { Vec3 } from './vec3';
import { norm, normalize, scale } from './vec3';

/**
 * Signed distance to the displaced sphere: negative inside, positive outside.
 *
 * The displacement only ever pulls the surface inward, so the radius ranges over
 * [sphereRadius - noiseAmplitude, sphereRadius].
 */
export function signedDistance(p: Vec3, scene: SceneConfig = DEFAULT_SCENE): number {
  const displacement = -fractalBrownianMotion(scale(p, scene.noiseFrequency)) * scene.noiseAmplitude;
  return norm(p) - (scene.sphereRadius + displacement);
}

/**
 * Surface normal from forward differences of the distance field (four field evaluations).
 */
export function distanceFieldNormal(pos: Vec3, scene: SceneConfig = DEFAULT_SCENE): Vec3 {
  const eps = scene.normalEpsilon;
  const d = signedDistance(pos, scene);

  const nx = signedDistance({ x: pos.x + eps, y: pos.y, z: pos.z }, scene) - d;
  const ny = signedDistance({ x: pos.x, y: pos.y + eps, z: pos.z }, scene) - d;
  const nz = signedDistance({ x: pos.x, y: pos.y, z: pos.z + eps }, scene) - d;

  return normalize({ x: nx, y: ny, z: nz });
}
