import { distanceFieldNormal } from './distanceField';
import type { SceneConfig } from './scene';
import { DEFAULT_SCENE, validateRenderRequest } from './scene';
import { sphereTrace } from './sphereTrace';
import type { Vec3 } from './vec3';
import { dot, normalize, scale, sub } from './vec3';

/** Floats per pixel in a ColorBuffer (r, g, b). */
export const COLOR_CHANNELS = 3;

/**
 * Linear float image, row-major, three floats per pixel.
 *
 * Components are not clamped here; packing to bytes does that.
 */
export type ColorBuffer = {
  width: number;
  height: number;
  data: Float32Array;
};

/** A horizontal strip of the image rendered on its own. */
export type RenderedBand = {
  /** Colors for rows [startRow, endRow), row-major. */
  colors: Float32Array;
  /** Number of pixels whose ray hit the surface. */
  hits: number;
};

export type RowRange = { startRow: number; endRow: number };

/**
 * Pinhole camera direction for pixel (i, j); +y up, looking down -z.
 */
export function cameraRayDirection(i: number, j: number, width: number, height: number, fov: number): Vec3 {
  const x = i + 0.5 - width / 2;
  const y = -(j + 0.5) + height / 2;
  const z = -height / (2 * Math.tan(fov / 2));
  return normalize({ x, y, z });
}

/**
 * Shade a hit point with the scene's point light, or return the background on a miss.
 */
export function shadePixel(dir: Vec3, scene: SceneConfig): { color: Vec3; hit: boolean } {
  const trace = sphereTrace(scene.eye, dir, scene);
  if (trace.kind === 'miss') {
    return { color: scene.backgroundColor, hit: false };
  }

  const lightDir = normalize(sub(scene.lightPosition, trace.position));
  const intensity = Math.max(scene.ambient, dot(lightDir, distanceFieldNormal(trace.position, scene)));
  return { color: scale(scene.surfaceColor, intensity), hit: true };
}

/**
 * Render rows [startRow, endRow) of a width x height image.
 *
 * Each pixel depends only on its coordinates and the scene, so any split of rows gives the same
 * bytes as a single full-frame pass.
 */
export function renderRows(params: {
  width: number;
  height: number;
  fov: number;
  scene: SceneConfig;
  range: RowRange;
}): RenderedBand {
  const { width, height, fov, scene, range } = params;
  const startRow = Math.max(0, range.startRow);
  const endRow = Math.min(height, range.endRow);
  const rows = Math.max(0, endRow - startRow);

  const colors = new Float32Array(rows * width * COLOR_CHANNELS);
  let hits = 0;

  for (let j = startRow; j < endRow; j++) {
    const rowBase = (j - startRow) * width;

    for (let i = 0; i < width; i++) {
      const { color, hit } = shadePixel(cameraRayDirection(i, j, width, height, fov), scene);
      if (hit) hits++;

      const o = (rowBase + i) * COLOR_CHANNELS;
      colors[o] = color.x;
      colors[o + 1] = color.y;
      colors[o + 2] = color.z;
    }
  }

  return { colors, hits };
}

/**
 * Render the full frame synchronously on the calling thread.
 */
export function renderFramebuffer(
  width: number,
  height: number,
  fov: number,
  scene: SceneConfig = DEFAULT_SCENE,
): ColorBuffer {
  validateRenderRequest({ width, height, fov });

  const { colors } = renderRows({ width, height, fov, scene, range: { startRow: 0, endRow: height } });
  return { width, height, data: colors };
}

/**
 * Read one pixel's color back out of a ColorBuffer.
 */
export function colorAt(buffer: ColorBuffer, i: number, j: number): Vec3 {
  const o = (j * buffer.width + i) * COLOR_CHANNELS;
  return { x: buffer.data[o] ?? 0, y: buffer.data[o + 1] ?? 0, z: buffer.data[o + 2] ?? 0 };
}
