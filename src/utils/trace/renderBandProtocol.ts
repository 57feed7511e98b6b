import type { RowRange } from './framebuffer';
import { renderRows } from './framebuffer';
import type { SceneConfig } from './scene';
import { validateRenderRequest } from './scene';

/** One band of work, as posted to a render worker. */
export type RenderBandRequest = {
  id: number;
  width: number;
  height: number;
  fov: number;
  scene: SceneConfig;
  range: RowRange;
};

export type RenderBandResponse =
  | { id: number; ok: true; colors: Float32Array; hits: number }
  | { id: number; ok: false; message: string };

/**
 * Render a band request and wrap the outcome for posting back.
 *
 * Shared by the worker entry and by in-process fakes so both speak the same protocol.
 */
export function handleRenderBandRequest(req: RenderBandRequest): RenderBandResponse {
  try {
    validateRenderRequest(req);
    const { colors, hits } = renderRows(req);
    return { id: req.id, ok: true, colors, hits };
  } catch (e) {
    return { id: req.id, ok: false, message: e instanceof Error ? e.message : String(e) };
  }
}
