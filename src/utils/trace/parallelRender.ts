import { debugTraceLog } from '../debugTrace';
import type { ColorBuffer, RenderedBand, RowRange } from './framebuffer';
import { COLOR_CHANNELS, renderRows } from './framebuffer';
import type { SceneConfig } from './scene';
import { DEFAULT_SCENE, validateRenderRequest } from './scene';

export type RenderProgress = { completedRows: number; totalRows: number };

export type BandTask = {
  width: number;
  height: number;
  fov: number;
  scene: SceneConfig;
  range: RowRange;
};

/**
 * Renders one band somewhere (this thread, a worker, …) and resolves with its colors.
 *
 * Runners should check `signal` before starting work they have queued.
 */
export type BandRunner = (task: BandTask, signal?: AbortSignal) => Promise<RenderedBand>;

export type ParallelRenderResult = {
  buffer: ColorBuffer;
  hits: number;
};

export const DEFAULT_BAND_ROWS = 16;

function yieldToMain(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

function assertNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new Error('Render cancelled');
  }
}

/**
 * Split `height` rows into consecutive bands of at most `bandRows` rows.
 */
export function planRowBands(height: number, bandRows: number): RowRange[] {
  const size = Math.max(1, Math.floor(bandRows));
  const bands: RowRange[] = [];
  for (let startRow = 0; startRow < height; startRow += size) {
    bands.push({ startRow, endRow: Math.min(height, startRow + size) });
  }
  return bands;
}

/**
 * Band runner that renders on the calling thread, yielding to the event loop before each band
 * so the UI stays responsive.
 */
export const runBandInProcess: BandRunner = async (task, signal) => {
  await yieldToMain();
  assertNotAborted(signal);
  return renderRows(task);
};

/**
 * Fan rows out to `runBand` in bands and join the results into one ColorBuffer.
 *
 * Bands write disjoint slices of the output, so completion order does not matter.
 */
export async function renderFramebufferParallel(params: {
  width: number;
  height: number;
  fov: number;
  scene?: SceneConfig;
  bandRows?: number;
  runBand?: BandRunner;
  signal?: AbortSignal;
  onProgress?: (p: RenderProgress) => void;
  debug?: boolean;
}): Promise<ParallelRenderResult> {
  const { width, height, fov, signal, onProgress } = params;
  const scene = params.scene ?? DEFAULT_SCENE;
  const runBand = params.runBand ?? runBandInProcess;
  const debug = params.debug ?? false;

  validateRenderRequest({ width, height, fov });
  assertNotAborted(signal);

  const bands = planRowBands(height, params.bandRows ?? DEFAULT_BAND_ROWS);
  const rowStride = width * COLOR_CHANNELS;
  const data = new Float32Array(height * rowStride);

  const started = performance.now();
  debugTraceLog('render:start', { width, height, fov, bands: bands.length }, debug);

  let completedRows = 0;
  let hits = 0;

  // Bands still queued behind a failed one are dropped instead of rendered.
  const bandController = new AbortController();
  const bandSignal = bandController.signal;
  const forwardAbort = () => bandController.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    await Promise.all(
      bands.map(async (range) => {
        assertNotAborted(bandSignal);

        const band = await runBand({ width, height, fov, scene, range }, bandSignal);
        assertNotAborted(bandSignal);

        const expected = (range.endRow - range.startRow) * rowStride;
        if (band.colors.length !== expected) {
          throw new Error(
            `Band rows ${range.startRow}-${range.endRow} returned ${band.colors.length} floats, expected ${expected}`,
          );
        }

        data.set(band.colors, range.startRow * rowStride);
        hits += band.hits;
        completedRows += range.endRow - range.startRow;

        debugTraceLog('render:band', { ...range, hits: band.hits }, debug);
        onProgress?.({ completedRows, totalRows: height });
      }),
    );
  } catch (err) {
    bandController.abort();
    throw err;
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
  }

  debugTraceLog('render:done', { width, height, hits, ms: Math.round(performance.now() - started) }, debug);

  return { buffer: { width, height, data }, hits };
}
