import { useCallback, useEffect, useRef, useState } from 'react';
import { debugTraceLog, isDebugTraceEnabled } from '../utils/debugTrace';
import type { RenderSettings } from '../utils/renderSettings';
import { fovDegreesToRadians } from '../utils/renderSettings';
import type { BandRunner, RenderProgress } from '../utils/trace/parallelRender';
import { renderFramebufferParallel, runBandInProcess } from '../utils/trace/parallelRender';
import type { PixelBuffer } from '../utils/trace/pixels';
import { convertFramebufferToPixels } from '../utils/trace/pixels';
import type { SceneConfig } from '../utils/trace/scene';
import { DEFAULT_SCENE } from '../utils/trace/scene';
import type { WorkerBandRunner } from '../utils/trace/workerPool';
import { createWorkerBandRunner } from '../utils/trace/workerPool';

export type RenderedImage = {
  width: number;
  height: number;
  pixels: PixelBuffer;
  hits: number;
  durationMs: number;
};

export type UseFramebufferRenderState = {
  isRunning: boolean;
  progress: RenderProgress | null;
  result: RenderedImage | null;
  error: string | null;
};

function canUseWorkers(): boolean {
  return typeof Worker !== 'undefined';
}

export function useFramebufferRender(scene: SceneConfig = DEFAULT_SCENE) {
  const [state, setState] = useState<UseFramebufferRenderState>({
    isRunning: false,
    progress: null,
    result: null,
    error: null,
  });

  const abortRef = useRef<AbortController | null>(null);
  const poolRef = useRef<WorkerBandRunner | null>(null);
  const lastProgressUpdateMsRef = useRef(0);

  // The pool outlives individual renders; rebuild it only when the requested size changes.
  const getRunner = useCallback((workerCount: number): BandRunner => {
    if (workerCount <= 1 || !canUseWorkers()) {
      return runBandInProcess;
    }

    const existing = poolRef.current;
    if (existing && existing.workerCount === workerCount) {
      return existing.runBand;
    }

    existing?.dispose();
    const pool = createWorkerBandRunner({ workerCount });
    poolRef.current = pool;
    return pool.runBand;
  }, []);

  useEffect(() => {
    return () => {
      abortRef.current?.abort();
      poolRef.current?.dispose();
      poolRef.current = null;
    };
  }, []);

  const cancel = useCallback(() => {
    abortRef.current?.abort();
  }, []);

  const clear = useCallback(() => {
    setState({ isRunning: false, progress: null, result: null, error: null });
  }, []);

  const run = useCallback(
    async (settings: RenderSettings): Promise<RenderedImage | null> => {
      abortRef.current?.abort();

      const controller = new AbortController();
      abortRef.current = controller;

      const { width, height } = settings;
      const debug = isDebugTraceEnabled();

      setState((s) => ({
        ...s,
        isRunning: true,
        progress: { completedRows: 0, totalRows: height },
        error: null,
      }));

      lastProgressUpdateMsRef.current = 0;
      const started = performance.now();

      try {
        const { buffer, hits } = await renderFramebufferParallel({
          width,
          height,
          fov: fovDegreesToRadians(settings.fovDegrees),
          scene,
          bandRows: settings.bandRows,
          runBand: getRunner(settings.workerCount),
          signal: controller.signal,
          debug,
          onProgress: (p) => {
            const now = Date.now();
            const isFinal = p.completedRows >= p.totalRows;

            // Avoid spamming React renders.
            if (!isFinal && now - lastProgressUpdateMsRef.current < 100) {
              return;
            }
            lastProgressUpdateMsRef.current = now;

            setState((s) => (s.isRunning ? { ...s, progress: p } : s));
          },
        });

        const result: RenderedImage = {
          width,
          height,
          pixels: convertFramebufferToPixels(buffer, width, height),
          hits,
          durationMs: performance.now() - started,
        };
        debugTraceLog('viewer:frame', { width, height, hits, ms: Math.round(result.durationMs) }, debug);

        if (abortRef.current === controller) {
          setState({ isRunning: false, progress: null, result, error: null });
        }
        return result;
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);

        // A newer run superseded this one; leave its state alone.
        if (abortRef.current === controller) {
          setState((s) => ({ ...s, isRunning: false, progress: null, error: msg }));
        }
        return null;
      } finally {
        if (abortRef.current === controller) {
          abortRef.current = null;
        }
      }
    },
    [getRunner, scene],
  );

  return {
    ...state,
    run,
    cancel,
    clear,
  };
}
