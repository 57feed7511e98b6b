import type { RenderedBand } from './framebuffer';
import type { BandRunner } from './parallelRender';
import type { RenderBandRequest, RenderBandResponse } from './renderBandProtocol';

/** The slice of the Worker API the pool uses. */
export interface BandWorker {
  onmessage: ((event: MessageEvent<RenderBandResponse>) => void) | null;
  onerror: ((event: ErrorEvent) => void) | null;
  postMessage(message: RenderBandRequest): void;
  terminate(): void;
}

export type WorkerBandRunner = {
  runBand: BandRunner;
  workerCount: number;
  /** Terminate every worker and reject bands that have not finished. */
  dispose: () => void;
};

type PendingBand = {
  request: RenderBandRequest;
  signal?: AbortSignal;
  resolve: (band: RenderedBand) => void;
  reject: (err: Error) => void;
};

function createRenderWorker(): BandWorker {
  return new Worker(new URL('./renderBand.worker.ts', import.meta.url), { type: 'module' });
}

/**
 * Fixed pool of render workers. Each worker renders one band at a time; extra bands wait in a FIFO queue.
 */
export function createWorkerBandRunner(params: {
  workerCount: number;
  createWorker?: () => BandWorker;
}): WorkerBandRunner {
  const workerCount = Math.max(1, Math.floor(params.workerCount));
  const createWorker = params.createWorker ?? createRenderWorker;

  const workers: BandWorker[] = [];
  const idle: BandWorker[] = [];
  const inflight = new Map<BandWorker, PendingBand>();
  const queue: PendingBand[] = [];

  let nextId = 0;
  let disposed = false;

  const pump = () => {
    while (queue.length > 0) {
      const worker = idle.pop();
      if (!worker) return;

      const job = queue.shift();
      if (!job) {
        idle.push(worker);
        return;
      }

      if (job.signal?.aborted) {
        idle.push(worker);
        job.reject(new Error('Render cancelled'));
        continue;
      }

      inflight.set(worker, job);
      worker.postMessage(job.request);
    }
  };

  const remove = (list: BandWorker[], worker: BandWorker) => {
    const i = list.indexOf(worker);
    if (i !== -1) list.splice(i, 1);
  };

  // A worker that raised an error event (e.g. its module failed to load) may never answer again,
  // so it is dropped and replaced rather than returned to `idle`.
  const replace = (worker: BandWorker) => {
    worker.onmessage = null;
    worker.onerror = null;
    worker.terminate();
    remove(workers, worker);
    remove(idle, worker);
    if (!disposed) spawn();
  };

  const spawn = () => {
    const worker = createWorker();

    worker.onmessage = (event) => {
      const job = inflight.get(worker);
      // Stray message from an idle worker.
      if (!job) return;

      inflight.delete(worker);
      idle.push(worker);

      const res = event.data;
      if (job.request.id !== res.id) {
        job.reject(new Error(`Render worker answered band ${res.id}, expected ${job.request.id}`));
      } else if (res.ok) {
        job.resolve({ colors: res.colors, hits: res.hits });
      } else {
        job.reject(new Error(res.message));
      }
      pump();
    };

    worker.onerror = (event) => {
      const job = inflight.get(worker);
      inflight.delete(worker);
      replace(worker);
      job?.reject(new Error(event.message || 'Render worker failed'));
      pump();
    };

    workers.push(worker);
    idle.push(worker);
  };

  for (let i = 0; i < workerCount; i++) {
    spawn();
  }

  const runBand: BandRunner = (task, signal) => {
    if (disposed) {
      return Promise.reject(new Error('Render worker pool disposed'));
    }

    return new Promise<RenderedBand>((resolve, reject) => {
      queue.push({ request: { id: nextId++, ...task }, signal, resolve, reject });
      pump();
    });
  };

  const dispose = () => {
    if (disposed) return;
    disposed = true;

    for (const worker of workers) {
      worker.onmessage = null;
      worker.onerror = null;
      worker.terminate();
    }

    const err = new Error('Render worker pool disposed');
    for (const job of inflight.values()) job.reject(err);
    for (const job of queue) job.reject(err);
    inflight.clear();
    queue.length = 0;
    idle.length = 0;
  };

  return { runBand, workerCount, dispose };
}
