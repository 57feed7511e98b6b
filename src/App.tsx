import { useCallback, useEffect, useRef } from 'react';
import { AlertCircle, Circle, Loader2 } from 'lucide-react';
import { FramebufferCanvas } from './components/FramebufferCanvas';
import { RenderControls } from './components/RenderControls';
import { useFramebufferRender } from './hooks/useFramebufferRender';
import { useRenderSettings } from './hooks/useRenderSettings';

function downloadBlob(blob: Blob, filename: string): void {
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  a.click();
  // Best-effort cleanup.
  setTimeout(() => URL.revokeObjectURL(url), 2000);
}

function App() {
  const { settings, update, reset } = useRenderSettings();
  const { isRunning, progress, result, error, run, cancel } = useFramebufferRender();
  const canvasRef = useRef<HTMLCanvasElement | null>(null);

  const settingsRef = useRef(settings);
  useEffect(() => {
    settingsRef.current = settings;
  }, [settings]);

  const handleRender = useCallback(() => {
    void run(settingsRef.current);
  }, [run]);

  // Render the default frame once on mount.
  useEffect(() => {
    handleRender();
  }, [handleRender]);

  const handleSave = useCallback(() => {
    const canvas = canvasRef.current;
    if (!canvas || !result) return;

    canvas.toBlob((blob) => {
      if (!blob) {
        console.error('[Viewer] Failed to encode PNG');
        return;
      }
      downloadBlob(blob, `sphere_${result.width}x${result.height}.png`);
    }, 'image/png');
  }, [result]);

  const pct = progress && progress.totalRows > 0 ? Math.round((progress.completedRows / progress.totalRows) * 100) : 0;

  return (
    <div className="h-screen flex flex-col bg-[var(--bg-primary)] text-[var(--text-primary)]">
      <header className="flex items-center justify-between gap-4 px-4 py-2 border-b border-[var(--border-color)]">
        <div className="flex items-center gap-2">
          <Circle className="w-5 h-5 text-[var(--accent)]" />
          <h1 className="text-sm font-semibold">Sphere Tracer</h1>
        </div>
        <RenderControls
          settings={settings}
          isRunning={isRunning}
          canSave={result !== null}
          onUpdate={update}
          onRender={handleRender}
          onCancel={cancel}
          onSave={handleSave}
          onReset={reset}
        />
      </header>

      <main className="flex-1 flex items-center justify-center overflow-auto p-4">
        {result ? (
          <FramebufferCanvas
            ref={canvasRef}
            pixels={result.pixels}
            width={result.width}
            height={result.height}
            className="max-w-full max-h-full border border-[var(--border-color)]"
          />
        ) : (
          !isRunning && !error && <p className="text-xs text-[var(--text-secondary)]">No image yet.</p>
        )}
      </main>

      <footer className="flex items-center gap-3 px-4 py-1 text-[10px] text-[var(--text-secondary)] border-t border-[var(--border-color)]">
        {isRunning && (
          <span className="flex items-center gap-1" role="status">
            <Loader2 className="w-3 h-3 animate-spin" />
            Rendering… {pct}%
          </span>
        )}
        {error && (
          <span className="flex items-center gap-1 text-red-400" role="alert">
            <AlertCircle className="w-3 h-3" />
            {error}
          </span>
        )}
        {result && !isRunning && (
          <span>
            {result.width}×{result.height} · {result.hits} surface hits · {Math.round(result.durationMs)} ms
          </span>
        )}
      </footer>
    </div>
  );
}

export default App;
