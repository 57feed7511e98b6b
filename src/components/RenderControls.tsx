import { ChevronLeft, ChevronRight, Download, Play, RotateCcw, Square } from 'lucide-react';
import type { RenderSettings } from '../utils/renderSettings';
import { RENDER_LIMITS } from '../utils/renderSettings';

interface StepFieldProps {
  label: string;
  value: string;
  onDecrement: () => void;
  onIncrement: () => void;
  disabled?: boolean;
}

function StepField({ label, value, onDecrement, onIncrement, disabled = false }: StepFieldProps) {
  const chevronClass =
    'p-0.5 rounded hover:bg-[var(--bg-tertiary)] text-[var(--text-secondary)] disabled:opacity-40';

  return (
    <div className="flex items-center gap-0.5">
      <span className="text-[var(--text-secondary)] text-[10px] w-12">{label}</span>
      <button
        type="button"
        aria-label={`Decrease ${label}`}
        className={chevronClass}
        onClick={onDecrement}
        disabled={disabled}
      >
        <ChevronLeft className="w-3 h-3" />
      </button>
      <span className="text-[var(--text-primary)] text-[10px] text-center font-mono tabular-nums w-10">{value}</span>
      <button
        type="button"
        aria-label={`Increase ${label}`}
        className={chevronClass}
        onClick={onIncrement}
        disabled={disabled}
      >
        <ChevronRight className="w-3 h-3" />
      </button>
    </div>
  );
}

interface RenderControlsProps {
  settings: RenderSettings;
  isRunning: boolean;
  canSave: boolean;
  onUpdate: (partial: Partial<RenderSettings>) => void;
  onRender: () => void;
  onCancel: () => void;
  onSave: () => void;
  onReset: () => void;
}

export function RenderControls({
  settings,
  isRunning,
  canSave,
  onUpdate,
  onRender,
  onCancel,
  onSave,
  onReset,
}: RenderControlsProps) {
  const { WIDTH, HEIGHT, FOV_DEGREES, WORKERS } = RENDER_LIMITS;

  const buttonClass =
    'flex items-center gap-1 px-2 py-1 rounded text-xs bg-[var(--bg-tertiary)] text-[var(--text-primary)] hover:opacity-90 disabled:opacity-40';

  return (
    <div className="flex flex-wrap items-center gap-3">
      <StepField
        label="Width"
        value={String(settings.width)}
        disabled={isRunning}
        onDecrement={() => onUpdate({ width: settings.width - WIDTH.STEP })}
        onIncrement={() => onUpdate({ width: settings.width + WIDTH.STEP })}
      />
      <StepField
        label="Height"
        value={String(settings.height)}
        disabled={isRunning}
        onDecrement={() => onUpdate({ height: settings.height - HEIGHT.STEP })}
        onIncrement={() => onUpdate({ height: settings.height + HEIGHT.STEP })}
      />
      <StepField
        label="FOV"
        value={`${settings.fovDegrees}°`}
        disabled={isRunning}
        onDecrement={() => onUpdate({ fovDegrees: settings.fovDegrees - FOV_DEGREES.STEP })}
        onIncrement={() => onUpdate({ fovDegrees: settings.fovDegrees + FOV_DEGREES.STEP })}
      />
      <StepField
        label="Workers"
        value={String(settings.workerCount)}
        disabled={isRunning}
        onDecrement={() => onUpdate({ workerCount: settings.workerCount - WORKERS.STEP })}
        onIncrement={() => onUpdate({ workerCount: settings.workerCount + WORKERS.STEP })}
      />

      <div className="flex items-center gap-1">
        {isRunning ? (
          <button type="button" className={buttonClass} onClick={onCancel}>
            <Square className="w-3 h-3" />
            Cancel
          </button>
        ) : (
          <button type="button" className={buttonClass} onClick={onRender}>
            <Play className="w-3 h-3" />
            Render
          </button>
        )}
        <button type="button" className={buttonClass} onClick={onSave} disabled={!canSave || isRunning}>
          <Download className="w-3 h-3" />
          Save PNG
        </button>
        <button type="button" className={buttonClass} onClick={onReset} disabled={isRunning} title="Reset settings">
          <RotateCcw className="w-3 h-3" />
        </button>
      </div>
    </div>
  );
}
