import { useCallback, useState } from 'react';
import type { RenderSettings } from '../utils/renderSettings';
import {
  DEFAULT_RENDER_SETTINGS,
  clearRenderSettings,
  parseRenderSettings,
  readRenderSettings,
  writeRenderSettings,
} from '../utils/renderSettings';

export function useRenderSettings() {
  const [settings, setSettings] = useState<RenderSettings>(() => readRenderSettings());

  const update = useCallback((partial: Partial<RenderSettings>) => {
    setSettings((prev) => {
      const next = parseRenderSettings({ ...prev, ...partial });
      writeRenderSettings(next);
      return next;
    });
  }, []);

  const reset = useCallback(() => {
    clearRenderSettings();
    setSettings(DEFAULT_RENDER_SETTINGS);
  }, []);

  return { settings, update, reset };
}
