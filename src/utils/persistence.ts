export function safeJsonParse(raw: string): unknown | null {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return null;
  }
}

export function readLocalStorageJson(key: string): unknown | null {
  if (typeof window === 'undefined') return null;

  try {
    const raw = window.localStorage.getItem(key);
    if (!raw) return null;
    return safeJsonParse(raw);
  } catch {
    return null;
  }
}

export function writeLocalStorageJson(key: string, value: unknown): void {
  if (typeof window === 'undefined') return;

  try {
    window.localStorage.setItem(key, JSON.stringify(value));
  } catch (e) {
    // Quota or blocked storage; the value just won't survive a reload.
    console.warn(`[storage] Failed to write ${key}`, e);
  }
}

export function removeLocalStorageItem(key: string): void {
  if (typeof window === 'undefined') return;

  try {
    window.localStorage.removeItem(key);
  } catch (e) {
    console.warn(`[storage] Failed to remove ${key}`, e);
  }
}
