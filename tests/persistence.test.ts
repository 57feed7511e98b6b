import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  readLocalStorageJson,
  removeLocalStorageItem,
  safeJsonParse,
  writeLocalStorageJson,
} from '../src/utils/persistence';

beforeEach(() => {
  localStorage.clear();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('persistence utils', () => {
  it('safeJsonParse returns null on invalid JSON', () => {
    expect(safeJsonParse('{')).toBeNull();
    expect(safeJsonParse('[1,2]')).toEqual([1, 2]);
  });

  it('readLocalStorageJson returns parsed JSON or null', () => {
    expect(readLocalStorageJson('missing')).toBeNull();

    writeLocalStorageJson('k1', { a: 1 });
    expect(readLocalStorageJson('k1')).toEqual({ a: 1 });

    localStorage.setItem('k2', '{');
    expect(readLocalStorageJson('k2')).toBeNull();
  });

  it('removeLocalStorageItem drops the key', () => {
    writeLocalStorageJson('k1', 1);
    removeLocalStorageItem('k1');
    expect(localStorage.getItem('k1')).toBeNull();
  });

  it('warns instead of throwing when storage rejects a write', () => {
    vi.spyOn(Storage.prototype, 'setItem').mockImplementation(() => {
      throw new Error('quota exceeded');
    });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(() => writeLocalStorageJson('k1', { a: 1 })).not.toThrow();
    expect(warn).toHaveBeenCalledWith('[storage] Failed to write k1', expect.any(Error));
  });
});
