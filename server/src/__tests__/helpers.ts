import { vi } from 'vitest';
import type { SourceResult } from '../types.js';

/**
 * A source that answers after `delayMs`, or answers empty as soon as the
 * caller aborts it. `delayMs = Infinity` never answers on its own.
 */
export function fakeSource(name: string, answer: string, delayMs: number, source = name) {
  let aborted = false;
  const lookup = vi.fn((_query: string, signal?: AbortSignal) =>
    new Promise<SourceResult>(resolve => {
      const timer = Number.isFinite(delayMs) ? setTimeout(() => resolve({ answer, source }), delayMs) : undefined;
      signal?.addEventListener('abort', () => {
        aborted = true;
        clearTimeout(timer);
        resolve({ answer: '', source: '' });
      });
    })
  );
  return { name, lookup, aborted: () => aborted };
}
