import fetch from 'node-fetch';
import type { LookupResult } from '../../types.js';

export interface FetchJsonOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
}

export type JsonFetcher = (url: string, opts: FetchJsonOptions) => Promise<LookupResult<unknown>>;

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export async function fetchJson(url: string, opts: FetchJsonOptions): Promise<LookupResult<unknown>> {
  if (opts.signal?.aborted) return { status: 'failure', reason: 'aborted' };

  const ctrl = new AbortController();
  let timedOut = false;
  const t = setTimeout(() => {
    timedOut = true;
    ctrl.abort();
  }, opts.timeoutMs);
  const onAbort = () => ctrl.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const res = await fetch(url, {
      headers: {
        'User-Agent': opts.userAgent,
        'Accept': 'application/json'
      },
      redirect: 'follow',
      signal: ctrl.signal
    });
    if (!res.ok) return { status: 'failure', reason: `HTTP ${res.status}` };
    const body = await res.text();
    if (!body.trim()) return { status: 'empty' };
    return { status: 'success', value: JSON.parse(body) };
  } catch (err) {
    if (timedOut) return { status: 'failure', reason: `timeout after ${opts.timeoutMs}ms` };
    if (ctrl.signal.aborted) return { status: 'failure', reason: 'aborted' };
    return { status: 'failure', reason: describeError(err) };
  } finally {
    clearTimeout(t);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}

/** Collapses a text lookup to its string, logging why nothing came back. */
export function textOf(result: LookupResult<string>, label: string): string {
  if (result.status === 'success') return result.value.trim();
  if (result.status === 'failure' && result.reason !== 'aborted') {
    console.warn(`${label} lookup failed: ${result.reason}`);
  }
  return '';
}
