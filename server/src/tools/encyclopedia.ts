import { z } from 'zod';
import type { KnowledgeSource, LookupResult, SourceResult } from '../types.js';
import { fetchJson, textOf, type JsonFetcher } from './shared/web.js';

const SearchSchema = z.object({
  query: z.object({
    search: z.array(z.object({ title: z.string() }))
  })
});

const SummarySchema = z.object({
  type: z.string().optional(),
  extract: z.string().optional()
});

export interface EncyclopediaOptions {
  apiUrl: string;
  summaryUrl: string;
  timeoutMs: number;
  userAgent: string;
  fetcher?: JsonFetcher;
}

export interface EncyclopediaClient {
  searchTitle(query: string, signal?: AbortSignal): Promise<string>;
  fetchSummary(title: string, signal?: AbortSignal): Promise<string>;
}

export function encyclopediaLabel(title: string): string {
  return `Wikipedia: ${title}`;
}

export function createEncyclopediaClient(opts: EncyclopediaOptions): EncyclopediaClient {
  const fetcher = opts.fetcher ?? fetchJson;
  const base = { timeoutMs: opts.timeoutMs, userAgent: opts.userAgent };

  async function search(query: string, signal?: AbortSignal): Promise<LookupResult<string>> {
    const url = new URL(opts.apiUrl);
    url.searchParams.set('action', 'query');
    url.searchParams.set('list', 'search');
    url.searchParams.set('srsearch', query);
    url.searchParams.set('srlimit', '1');
    url.searchParams.set('format', 'json');

    const res = await fetcher(url.toString(), { ...base, signal });
    if (res.status !== 'success') return res;
    const parsed = SearchSchema.safeParse(res.value);
    if (!parsed.success) return { status: 'failure', reason: 'malformed search payload' };
    const title = parsed.data.query.search[0]?.title.trim();
    return title ? { status: 'success', value: title } : { status: 'empty' };
  }

  async function summary(title: string, signal?: AbortSignal): Promise<LookupResult<string>> {
    const url = `${opts.summaryUrl.replace(/\/?$/, '/')}${encodeURIComponent(title.replace(/ /g, '_'))}`;
    const res = await fetcher(url, { ...base, signal });
    if (res.status !== 'success') return res;
    const parsed = SummarySchema.safeParse(res.value);
    if (!parsed.success) return { status: 'failure', reason: 'malformed summary payload' };
    if (parsed.data.type === 'disambiguation') return { status: 'empty' };
    const extract = parsed.data.extract?.trim();
    return extract ? { status: 'success', value: extract } : { status: 'empty' };
  }

  return {
    async searchTitle(query, signal) {
      return textOf(await search(query, signal), 'Wikipedia search');
    },
    async fetchSummary(title, signal) {
      if (!title.trim()) return '';
      return textOf(await summary(title, signal), 'Wikipedia summary');
    }
  };
}

export function createEncyclopediaSource(opts: EncyclopediaOptions): KnowledgeSource {
  const client = createEncyclopediaClient(opts);
  return {
    name: 'encyclopedia',
    async lookup(query: string, signal?: AbortSignal): Promise<SourceResult> {
      const title = await client.searchTitle(query, signal);
      if (!title) return { answer: '', source: '' };
      const answer = await client.fetchSummary(title, signal);
      return { answer, source: answer ? encyclopediaLabel(title) : '' };
    }
  };
}
