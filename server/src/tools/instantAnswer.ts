import { z } from 'zod';
import type { KnowledgeSource, LookupResult, SourceResult } from '../types.js';
import { fetchJson, textOf, type JsonFetcher } from './shared/web.js';

export const INSTANT_ANSWER_LABEL = 'DuckDuckGo';

const InstantAnswerSchema = z.object({
  AbstractText: z.string().optional(),
  RelatedTopics: z.array(z.object({ Text: z.string().optional() }).passthrough()).optional()
});

export type InstantAnswerPayload = z.infer<typeof InstantAnswerSchema>;

export interface InstantAnswerOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  fetcher?: JsonFetcher;
}

export function extractInstantAnswer(payload: InstantAnswerPayload): string {
  const abstract = payload.AbstractText?.trim();
  if (abstract) return abstract;
  for (const topic of payload.RelatedTopics ?? []) {
    const text = topic.Text?.trim();
    if (text) return text;
  }
  return '';
}

export function createInstantAnswerSource(opts: InstantAnswerOptions): KnowledgeSource {
  const fetcher = opts.fetcher ?? fetchJson;

  async function query(q: string, signal?: AbortSignal): Promise<LookupResult<string>> {
    const url = new URL(opts.baseUrl);
    url.searchParams.set('q', q);
    url.searchParams.set('format', 'json');
    url.searchParams.set('no_html', '1');
    url.searchParams.set('skip_disambig', '1');

    const res = await fetcher(url.toString(), { timeoutMs: opts.timeoutMs, userAgent: opts.userAgent, signal });
    if (res.status !== 'success') return res;
    const parsed = InstantAnswerSchema.safeParse(res.value);
    if (!parsed.success) return { status: 'failure', reason: 'malformed instant-answer payload' };
    const text = extractInstantAnswer(parsed.data);
    return text ? { status: 'success', value: text } : { status: 'empty' };
  }

  return {
    name: 'instant-answer',
    async lookup(q: string, signal?: AbortSignal): Promise<SourceResult> {
      const answer = textOf(await query(q, signal), INSTANT_ANSWER_LABEL);
      return { answer, source: answer ? INSTANT_ANSWER_LABEL : '' };
    }
  };
}
