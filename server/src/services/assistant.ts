import type { Answer, AssistantConfig, KnowledgeSource } from '../types.js';
import { clean, rewriteForTopic, truncate } from './normalizer.js';
import { ruleAnswer } from './rules.js';
import { isInDomain, pickRefusal, seemsRelevant } from './relevance.js';
import { resolve } from './resolver.js';
import { formatReply } from './formatter.js';
import { describeError } from '../tools/shared/web.js';

export type AssistantSettings = Pick<AssistantConfig, 'raceDeadlineMs' | 'replyCharLimit' | 'domain'>;

export interface AssistantDeps {
  sources: KnowledgeSource[];
  random?: () => number;
}

export interface Assistant {
  answer(question: string): Promise<Answer>;
  /** Always resolves to a non-empty reply no longer than the configured limit. */
  answerQuestion(question: string): Promise<string>;
  fallback(): Answer;
}

export function createAssistant(settings: AssistantSettings, deps: AssistantDeps): Assistant {
  const { domain, replyCharLimit: limit, raceDeadlineMs } = settings;
  const fallback = (): Answer => ({ kind: 'fallback', reply: truncate(domain.fallbackMessage, limit) });

  async function answer(question: string): Promise<Answer> {
    const cleaned = clean(question);

    if (!isInDomain(cleaned, domain.domainKeywords)) {
      return { kind: 'refusal', reply: truncate(pickRefusal(domain.refusals, deps.random), limit) };
    }

    const canned = ruleAnswer(cleaned, domain.rules);
    if (canned) return { kind: 'rule', reply: truncate(canned, limit) };

    const query = rewriteForTopic(cleaned, domain);
    const outcome = await resolve(query, deps.sources, raceDeadlineMs);
    if (!outcome.answer) return fallback();
    if (!seemsRelevant(outcome.answer, cleaned, domain.primaryKeyword)) {
      console.log(`discarding off-topic answer from ${outcome.source}`);
      return fallback();
    }

    const reply = formatReply(outcome.answer, outcome.source, limit);
    return reply ? { kind: 'lookup', reply, source: outcome.source } : fallback();
  }

  return {
    answer,
    fallback,
    async answerQuestion(question: string): Promise<string> {
      try {
        return (await answer(question)).reply;
      } catch (err) {
        console.error('answerQuestion failed:', describeError(err));
        return fallback().reply;
      }
    }
  };
}
