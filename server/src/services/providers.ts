import type { AssistantConfig, KnowledgeSource } from '../types.js';
import { createInstantAnswerSource } from '../tools/instantAnswer.js';
import { createEncyclopediaSource } from '../tools/encyclopedia.js';
import type { JsonFetcher } from '../tools/shared/web.js';

export function getDefaultSources(config: AssistantConfig, fetcher?: JsonFetcher): KnowledgeSource[] {
  const common = { timeoutMs: config.webTimeoutMs, userAgent: config.userAgent, fetcher };
  return [
    createInstantAnswerSource({ ...common, baseUrl: config.instantAnswerUrl }),
    createEncyclopediaSource({
      ...common,
      apiUrl: config.encyclopediaApiUrl,
      summaryUrl: config.encyclopediaSummaryUrl
    })
  ];
}
