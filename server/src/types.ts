
export interface SourceResult {
  answer: string;
  source: string;
}

export type RaceOutcome = SourceResult;

export type LookupResult<T> =
  | { status: 'success'; value: T }
  | { status: 'empty' }
  | { status: 'failure'; reason: string };

export interface KnowledgeSource {
  name: string;
  /** Resolves to an empty answer on any failure; never rejects. */
  lookup(query: string, signal?: AbortSignal): Promise<SourceResult>;
}

export type AnswerKind = 'refusal' | 'rule' | 'lookup' | 'fallback';

export interface Answer {
  reply: string;
  source?: string;
  kind: AnswerKind;
}

export interface RuleGroup {
  name: string;
  triggers: string[];
  answer: string;
}

export interface TopicRewrite {
  name: string;
  triggers: string[];
  topic: string;
}

export interface DomainConfig {
  primaryKeyword: string;
  domainKeywords: string[];
  rules: RuleGroup[];
  topicRewrites: TopicRewrite[];
  refusals: string[];
  fallbackMessage: string;
}

export interface AssistantConfig {
  port: number;
  webTimeoutMs: number;
  raceDeadlineMs: number;
  replyCharLimit: number;
  instantAnswerUrl: string;
  encyclopediaApiUrl: string;
  encyclopediaSummaryUrl: string;
  userAgent: string;
  domain: DomainConfig;
}
