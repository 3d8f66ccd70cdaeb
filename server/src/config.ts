import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { AssistantConfig, DomainConfig } from './types.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_DOMAIN_PATH = fileURLToPath(new URL('./data/otter-domain.json', import.meta.url));

const Triggers = z.array(z.string().min(1)).min(1);

const DomainConfigSchema = z.object({
  primaryKeyword: z.string().min(1),
  domainKeywords: z.array(z.string().min(1)).min(1),
  rules: z.array(z.object({ name: z.string().min(1), triggers: Triggers, answer: z.string().min(1) })).min(1),
  topicRewrites: z.array(z.object({ name: z.string().min(1), triggers: Triggers, topic: z.string().min(1) })),
  refusals: z.array(z.string().min(1)).min(1),
  fallbackMessage: z.string().min(1)
});

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8080),
    WEB_TIMEOUT_MS: z.coerce.number().int().positive().default(1600),
    RACE_DEADLINE_MS: z.coerce.number().int().positive().default(3200),
    REPLY_CHAR_LIMIT: z.coerce.number().int().min(60).default(240),
    INSTANT_ANSWER_URL: z.string().url().default('https://api.duckduckgo.com/'),
    ENCYCLOPEDIA_API_URL: z.string().url().default('https://en.wikipedia.org/w/api.php'),
    ENCYCLOPEDIA_SUMMARY_URL: z.string().url().default('https://en.wikipedia.org/api/rest_v1/page/summary/'),
    USER_AGENT: z.string().min(1).default('otter-answers-bot/1.0'),
    DOMAIN_CONFIG_PATH: z.string().min(1).optional()
  })
  .refine(env => env.WEB_TIMEOUT_MS < env.RACE_DEADLINE_MS, {
    message: 'WEB_TIMEOUT_MS must be shorter than RACE_DEADLINE_MS',
    path: ['WEB_TIMEOUT_MS']
  });

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function loadDomainConfig(path: string = DEFAULT_DOMAIN_PATH): DomainConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read domain config at ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = DomainConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid domain config at ${path}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

// Empty strings count as unset so a blank line in .env falls back to the default.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value != null && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    webTimeoutMs: e.WEB_TIMEOUT_MS,
    raceDeadlineMs: e.RACE_DEADLINE_MS,
    replyCharLimit: e.REPLY_CHAR_LIMIT,
    instantAnswerUrl: e.INSTANT_ANSWER_URL,
    encyclopediaApiUrl: e.ENCYCLOPEDIA_API_URL,
    encyclopediaSummaryUrl: e.ENCYCLOPEDIA_SUMMARY_URL,
    userAgent: e.USER_AGENT,
    domain: loadDomainConfig(e.DOMAIN_CONFIG_PATH)
  };
}
