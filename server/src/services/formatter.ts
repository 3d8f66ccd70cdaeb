import { truncate } from './normalizer.js';

const MIN_BODY_CHARS = 40;

export function formatReply(answer: string, source: string, limit: number): string {
  if (!source) return truncate(answer, limit);
  const suffix = ` (Source: ${source})`;
  const budget = limit - suffix.length;
  if (budget < MIN_BODY_CHARS) return truncate(`${answer}${suffix}`, limit);
  return `${truncate(answer, budget)}${suffix}`;
}
