import { mentions, mentionsAny } from './matching.js';

export function isInDomain(question: string, keywords: string[]): boolean {
  return mentionsAny(question, keywords);
}

export function pickRefusal(pool: string[], random: () => number = Math.random): string {
  const idx = Math.min(pool.length - 1, Math.max(0, Math.floor(random() * pool.length)));
  return pool[idx] ?? '';
}

/**
 * Generic web search often answers a different question than the one asked.
 * Reject when the question names the primary keyword and the answer never does.
 */
export function seemsRelevant(answer: string, question: string, primaryKeyword: string): boolean {
  if (mentions(question, primaryKeyword) && !mentions(answer, primaryKeyword)) return false;
  return true;
}
