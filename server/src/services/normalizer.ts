import type { DomainConfig } from '../types.js';
import { mentions, mentionsAny } from './matching.js';

export function clean(text: string): string {
  return text
    .trim()
    .replace(/[?!.]+$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Maps a recognised question shape onto a short topic phrase that search
 * backends answer well ("how long do otters live" -> "otter lifespan").
 * Only applies when the primary keyword is present; groups are tried in
 * declared order.
 */
export function rewriteForTopic(
  text: string,
  domain: Pick<DomainConfig, 'primaryKeyword' | 'topicRewrites'>
): string {
  if (!mentions(text, domain.primaryKeyword)) return text;
  for (const group of domain.topicRewrites) {
    if (mentionsAny(text, group.triggers)) return group.topic;
  }
  return text;
}

export function truncate(text: string, limit: number): string {
  if (limit < 1) return '';
  const s = text.replace(/\s+/g, ' ').trim();
  if (s.length <= limit) return s;
  let head = s.slice(0, limit - 1);
  // don't leave half of a surrogate pair in front of the ellipsis
  if (/[\uD800-\uDBFF]$/.test(head)) head = head.slice(0, -1);
  return `${head.trimEnd()}…`;
}
