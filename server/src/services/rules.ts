import type { RuleGroup } from '../types.js';
import { mentionsAny } from './matching.js';

// First declared group wins; the canned answers differ enough that order matters.
export function ruleAnswer(question: string, rules: RuleGroup[]): string {
  for (const rule of rules) {
    if (mentionsAny(question, rule.triggers)) return rule.answer;
  }
  return '';
}
