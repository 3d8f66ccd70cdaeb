function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `term` appears in `text` starting at a word boundary, ignoring
 * case: "otter" matches "Sea otters" but not "Harry Potter".
 */
export function mentions(text: string, term: string): boolean {
  const t = term.trim();
  if (!t) return false;
  return new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(t)}`, 'iu').test(text);
}

export function mentionsAny(text: string, terms: string[]): boolean {
  return terms.some(t => mentions(text, t));
}
