/**
 * Convert a `*` wildcard pattern into an anchored regular expression
 */
export function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}

export function matchesPattern(key: string, pattern = '*'): boolean {
  return patternToRegExp(pattern).test(key);
}
