/**
 * Set helpers over keyword lists. Results keep the order of the first
 * argument and never contain duplicates.
 */

export function unique(list: readonly string[]): string[] {
  return [...new Set(list)];
}

export function intersection(a: readonly string[], b: readonly string[]): string[] {
  const other = new Set(b);
  return unique(a.filter((item) => other.has(item)));
}

export function difference(a: readonly string[], b: readonly string[]): string[] {
  const other = new Set(b);
  return unique(a.filter((item) => !other.has(item)));
}

export function containsAll(haystack: readonly string[], needles: readonly string[]): boolean {
  const present = new Set(haystack);
  return needles.every((needle) => present.has(needle));
}

export function containsAny(haystack: readonly string[], needles: readonly string[]): boolean {
  const present = new Set(haystack);
  return needles.some((needle) => present.has(needle));
}
