/** Classic Levenshtein distance over UTF-16 code units, two-row variant. */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      );
    }
    [previous, current] = [current, previous];
  }
  return previous[b.length] ?? 0;
}

/** Typos allowed for a keyword: none up to 2 chars, 1 up to 5, 2 beyond. */
export function typoBudget(keyword: string): number {
  if (keyword.length <= 2) return 0;
  if (keyword.length <= 5) return 1;
  return 2;
}

export function isFuzzyMatch(token: string, keyword: string): boolean {
  const budget = typoBudget(keyword);
  if (Math.abs(token.length - keyword.length) > budget) return false;
  return editDistance(token, keyword) <= budget;
}
