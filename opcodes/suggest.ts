// Fuzzy opcode-name matching for "did you mean" hints.

export const SUGGESTION_THRESHOLD = 0.6;
export const MAX_SUGGESTIONS = 3;

function editDistance(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = prev[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      row.push(Math.min(prev[j] + 1, row[j - 1] + 1, substitution));
    }
    prev = row;
  }
  return prev[b.length];
}

/** 1 for identical strings, 0 for nothing in common. */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - editDistance(a, b) / longest;
}

/**
 * Known names at least `threshold` similar to `word`, best first, ties
 * broken alphabetically.
 */
export function closeMatches(
  word: string,
  candidates: Iterable<string>,
  limit = MAX_SUGGESTIONS,
  threshold = SUGGESTION_THRESHOLD,
): string[] {
  const needle = word.toUpperCase();
  const scored: { name: string; score: number }[] = [];
  for (const name of candidates) {
    const score = similarity(needle, name);
    if (score >= threshold) scored.push({ name, score });
  }
  scored.sort((x, y) => y.score - x.score || x.name.localeCompare(y.name));
  return scored.slice(0, limit).map((s) => s.name);
}
