/**
 * Name Suggestions
 * Edit-distance matching used for "Did you mean" hints
 */

const MAX_DISTANCE = 2;
const MAX_SUGGESTIONS = 3;

/**
 * Levenshtein distance with a single rolling row.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length > b.length) [a, b] = [b, a];
  if (a.length === 0) return b.length;

  let prevRow = Array.from({ length: a.length + 1 }, (_, i) => i);
  let currRow = new Array<number>(a.length + 1).fill(0);

  for (let j = 1; j <= b.length; j++) {
    currRow[0] = j;
    for (let i = 1; i <= a.length; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1,
        (currRow[i - 1] ?? 0) + 1,
        (prevRow[i - 1] ?? 0) + cost
      );
    }
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[a.length] ?? 0;
}

/**
 * Candidates within edit distance 2 of the target, closest first and then
 * alphabetical, at most three.
 */
export function suggestSimilarNames(
  target: string,
  candidates: Iterable<string>
): string[] {
  if (target === '') return [];

  const scored: { name: string; distance: number }[] = [];
  for (const name of candidates) {
    const distance = levenshteinDistance(target, name);
    if (distance > 0 && distance <= MAX_DISTANCE) {
      scored.push({ name, distance });
    }
  }

  scored.sort((x, y) =>
    x.distance !== y.distance
      ? x.distance - y.distance
      : x.name.localeCompare(y.name)
  );
  return scored.slice(0, MAX_SUGGESTIONS).map((s) => s.name);
}
