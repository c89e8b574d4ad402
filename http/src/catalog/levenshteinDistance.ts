/**
 * Computes the Levenshtein (edit) distance between two identifiers.
 * Case-insensitive, so "LibFoo" and "libfoo" are considered equal.
 *
 * @example
 * levenshteinDistance("kitten", "sitting") // 3
 * levenshteinDistance("LibFoo", "libfoo") // 0
 */
export const levenshteinDistance = (a: string, b: string): number => {
  const aLower = a.toLowerCase();
  const bLower = b.toLowerCase();

  if (aLower.length === 0) {
    return bLower.length;
  }
  if (bLower.length === 0) {
    return aLower.length;
  }

  // Two rolling rows of the DP table
  let prevRow = Array.from({ length: bLower.length + 1 }, (_, i) => i);
  let currRow = Array.from({ length: bLower.length + 1 }, () => 0);

  for (let i = 1; i <= aLower.length; i++) {
    currRow[0] = i;

    for (let j = 1; j <= bLower.length; j++) {
      const cost = aLower[i - 1] === bLower[j - 1] ? 0 : 1;
      const deletion = (prevRow[j] ?? 0) + 1;
      const insertion = (currRow[j - 1] ?? 0) + 1;
      const substitution = (prevRow[j - 1] ?? 0) + cost;
      currRow[j] = Math.min(deletion, insertion, substitution);
    }

    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[bLower.length] ?? 0;
};

/** Upper bound on the edit distance of a suggestion, reached at 9 characters */
const MAX_SUGGESTION_DISTANCE = 3;

/**
 * Edits allowed for a target: one per three characters, at least one.
 */
const suggestionThreshold = (target: string): number =>
  Math.min(MAX_SUGGESTION_DISTANCE, Math.max(1, Math.floor(target.length / 3)));

/**
 * Pick the known identifiers closest to an unknown one.
 * A candidate that shares no character position with the target
 * (distance equal to the longer length) is never suggested.
 * Ties keep the order of `candidates`.
 *
 * @example
 * closestMatches("libfo", ["openssl", "libbar", "libfoo"]) // ["libfoo"]
 * closestMatches("bb", ["a", "b", "c"]) // ["b"]
 */
export const closestMatches = (
  target: string,
  candidates: Iterable<string>,
  limit = 3,
): string[] => {
  const threshold = suggestionThreshold(target);
  const scored: Array<{ candidate: string; distance: number }> = [];
  for (const candidate of candidates) {
    const distance = levenshteinDistance(candidate, target);
    const replacesEverything =
      distance >= Math.max(candidate.length, target.length);
    if (distance <= threshold && !replacesEverything) {
      scored.push({ candidate, distance });
    }
  }
  return scored
    .sort((a, b) => a.distance - b.distance)
    .slice(0, limit)
    .map((s) => s.candidate);
};
