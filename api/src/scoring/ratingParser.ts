export const RATING_PREFIX = 'Your code has been rated at';
export const MAX_SCORE = 10;

// "Your code has been rated at 7.50/10 (previous run: ...)" -> word 6 is "7.50/10"
const RATING_WORD_INDEX = 6;

/**
 * Finds the linter's rating line in its standard output and returns the
 * numerator of the "<score>/10" token, clamped to [0, MAX_SCORE].
 *
 * Only the first line carrying the prefix is considered. Returns null when
 * no such line exists or its rating is not a number.
 */
export function parseRating(stdout: string): number | null {
  for (const line of stdout.split(/\r?\n/)) {
    if (!line.startsWith(RATING_PREFIX)) continue;

    const word: string | undefined = line.split(' ')[RATING_WORD_INDEX];
    if (word === undefined) return null;

    const numerator = word.split('/')[0];
    if (numerator.trim() === '') return null;

    const value = Number(numerator);
    if (!Number.isFinite(value)) return null;

    return Math.min(MAX_SCORE, Math.max(0, value));
  }
  return null;
}
