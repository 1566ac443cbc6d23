/**
 * Title Case Utilities
 *
 * Movie folders in the library are named in title case, while the
 * filename guesser returns titles as they appear in the release name
 * ("some movie", "SOME MOVIE", "Some.Movie").
 *
 * Examples:
 * - "some movie" → "Some Movie"
 * - "THE DARK KNIGHT" → "The Dark Knight"
 * - "spider-man" → "Spider-Man"
 * - "ocean's eleven" → "Ocean'S Eleven"
 * - "2fast 2furious" → "2Fast 2Furious"
 *
 * Every word is capitalized, articles included.
 */

// A run of letters is a word: anything that is not a letter (digits and
// apostrophes included) ends the previous one.
const WORD = /(\p{L})(\p{L}*)/gu;

/**
 * Render a title in title case
 *
 * @example
 * toTitleCase("some movie") // Returns "Some Movie"
 * toTitleCase("AMÉLIE") // Returns "Amélie"
 */
export function toTitleCase(title: string): string {
  return title.replace(WORD, (_match, first: string, rest: string) => first.toUpperCase() + rest.toLowerCase());
}
