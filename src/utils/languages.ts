/**
 * Language Code Utilities
 *
 * Converts between ISO 639-1 codes (used in sidecar file names, e.g. ".he.srt")
 * and ISO 639-2 codes (used to key results, e.g. "heb").
 * The table lives in data/languages.json.
 */

import languageTable from '../data/languages.json';
import { Language } from '../types/subtitles.js';

const BY_ALPHA2 = new Map<string, Language>();
const BY_ALPHA3 = new Map<string, Language>();

for (const entry of languageTable) {
  const language: Language = { alpha2: entry.alpha2, alpha3: entry.alpha3, name: entry.name };
  BY_ALPHA2.set(language.alpha2, language);
  BY_ALPHA3.set(language.alpha3, language);
}

/**
 * Look up a language by its two- or three-letter code
 *
 * @example
 * findLanguage('he') // => { alpha2: 'he', alpha3: 'heb', name: 'Hebrew' }
 * findLanguage('ENG') // => { alpha2: 'en', alpha3: 'eng', name: 'English' }
 * findLanguage('xx') // => undefined
 */
export function findLanguage(code: string | null | undefined): Language | undefined {
  if (!code) {
    return undefined;
  }
  const normalized = code.trim().toLowerCase();
  return normalized.length === 2 ? BY_ALPHA2.get(normalized) : BY_ALPHA3.get(normalized);
}
