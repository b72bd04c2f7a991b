/**
 * Language Utility Module
 * Normalizes language tags from metadata and transcription output to ISO 639-1
 */

import whisperLanguages from '../data/whisper-languages.json';

/** Whisper language name -> ISO 639-1 code */
const NAME_TO_CODE: Record<string, string> = whisperLanguages;

const KNOWN_CODES = new Set(Object.values(NAME_TO_CODE));

/**
 * Normalize a language tag or name to an ISO 639-1 code.
 * Accepts BCP 47 tags (`en-US`, `pt_BR`), bare codes and Whisper language names (`english`).
 * @returns the code, or '' when the value cannot be interpreted
 */
export function normalizeLanguageCode(value: string | null | undefined): string {
  if (!value) return '';

  const lowered = value.trim().toLowerCase();
  if (!lowered || lowered === 'unknown' || lowered === 'und') return '';

  const byName = NAME_TO_CODE[lowered];
  if (byName) return byName;

  const primary = lowered.split(/[-_]/)[0].trim();
  if (KNOWN_CODES.has(primary)) return primary;

  // any other two-letter subtag is trusted as-is
  return /^[a-z]{2}$/.test(primary) ? primary : '';
}

/**
 * First non-empty normalized code among the candidates
 */
export function resolveLanguageCode(...candidates: Array<string | null | undefined>): string {
  for (const candidate of candidates) {
    const code = normalizeLanguageCode(candidate);
    if (code) return code;
  }
  return '';
}
