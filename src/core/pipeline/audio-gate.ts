/**
 * Audio-sufficiency gate applied to every transcript
 */

import { MIN_TRANSCRIPT_CHARS, MIN_TRANSCRIPT_WORDS } from '../../constants.js';
import { countWords, normalizeWhitespace } from '../../utils/text.js';

export interface TranscriptAssessment {
  sufficient: boolean;
  /** Whitespace-normalized transcript */
  text: string;
  wordCount: number;
  /** Code points of the trimmed transcript */
  charCount: number;
}

/**
 * A transcript is insufficient only when it is below BOTH minimums
 */
export function assessTranscript(transcript: string): TranscriptAssessment {
  const text = normalizeWhitespace(transcript);
  const wordCount = countWords(text);
  const charCount = [...transcript.trim()].length;

  return {
    sufficient: !(wordCount < MIN_TRANSCRIPT_WORDS && charCount < MIN_TRANSCRIPT_CHARS),
    text,
    wordCount,
    charCount,
  };
}

export function insufficientAudioMessage(assessment: TranscriptAssessment): string {
  return (
    `Audio not found or insufficient. Transcript too short: ${assessment.wordCount} words, ` +
    `${assessment.charCount} characters. Minimum required: ${MIN_TRANSCRIPT_WORDS} words or ${MIN_TRANSCRIPT_CHARS} characters.`
  );
}
