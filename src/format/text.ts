import { convertTimestamp } from "./timestamps.js";
import type {
  FormattedSegment,
  FormattedUtterance,
  RawTranscriptSegment,
} from "../types.js";

// True when nothing but periods and whitespace is left
export function isEmptyAfterCleaning(text: string): boolean {
  return text.replace(/\./g, "").replace(/\s+/g, "") === "";
}

/**
 * Strips the engine's `...` filler and fixes spacing artifacts.
 * Ellipses go first so one sitting next to punctuation never leaves a gap behind.
 */
export function cleanPunctuation(text: string): string {
  return text
    .replace(/\.\.\./g, "")
    .replace(/\s+(?=[?!.,:;])/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function formatSegments(segments: RawTranscriptSegment[]): FormattedSegment[] {
  return segments.map((s) => ({
    start: s.start,
    end: s.end,
    word: s.text.trim(),
  }));
}

/**
 * Turns raw engine segments into caller-facing utterances: cleaned text,
 * converted offsets, empty segments dropped.
 */
export function formatUtterances(
  segments: RawTranscriptSegment[],
  unit: string
): FormattedUtterance[] {
  const utterances: FormattedUtterance[] = [];
  for (const seg of segments) {
    const text = cleanPunctuation(seg.text);
    if (isEmptyAfterCleaning(text)) {
      continue;
    }
    const end = Math.max(seg.start, seg.end);
    utterances.push({
      speaker: seg.speaker,
      start: convertTimestamp(seg.start, unit),
      end: convertTimestamp(end, unit),
      text,
    });
  }
  return utterances;
}
