import type { TranscriptFormat, TranscriptSegment } from '../types/transcript';

export function formatAsText(segments: readonly TranscriptSegment[]): string {
  return segments.map(segment => segment.text).join('\n');
}

export function formatAsJson(segments: readonly TranscriptSegment[]): TranscriptSegment[] {
  return segments.map(({ text, start, duration }) => ({ text, start, duration }));
}

export function formatTranscript(segments: readonly TranscriptSegment[], format: 'text'): string;
export function formatTranscript(segments: readonly TranscriptSegment[], format: 'json'): TranscriptSegment[];
export function formatTranscript(
  segments: readonly TranscriptSegment[],
  format: TranscriptFormat
): string | TranscriptSegment[];
export function formatTranscript(
  segments: readonly TranscriptSegment[],
  format: TranscriptFormat
): string | TranscriptSegment[] {
  return format === 'text' ? formatAsText(segments) : formatAsJson(segments);
}
