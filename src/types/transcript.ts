export const TRANSCRIPT_FORMATS = ['json', 'text'] as const;

export type TranscriptFormat = typeof TRANSCRIPT_FORMATS[number];

export const DEFAULT_LANGUAGES: readonly string[] = ['ko', 'en'];

export interface TranscriptSegment {
  text: string;
  start: number;
  duration: number;
}

export interface TranslationLanguage {
  language: string;
  languageCode: string;
}

/**
 * A caption track as YouTube advertises it, before any captions are fetched.
 */
export interface TranscriptTrack {
  videoId: string;
  language: string;
  languageCode: string;
  isGenerated: boolean;
  isTranslatable: boolean;
  translationLanguages: TranslationLanguage[];
}

export interface FetchedTranscript {
  videoId: string;
  language: string;
  languageCode: string;
  isGenerated: boolean;
  segments: TranscriptSegment[];
}

export interface FetchTranscriptOptions {
  languages: readonly string[];
  preserveFormatting: boolean;
}

/**
 * The transcript capability the service is built on. Implementations own the
 * language fallback: the first code in `languages` with a track wins.
 */
export interface TranscriptProvider {
  fetchTranscript(videoId: string, options: FetchTranscriptOptions): Promise<FetchedTranscript>;
  listTranscripts(videoId: string): Promise<TranscriptTrack[]>;
}

export interface TranscriptRequest {
  urlOrId: string;
  languages: string[];
  format: TranscriptFormat;
  preserveFormatting: boolean;
}

// Response bodies keep the snake_case field names of the public API.

export interface TranscriptResponse {
  video_id: string;
  language: string;
  language_code: string;
  is_generated: boolean;
  transcript: string | TranscriptSegment[];
}

export interface TranscriptInfo {
  language: string;
  language_code: string;
  is_generated: boolean;
  is_translatable: boolean;
  translation_languages: string[];
}

export interface TranscriptListResponse {
  video_id: string;
  available_transcripts: TranscriptInfo[];
}

export interface ErrorResponse {
  detail: string;
}
