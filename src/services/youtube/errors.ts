export const WATCH_URL = 'https://www.youtube.com/watch?v=';

export type TranscriptErrorCode =
  | 'VIDEO_UNAVAILABLE'
  | 'INVALID_VIDEO_ID'
  | 'VIDEO_UNPLAYABLE'
  | 'AGE_RESTRICTED'
  | 'REQUEST_BLOCKED'
  | 'IP_BLOCKED'
  | 'TRANSCRIPTS_DISABLED'
  | 'NO_TRANSCRIPT_FOUND'
  | 'PO_TOKEN_REQUIRED'
  | 'FAILED_TO_CREATE_CONSENT_COOKIE'
  | 'YOUTUBE_REQUEST_FAILED'
  | 'YOUTUBE_DATA_UNPARSABLE';

/**
 * Raised by the YouTube client whenever a transcript or track list cannot be
 * produced. `reason` is the short cause; `message` is the full sentence.
 */
export class TranscriptError extends Error {
  constructor(
    public readonly videoId: string,
    public readonly code: TranscriptErrorCode,
    public readonly reason: string
  ) {
    super(`Could not retrieve a transcript for the video ${WATCH_URL}${videoId}! This is most likely caused by: ${reason}`);
    this.name = 'TranscriptError';
  }

  static videoUnavailable(videoId: string): TranscriptError {
    return new TranscriptError(videoId, 'VIDEO_UNAVAILABLE', 'The video is no longer available');
  }

  static invalidVideoId(videoId: string): TranscriptError {
    return new TranscriptError(
      videoId,
      'INVALID_VIDEO_ID',
      'You provided an invalid video id. Make sure you are using the video id and NOT the url!'
    );
  }

  static videoUnplayable(videoId: string, reason: string | undefined, subreasons: string[]): TranscriptError {
    let cause = `The video is unplayable for the following reason: ${reason ?? 'No reason specified!'}`;
    if (subreasons.length > 0) {
      cause += ` Additional details: ${subreasons.join('; ')}`;
    }
    return new TranscriptError(videoId, 'VIDEO_UNPLAYABLE', cause);
  }

  static ageRestricted(videoId: string): TranscriptError {
    return new TranscriptError(
      videoId,
      'AGE_RESTRICTED',
      'This video is age-restricted. Transcripts cannot be retrieved for it without authenticating.'
    );
  }

  static requestBlocked(videoId: string): TranscriptError {
    return new TranscriptError(
      videoId,
      'REQUEST_BLOCKED',
      'YouTube is blocking requests from this client and asked to confirm it is not a bot'
    );
  }

  static ipBlocked(videoId: string): TranscriptError {
    return new TranscriptError(videoId, 'IP_BLOCKED', 'YouTube is blocking requests from your IP');
  }

  static transcriptsDisabled(videoId: string): TranscriptError {
    return new TranscriptError(videoId, 'TRANSCRIPTS_DISABLED', 'Subtitles are disabled for this video');
  }

  static noTranscriptFound(videoId: string, requestedCodes: readonly string[], available: string): TranscriptError {
    return new TranscriptError(
      videoId,
      'NO_TRANSCRIPT_FOUND',
      `No transcripts were found for any of the requested language codes: ${requestedCodes.join(', ')}. ${available}`
    );
  }

  static poTokenRequired(videoId: string): TranscriptError {
    return new TranscriptError(
      videoId,
      'PO_TOKEN_REQUIRED',
      'The requested video cannot be retrieved without a PO Token'
    );
  }

  static failedToCreateConsentCookie(videoId: string): TranscriptError {
    return new TranscriptError(
      videoId,
      'FAILED_TO_CREATE_CONSENT_COOKIE',
      'Failed to automatically give consent to saving cookies'
    );
  }

  static requestFailed(videoId: string, detail: string): TranscriptError {
    return new TranscriptError(videoId, 'YOUTUBE_REQUEST_FAILED', `Request to YouTube failed: ${detail}`);
  }

  static dataUnparsable(videoId: string): TranscriptError {
    return new TranscriptError(
      videoId,
      'YOUTUBE_DATA_UNPARSABLE',
      'The data required to fetch the transcript is not parsable'
    );
  }
}
