import type {
  TranscriptListResponse,
  TranscriptProvider,
  TranscriptRequest,
  TranscriptResponse
} from '../types/transcript';
import { extractVideoId } from '../utils/videoId';
import { AppError, errorMessage } from '../utils/appError';
import { logService } from '../utils/logger';
import { formatTranscript } from './transcriptFormatter';

export class TranscriptService {
  constructor(private readonly provider: TranscriptProvider) {}

  /**
   * Fetches one transcript in the first available language of the request.
   * Every failure becomes a single TRANSCRIPT_FETCH_FAILED error carrying the
   * upstream message.
   */
  async getTranscript(request: TranscriptRequest): Promise<TranscriptResponse> {
    const videoId = extractVideoId(request.urlOrId);

    logService('TranscriptService', 'getTranscript', 'info', 'Transcript requested', {
      videoId,
      languages: request.languages,
      format: request.format
    });

    try {
      const fetched = await this.provider.fetchTranscript(videoId, {
        languages: request.languages,
        preserveFormatting: request.preserveFormatting
      });

      return {
        video_id: fetched.videoId,
        language: fetched.language,
        language_code: fetched.languageCode,
        is_generated: fetched.isGenerated,
        transcript: formatTranscript(fetched.segments, request.format)
      };
    } catch (error) {
      logService('TranscriptService', 'getTranscript', 'warn', 'Transcript fetch failed', {
        videoId,
        error: errorMessage(error)
      });
      throw AppError.transcriptFetchFailed(errorMessage(error));
    }
  }

  async listTranscripts(urlOrId: string): Promise<TranscriptListResponse> {
    const videoId = extractVideoId(urlOrId);

    logService('TranscriptService', 'listTranscripts', 'info', 'Transcript list requested', { videoId });

    try {
      const tracks = await this.provider.listTranscripts(videoId);

      return {
        video_id: videoId,
        available_transcripts: tracks.map(track => ({
          language: track.language,
          language_code: track.languageCode,
          is_generated: track.isGenerated,
          is_translatable: track.isTranslatable,
          translation_languages: track.translationLanguages.map(translation => translation.languageCode)
        }))
      };
    } catch (error) {
      logService('TranscriptService', 'listTranscripts', 'warn', 'Transcript list failed', {
        videoId,
        error: errorMessage(error)
      });
      throw AppError.transcriptListFailed(errorMessage(error));
    }
  }
}
