import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { env } from '../../config/env';
import { logService } from '../../utils/logger';
import { errorMessage } from '../../utils/appError';
import type {
  FetchTranscriptOptions,
  FetchedTranscript,
  TranscriptProvider,
  TranscriptSegment,
  TranscriptTrack
} from '../../types/transcript';
import { CaptionParseError, parseTimedText } from './captionParser';
import { type CaptionTrack, type CaptionsJson, TranscriptList } from './transcriptList';
import { TranscriptError, WATCH_URL } from './errors';

const INNERTUBE_API_URL = 'https://www.youtube.com/youtubei/v1/player';
const INNERTUBE_CONTEXT = {
  client: {
    clientName: 'ANDROID',
    clientVersion: '20.10.38'
  }
};

const CONSENT_FORM_MARKER = 'action="https://consent.youtube.com/s"';
const RECAPTCHA_MARKER = 'class="g-recaptcha"';
const BOT_DETECTED_REASON = 'Sign in to confirm you’re not a bot';
const AGE_RESTRICTED_REASON = 'This video may be inappropriate for some users.';
const VIDEO_UNAVAILABLE_REASON = 'This video is unavailable';

interface PlayabilityStatus {
  status?: string;
  reason?: string;
  errorScreen?: {
    playerErrorMessageRenderer?: {
      subreason?: { runs?: { text?: string }[] };
    };
  };
}

interface PlayerResponse {
  playabilityStatus?: PlayabilityStatus;
  captions?: {
    playerCaptionsTracklistRenderer?: CaptionsJson;
  };
}

interface VideoPage {
  html: string;
  cookie?: string;
}

interface LoadedTranscriptList {
  transcriptList: TranscriptList;
  /** Consent cookie, sent again on every later request for this video. */
  cookie?: string;
}

export interface YouTubeTranscriptClientOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
}

function toTrack({ url: _url, ...track }: CaptionTrack): TranscriptTrack {
  return track;
}

function assertPlayability(videoId: string, playability: PlayabilityStatus | undefined): void {
  const status = playability?.status;
  if (status === undefined || status === 'OK') {
    return;
  }

  const reason = playability?.reason;
  if (status === 'LOGIN_REQUIRED') {
    if (reason === BOT_DETECTED_REASON) {
      throw TranscriptError.requestBlocked(videoId);
    }
    if (reason === AGE_RESTRICTED_REASON) {
      throw TranscriptError.ageRestricted(videoId);
    }
  }

  if (status === 'ERROR' && reason === VIDEO_UNAVAILABLE_REASON) {
    if (videoId.startsWith('http://') || videoId.startsWith('https://')) {
      throw TranscriptError.invalidVideoId(videoId);
    }
    throw TranscriptError.videoUnavailable(videoId);
  }

  const subreasons = (playability?.errorScreen?.playerErrorMessageRenderer?.subreason?.runs ?? [])
    .map(run => run.text ?? '');
  throw TranscriptError.videoUnplayable(videoId, reason, subreasons);
}

/**
 * Transcript provider backed by YouTube's watch page, the innertube player
 * endpoint and the timedtext caption files.
 */
export class YouTubeTranscriptClient implements TranscriptProvider {
  private readonly http: AxiosInstance;

  constructor(options: YouTubeTranscriptClientOptions = {}) {
    this.http = options.http ?? axios.create({
      timeout: options.timeoutMs ?? env.YOUTUBE_REQUEST_TIMEOUT_MS
    });
  }

  async listTranscripts(videoId: string): Promise<TranscriptTrack[]> {
    const { transcriptList } = await this.loadTranscriptList(videoId);
    return transcriptList.tracks().map(toTrack);
  }

  async fetchTranscript(videoId: string, options: FetchTranscriptOptions): Promise<FetchedTranscript> {
    const { transcriptList, cookie } = await this.loadTranscriptList(videoId);
    const track = transcriptList.findTranscript(options.languages);

    logService('YouTubeTranscriptClient', 'fetchTranscript', 'debug', 'Track selected', {
      videoId,
      languageCode: track.languageCode,
      isGenerated: track.isGenerated
    });

    const segments = await this.fetchCaptions(track, options.preserveFormatting, cookie);

    return {
      videoId: track.videoId,
      language: track.language,
      languageCode: track.languageCode,
      isGenerated: track.isGenerated,
      segments
    };
  }

  private async loadTranscriptList(videoId: string): Promise<LoadedTranscriptList> {
    const page = await this.fetchVideoPage(videoId);
    const apiKey = this.extractInnertubeApiKey(videoId, page.html);
    const player = await this.fetchPlayerResponse(videoId, apiKey, page.cookie);

    assertPlayability(videoId, player.playabilityStatus);

    const captions = player.captions?.playerCaptionsTracklistRenderer;
    if (!captions?.captionTracks) {
      throw TranscriptError.transcriptsDisabled(videoId);
    }

    return { transcriptList: TranscriptList.build(videoId, captions), cookie: page.cookie };
  }

  private async fetchVideoPage(videoId: string): Promise<VideoPage> {
    const html = await this.fetchHtml(videoId);
    if (!html.includes(CONSENT_FORM_MARKER)) {
      return { html };
    }

    const consentToken = html.match(/name="v" value="(.*?)"/);
    if (!consentToken) {
      throw TranscriptError.failedToCreateConsentCookie(videoId);
    }

    const cookie = `CONSENT=YES+${consentToken[1]}`;
    const consentedHtml = await this.fetchHtml(videoId, cookie);
    if (consentedHtml.includes(CONSENT_FORM_MARKER)) {
      throw TranscriptError.failedToCreateConsentCookie(videoId);
    }

    return { html: consentedHtml, cookie };
  }

  private async fetchHtml(videoId: string, cookie?: string): Promise<string> {
    const response = await this.request<string>(videoId, {
      method: 'GET',
      url: `${WATCH_URL}${encodeURIComponent(videoId)}`,
      responseType: 'text',
      headers: {
        'Accept-Language': 'en-US',
        ...(cookie ? { Cookie: cookie } : {})
      }
    });
    return String(response.data);
  }

  private extractInnertubeApiKey(videoId: string, html: string): string {
    const match = html.match(/"INNERTUBE_API_KEY":\s*"([a-zA-Z0-9_-]+)"/);
    if (match) {
      return match[1];
    }

    if (html.includes(RECAPTCHA_MARKER)) {
      throw TranscriptError.ipBlocked(videoId);
    }
    throw TranscriptError.dataUnparsable(videoId);
  }

  private async fetchPlayerResponse(videoId: string, apiKey: string, cookie?: string): Promise<PlayerResponse> {
    const response = await this.request<PlayerResponse | string>(videoId, {
      method: 'POST',
      url: INNERTUBE_API_URL,
      params: { key: apiKey },
      data: { context: INNERTUBE_CONTEXT, videoId },
      headers: {
        'Accept-Language': 'en-US',
        'Content-Type': 'application/json',
        ...(cookie ? { Cookie: cookie } : {})
      }
    });

    const data = response.data;
    if (typeof data !== 'object' || data === null) {
      throw TranscriptError.dataUnparsable(videoId);
    }
    return data;
  }

  private async fetchCaptions(
    track: CaptionTrack,
    preserveFormatting: boolean,
    cookie?: string
  ): Promise<TranscriptSegment[]> {
    if (track.url.includes('&exp=xpe')) {
      throw TranscriptError.poTokenRequired(track.videoId);
    }

    const response = await this.request<string>(track.videoId, {
      method: 'GET',
      url: track.url,
      responseType: 'text',
      headers: {
        'Accept-Language': 'en-US',
        ...(cookie ? { Cookie: cookie } : {})
      }
    });

    try {
      return parseTimedText(String(response.data), preserveFormatting);
    } catch (error) {
      if (error instanceof CaptionParseError) {
        logService('YouTubeTranscriptClient', 'fetchCaptions', 'warn', error.message, { videoId: track.videoId });
        throw TranscriptError.dataUnparsable(track.videoId);
      }
      throw error;
    }
  }

  /**
   * Sends one request and turns transport failures and non-2xx statuses into
   * TranscriptErrors. A 429 means YouTube has blocked this IP.
   */
  private async request<T>(videoId: string, config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    let response: AxiosResponse<T>;
    try {
      response = await this.http.request<T>({ ...config, validateStatus: () => true });
    } catch (error) {
      throw TranscriptError.requestFailed(videoId, errorMessage(error));
    }

    if (response.status === 429) {
      throw TranscriptError.ipBlocked(videoId);
    }
    if (response.status < 200 || response.status >= 300) {
      throw TranscriptError.requestFailed(videoId, `HTTP ${response.status} for url: ${config.url ?? ''}`);
    }
    return response;
  }
}
