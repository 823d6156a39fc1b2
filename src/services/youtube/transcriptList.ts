import type { TranscriptTrack, TranslationLanguage } from '../../types/transcript';
import { TranscriptError } from './errors';

interface TextJson {
  simpleText?: string;
  runs?: { text?: string }[];
}

export interface CaptionTrackJson {
  baseUrl?: string;
  name?: TextJson;
  languageCode?: string;
  kind?: string;
  isTranslatable?: boolean;
}

export interface TranslationLanguageJson {
  languageCode?: string;
  languageName?: TextJson;
}

export interface CaptionsJson {
  captionTracks?: CaptionTrackJson[];
  translationLanguages?: TranslationLanguageJson[];
}

/** A track plus the timedtext URL its captions are downloaded from. */
export interface CaptionTrack extends TranscriptTrack {
  url: string;
}

function readText(text: TextJson | undefined): string | undefined {
  return text?.runs?.[0]?.text ?? text?.simpleText;
}

function describeTracks(tracks: Iterable<CaptionTrack>): string {
  const entries = Array.from(tracks, track => `${track.languageCode} ("${track.language}")`);
  return entries.length > 0 ? entries.join(', ') : 'none';
}

export class TranscriptList {
  private constructor(
    public readonly videoId: string,
    private readonly manuallyCreated: Map<string, CaptionTrack>,
    private readonly generated: Map<string, CaptionTrack>
  ) {}

  static build(videoId: string, captions: CaptionsJson): TranscriptList {
    const translationLanguages: TranslationLanguage[] = [];
    for (const entry of captions.translationLanguages ?? []) {
      if (!entry.languageCode) continue;
      translationLanguages.push({
        language: readText(entry.languageName) ?? entry.languageCode,
        languageCode: entry.languageCode
      });
    }

    const manuallyCreated = new Map<string, CaptionTrack>();
    const generated = new Map<string, CaptionTrack>();

    for (const caption of captions.captionTracks ?? []) {
      if (!caption.baseUrl || !caption.languageCode) continue;

      const isGenerated = caption.kind === 'asr';
      const isTranslatable = caption.isTranslatable === true;
      const track: CaptionTrack = {
        videoId,
        url: caption.baseUrl.replace('&fmt=srv3', ''),
        language: readText(caption.name) ?? caption.languageCode,
        languageCode: caption.languageCode,
        isGenerated,
        isTranslatable,
        translationLanguages: isTranslatable ? translationLanguages : []
      };

      (isGenerated ? generated : manuallyCreated).set(caption.languageCode, track);
    }

    return new TranscriptList(videoId, manuallyCreated, generated);
  }

  /** Manually created tracks first, then generated ones. */
  tracks(): CaptionTrack[] {
    return [...this.manuallyCreated.values(), ...this.generated.values()];
  }

  /**
   * Picks the track for the first language code that has one. Within a code,
   * a manually created track beats a generated one.
   */
  findTranscript(languageCodes: readonly string[]): CaptionTrack {
    for (const code of languageCodes) {
      const track = this.manuallyCreated.get(code) ?? this.generated.get(code);
      if (track) {
        return track;
      }
    }

    throw TranscriptError.noTranscriptFound(this.videoId, languageCodes, this.describe());
  }

  describe(): string {
    return `For this video (${this.videoId}) transcripts are available in the following languages: ` +
      `manually created: ${describeTracks(this.manuallyCreated.values())}; ` +
      `generated: ${describeTracks(this.generated.values())}`;
  }
}
