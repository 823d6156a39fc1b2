import axios, { type AxiosInstance } from 'axios';
import { writeFile } from 'fs/promises';
import { DEFAULT_LANGUAGES, type TranscriptResponse } from '../types/transcript';
import type { TranscriptService } from '../services/transcriptService';
import { formatAsText } from '../services/transcriptFormatter';
import { extractVideoId } from '../utils/videoId';
import { errorMessage } from '../utils/appError';
import { logService } from '../utils/logger';

export const USAGE =
  'Usage: saveTranscript <video-id-or-url> [--languages ko,en] [--output <file>] [--api-url <url>] [--preserve-formatting]';

export interface SaveTranscriptOptions {
  urlOrId: string;
  languages: string[];
  outputFile: string;
  apiUrl?: string;
  preserveFormatting: boolean;
}

export interface SaveTranscriptDependencies {
  transcriptService: TranscriptService;
  http?: AxiosInstance;
}

/** Where the command line reports to; `console` outside tests. */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

function splitLanguages(value: string): string[] {
  return value.split(',').map(language => language.trim());
}

export function parseSaveTranscriptArgs(argv: string[], defaultApiUrl?: string): SaveTranscriptOptions {
  let urlOrId: string | undefined;
  let languages = [...DEFAULT_LANGUAGES];
  let outputFile: string | undefined;
  let apiUrl = defaultApiUrl;
  let preserveFormatting = false;

  const takeValue = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--languages':
        languages = splitLanguages(takeValue(arg, i++));
        break;
      case '--output':
        outputFile = takeValue(arg, i++);
        break;
      case '--api-url':
        apiUrl = takeValue(arg, i++);
        break;
      case '--preserve-formatting':
        preserveFormatting = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (urlOrId !== undefined) {
          throw new Error(`Unexpected argument: ${arg}`);
        }
        urlOrId = arg;
    }
  }

  if (!urlOrId) {
    throw new Error('A video id or URL is required');
  }

  return {
    urlOrId,
    languages,
    outputFile: outputFile ?? `transcript_${extractVideoId(urlOrId)}.txt`,
    apiUrl,
    preserveFormatting
  };
}

/**
 * Plain text of a transcript response: segment texts, one per line. A
 * response without a transcript has no text.
 */
export function extractText({ transcript }: Partial<TranscriptResponse>): string {
  if (typeof transcript === 'string') {
    return transcript;
  }
  return Array.isArray(transcript) ? formatAsText(transcript) : '';
}

async function fetchFromApi(
  http: AxiosInstance,
  apiUrl: string,
  options: SaveTranscriptOptions
): Promise<Partial<TranscriptResponse>> {
  const videoId = extractVideoId(options.urlOrId);
  try {
    const response = await http.get<Partial<TranscriptResponse>>(
      `${apiUrl.replace(/\/+$/, '')}/transcript/${encodeURIComponent(videoId)}`,
      {
        params: {
          languages: options.languages.join(','),
          format: 'json',
          preserve_formatting: options.preserveFormatting
        }
      }
    );
    return response.data;
  } catch (error) {
    if (axios.isAxiosError<{ detail?: string }>(error) && error.response?.data?.detail) {
      throw new Error(`API request failed (${error.response.status}): ${error.response.data.detail}`);
    }
    throw new Error(`API request failed: ${errorMessage(error)}`);
  }
}

/**
 * Fetches a transcript, through the HTTP API when `apiUrl` is set and
 * in process otherwise, and writes its text to `outputFile`.
 */
export async function saveTranscript(
  options: SaveTranscriptOptions,
  dependencies: SaveTranscriptDependencies
): Promise<string> {
  logService('SaveTranscript', 'saveTranscript', 'info', 'Fetching transcript', {
    urlOrId: options.urlOrId,
    languages: options.languages,
    viaApi: options.apiUrl ?? null
  });

  const response: Partial<TranscriptResponse> = options.apiUrl
    ? await fetchFromApi(dependencies.http ?? axios.create(), options.apiUrl, options)
    : await dependencies.transcriptService.getTranscript({
      urlOrId: options.urlOrId,
      languages: options.languages,
      format: 'json',
      preserveFormatting: options.preserveFormatting
    });

  const videoId = response.video_id ?? extractVideoId(options.urlOrId);
  const text = extractText(response);
  if (!text) {
    throw new Error(`Transcript for ${videoId} has no text to save`);
  }

  await writeFile(options.outputFile, text, 'utf-8');

  logService('SaveTranscript', 'saveTranscript', 'info', 'Transcript saved', {
    videoId,
    outputFile: options.outputFile
  });

  return options.outputFile;
}

/**
 * Runs the save-transcript command line and resolves to its exit code:
 * 0 on success, 1 when the transcript could not be saved, 2 on bad arguments.
 */
export async function runSaveTranscriptCli(
  argv: string[],
  dependencies: SaveTranscriptDependencies & { defaultApiUrl?: string },
  output: CliOutput = console
): Promise<number> {
  let options: SaveTranscriptOptions;
  try {
    options = parseSaveTranscriptArgs(argv, dependencies.defaultApiUrl);
  } catch (error) {
    output.error(errorMessage(error));
    output.log(USAGE);
    return 2;
  }

  try {
    const outputFile = await saveTranscript(options, dependencies);
    output.log(`Transcript saved to ${outputFile}`);
    return 0;
  } catch (error) {
    output.error(`Could not save transcript: ${errorMessage(error)}`);
    return 1;
  }
}
