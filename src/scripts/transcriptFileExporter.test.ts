import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  USAGE,
  extractText,
  parseSaveTranscriptArgs,
  runSaveTranscriptCli,
  saveTranscript,
  type CliOutput,
  type SaveTranscriptOptions
} from './transcriptFileExporter';
import { TranscriptService } from '../services/transcriptService';
import { FakeTranscriptProvider } from '../testing/fakeTranscriptProvider';

describe('parseSaveTranscriptArgs', () => {
  it('uses defaults for everything but the video', () => {
    expect(parseSaveTranscriptArgs(['https://youtu.be/dQw4w9WgXcQ'])).toEqual({
      urlOrId: 'https://youtu.be/dQw4w9WgXcQ',
      languages: ['ko', 'en'],
      outputFile: 'transcript_dQw4w9WgXcQ.txt',
      apiUrl: undefined,
      preserveFormatting: false
    });
  });

  it('reads every flag', () => {
    expect(parseSaveTranscriptArgs([
      '--languages', 'ja, en',
      'dQw4w9WgXcQ',
      '--output', 'out.txt',
      '--api-url', 'http://localhost:9000',
      '--preserve-formatting'
    ])).toEqual({
      urlOrId: 'dQw4w9WgXcQ',
      languages: ['ja', 'en'],
      outputFile: 'out.txt',
      apiUrl: 'http://localhost:9000',
      preserveFormatting: true
    });
  });

  it('falls back to the configured API URL', () => {
    expect(parseSaveTranscriptArgs(['abc'], 'http://localhost:8000').apiUrl).toBe('http://localhost:8000');
  });

  it.each<[string[], string]>([
    [[], 'A video id or URL is required'],
    [['abc', '--output'], 'Missing value for --output'],
    [['abc', '--languages', '--output', 'x'], 'Missing value for --languages'],
    [['abc', '--verbose'], 'Unknown option: --verbose'],
    [['abc', 'def'], 'Unexpected argument: def']
  ])('rejects %j', (argv, message) => {
    expect(() => parseSaveTranscriptArgs(argv)).toThrow(message);
  });
});

describe('extractText', () => {
  const base = { video_id: 'abc', language: 'English', language_code: 'en', is_generated: false };

  it('joins json segments with newlines', () => {
    expect(extractText({
      ...base,
      transcript: [
        { text: 'one', start: 0, duration: 1 },
        { text: 'two', start: 1, duration: 1 }
      ]
    })).toBe('one\ntwo');
  });

  it('returns text transcripts as they are', () => {
    expect(extractText({ ...base, transcript: 'already text' })).toBe('already text');
  });

  it('has no text when the transcript is missing', () => {
    expect(extractText(base)).toBe('');
  });
});

describe('saveTranscript', () => {
  let dir: string;

  const provider = new FakeTranscriptProvider({
    dQw4w9WgXcQ: {
      tracks: [
        {
          language: 'English',
          languageCode: 'en',
          isGenerated: false,
          segments: [
            { text: 'first', start: 0, duration: 1 },
            { text: 'second', start: 1, duration: 1 }
          ]
        }
      ]
    },
    silent: {
      tracks: [{ language: 'English', languageCode: 'en', isGenerated: true, segments: [] }]
    }
  });
  const transcriptService = new TranscriptService(provider);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transcript-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function options(overrides: Partial<SaveTranscriptOptions> = {}): SaveTranscriptOptions {
    return {
      urlOrId: 'https://www.youtube.com/watch?v=dQw4w9WgXcQ',
      languages: ['en'],
      outputFile: join(dir, 'out.txt'),
      preserveFormatting: false,
      ...overrides
    };
  }

  it('writes the transcript text fetched in process', async () => {
    const outputFile = await saveTranscript(options(), { transcriptService });

    expect(outputFile).toBe(join(dir, 'out.txt'));
    expect(await readFile(outputFile, 'utf-8')).toBe('first\nsecond');
  });

  it('refuses to write an empty transcript', async () => {
    await expect(saveTranscript(options({ urlOrId: 'silent' }), { transcriptService }))
      .rejects.toThrow('Transcript for silent has no text to save');
  });

  it('propagates fetch failures', async () => {
    await expect(saveTranscript(options({ languages: ['xx'] }), { transcriptService }))
      .rejects.toThrow(/^Failed to fetch transcript: /);
  });

  describe('through the HTTP API', () => {
    function createApiStub(respond: (config: InternalAxiosRequestConfig) => AxiosResponse) {
      const requests: InternalAxiosRequestConfig[] = [];
      const http = axios.create({
        adapter: async (config) => {
          requests.push(config);
          const response = respond(config);
          if (response.status >= 400) {
            throw new AxiosError(
              `Request failed with status code ${response.status}`,
              AxiosError.ERR_BAD_REQUEST,
              config,
              null,
              response
            );
          }
          return response;
        }
      });
      return { http, requests };
    }

    it('requests json for the normalized id and writes its text', async () => {
      provider.calls.length = 0;
      const { http, requests } = createApiStub(config => ({
        data: {
          video_id: 'dQw4w9WgXcQ',
          language: 'Korean',
          language_code: 'ko',
          is_generated: false,
          transcript: [{ text: 'from api', start: 0, duration: 1 }]
        },
        status: 200,
        statusText: 'OK',
        headers: {},
        config
      }));

      const outputFile = await saveTranscript(
        options({ apiUrl: 'http://localhost:8000/', languages: ['ko', 'en'], preserveFormatting: true }),
        { transcriptService, http }
      );

      expect(requests).toHaveLength(1);
      expect(requests[0].url).toBe('http://localhost:8000/transcript/dQw4w9WgXcQ');
      expect(requests[0].params).toEqual({ languages: 'ko,en', format: 'json', preserve_formatting: true });
      expect(provider.calls).toEqual([]);
      expect(await readFile(outputFile, 'utf-8')).toBe('from api');
    });

    it('refuses a response without a transcript', async () => {
      const { http } = createApiStub(config => ({
        data: { video_id: 'dQw4w9WgXcQ' },
        status: 200,
        statusText: 'OK',
        headers: {},
        config
      }));

      await expect(saveTranscript(options({ apiUrl: 'http://localhost:8000' }), { transcriptService, http }))
        .rejects.toThrow('Transcript for dQw4w9WgXcQ has no text to save');
    });

    it('reports the detail of an error response', async () => {
      const { http } = createApiStub(config => ({
        data: { detail: 'Failed to fetch transcript: nope' },
        status: 400,
        statusText: 'Bad Request',
        headers: {},
        config
      }));

      await expect(saveTranscript(options({ apiUrl: 'http://localhost:8000' }), { transcriptService, http }))
        .rejects.toThrow('API request failed (400): Failed to fetch transcript: nope');
    });

    it('reports failures without a detail', async () => {
      const { http } = createApiStub(config => ({
        data: 'gateway down',
        status: 502,
        statusText: 'Bad Gateway',
        headers: {},
        config
      }));

      await expect(saveTranscript(options({ apiUrl: 'http://localhost:8000' }), { transcriptService, http }))
        .rejects.toThrow('API request failed: Request failed with status code 502');
    });
  });

  describe('runSaveTranscriptCli', () => {
    function createOutput() {
      const lines: string[] = [];
      const errors: string[] = [];
      const output: CliOutput = {
        log: message => lines.push(message),
        error: message => errors.push(message)
      };
      return { output, lines, errors };
    }

    it('prints where the transcript was saved', async () => {
      const { output, lines, errors } = createOutput();
      const outputFile = join(dir, 'cli.txt');

      const exitCode = await runSaveTranscriptCli(
        ['dQw4w9WgXcQ', '--languages', 'en', '--output', outputFile],
        { transcriptService },
        output
      );

      expect(exitCode).toBe(0);
      expect(lines).toEqual([`Transcript saved to ${outputFile}`]);
      expect(errors).toEqual([]);
      expect(await readFile(outputFile, 'utf-8')).toBe('first\nsecond');
    });

    it('prints the usage for bad arguments', async () => {
      const { output, lines, errors } = createOutput();

      const exitCode = await runSaveTranscriptCli(['--output'], { transcriptService }, output);

      expect(exitCode).toBe(2);
      expect(errors).toEqual(['Missing value for --output']);
      expect(lines).toEqual([USAGE]);
    });

    it('prints why the transcript could not be saved', async () => {
      const { output, lines, errors } = createOutput();

      const exitCode = await runSaveTranscriptCli(
        ['missing', '--output', join(dir, 'never.txt')],
        { transcriptService },
        output
      );

      expect(exitCode).toBe(1);
      expect(lines).toEqual([]);
      expect(errors).toEqual([
        'Could not save transcript: Failed to fetch transcript: Could not retrieve a transcript for the video ' +
        'https://www.youtube.com/watch?v=missing! This is most likely caused by: The video is no longer available'
      ]);
    });
  });
});
