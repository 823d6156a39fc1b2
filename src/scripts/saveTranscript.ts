#!/usr/bin/env node
import { env } from '../config/env';
import { TranscriptService } from '../services/transcriptService';
import { YouTubeTranscriptClient } from '../services/youtube/youtubeTranscriptClient';
import { runSaveTranscriptCli } from './transcriptFileExporter';

void runSaveTranscriptCli(process.argv.slice(2), {
  transcriptService: new TranscriptService(new YouTubeTranscriptClient()),
  defaultApiUrl: env.TRANSCRIPT_API_URL
}).then(exitCode => {
  process.exitCode = exitCode;
});
