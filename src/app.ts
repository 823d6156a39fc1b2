import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { env } from './config/env';
import { errorHandler } from './middleware/errorHandler';
import { notFoundHandler } from './middleware/notFoundHandler';
import systemRoutes from './routes/systemRoutes';
import { createTranscriptRoutes } from './routes/transcriptRoutes';
import { createTranscriptController } from './controllers/transcriptController';
import { TranscriptService } from './services/transcriptService';
import { YouTubeTranscriptClient } from './services/youtube/youtubeTranscriptClient';
import type { TranscriptProvider } from './types/transcript';
import { httpLogStream } from './utils/logger';

export interface AppDependencies {
  transcriptProvider?: TranscriptProvider;
}

export function createApp(dependencies: AppDependencies = {}): Express {
  const transcriptProvider = dependencies.transcriptProvider ?? new YouTubeTranscriptClient();
  const transcriptService = new TranscriptService(transcriptProvider);

  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(express.json());
  app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
    stream: httpLogStream,
    skip: () => env.NODE_ENV === 'test'
  }));

  // Routes
  app.use(systemRoutes);
  app.use(createTranscriptRoutes(createTranscriptController(transcriptService)));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
