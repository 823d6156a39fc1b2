import { Router } from 'express';
import type { TranscriptController } from '../controllers/transcriptController';

export function createTranscriptRoutes(controller: TranscriptController): Router {
  const router = Router();

  // Fetch transcript from a URL or id in the body
  router.post('/transcript', controller.getTranscript);

  // Fetch transcript with options in the query string
  router.get('/transcript/:video_id', controller.getTranscriptById);

  // List available caption tracks
  router.get('/list/:video_id', controller.listTranscripts);

  return router;
}
