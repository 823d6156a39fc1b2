import type { NextFunction, Request, Response } from 'express';
import { parseTranscriptBody, parseTranscriptQuery } from '../dto/transcriptDto';
import type { TranscriptService } from '../services/transcriptService';

export interface TranscriptController {
  getTranscript(req: Request, res: Response, next: NextFunction): Promise<void>;
  getTranscriptById(req: Request, res: Response, next: NextFunction): Promise<void>;
  listTranscripts(req: Request, res: Response, next: NextFunction): Promise<void>;
}

export function createTranscriptController(transcriptService: TranscriptService): TranscriptController {
  return {
    /**
     * POST /transcript - body carries a URL or id plus fetch options
     */
    async getTranscript(req, res, next) {
      try {
        const request = parseTranscriptBody(req.body);
        res.json(await transcriptService.getTranscript(request));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /transcript/:video_id - same as the POST form, options in the query
     */
    async getTranscriptById(req, res, next) {
      try {
        const request = parseTranscriptQuery(req.params.video_id, req.query);
        res.json(await transcriptService.getTranscript(request));
      } catch (error) {
        next(error);
      }
    },

    async listTranscripts(req, res, next) {
      try {
        res.json(await transcriptService.listTranscripts(req.params.video_id));
      } catch (error) {
        next(error);
      }
    }
  };
}
