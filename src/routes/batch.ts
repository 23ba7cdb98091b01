import express, { type Request, type Response } from 'express';

import { BatchOrchestrator } from '../services/batchOrchestrator';
import { sendError } from './respond';

export function createBatchRouter(orchestrator: BatchOrchestrator): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ batch: orchestrator.getSnapshot() });
  });

  router.post('/', async (_req: Request, res: Response) => {
    try {
      const job = await orchestrator.startBatch();
      return res.status(202).json({
        message: 'Conversion batch started.',
        job
      });
    } catch (error) {
      return sendError(res, error);
    }
  });

  router.post('/cancel', (_req: Request, res: Response) => {
    if (!orchestrator.cancel()) {
      return res.status(409).json({ message: 'No running batch to cancel.' });
    }

    return res.status(202).json({ message: 'Cancellation requested; the current file will finish first.' });
  });

  router.get('/log', (_req: Request, res: Response) => {
    res.json({ entries: orchestrator.getLog() });
  });

  return router;
}
