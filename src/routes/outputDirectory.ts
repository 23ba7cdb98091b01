import express, { type Request, type Response } from 'express';

import { BatchOrchestrator } from '../services/batchOrchestrator';
import { readBody, sendError } from './respond';

export function createOutputDirectoryRouter(orchestrator: BatchOrchestrator): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ outputDirectory: orchestrator.getOutputDirectory() ?? null });
  });

  router.put('/', async (req: Request, res: Response) => {
    const directory = readBody(req.body).path;

    if (typeof directory !== 'string' || !directory.trim()) {
      return res.status(400).json({ message: 'path is required.' });
    }

    try {
      const outputDirectory = await orchestrator.setOutputDirectory(directory);
      return res.json({ outputDirectory });
    } catch (error) {
      return sendError(res, error);
    }
  });

  return router;
}
