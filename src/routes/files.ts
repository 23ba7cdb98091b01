import express, { type Request, type Response } from 'express';

import { BatchOrchestrator } from '../services/batchOrchestrator';
import { readBody } from './respond';

function readPaths(value: unknown): string[] | undefined {
  if (typeof value === 'string') {
    return [value];
  }

  if (!Array.isArray(value) || value.length === 0) {
    return undefined;
  }

  const paths = value.filter((entry): entry is string => typeof entry === 'string' && entry.trim() !== '');
  return paths.length === value.length ? paths : undefined;
}

export function createFilesRouter(orchestrator: BatchOrchestrator): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ files: orchestrator.getFiles() });
  });

  router.post('/', (req: Request, res: Response) => {
    const paths = readPaths(readBody(req.body).paths);

    if (!paths) {
      return res.status(400).json({ message: 'paths must be a non-empty array of file paths.' });
    }

    const result = orchestrator.addFiles(paths);

    return res.json({
      added: result.added,
      rejected: result.rejected,
      duplicates: result.duplicates,
      files: orchestrator.getFiles()
    });
  });

  router.delete('/', (_req: Request, res: Response) => {
    orchestrator.clearFiles();
    res.json({ files: orchestrator.getFiles() });
  });

  router.delete('/entry', (req: Request, res: Response) => {
    const filePath = readBody(req.body).path;

    if (typeof filePath !== 'string' || !filePath.trim()) {
      return res.status(400).json({ message: 'path is required.' });
    }

    if (!orchestrator.removeFile(filePath)) {
      return res.status(404).json({ message: 'File is not queued.', path: filePath });
    }

    return res.json({ files: orchestrator.getFiles() });
  });

  return router;
}
