import express, { type Request, type Response } from 'express';

import { OUTPUT_FORMAT } from '../config/formats';

export function createFormatsRouter(inputExtensions: readonly string[]): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      formats: {
        input: inputExtensions,
        output: OUTPUT_FORMAT
      }
    });
  });

  return router;
}
