import type { Response } from 'express';

import { BatchError } from '../errors/batchErrors';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readBody(body: unknown): Record<string, unknown> {
  return isRecord(body) ? body : {};
}

export function sendError(res: Response, error: unknown): Response {
  if (error instanceof BatchError) {
    return res.status(error.status).json({ message: error.message, code: error.code });
  }

  const message = error instanceof Error ? error.message : 'Unknown error.';
  console.error('Unhandled request error:', message);
  return res.status(500).json({ message });
}
