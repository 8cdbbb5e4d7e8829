import type { Response } from 'express';
import { z } from 'zod';
import { AppError, statusByKind } from '../errors';
import type { Logger } from '../logger';

/** Writes the fixed response for `e`. Unknown errors never leak their message. */
export function sendError(res: Response, e: unknown, logger: Logger) {
  if (e instanceof AppError) {
    if (e.kind === 'unauthenticated') res.setHeader('WWW-Authenticate', 'Bearer');
    return res.status(e.status).json({ error: e.message });
  }
  if (e instanceof z.ZodError) {
    return res.status(statusByKind.validation).json({ error: 'Validation failed', issues: e.issues });
  }
  if (isBodyParseError(e)) {
    return res.status(400).json({ error: 'Malformed request body' });
  }

  logger.error('unhandled error', e);
  return res.status(500).json({ error: 'Internal server error' });
}

// body-parser tags its errors with `type` and a 4xx `status`.
function isBodyParseError(e: unknown): boolean {
  return e instanceof SyntaxError && 'type' in e && e.type === 'entity.parse.failed';
}
