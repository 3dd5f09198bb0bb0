import type { Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../errors.js';
import { createLogger } from '../services/logger.js';

const log = createLogger('http');

/**
 * Writes the JSON error for `error`. Known errors answer with their status and public
 * message; anything else is logged and answered with 500 and `fallback`.
 */
export function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const field = issue?.path.join('.');
    res.status(400).json({ error: field ? `${field}: ${issue.message}` : (issue?.message ?? 'Invalid request') });
    return;
  }

  if (error instanceof AppError) {
    if (error.status >= 500) {
      log.error(`${fallback}: ${error.message}`);
    }
    res.status(error.status).json({ error: error.publicMessage, code: error.code });
    return;
  }

  log.error(`${fallback}:`, error);
  res.status(500).json({ error: fallback });
}
