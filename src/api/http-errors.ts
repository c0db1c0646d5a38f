/**
 * BNPL Credit Protocol - HTTP Error Mapping
 */

import { Response } from 'express';
import { ZodError } from 'zod';
import { ErrorCategory, isProtocolError } from '../shared/errors';
import { CustodyError } from '../modules/custody';

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  VALIDATION: 400,
  AUTHORIZATION: 403,
  STATE_CONFLICT: 409,
  EXTERNAL: 502,
};

export function handleRouteError(res: Response, error: unknown): void {
  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'Invalid request',
      code: 'INVALID_REQUEST',
      issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
    return;
  }

  if (isProtocolError(error)) {
    res.status(STATUS_BY_CATEGORY[error.category]).json({
      error: error.message,
      code: error.code,
      category: error.category,
    });
    return;
  }

  if (error instanceof CustodyError) {
    res.status(400).json({ error: error.message, code: error.code });
    return;
  }

  console.error('[API] Unhandled error:', error);
  res.status(500).json({ error: 'Internal server error' });
}
