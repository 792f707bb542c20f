import type { Request, Response, NextFunction } from 'express';
import { createLogger } from '@grid-stream/adapters';

const log = createLogger('http');

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof Error) {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) log.error('request failed', { error: err.message });
    res.status(status).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
