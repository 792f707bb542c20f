import { Router } from 'express';
import type { Request, Response } from 'express';
import type { MeasurementIngestionPort } from '@grid-stream/domain';

export function createStatusRouter(ingestion: MeasurementIngestionPort): Router {
  const statusRouter = Router();

  /** GET /healthz: 200 only while datagrams are being accepted */
  statusRouter.get('/healthz', (_req: Request, res: Response) => {
    const { state } = ingestion.stats();
    res.status(state === 'Running' ? 200 : 503).json({
      status: state === 'Running' ? 'ok' : 'unavailable',
      state,
      ts: new Date().toISOString(),
    });
  });

  /** GET /stats: receiver counters */
  statusRouter.get('/stats', (_req: Request, res: Response) => {
    const stats = ingestion.stats();
    res.json({
      ...stats,
      lastFlushAt: stats.lastFlushAt ? stats.lastFlushAt.toISOString() : null,
    });
  });

  return statusRouter;
}
