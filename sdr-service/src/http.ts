import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import morgan from 'morgan';
import { buildKey } from './identity.js';
import { formatBatch } from './publisher.js';
import { listFamilies } from './packets/index.js';
import type { IngestionPipeline } from './pipeline.js';

/**
 * Poll API for consumers that pull batches instead of subscribing:
 * - GET /api/health     supervisor state and ingestion counters
 * - GET /api/batch      the current batch; flushes only when HTTP is the batch consumer
 * - GET /api/snapshot   current values without flushing
 * - GET /api/sensors    sensors heard so far, with their identity keys
 * - GET /api/families   supported packet families
 */
export interface AppOptions {
  accessLog?: boolean;
  /** Whether GET /api/batch consumes the batch (deltas included) or only reads it. */
  flushOnBatch?: boolean;
}

export function createApp(pipeline: IngestionPipeline, opts: AppOptions = {}): Express {
  const flushOnBatch = opts.flushOnBatch ?? false;
  const app = express();
  app.set('etag', false);
  if (opts.accessLog ?? true) app.use(morgan('combined'));
  app.use((req: Request, res: Response, next: NextFunction) => {
    if (req.path.startsWith('/api/')) {
      res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, proxy-revalidate');
      res.setHeader('Pragma', 'no-cache');
    }
    next();
  });

  app.get('/api/health', (_req: Request, res: Response) => {
    const failure = pipeline.supervisor.failure;
    res.status(failure ? 503 : 200).json({
      ok: !failure,
      state: pipeline.supervisor.state,
      error: failure ? { code: failure.code, message: failure.message } : undefined,
      restarts: pipeline.supervisor.restarts,
      fields: pipeline.accumulator.size,
      counters: pipeline.counters,
      unmapped: pipeline.mapping.unmappedKeys,
    });
  });

  app.get('/api/batch', (_req: Request, res: Response) => {
    const now = Date.now();
    const batch = flushOnBatch ? pipeline.poll(now) : { timestamp: now, fields: pipeline.snapshot() };
    res.json(formatBatch(batch, now));
  });

  app.get('/api/snapshot', (_req: Request, res: Response) => {
    const now = Date.now();
    res.json(formatBatch({ timestamp: now, fields: pipeline.snapshot() }, now));
  });

  app.get('/api/sensors', (_req: Request, res: Response) => {
    const order = pipeline.mapping.sensorMap.keyOrder;
    res.json(pipeline.detectedSensors().map((s) => ({
      ...s,
      firstSeen: new Date(s.firstSeen).toISOString(),
      lastSeen: new Date(s.lastSeen).toISOString(),
      keys: s.observations.map((observation) => buildKey({ observation, deviceId: s.deviceId, family: s.family }, order)),
    })));
  });

  app.get('/api/families', (_req: Request, res: Response) => {
    res.json(listFamilies());
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not found' });
  });

  return app;
}
