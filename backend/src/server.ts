import express from 'express';
import cors from 'cors';
import { config, type Config } from './config.js';
import { errorHandler } from './middleware/error.js';
import { healthRouter } from './routes/health.js';
import { createRecordsRouter } from './routes/records.js';
import { RecordStore } from './services/store.js';

export function createServer(opts: { store?: RecordStore; cfg?: Config } = {}) {
  const cfg = opts.cfg ?? config;
  const store = opts.store ?? new RecordStore(cfg.historyCapacity);
  const app = express();

  app.disable('x-powered-by');
  app.use(cors({ origin: cfg.corsOrigin }));
  app.use(express.json({ limit: '64kb' }));

  app.use('/healthz', healthRouter);
  app.use('/api/records', createRecordsRouter(store, { authToken: cfg.authToken }));

  app.use(errorHandler);
  return app;
}
