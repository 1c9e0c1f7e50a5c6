import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import createError from 'http-errors';
import createUploadRouter from './routes/upload.js';
import createTranscriptionsRouter from './routes/transcriptions.js';
import createExportRouter from './routes/export.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import type { JobStore } from './services/jobStore.js';
import type { TranscriptionQueue } from './services/queue.js';
import type { Configuration, ReadinessReport, Workspace } from './models/types.js';

export interface AppContext {
  store: JobStore;
  queue: TranscriptionQueue;
  workspace: Workspace;
  uploadDir: string;
  config: () => Configuration;
  readiness: () => Promise<ReadinessReport>;
}

export function createApp(ctx: AppContext, opts: { requestLog?: boolean } = {}) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  if (opts.requestLog ?? true) app.use(morgan('dev'));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, service: 'whisperx-batch-orchestrator', time: new Date().toISOString() });
  });

  app.get('/api/readiness', (_req, res, next) => {
    ctx.readiness().then(
      (report) => res.status(report.ready ? 200 : 503).json(report),
      (err: unknown) => next(err)
    );
  });

  app.use('/api/upload', createUploadRouter(ctx));
  app.use('/api/transcriptions', createTranscriptionsRouter(ctx));
  app.use('/api/export', createExportRouter(ctx));

  app.use((_req, _res, next) => {
    next(createError(404, 'Not Found'));
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = createError.isHttpError(err) ? err.status : 500;
    if (status >= 500) logger.error(`Request failed: ${errorMessage(err)}`);
    res.status(status).json({ error: status >= 500 ? 'Internal Server Error' : errorMessage(err) });
  });

  return app;
}
