import express from 'express';
import path from 'path';
import createError from 'http-errors';
import { phaseName } from '../services/phases.js';
import type { TranscriptionJob } from '../models/types.js';
import type { AppContext } from '../app.js';

function view(job: TranscriptionJob) {
  return { ...job, progress: { ...job.progress, phaseName: phaseName(job.progress.phase) } };
}

export default function createTranscriptionsRouter(ctx: AppContext) {
  const router = express.Router();

  router.get('/', (_req, res) => {
    const jobs = ctx.store.list().map((j) => ({
      id: j.id,
      status: j.status,
      progress: view(j).progress,
      file: j.file,
      createdAt: j.createdAt,
      updatedAt: j.updatedAt,
    }));
    res.json({ jobs });
  });

  router.get('/:id', (req, res, next) => {
    const job = ctx.store.get(req.params.id);
    if (!job) return next(createError(404, 'Job not found'));
    res.json(view(job));
  });

  // SSE stream for progress
  router.get('/:id/stream', (req, res, next) => {
    if (!ctx.store.get(req.params.id)) return next(createError(404, 'Job not found'));
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const send = () => {
      const job = ctx.store.get(req.params.id);
      if (!job) return;
      res.write(`data: ${JSON.stringify({ status: job.status, progress: view(job).progress })}\n\n`);
      if (job.status === 'completed' || job.status === 'failed') {
        clearInterval(interval);
        res.end();
      }
    };
    const interval = setInterval(send, 1000);
    send();

    req.on('close', () => {
      clearInterval(interval);
    });
  });

  // Serve one result file of a finished job
  router.get('/:id/files/:name', (req, res, next) => {
    const job = ctx.store.get(req.params.id);
    if (!job) return next(createError(404, 'Job not found'));
    const name = path.basename(req.params.name);
    if (!job.files?.includes(name)) return next(createError(404, 'File not found'));
    res.download(path.join(job.outputDir, name), name, (err) => {
      if (err && !res.headersSent) next(err);
    });
  });

  return router;
}
