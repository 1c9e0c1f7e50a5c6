import express from 'express';
import multer from 'multer';
import path from 'path';
import { randomUUID } from 'crypto';
import createError from 'http-errors';
import { isMediaFile, resolveJobOutputDir } from '../services/workspace.js';
import { phaseLabel } from '../services/phases.js';
import { Phase, type TranscriptionJob } from '../models/types.js';
import type { AppContext } from '../app.js';

export default function createUploadRouter(ctx: AppContext) {
  const router = express.Router();

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => cb(null, ctx.uploadDir),
    filename: (_req, file, cb) => {
      const id = randomUUID();
      const ext = path.extname(file.originalname).toLowerCase();
      cb(null, `${id}${ext}`);
    },
  });

  const upload = multer({
    storage,
    limits: { fileSize: 500 * 1024 * 1024 }, // 500MB
    fileFilter: (_req, file, cb) => {
      if (isMediaFile(file.originalname)) cb(null, true);
      else cb(createError(400, `Unsupported file type: ${file.originalname}`));
    },
  });

  // Store the file and queue a transcription job for it
  router.post('/', upload.single('file'), (req, res, next) => {
    const f = req.file;
    if (!f) return next(createError(400, 'file is required'));

    const now = new Date().toISOString();
    const job: TranscriptionJob = {
      id: randomUUID(),
      file: {
        id: path.parse(f.filename).name,
        path: f.path,
        originalName: f.originalname,
        mimetype: f.mimetype,
        size: f.size,
      },
      outputDir: resolveJobOutputDir(ctx.workspace, f.path),
      createdAt: now,
      updatedAt: now,
      status: 'queued',
      progress: {
        phase: Phase.Initializing,
        label: phaseLabel(Phase.Initializing),
        elapsedSec: 0,
        message: 'Waiting in queue',
      },
    };

    ctx.store.create(job);
    ctx.queue.enqueue(job.id).then(
      () => res.status(202).json({ jobId: job.id, file: job.file.originalName }),
      (err: unknown) => next(err)
    );
  });

  return router;
}
