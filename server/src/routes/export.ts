import express from 'express';
import path from 'path';
import createError from 'http-errors';
import {
  buildDocxBuffer,
  buildJson,
  buildPdfBuffer,
  buildSrtText,
  buildTxtText,
  buildXlsxBuffer,
  isExportFormat,
  type ExportFormat,
} from '../services/exporters.js';
import { loadTranscript } from '../services/transcripts.js';
import type { TranscriptionJob, TranscriptResult } from '../models/types.js';
import type { AppContext } from '../app.js';

const CONTENT_TYPES = {
  json: 'application/json',
  txt: 'text/plain; charset=utf-8',
  srt: 'application/x-subrip; charset=utf-8',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  pdf: 'application/pdf',
} as const;

async function render(fmt: ExportFormat, job: TranscriptionJob, transcript: TranscriptResult): Promise<string | Buffer> {
  switch (fmt) {
    case 'json':
      return JSON.stringify(buildJson(job, transcript), null, 2);
    case 'txt':
      return buildTxtText(job, transcript);
    case 'srt':
      return buildSrtText(transcript.segments);
    case 'docx':
      return buildDocxBuffer(job, transcript);
    case 'xlsx':
      return buildXlsxBuffer(transcript);
    case 'pdf':
      return buildPdfBuffer(job, transcript);
  }
}

export default function createExportRouter(ctx: AppContext) {
  const router = express.Router();

  router.get('/:id/:fmt', async (req, res, next) => {
    const { id, fmt } = req.params;
    if (!isExportFormat(fmt)) return next(createError(400, `Unknown format: ${fmt}`));
    const job = ctx.store.get(id);
    if (!job || job.status !== 'completed') return next(createError(404, 'Result not found'));

    try {
      const transcript = loadTranscript(job.outputDir, job.file.path);
      if (!transcript) return next(createError(404, 'Result not found'));

      const body = await render(fmt, job, transcript);

      const base = path.parse(job.file.originalName).name || job.id;
      res.setHeader('Content-Type', CONTENT_TYPES[fmt]);
      res.setHeader('Content-Disposition', `attachment; filename="${encodeURIComponent(base)}.${fmt}"`);
      res.send(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
