import fs from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';
import { srtTimestamp } from './reporter.js';
import { isRecord, readJson, writeJson } from '../utils/fsutil.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { BatchResult, TranscriptResult, TranscriptSegment } from '../models/types.js';

export const BATCH_REPORT_FILE = 'transcripts_detailed.json';
export const COMBINED_TEXT_FILE = 'all_transcripts.txt';

function toSegment(raw: unknown): TranscriptSegment | undefined {
  if (!isRecord(raw)) return undefined;
  const { start, end, text, speaker } = raw;
  if (typeof start !== 'number' || typeof end !== 'number' || typeof text !== 'string') return undefined;
  return {
    id: nanoid(),
    start,
    end,
    text: text.trim(),
    ...(typeof speaker === 'string' ? { speaker } : {}),
  };
}

/** Maps the worker's JSON output onto a transcript; unknown fields are ignored. */
export function parseWorkerOutput(file: string, raw: unknown): TranscriptResult {
  const segmentsRaw = isRecord(raw) && Array.isArray(raw.segments) ? raw.segments : [];
  const segments = segmentsRaw.map(toSegment).filter((s): s is TranscriptSegment => s !== undefined);
  const language = isRecord(raw) && typeof raw.language === 'string' ? raw.language : undefined;
  return {
    file,
    text: segments.map((s) => s.text).join(' ').trim(),
    segments,
    ...(language ? { language } : {}),
  };
}

export function workerJsonPath(outputDir: string, inputFile: string) {
  return path.join(outputDir, `${path.parse(inputFile).name}.json`);
}

export function loadTranscript(outputDir: string, inputFile: string): TranscriptResult | undefined {
  const raw = readJson(workerJsonPath(outputDir, inputFile));
  return raw === undefined ? undefined : parseWorkerOutput(inputFile, raw);
}

export function buildSrtText(segments: TranscriptSegment[]) {
  const parts: string[] = [];
  segments.forEach((seg, i) => {
    parts.push(String(i + 1));
    parts.push(`${srtTimestamp(seg.start)} --> ${srtTimestamp(seg.end)}`);
    parts.push(seg.speaker ? `[${seg.speaker}]: ${seg.text}` : seg.text);
    parts.push('');
  });
  return parts.join('\n');
}

/** Writes `<stem>.srt` next to the worker output when the worker produced none. */
export function ensureSubtitleFile(outputDir: string, transcript: TranscriptResult) {
  const srtPath = path.join(outputDir, `${path.parse(transcript.file).name}.srt`);
  if (fs.existsSync(srtPath) || transcript.segments.length === 0) return undefined;
  fs.writeFileSync(srtPath, buildSrtText(transcript.segments), 'utf8');
  return srtPath;
}

/**
 * Collects the transcripts of every succeeded job into one JSON array and one
 * combined text file under the results root.
 */
export function writeBatchReport(batch: BatchResult, resultsDir: string) {
  const transcripts: TranscriptResult[] = [];
  for (const { result } of batch.jobs) {
    if (result.status !== 'succeeded') continue;
    try {
      const transcript = loadTranscript(result.outputDir, result.inputFile);
      if (!transcript) {
        logger.warn(`No worker JSON for ${result.inputFile}, skipped in report`);
        continue;
      }
      ensureSubtitleFile(result.outputDir, transcript);
      transcripts.push(transcript);
    } catch (err) {
      logger.warn(`Unreadable worker output for ${result.inputFile}: ${errorMessage(err)}`);
    }
  }

  const reportPath = path.join(resultsDir, BATCH_REPORT_FILE);
  writeJson(
    reportPath,
    transcripts.map(({ file, text, segments, language }) => ({
      file,
      text,
      segments: segments.map(({ start, end, text: segText, speaker }) => ({ start, end, text: segText, speaker })),
      language: language ?? null,
    }))
  );

  const combined = transcripts.map((t) => `=== ${path.basename(t.file)} ===\n${t.text}\n\n`).join('');
  fs.writeFileSync(path.join(resultsDir, COMBINED_TEXT_FILE), combined, 'utf8');
  return { reportPath, count: transcripts.length };
}
