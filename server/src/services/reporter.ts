import path from 'path';
import { phaseLabel } from './phases.js';
import type { BatchJobEntry, BatchResult, JobFailure, Phase, ReadinessReport } from '../models/types.js';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

const RULE = '═'.repeat(40);

function pad(n: number, width = 2) {
  return String(n).padStart(width, '0');
}

/** Human-readable duration: "4.2s", "3m 7s", "1h 2m 3s". */
export function formatDuration(seconds: number) {
  if (!(seconds > 0)) return '0.0s';
  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  if (hours > 0) return `${hours}h ${mins}m ${Math.floor(secs)}s`;
  if (mins > 0) return `${mins}m ${Math.floor(secs)}s`;
  return `${secs.toFixed(1)}s`;
}

/** SRT timestamp, HH:MM:SS,mmm. */
export function srtTimestamp(seconds: number) {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3600000);
  const minutes = Math.floor((totalMs % 3600000) / 60000);
  const secs = Math.floor((totalMs % 60000) / 1000);
  const millis = totalMs % 1000;
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(millis, 3)}`;
}

export function renderProgressLine(phase: Phase, tick: number) {
  const frame = SPINNER_FRAMES[tick % SPINNER_FRAMES.length];
  return `   [PROGRESS] ${frame} ${phaseLabel(phase)}`;
}

export function renderJobHeader(index: number, total: number, file: string, sizeBytes?: number, durationSec?: number) {
  const lines = [`═══ File ${index}/${total} ═══`, `Processing: ${path.basename(file)}`];
  if (sizeBytes !== undefined) lines.push(`   Size: ${(sizeBytes / (1024 * 1024)).toFixed(1)} MB`);
  if (durationSec !== undefined) lines.push(`   Duration: ${formatDuration(durationSec)}`);
  return lines;
}

export function describeFailure(error: JobFailure) {
  switch (error.kind) {
    case 'launch':
      return `could not launch worker: ${error.message}`;
    case 'timeout':
      return `timed out: ${error.message}`;
    case 'runtime':
      return error.exitCode !== null && error.exitCode !== undefined
        ? `worker exited with code ${error.exitCode}`
        : error.message;
  }
}

export function renderJobSummary(entry: BatchJobEntry): string[] {
  const { result } = entry;
  const name = path.basename(result.inputFile);
  const elapsed = formatDuration(result.elapsedMs / 1000);
  if (result.status === 'succeeded') {
    const lines = [`✅ ${name}: done in ${elapsed}`];
    if (entry.speedFactor !== undefined) lines.push(`   Speed: ${entry.speedFactor.toFixed(1)}x realtime`);
    lines.push(`   Output: ${result.outputDir} (${result.files.length} files)`);
    for (const file of result.files) lines.push(`      • ${file}`);
    return lines;
  }
  const lines = [`❌ ${name}: ${describeFailure(result.error)} after ${elapsed}`];
  const tail = result.error.diagnosticTail.filter((l) => l.trim() !== '');
  if (tail.length > 0) {
    lines.push('   Last worker messages:');
    for (const line of tail) lines.push(`   [worker] ${line}`);
  }
  return lines;
}

export function renderBatchSummary(batch: BatchResult): string[] {
  const lines = [
    RULE,
    'BATCH SUMMARY',
    RULE,
    `Attempted: ${batch.attempted}`,
    `Succeeded: ${batch.succeeded}`,
    `Failed: ${batch.failed}`,
    `Total time: ${formatDuration(batch.totalElapsedMs / 1000)}`,
  ];
  if (batch.attempted > 0) lines.push(`Average per file: ${formatDuration(batch.meanElapsedMs / 1000)}`);
  const failures = batch.jobs.filter((j) => j.result.status === 'failed');
  if (failures.length > 0) {
    lines.push('Failed files:');
    for (const entry of failures) lines.push(...renderJobSummary(entry).map((l) => `  ${l}`));
  }
  return lines;
}

export function renderReadiness(report: ReadinessReport): string[] {
  const icon = { pass: '✅', warn: '⚠️', fail: '❌' } as const;
  const lines = report.checks.map((c) => `${icon[c.status]} ${c.name}: ${c.message}`);
  lines.push(report.ready ? 'System is ready' : 'System is not ready');
  return lines;
}
