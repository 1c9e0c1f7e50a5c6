import { randomUUID } from 'crypto';
import { buildWorkerInvocation, type JobTarget, type WorkerInvocation } from './invocation.js';
import { runJob, type RunOptions } from './runner.js';
import { prepareJobOutputDir, resolveJobOutputDir } from './workspace.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { Phase, type BatchJobEntry, type BatchResult, type Configuration, type JobResult, type Workspace } from '../models/types.js';
import type { DurationProbe } from './probe.js';

export interface BatchHooks {
  run?: (job: JobTarget, invocation: WorkerInvocation, options: RunOptions) => Promise<JobResult>;
  buildInvocation?: (config: Configuration, job: JobTarget, cacheDir: string) => WorkerInvocation;
  probeDuration?: DurationProbe;
  newJobId?: () => string;
  onJobStart?: (index: number, total: number, job: JobTarget, durationSec?: number) => void;
  onJobFinished?: (entry: BatchJobEntry, index: number, total: number) => void;
  /** Extra runner options (progress callbacks) for each job. */
  runOptions?: (job: JobTarget) => RunOptions;
}

export function speedFactor(durationSec: number | undefined, elapsedMs: number) {
  if (durationSec === undefined || elapsedMs <= 0) return undefined;
  return durationSec / (elapsedMs / 1000);
}

export function summarize(jobs: BatchJobEntry[], totalElapsedMs: number): BatchResult {
  const succeeded = jobs.filter((j) => j.result.status === 'succeeded').length;
  const attempted = jobs.length;
  const jobTime = jobs.reduce((sum, j) => sum + j.result.elapsedMs, 0);
  return {
    attempted,
    succeeded,
    failed: attempted - succeeded,
    totalElapsedMs,
    meanElapsedMs: attempted > 0 ? jobTime / attempted : 0,
    jobs,
  };
}

/**
 * Processes files one at a time in path order. A failing file is recorded and the
 * batch moves on; nothing thrown by a single job escapes the loop.
 */
export async function runBatch(
  files: readonly string[],
  config: Configuration,
  ws: Workspace,
  hooks: BatchHooks = {}
): Promise<BatchResult> {
  const run = hooks.run ?? runJob;
  const build = hooks.buildInvocation ?? buildWorkerInvocation;
  const newJobId = hooks.newJobId ?? randomUUID;
  const ordered = [...files].sort();
  const startedAt = Date.now();
  const entries: BatchJobEntry[] = [];

  for (const [i, inputFile] of ordered.entries()) {
    const job: JobTarget = { id: newJobId(), inputFile, outputDir: resolveJobOutputDir(ws, inputFile) };
    let durationSec: number | undefined;
    let result: JobResult;
    const jobStarted = Date.now();
    try {
      durationSec = hooks.probeDuration ? await hooks.probeDuration(inputFile) : undefined;
      hooks.onJobStart?.(i + 1, ordered.length, job, durationSec);
      prepareJobOutputDir(ws, inputFile);
      result = await run(job, build(config, job, ws.cacheDir), {
        timeoutMs: config.jobTimeoutSec * 1000,
        pollIntervalMs: config.pollIntervalMs,
        ...hooks.runOptions?.(job),
      });
    } catch (err) {
      logger.error(`Job for ${inputFile} could not be started: ${errorMessage(err)}`);
      result = {
        status: 'failed',
        jobId: job.id,
        inputFile,
        outputDir: job.outputDir,
        phase: Phase.Initializing,
        elapsedMs: Date.now() - jobStarted,
        error: { kind: 'launch', message: errorMessage(err), exitCode: null, diagnosticTail: [] },
      };
    }

    const entry: BatchJobEntry = { result, durationSec };
    if (result.status === 'succeeded') entry.speedFactor = speedFactor(durationSec, result.elapsedMs);
    entries.push(entry);
    hooks.onJobFinished?.(entry, i + 1, ordered.length);
  }

  return summarize(entries, Date.now() - startedAt);
}
