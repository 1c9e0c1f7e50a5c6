import path from 'path';
import { Queue, Worker, type Job } from 'bullmq';
import IORedis from 'ioredis';
import { buildWorkerInvocation, type JobTarget, type WorkerInvocation } from './invocation.js';
import { runJob, type RunOptions } from './runner.js';
import { phaseLabel } from './phases.js';
import { prepareJobOutputDir } from './workspace.js';
import { ensureSubtitleFile, loadTranscript } from './transcripts.js';
import { JobStore } from './jobStore.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Configuration, JobResult, Workspace } from '../models/types.js';

const queueName = 'transcriptions';

export interface TranscriptionQueue {
  enqueue(jobId: string): Promise<void>;
  close(): Promise<void>;
}

export interface ProcessorDeps {
  store: JobStore;
  config: () => Configuration;
  workspace: Workspace;
  run?: (job: JobTarget, invocation: WorkerInvocation, options: RunOptions) => Promise<JobResult>;
  buildInvocation?: (config: Configuration, job: JobTarget, cacheDir: string) => WorkerInvocation;
}

export function createProcessor(deps: ProcessorDeps) {
  const run = deps.run ?? runJob;
  const build = deps.buildInvocation ?? buildWorkerInvocation;

  return async function processTranscription(jobId: string) {
    const record = deps.store.get(jobId);
    if (!record) throw new Error(`Job ${jobId} not found`);
    const config = deps.config();
    const target: JobTarget = { id: record.id, inputFile: record.file.path, outputDir: record.outputDir };

    deps.store.update(jobId, (j) => {
      j.status = 'running';
      j.progress.message = 'Worker starting';
    });

    let outcome: JobResult;
    try {
      prepareJobOutputDir(deps.workspace, record.file.path);
      outcome = await run(target, build(config, target, deps.workspace.cacheDir), {
        timeoutMs: config.jobTimeoutSec * 1000,
        pollIntervalMs: config.pollIntervalMs,
        onPhase: (phase) =>
          deps.store.update(jobId, (j) => {
            j.progress.phase = phase;
            j.progress.label = phaseLabel(phase);
          }),
        // Ticks are frequent; only keep the elapsed counter in memory between phase changes.
        onTick: (_phase, elapsedMs) => {
          const job = deps.store.get(jobId);
          if (job) job.progress.elapsedSec = Math.round(elapsedMs / 1000);
        },
      });
    } catch (err) {
      deps.store.update(jobId, (j) => {
        j.status = 'failed';
        j.error = { kind: 'launch', message: errorMessage(err), exitCode: null, diagnosticTail: [] };
      });
      throw err;
    }

    const result = outcome;
    if (result.status === 'failed') {
      deps.store.update(jobId, (j) => {
        j.status = 'failed';
        j.progress.phase = result.phase;
        j.progress.label = phaseLabel(result.phase);
        j.progress.elapsedSec = Math.round(result.elapsedMs / 1000);
        j.progress.message = result.error.message;
        j.error = result.error;
      });
      logger.warn(`Job ${jobId} failed: ${result.error.message}`);
      return result;
    }

    let srt: string | undefined;
    try {
      const transcript = loadTranscript(result.outputDir, record.file.path);
      srt = transcript ? ensureSubtitleFile(result.outputDir, transcript) : undefined;
    } catch (err) {
      // The worker's own files are still served; only the derived subtitle is skipped.
      logger.warn(`Job ${jobId}: unreadable worker output, no subtitle derived: ${errorMessage(err)}`);
    }
    deps.store.update(jobId, (j) => {
      j.status = 'completed';
      j.progress.phase = result.phase;
      j.progress.label = phaseLabel(result.phase);
      j.progress.elapsedSec = Math.round(result.elapsedMs / 1000);
      j.progress.message = 'Done';
      j.files = srt ? [...result.files, path.basename(srt)].sort() : result.files;
    });
    logger.info(`Job ${jobId} completed in ${(result.elapsedMs / 1000).toFixed(1)}s`);
    return result;
  };
}

/** One job at a time, in submission order, inside this process. */
export function createInMemoryQueue(handler: (jobId: string) => Promise<unknown>): TranscriptionQueue {
  let tail: Promise<void> = Promise.resolve();
  return {
    enqueue(jobId) {
      tail = tail.then(async () => {
        try {
          await handler(jobId);
        } catch (err) {
          logger.error(`Job ${jobId} aborted: ${errorMessage(err)}`);
        }
      });
      return Promise.resolve();
    },
    close() {
      return tail;
    },
  };
}

/** BullMQ-backed queue; a single worker with concurrency 1 keeps jobs sequential. */
export function createRedisQueue(redisUrl: string, handler: (jobId: string) => Promise<unknown>): TranscriptionQueue {
  const connection = new IORedis(redisUrl, { maxRetriesPerRequest: null });
  const bullQueue = new Queue(queueName, { connection });
  const bullWorker = new Worker(
    queueName,
    async (job: Job<{ jobId: string }>) => {
      await handler(job.data.jobId);
    },
    { connection, concurrency: 1 }
  );
  bullWorker.on('failed', (job, err) => {
    logger.error(`Queue job ${job?.data.jobId ?? '?'} failed: ${err.message}`);
  });

  return {
    async enqueue(jobId) {
      await bullQueue.add('transcribe', { jobId }, { removeOnComplete: true, removeOnFail: true });
    },
    async close() {
      await bullWorker.close();
      await bullQueue.close();
      await connection.quit();
    },
  };
}

export function initQueue(deps: ProcessorDeps, redisUrl = process.env.REDIS_URL): TranscriptionQueue {
  const processTranscription = createProcessor(deps);
  const queue = redisUrl
    ? createRedisQueue(redisUrl, processTranscription)
    : createInMemoryQueue(processTranscription);

  for (const job of deps.store.unfinished()) {
    logger.info(`Re-queueing unfinished job ${job.id}`);
    void queue.enqueue(job.id).catch((err: unknown) => logger.error(`Re-queue of ${job.id} failed: ${errorMessage(err)}`));
  }
  return queue;
}
