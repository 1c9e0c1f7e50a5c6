import { spawn, type ChildProcess } from 'child_process';
import readline from 'readline';
import { classifyLine } from './phases.js';
import { listOutputFiles } from './workspace.js';
import { runCommand, type CommandExecutor } from '../utils/exec.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { Phase, type JobFailure, type JobResult } from '../models/types.js';
import type { JobTarget, WorkerInvocation } from './invocation.js';

export const DEFAULT_TAIL_LINES = 10;
export const DEFAULT_POLL_INTERVAL_MS = 100;

export interface RunOptions {
  /** Wall-clock limit; 0 or undefined waits for the worker indefinitely. */
  timeoutMs?: number;
  /** How often onTick fires while the worker is alive. */
  pollIntervalMs?: number;
  /** Diagnostic lines kept for a failure report. */
  tailLines?: number;
  onPhase?: (phase: Phase) => void;
  onTick?: (phase: Phase, elapsedMs: number) => void;
  onLine?: (line: string, stream: 'stdout' | 'stderr') => void;
  exec?: CommandExecutor;
}

function splitCarriageReturns(line: string) {
  return line.split('\r').map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Runs one worker process to completion and reports the outcome. Diagnostic lines
 * are consumed as they arrive and drive the job's phase. The returned promise
 * never rejects: launch errors, non-zero exits and timeouts are failed results.
 */
export function runJob(job: JobTarget, invocation: WorkerInvocation, options: RunOptions = {}): Promise<JobResult> {
  const tailLimit = options.tailLines ?? DEFAULT_TAIL_LINES;
  const exec = options.exec ?? runCommand;
  const startedAt = Date.now();

  return new Promise<JobResult>((resolve) => {
    let phase = Phase.Initializing;
    let spawned = false;
    let timedOut = false;
    let settled = false;
    const tail: string[] = [];
    let ticker: NodeJS.Timeout | undefined;
    let deadline: NodeJS.Timeout | undefined;
    let cleanup: Promise<void> = Promise.resolve();

    const elapsed = () => Date.now() - startedAt;

    const advance = (next: Phase) => {
      if (next === phase) return;
      phase = next;
      options.onPhase?.(phase);
    };

    const fail = (error: JobFailure): JobResult => ({
      status: 'failed',
      jobId: job.id,
      inputFile: job.inputFile,
      outputDir: job.outputDir,
      phase,
      elapsedMs: elapsed(),
      error,
    });

    const settle = (result: JobResult | Promise<JobResult>) => {
      if (settled) return;
      settled = true;
      clearInterval(ticker);
      clearTimeout(deadline);
      resolve(result);
    };

    const launchFailure = (err: unknown) =>
      fail({
        kind: 'launch',
        message: `Could not start ${invocation.command}: ${errorMessage(err)}`,
        exitCode: null,
        diagnosticTail: [],
      });

    let child: ChildProcess;
    try {
      child = spawn(invocation.command, invocation.args, {
        env: { ...process.env, ...invocation.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      settle(launchFailure(err));
      return;
    }

    child.once('spawn', () => {
      spawned = true;
      logger.debug(`Worker started (pid ${child.pid}): ${invocation.command}`);
    });

    child.on('error', (err) => {
      if (!spawned) {
        settle(launchFailure(err));
        return;
      }
      logger.warn(`Worker process error: ${errorMessage(err)}`);
    });

    if (child.stderr) {
      readline.createInterface({ input: child.stderr, crlfDelay: Infinity }).on('line', (raw) => {
        for (const line of splitCarriageReturns(raw)) {
          tail.push(line);
          if (tail.length > tailLimit) tail.shift();
          options.onLine?.(line, 'stderr');
          advance(classifyLine(phase, line));
        }
      });
    }
    if (child.stdout) {
      readline.createInterface({ input: child.stdout, crlfDelay: Infinity }).on('line', (raw) => {
        for (const line of splitCarriageReturns(raw)) options.onLine?.(line, 'stdout');
      });
    }

    ticker = setInterval(() => options.onTick?.(phase, elapsed()), options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);

    if (options.timeoutMs && options.timeoutMs > 0) {
      const limit = options.timeoutMs;
      deadline = setTimeout(() => {
        timedOut = true;
        logger.warn(`Worker exceeded ${limit} ms, terminating`);
        child.kill('SIGKILL');
        if (invocation.terminate) {
          const { command, args } = invocation.terminate;
          const label = `${command} ${args.join(' ')}`;
          cleanup = exec(command, args, 15_000).then(
            (outcome) => {
              if (!outcome.ok) logger.warn(`Cleanup ${label} failed: ${outcome.error ?? ''}`);
            },
            (err: unknown) => logger.warn(`Cleanup ${label} failed: ${errorMessage(err)}`)
          );
        }
      }, limit);
    }

    // The container may outlive its client; the next job waits until it is gone.
    const settleTimeout = () => settle(cleanup.then(() => timeoutResult()));

    const timeoutResult = () =>
      fail({
        kind: 'timeout',
        message: `Worker did not finish within ${options.timeoutMs} ms and was terminated`,
        exitCode: null,
        signal: 'SIGKILL',
        diagnosticTail: [...tail],
      });

    // A killed worker may leave pipes open in descendants; do not wait for them.
    child.once('exit', () => {
      if (timedOut) settleTimeout();
    });

    child.once('close', (code, signal) => {
      if (!spawned) return;
      if (timedOut) {
        settleTimeout();
        return;
      }
      if (code === 0) {
        advance(Phase.Finalizing);
        const elapsedMs = elapsed();
        settle(
          listOutputFiles(job.outputDir).then(
            (files): JobResult => ({
              status: 'succeeded',
              jobId: job.id,
              inputFile: job.inputFile,
              outputDir: job.outputDir,
              phase,
              elapsedMs,
              files,
            }),
            (err): JobResult =>
              fail({
                kind: 'runtime',
                message: `Worker finished but its output could not be listed: ${errorMessage(err)}`,
                exitCode: 0,
                diagnosticTail: [...tail],
              })
          )
        );
        return;
      }
      settle(
        fail({
          kind: 'runtime',
          message: signal ? `Worker was stopped by ${signal}` : `Worker exited with code ${code}`,
          exitCode: code,
          signal,
          diagnosticTail: [...tail],
        })
      );
    });
  });
}
