import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, EXIT_PARTIAL, installInterruptHandler, runCli, type CliDeps } from './program.js';
import { runBatch } from './services/batch.js';
import { BATCH_REPORT_FILE } from './services/transcripts.js';
import { Phase, type Configuration, type JobResult, type ReadinessCheck, type Workspace } from './models/types.js';
import type { JobTarget } from './services/invocation.js';

let root: string;
let configPath: string;
let audioDir: string;
let resultsDir: string;
let printed: string[];

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));
  configPath = path.join(root, 'config.env');
  audioDir = path.join(root, 'audio');
  resultsDir = path.join(root, 'results');
  fs.writeFileSync(configPath, `WORKER_RUNTIME=local\nENABLE_DIARIZATION=false\nCACHE_DIR=${path.join(root, 'cache')}\n`);
  printed = [];
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function readiness(ready: boolean): CliDeps['checkReadiness'] {
  const checks: ReadinessCheck[] = [
    { name: 'runtime', status: 'pass', message: 'whisperx found' },
    { name: 'credential', status: ready ? 'pass' : 'fail', message: ready ? 'not needed' : 'HF_TOKEN missing' },
  ];
  return async (config: Configuration, _ws: Workspace) => ({ ready, checks, configuration: config });
}

function result(job: JobTarget, ok: boolean): JobResult {
  return ok
    ? { status: 'succeeded', jobId: job.id, inputFile: job.inputFile, outputDir: job.outputDir, phase: Phase.Finalizing, elapsedMs: 1000, files: [] }
    : {
        status: 'failed',
        jobId: job.id,
        inputFile: job.inputFile,
        outputDir: job.outputDir,
        phase: Phase.Transcribing,
        elapsedMs: 1000,
        error: { kind: 'runtime', message: 'Worker exited with code 1', exitCode: 1, diagnosticTail: [] },
      };
}

/** Real batch loop with a fake worker; files whose name contains `fail` exit non-zero. */
function batchWithFakeWorker(ran: string[] = []): CliDeps['runBatch'] {
  return (files, config, ws, hooks) =>
    runBatch(files, config, ws, {
      ...hooks,
      run: async (job) => {
        ran.push(path.basename(job.inputFile));
        return result(job, !job.inputFile.includes('fail'));
      },
    });
}

function cli(args: string[], deps: Partial<CliDeps>) {
  const argv = ['node', 'whisperx-batch', '--config', configPath, '-d', audioDir, '-o', resultsDir, ...args];
  return runCli(argv, { print: (line) => printed.push(line), progress: undefined, ...deps });
}

describe('runCli', () => {
  it('exits 0 on a passing readiness check without touching any file', async () => {
    const ran: string[] = [];
    const code = await cli(['--check'], { checkReadiness: readiness(true), runBatch: batchWithFakeWorker(ran) });
    expect(code).toBe(EXIT_OK);
    expect(printed).toContain('System is ready');
    expect(ran).toEqual([]);
  });

  it('exits 1 on a failing readiness check', async () => {
    expect(await cli(['--check'], { checkReadiness: readiness(false) })).toBe(EXIT_FAILURE);
    expect(printed).toContain('❌ credential: HF_TOKEN missing');
  });

  it('refuses to run a batch when the system is not ready', async () => {
    fs.mkdirSync(audioDir, { recursive: true });
    fs.writeFileSync(path.join(audioDir, 'a.wav'), 'x');
    const ran: string[] = [];
    const code = await cli([], { checkReadiness: readiness(false), runBatch: batchWithFakeWorker(ran) });
    expect(code).toBe(EXIT_FAILURE);
    expect(ran).toEqual([]);
  });

  it('exits 0 when every file succeeds and writes the batch report', async () => {
    fs.mkdirSync(audioDir, { recursive: true });
    fs.writeFileSync(path.join(audioDir, 'a.wav'), 'x');
    fs.writeFileSync(path.join(audioDir, 'notes.txt'), 'x');
    const ran: string[] = [];

    const code = await cli([], { checkReadiness: readiness(true), runBatch: batchWithFakeWorker(ran) });

    expect(code).toBe(EXIT_OK);
    expect(ran).toEqual(['a.wav']);
    expect(printed).toContain('Processing: a.wav');
    expect(printed).toContain('Attempted: 1');
    expect(JSON.parse(fs.readFileSync(path.join(resultsDir, BATCH_REPORT_FILE), 'utf8'))).toEqual([]);
  });

  it('exits 2 when some files failed but still processes all of them', async () => {
    fs.mkdirSync(audioDir, { recursive: true });
    for (const name of ['a.wav', 'b-fail.wav', 'c.wav']) fs.writeFileSync(path.join(audioDir, name), 'x');
    const ran: string[] = [];

    const code = await cli([], { checkReadiness: readiness(true), runBatch: batchWithFakeWorker(ran) });

    expect(code).toBe(EXIT_PARTIAL);
    expect(ran).toEqual(['a.wav', 'b-fail.wav', 'c.wav']);
    expect(printed).toContain('Failed: 1');
  });

  it('exits 0 with nothing to do for an empty directory', async () => {
    const ran: string[] = [];
    expect(await cli([], { checkReadiness: readiness(true), runBatch: batchWithFakeWorker(ran) })).toBe(EXIT_OK);
    expect(ran).toEqual([]);
  });

  it('exits 1 for a single file that does not exist', async () => {
    const code = await cli(['-f', path.join(root, 'missing.wav')], { checkReadiness: readiness(true) });
    expect(code).toBe(EXIT_FAILURE);
  });

  it('runs only the named file in single-file mode', async () => {
    const file = path.join(root, 'one.mp3');
    fs.writeFileSync(file, 'x');
    const ran: string[] = [];
    expect(await cli(['-f', file], { checkReadiness: readiness(true), runBatch: batchWithFakeWorker(ran) })).toBe(EXIT_OK);
    expect(ran).toEqual(['one.mp3']);
  });
});

describe('installInterruptHandler', () => {
  it('exits with 130 on SIGINT', () => {
    const codes: number[] = [];
    const handler = installInterruptHandler((code) => codes.push(code));
    process.emit('SIGINT');
    process.removeListener('SIGINT', handler);
    expect(codes).toEqual([EXIT_INTERRUPTED]);
  });
});
