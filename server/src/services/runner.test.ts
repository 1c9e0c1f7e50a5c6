import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runJob } from './runner.js';
import { Phase } from '../models/types.js';
import type { JobTarget, WorkerInvocation } from './invocation.js';
import type { CommandExecutor } from '../utils/exec.js';

let outDir: string;
let job: JobTarget;

function nodeWorker(script: string, env: Record<string, string> = {}): WorkerInvocation {
  return { command: process.execPath, args: ['-e', script], env };
}

function isAlive(pid: number) {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

beforeEach(() => {
  outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'runner-test-'));
  job = { id: 'job-1', inputFile: '/media/a.wav', outputDir: outDir };
});

afterEach(() => {
  fs.rmSync(outDir, { recursive: true, force: true });
});

describe('runJob', () => {
  it('reports success with the produced files and the observed phase', async () => {
    const phases: Phase[] = [];
    const script = [
      "const fs = require('fs');",
      "const path = require('path');",
      "process.stderr.write('Loading model\\n');",
      "process.stderr.write('>>Performing transcription...\\n');",
      "fs.writeFileSync(path.join(process.env.OUT_DIR, 'out.txt'), 'hello');",
    ].join('\n');

    const result = await runJob(job, nodeWorker(script, { OUT_DIR: outDir }), {
      onPhase: (p) => phases.push(p),
    });

    expect(result.status).toBe('succeeded');
    if (result.status !== 'succeeded') return;
    expect(result.files).toContain('out.txt');
    expect(result.phase).toBeGreaterThanOrEqual(Phase.Transcribing);
    expect(phases).toEqual([Phase.Transcribing, Phase.Finalizing]);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('passes the extra environment to the worker', async () => {
    const script = "require('fs').writeFileSync(require('path').join(process.env.OUT_DIR, process.env.HF_HOME + '.txt'), '')";
    const result = await runJob(job, nodeWorker(script, { OUT_DIR: outDir, HF_HOME: 'cache-marker' }));
    expect(result.status).toBe('succeeded');
    if (result.status !== 'succeeded') return;
    expect(result.files).toEqual(['cache-marker.txt']);
  });

  it('keeps only the last diagnostic lines of a failed run', async () => {
    const script = [
      "for (let i = 1; i <= 12; i++) process.stderr.write('line ' + i + '\\n');",
      'process.exit(3);',
    ].join('\n');

    const result = await runJob(job, nodeWorker(script));

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.kind).toBe('runtime');
    expect(result.error.exitCode).toBe(3);
    expect(result.error.diagnosticTail).toEqual([
      'line 3', 'line 4', 'line 5', 'line 6', 'line 7',
      'line 8', 'line 9', 'line 10', 'line 11', 'line 12',
    ]);
  });

  it('distinguishes a worker that cannot be launched', async () => {
    const result = await runJob(job, { command: path.join(outDir, 'no-such-worker'), args: [], env: {} });
    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.kind).toBe('launch');
    expect(result.phase).toBe(Phase.Initializing);
  });

  it('kills a worker that outlives the timeout', async () => {
    const cleanups: string[][] = [];
    const exec: CommandExecutor = async (cmd, args) => {
      cleanups.push([cmd, ...args]);
      return { ok: true, stdout: '', stderr: '' };
    };
    const script = [
      "process.stderr.write('pid ' + process.pid + '\\n');",
      "process.stderr.write('Performing VAD\\n');",
      'setInterval(() => {}, 1000);',
    ].join('\n');
    const invocation: WorkerInvocation = { ...nodeWorker(script), terminate: { command: 'docker', args: ['rm', '-f', 'w'] } };

    const started = Date.now();
    const result = await runJob(job, invocation, { timeoutMs: 1500, exec });
    const took = Date.now() - started;

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.kind).toBe('timeout');
    expect(took).toBeLessThan(5000);
    expect(result.phase).toBe(Phase.DetectingSpeech);
    expect(cleanups).toEqual([['docker', 'rm', '-f', 'w']]);

    const pidLine = result.error.diagnosticTail.find((l) => l.startsWith('pid '));
    expect(pidLine).toBeDefined();
    expect(isAlive(Number(pidLine?.slice(4)))).toBe(false);
  });

  it('settles a timed-out job only after the container cleanup finished', async () => {
    let cleanupFinished = false;
    const exec: CommandExecutor = async () => {
      await new Promise((r) => setTimeout(r, 400));
      cleanupFinished = true;
      return { ok: false, stdout: '', stderr: '', error: 'No such container: w' };
    };
    const invocation: WorkerInvocation = {
      ...nodeWorker('setInterval(() => {}, 1000);'),
      terminate: { command: 'docker', args: ['rm', '-f', 'w'] },
    };

    const result = await runJob(job, invocation, { timeoutMs: 300, exec });

    expect(cleanupFinished).toBe(true);
    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.kind).toBe('timeout');
  });

  it('treats silence as normal and waits for exit', async () => {
    const ticks: number[] = [];
    const script = 'setTimeout(() => process.exit(0), 300);';
    const result = await runJob(job, nodeWorker(script), {
      pollIntervalMs: 50,
      onTick: (_phase, elapsed) => ticks.push(elapsed),
    });
    expect(result.status).toBe('succeeded');
    expect(ticks.length).toBeGreaterThan(0);
  });
});
