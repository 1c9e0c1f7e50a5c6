import path from 'path';
import { hasUsableToken } from './config.js';
import type { Configuration } from '../models/types.js';

export interface WorkerInvocation {
  command: string;
  args: string[];
  /** Extra environment for the spawned process, merged over the host environment. */
  env: Record<string, string>;
  /** Command that force-stops the worker when the supervised process has to be killed. */
  terminate?: { command: string; args: string[] };
}

export interface JobTarget {
  id: string;
  inputFile: string;
  outputDir: string;
}

export interface HostIdentity {
  uid?: number;
  gid?: number;
}

const CONTAINER_AUDIO = '/audio';
const CONTAINER_RESULTS = '/results';
const CONTAINER_CACHE = '/models';

/** Cache redirections; every job resolves model and credential caches to the same place. */
export function cacheEnvironment(cacheRoot: string): Record<string, string> {
  return {
    HOME: cacheRoot,
    HF_HOME: path.posix.join(cacheRoot, '.cache', 'huggingface'),
    XDG_CACHE_HOME: path.posix.join(cacheRoot, '.cache'),
    TORCH_HOME: path.posix.join(cacheRoot, '.cache', 'torch'),
  };
}

export function containerName(jobId: string) {
  return `whisperx-${jobId}`;
}

export function diarizationActive(config: Configuration) {
  return config.enableDiarization && hasUsableToken(config);
}

/** Worker flags, in order, for the given input and output locations. */
export function workerArguments(config: Configuration, inputRef: string, outputRef: string): string[] {
  const args = [
    '--output_dir', outputRef,
    '--model', config.model,
  ];
  if (config.language !== 'auto') args.push('--language', config.language);
  args.push(
    '--batch_size', String(config.batchSize),
    '--device', config.device,
    '--compute_type', config.computeType,
    '--output_format', 'all',
    '--verbose', 'False',
    '--vad_method', config.vadMethod,
    '--chunk_size', String(config.chunkSize),
  );

  if (diarizationActive(config)) {
    args.push('--diarize', '--hf_token', config.hfToken);
    if (config.minSpeakers !== undefined) args.push('--min_speakers', String(config.minSpeakers));
    if (config.maxSpeakers !== undefined) args.push('--max_speakers', String(config.maxSpeakers));
  }

  args.push(inputRef);
  return args;
}

function withSudo(config: Configuration, command: string, args: string[]) {
  return config.useSudo ? { command: 'sudo', args: [command, ...args] } : { command, args };
}

function dockerInvocation(
  config: Configuration,
  job: JobTarget,
  cacheDir: string,
  host: HostIdentity
): WorkerInvocation {
  const name = containerName(job.id);
  const dockerArgs = ['run', '--rm', '--name', name];
  if (host.uid !== undefined && host.gid !== undefined) {
    dockerArgs.push('--user', `${host.uid}:${host.gid}`);
  }
  if (config.device === 'cuda') dockerArgs.push('--gpus', 'all');

  dockerArgs.push(
    '-v', `${path.resolve(path.dirname(job.inputFile))}:${CONTAINER_AUDIO}:ro`,
    '-v', `${path.resolve(job.outputDir)}:${CONTAINER_RESULTS}`,
    '-v', `${path.resolve(cacheDir)}:${CONTAINER_CACHE}`,
    '--workdir', '/app',
  );
  for (const [key, value] of Object.entries(cacheEnvironment(CONTAINER_CACHE))) {
    dockerArgs.push('-e', `${key}=${value}`);
  }
  if (diarizationActive(config)) dockerArgs.push('-e', `HF_TOKEN=${config.hfToken}`);

  dockerArgs.push(config.workerImage, 'whisperx');
  dockerArgs.push(
    ...workerArguments(config, path.posix.join(CONTAINER_AUDIO, path.basename(job.inputFile)), CONTAINER_RESULTS)
  );

  const run = withSudo(config, 'docker', dockerArgs);
  return {
    command: run.command,
    args: run.args,
    env: {},
    terminate: withSudo(config, 'docker', ['rm', '-f', name]),
  };
}

function localInvocation(config: Configuration, job: JobTarget, cacheDir: string): WorkerInvocation {
  const env = cacheEnvironment(path.resolve(cacheDir));
  if (diarizationActive(config)) env.HF_TOKEN = config.hfToken;
  return {
    command: config.workerBinary,
    args: workerArguments(config, path.resolve(job.inputFile), path.resolve(job.outputDir)),
    env,
  };
}

/** Builds the command line and environment for one job. Spawns nothing. */
export function buildWorkerInvocation(
  config: Configuration,
  job: JobTarget,
  cacheDir: string,
  host: HostIdentity = { uid: process.getuid?.(), gid: process.getgid?.() }
): WorkerInvocation {
  return config.workerRuntime === 'docker'
    ? dockerInvocation(config, job, cacheDir, host)
    : localInvocation(config, job, cacheDir);
}
