import fs from 'fs';
import path from 'path';
import { hasUsableToken, withDevice } from './config.js';
import { isProbeAvailable } from './probe.js';
import { runCommand, type CommandExecutor } from '../utils/exec.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Configuration, ReadinessCheck, ReadinessReport, Workspace } from '../models/types.js';

const VERSION_TIMEOUT_MS = 3_000;
const INSPECT_TIMEOUT_MS = 15_000;
const GPU_PROBE_TIMEOUT_MS = 15_000;
const GPU_PROBE_IMAGE = 'nvidia/cuda:12.4.1-base-ubuntu22.04';

function sudo(config: Configuration, cmd: string, args: string[]): [string, string[]] {
  return config.useSudo ? ['sudo', [cmd, ...args]] : [cmd, args];
}

async function checkRuntime(config: Configuration, exec: CommandExecutor): Promise<ReadinessCheck> {
  const [cmd, args]: [string, string[]] =
    config.workerRuntime === 'docker' ? ['docker', ['--version']] : [config.workerBinary, ['--help']];
  const outcome = await exec(cmd, args, VERSION_TIMEOUT_MS);
  if (outcome.ok) {
    return { name: 'runtime', status: 'pass', message: outcome.stdout.split('\n')[0] || `${cmd} found` };
  }
  return { name: 'runtime', status: 'fail', message: `${cmd} is not available: ${outcome.error ?? 'unknown error'}` };
}

async function checkGpu(config: Configuration, exec: CommandExecutor): Promise<ReadinessCheck> {
  if (config.device !== 'cuda') {
    return { name: 'gpu', status: 'pass', message: 'CPU mode configured' };
  }
  const outcome =
    config.workerRuntime === 'docker'
      ? await exec(
          ...sudo(config, 'docker', [
            'run', '--rm', '--gpus', 'all', GPU_PROBE_IMAGE,
            'nvidia-smi', '--query-gpu=name', '--format=csv,noheader',
          ]),
          GPU_PROBE_TIMEOUT_MS
        )
      : await exec('nvidia-smi', ['--query-gpu=name', '--format=csv,noheader'], GPU_PROBE_TIMEOUT_MS);
  if (outcome.ok && outcome.stdout) {
    return { name: 'gpu', status: 'pass', message: `GPU detected: ${outcome.stdout}` };
  }
  return { name: 'gpu', status: 'warn', message: 'GPU not reachable, falling back to CPU' };
}

async function checkWorker(config: Configuration, exec: CommandExecutor): Promise<ReadinessCheck> {
  if (config.workerRuntime === 'local') {
    // The runtime probe already invoked the binary itself.
    return { name: 'worker', status: 'pass', message: `Using local worker ${config.workerBinary}` };
  }
  const outcome = await exec(...sudo(config, 'docker', ['image', 'inspect', config.workerImage]), INSPECT_TIMEOUT_MS);
  if (outcome.ok) return { name: 'worker', status: 'pass', message: `Worker image ${config.workerImage} found` };
  return {
    name: 'worker',
    status: 'fail',
    message: `Worker image ${config.workerImage} not found; run: docker pull ${config.workerImage}`,
  };
}

function checkCredential(config: Configuration): ReadinessCheck {
  if (!config.enableDiarization) {
    return { name: 'credential', status: 'pass', message: 'Diarization disabled, no token required' };
  }
  if (!hasUsableToken(config)) {
    return {
      name: 'credential',
      status: 'fail',
      message: 'HF_TOKEN is not configured; diarization needs a Hugging Face token',
    };
  }
  return { name: 'credential', status: 'pass', message: 'HF_TOKEN configured' };
}

async function checkDurationProbe(exec: CommandExecutor): Promise<ReadinessCheck> {
  if (await isProbeAvailable(exec)) {
    return { name: 'duration-probe', status: 'pass', message: 'ffprobe found' };
  }
  return { name: 'duration-probe', status: 'warn', message: 'ffprobe not found; media durations will not be shown' };
}

function checkCache(cacheDir: string): ReadinessCheck {
  const marker = path.join(cacheDir, `.write-test-${process.pid}.tmp`);
  try {
    fs.writeFileSync(marker, '');
    fs.unlinkSync(marker);
    return { name: 'cache', status: 'pass', message: `Cache ${cacheDir} is writable` };
  } catch (err) {
    return { name: 'cache', status: 'fail', message: `Cache ${cacheDir} is not writable: ${errorMessage(err)}` };
  }
}

/**
 * Preflight checks run before any job. Hard failures make the report not ready;
 * an unreachable GPU downgrades the returned configuration to CPU instead.
 */
export async function checkReadiness(
  config: Configuration,
  ws: Workspace,
  exec: CommandExecutor = runCommand
): Promise<ReadinessReport> {
  const checks: ReadinessCheck[] = [];
  let effective = config;

  const runtime = await checkRuntime(config, exec);
  checks.push(runtime);

  const gpu = await checkGpu(config, exec);
  checks.push(gpu);
  if (gpu.status === 'warn') {
    effective = withDevice(config, 'cpu');
  }

  checks.push(await checkWorker(effective, exec));
  checks.push(checkCredential(effective));
  checks.push(await checkDurationProbe(exec));
  checks.push(checkCache(ws.cacheDir));

  for (const check of checks) {
    if (check.status === 'fail') logger.error(`[${check.name}] ${check.message}`);
    else if (check.status === 'warn') logger.warn(`[${check.name}] ${check.message}`);
    else logger.info(`[${check.name}] ${check.message}`);
  }

  return {
    ready: checks.every((c) => c.status !== 'fail'),
    checks,
    configuration: effective,
  };
}
