import fs from 'fs';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfiguration } from './services/config.js';
import { createWorkspace, ensureWorkspace, listMediaFiles } from './services/workspace.js';
import { checkReadiness } from './services/readiness.js';
import { createDurationProbe } from './services/probe.js';
import { runBatch } from './services/batch.js';
import { writeBatchReport } from './services/transcripts.js';
import {
  renderBatchSummary,
  renderJobHeader,
  renderJobSummary,
  renderProgressLine,
  renderReadiness,
} from './services/reporter.js';
import { ReadinessError, errorMessage } from './utils/errors.js';
import { logger, setLogLevel } from './utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL = 2;
export const EXIT_INTERRUPTED = 130;

interface CliOptions {
  file?: string;
  directory?: string;
  output: string;
  config: string;
  check?: boolean;
  timeout?: number;
  debug?: boolean;
}

export interface CliDeps {
  checkReadiness: typeof checkReadiness;
  runBatch: typeof runBatch;
  print: (line: string) => void;
  /** Progress line sink; undefined when stdout is not a terminal. */
  progress?: (text: string) => void;
}

const defaultDeps: CliDeps = {
  checkReadiness,
  runBatch,
  print: (line) => console.log(line),
  progress: process.stdout.isTTY === true ? (text) => process.stdout.write(text) : undefined,
};

function parseSeconds(value: string) {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a whole number of seconds.');
  return n;
}

function fileSize(file: string) {
  try {
    return fs.statSync(file).size;
  } catch {
    return undefined;
  }
}

function buildProgram() {
  return new Command()
    .name('whisperx-batch')
    .description('Transcribe audio/video files with speaker diarization in an isolated worker')
    .option('-f, --file <path>', 'process a single media file')
    .option('-d, --directory <path>', 'process every media file in a directory', './audio')
    .option('-o, --output <path>', 'results directory', './results')
    .option('--config <path>', 'configuration file', './config.env')
    .option('--check', 'only check that the system is ready')
    .option('--timeout <seconds>', 'per-file timeout (overrides JOB_TIMEOUT_SEC)', parseSeconds)
    .option('--debug', 'verbose logging');
}

async function execute(argv: string[], deps: CliDeps): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const opts = program.opts<CliOptions>();
  const print = (lines: string[]) => lines.forEach((line) => deps.print(line));

  if (opts.debug) setLogLevel('debug');

  let config = loadConfiguration(path.resolve(opts.config));
  if (opts.timeout !== undefined) config = Object.freeze({ ...config, jobTimeoutSec: opts.timeout });

  const ws = createWorkspace(config, { inputDir: opts.directory, outputDir: opts.output });
  ensureWorkspace(ws);

  const report = await deps.checkReadiness(config, ws);
  print(renderReadiness(report));
  if (opts.check) return report.ready ? EXIT_OK : EXIT_FAILURE;
  if (!report.ready) throw new ReadinessError(report.checks.filter((c) => c.status === 'fail'));

  let files: string[];
  if (opts.file) {
    const file = path.resolve(opts.file);
    if (!fs.existsSync(file)) {
      logger.error(`File not found: ${file}`);
      return EXIT_FAILURE;
    }
    files = [file];
  } else {
    files = listMediaFiles(ws.inputDir);
    if (files.length === 0) {
      logger.warn(`No media files found in ${ws.inputDir}`);
      return EXIT_OK;
    }
    logger.info(`Found ${files.length} media files`);
  }

  const probeReady = report.checks.some((c) => c.name === 'duration-probe' && c.status === 'pass');
  const progress = deps.progress;
  let tick = 0;
  let lastWidth = 0;
  const clearProgress = () => {
    if (progress && lastWidth > 0) progress(`${' '.repeat(lastWidth)}\r`);
    lastWidth = 0;
  };

  const batch = await deps.runBatch(files, report.configuration, ws, {
    probeDuration: probeReady ? createDurationProbe() : undefined,
    onJobStart: (index, total, job, durationSec) => {
      print(renderJobHeader(index, total, job.inputFile, fileSize(job.inputFile), durationSec));
    },
    runOptions: () => ({
      onLine: (line) => logger.debug(`[worker] ${line}`),
      onTick: (phase) => {
        if (!progress) return;
        const text = renderProgressLine(phase, tick++);
        lastWidth = text.length;
        progress(`${text}\r`);
      },
    }),
    onJobFinished: (entry) => {
      clearProgress();
      print(renderJobSummary(entry));
    },
  });

  const { reportPath } = writeBatchReport(batch, ws.outputDir);
  print(renderBatchSummary(batch));
  logger.info(`Batch report written to ${reportPath}`);
  return batch.failed > 0 ? EXIT_PARTIAL : EXIT_OK;
}

/** Runs the batch command and maps every outcome to a process exit code. */
export async function runCli(argv: string[], deps: Partial<CliDeps> = {}): Promise<number> {
  try {
    return await execute(argv, { ...defaultDeps, ...deps });
  } catch (err) {
    if (err instanceof ReadinessError) logger.error('System not ready, fix the errors above and retry');
    else logger.error(`Unexpected error: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  }
}

export function installInterruptHandler(exit: (code: number) => void = (code) => process.exit(code)) {
  const onInterrupt = () => {
    logger.warn('Interrupted by user');
    exit(EXIT_INTERRUPTED);
  };
  process.once('SIGINT', onInterrupt);
  return onInterrupt;
}
