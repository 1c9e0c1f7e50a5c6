export type Device = 'cuda' | 'cpu';

export type WorkerRuntime = 'docker' | 'local';

export interface Configuration {
  hfToken: string;
  model: string;
  language: string; // language code or 'auto'
  batchSize: number;
  device: Device;
  enableDiarization: boolean;
  minSpeakers?: number;
  maxSpeakers?: number;
  computeType: string; // float16 | float32 | int8
  vadMethod: string; // pyannote | silero
  chunkSize: number; // seconds
  workerRuntime: WorkerRuntime;
  workerImage: string;
  workerBinary: string;
  useSudo: boolean;
  jobTimeoutSec: number; // 0 = unbounded
  pollIntervalMs: number;
  cacheDir?: string;
  /** Keys present in the file that the orchestrator does not recognize. */
  extra: Readonly<Record<string, string>>;
}

export interface Workspace {
  inputDir: string;
  outputDir: string;
  cacheDir: string;
}

/** Ordered processing stages; numeric values carry the order. */
export enum Phase {
  Initializing = 0,
  DetectingSpeech = 1,
  Transcribing = 2,
  Aligning = 3,
  Diarizing = 4,
  Finalizing = 5,
}

export type JobState = 'pending' | 'running' | 'succeeded' | 'failed';

export type JobFailureKind = 'launch' | 'runtime' | 'timeout';

export interface Job {
  id: string;
  inputFile: string;
  outputDir: string;
  state: JobState;
  phase: Phase;
  startedAt?: number;
  finishedAt?: number;
  exitCode?: number | null;
  error?: JobFailure;
}

export interface JobFailure {
  kind: JobFailureKind;
  message: string;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  diagnosticTail: string[];
}

export type JobResult =
  | {
      status: 'succeeded';
      jobId: string;
      inputFile: string;
      outputDir: string;
      phase: Phase;
      elapsedMs: number;
      files: string[];
    }
  | {
      status: 'failed';
      jobId: string;
      inputFile: string;
      outputDir: string;
      phase: Phase;
      elapsedMs: number;
      error: JobFailure;
    };

export interface BatchJobEntry {
  result: JobResult;
  durationSec?: number;
  /** Audio duration divided by processing time; only for files with a known duration. */
  speedFactor?: number;
}

export interface BatchResult {
  attempted: number;
  succeeded: number;
  failed: number;
  totalElapsedMs: number;
  meanElapsedMs: number;
  jobs: BatchJobEntry[];
}

export type CheckStatus = 'pass' | 'warn' | 'fail';

export interface ReadinessCheck {
  name: 'runtime' | 'gpu' | 'worker' | 'credential' | 'duration-probe' | 'cache';
  status: CheckStatus;
  message: string;
}

export interface ReadinessReport {
  ready: boolean;
  checks: ReadinessCheck[];
  /** Effective configuration after a possible GPU to CPU downgrade. */
  configuration: Configuration;
}

export interface TranscriptSegment {
  id: string;
  start: number; // seconds
  end: number; // seconds
  text: string;
  speaker?: string;
}

export interface TranscriptResult {
  file: string;
  text: string;
  segments: TranscriptSegment[];
  language?: string;
}

export interface JobProgress {
  phase: Phase;
  label: string;
  elapsedSec: number;
  message?: string;
}

/** Upload-driven job record, persisted per id. */
export interface TranscriptionJob {
  id: string;
  file: {
    id: string;
    path: string;
    originalName: string;
    mimetype: string;
    size: number;
  };
  outputDir: string;
  createdAt: string;
  updatedAt: string;
  status: 'queued' | 'running' | 'completed' | 'failed';
  progress: JobProgress;
  files?: string[];
  error?: JobFailure;
}
