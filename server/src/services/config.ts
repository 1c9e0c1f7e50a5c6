import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { Configuration, Device, WorkerRuntime } from '../models/types.js';

export const TOKEN_PLACEHOLDER = 'your_token_here';

export const DEFAULT_SETTINGS = {
  HF_TOKEN: TOKEN_PLACEHOLDER,
  WHISPER_MODEL: 'large-v3',
  LANGUAGE: 'ru',
  BATCH_SIZE: '16',
  DEVICE: 'cuda',
  ENABLE_DIARIZATION: 'true',
  MIN_SPEAKERS: '',
  MAX_SPEAKERS: '',
  COMPUTE_TYPE: 'float16',
  VAD_METHOD: 'pyannote',
  CHUNK_SIZE: '30',
  WORKER_RUNTIME: 'docker',
  WORKER_IMAGE: 'ghcr.io/jim60105/whisperx:latest',
  WORKER_BINARY: 'whisperx',
  USE_SUDO: 'false',
  JOB_TIMEOUT_SEC: '0',
  POLL_INTERVAL_MS: '100',
  CACHE_DIR: '',
} as const;

type SettingKey = keyof typeof DEFAULT_SETTINGS;

const RECOGNIZED = new Set<string>(Object.keys(DEFAULT_SETTINGS));

const DEFAULT_FILE = `# Transcription orchestrator configuration
# Hugging Face token used for speaker diarization (https://huggingface.co/settings/tokens).
# Accept the pyannote/speaker-diarization-3.1 and pyannote/segmentation-3.0 licenses first.
HF_TOKEN=${TOKEN_PLACEHOLDER}

# Whisper model (tiny, base, small, medium, large-v1, large-v2, large-v3)
WHISPER_MODEL=large-v3

# Audio language (ru, en, ... or auto for detection)
LANGUAGE=ru

# Batch size; larger is faster but uses more GPU memory
BATCH_SIZE=16

# Compute device (cuda or cpu)
DEVICE=cuda

# Speaker diarization
ENABLE_DIARIZATION=true

# Speaker count hints (leave empty for automatic)
MIN_SPEAKERS=
MAX_SPEAKERS=

# Numeric precision (float16, float32, int8)
COMPUTE_TYPE=float16

# Voice activity detection (pyannote, silero)
VAD_METHOD=pyannote

# Chunk size in seconds
CHUNK_SIZE=30

# Worker runtime: docker (isolated container) or local (binary on PATH)
WORKER_RUNTIME=docker
WORKER_IMAGE=ghcr.io/jim60105/whisperx:latest
WORKER_BINARY=whisperx
USE_SUDO=false

# Per-file timeout in seconds (0 disables it)
JOB_TIMEOUT_SEC=0

# Progress display refresh interval in milliseconds
POLL_INTERVAL_MS=100

# Shared model cache (empty uses ~/whisperx)
CACHE_DIR=
`;

/** Only lines that are blank, comments, or key=value pairs are accepted. */
function isWellFormed(text: string) {
  return text.split(/\r?\n/).every((raw) => {
    const line = raw.trim();
    return line === '' || line.startsWith('#') || line.includes('=');
  });
}

function readSettings(configPath: string): Record<string, string> | undefined {
  if (!fs.existsSync(configPath)) {
    logger.info(`Configuration file ${configPath} not found, writing defaults`);
    return undefined;
  }
  try {
    const text = fs.readFileSync(configPath, 'utf8');
    if (!isWellFormed(text)) {
      logger.warn(`Configuration file ${configPath} is malformed, rewriting defaults`);
      return undefined;
    }
    return dotenv.parse(text);
  } catch (err) {
    logger.warn(`Failed to read configuration ${configPath}: ${errorMessage(err)}`);
    return undefined;
  }
}

export function writeDefaultConfig(configPath: string) {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, DEFAULT_FILE, { encoding: 'utf8', mode: 0o600 });
  logger.info(`Created configuration file ${configPath}`);
}

function positiveInt(key: SettingKey, value: string, fallback: number): number {
  const n = Number(value);
  if (value.trim() !== '' && Number.isInteger(n) && n > 0) return n;
  logger.warn(`${key}=${value} is not a positive integer, using ${fallback}`);
  return fallback;
}

function nonNegativeInt(key: SettingKey, value: string, fallback: number): number {
  const n = Number(value);
  if (value.trim() !== '' && Number.isInteger(n) && n >= 0) return n;
  logger.warn(`${key}=${value} is not a non-negative integer, using ${fallback}`);
  return fallback;
}

/** Speaker hints are emitted only for positive integers; anything else means "automatic". */
function speakerHint(value: string): number | undefined {
  if (!/^\d+$/.test(value.trim())) return undefined;
  const n = Number(value);
  return n > 0 ? n : undefined;
}

function parseDevice(value: string): Device {
  const v = value.toLowerCase();
  if (v === 'cuda' || v === 'cpu') return v;
  logger.warn(`DEVICE=${value} is not cuda or cpu, using ${DEFAULT_SETTINGS.DEVICE}`);
  return DEFAULT_SETTINGS.DEVICE;
}

function parseRuntime(value: string): WorkerRuntime {
  const v = value.toLowerCase();
  if (v === 'docker' || v === 'local') return v;
  logger.warn(`WORKER_RUNTIME=${value} is not docker or local, using ${DEFAULT_SETTINGS.WORKER_RUNTIME}`);
  return DEFAULT_SETTINGS.WORKER_RUNTIME;
}

function parseBool(value: string) {
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/** Builds a frozen configuration from raw settings; every recognized key falls back to its default. */
export function toConfiguration(raw: Readonly<Record<string, string>>): Configuration {
  const get = (key: SettingKey): string => raw[key] ?? DEFAULT_SETTINGS[key];
  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!RECOGNIZED.has(key)) extra[key] = value;
  }
  const cacheDir = get('CACHE_DIR').trim();

  return Object.freeze({
    hfToken: get('HF_TOKEN').trim(),
    model: get('WHISPER_MODEL') || DEFAULT_SETTINGS.WHISPER_MODEL,
    language: get('LANGUAGE') || DEFAULT_SETTINGS.LANGUAGE,
    batchSize: positiveInt('BATCH_SIZE', get('BATCH_SIZE'), Number(DEFAULT_SETTINGS.BATCH_SIZE)),
    device: parseDevice(get('DEVICE')),
    enableDiarization: parseBool(get('ENABLE_DIARIZATION')),
    minSpeakers: speakerHint(get('MIN_SPEAKERS')),
    maxSpeakers: speakerHint(get('MAX_SPEAKERS')),
    computeType: get('COMPUTE_TYPE') || DEFAULT_SETTINGS.COMPUTE_TYPE,
    vadMethod: get('VAD_METHOD') || DEFAULT_SETTINGS.VAD_METHOD,
    chunkSize: positiveInt('CHUNK_SIZE', get('CHUNK_SIZE'), Number(DEFAULT_SETTINGS.CHUNK_SIZE)),
    workerRuntime: parseRuntime(get('WORKER_RUNTIME')),
    workerImage: get('WORKER_IMAGE') || DEFAULT_SETTINGS.WORKER_IMAGE,
    workerBinary: get('WORKER_BINARY') || DEFAULT_SETTINGS.WORKER_BINARY,
    useSudo: parseBool(get('USE_SUDO')),
    jobTimeoutSec: nonNegativeInt('JOB_TIMEOUT_SEC', get('JOB_TIMEOUT_SEC'), Number(DEFAULT_SETTINGS.JOB_TIMEOUT_SEC)),
    pollIntervalMs: positiveInt('POLL_INTERVAL_MS', get('POLL_INTERVAL_MS'), Number(DEFAULT_SETTINGS.POLL_INTERVAL_MS)),
    cacheDir: cacheDir || undefined,
    extra: Object.freeze(extra),
  });
}

/**
 * Loads the orchestrator configuration. A missing, unreadable or malformed file is
 * replaced by the documented defaults; the caller always gets a full configuration.
 */
export function loadConfiguration(configPath: string): Configuration {
  const settings = readSettings(configPath);
  if (settings) return toConfiguration(settings);

  try {
    writeDefaultConfig(configPath);
  } catch (err) {
    logger.warn(`Could not write default configuration ${configPath}: ${errorMessage(err)}`);
  }
  return toConfiguration({});
}

export function withDevice(config: Configuration, device: Device): Configuration {
  return Object.freeze({ ...config, device });
}

export function hasUsableToken(config: Configuration) {
  return config.hfToken !== '' && config.hfToken !== TOKEN_PLACEHOLDER;
}
