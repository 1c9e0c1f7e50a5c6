import fs from 'fs';
import os from 'os';
import path from 'path';
import { WorkspaceError, errorCode } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Configuration, Workspace } from '../models/types.js';

export const MEDIA_EXTENSIONS = [
  '.wav', '.mp3', '.m4a', '.flac', '.ogg', '.aac', '.wma',
  '.mp4', '.mkv', '.avi', '.mov', '.webm',
];

/** User-scoped and run-independent, so downloaded models survive between runs. */
export function defaultCacheDir() {
  return path.join(os.homedir(), 'whisperx');
}

export function createWorkspace(
  config: Configuration,
  dirs: { inputDir?: string; outputDir?: string } = {}
): Workspace {
  return {
    inputDir: path.resolve(dirs.inputDir ?? './audio'),
    outputDir: path.resolve(dirs.outputDir ?? './results'),
    cacheDir: path.resolve(config.cacheDir ?? defaultCacheDir()),
  };
}

function mkdir(dir: string) {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new WorkspaceError(dir, err);
  }
}

/** Creates missing workspace directories. Never removes or rewrites existing content. */
export function ensureWorkspace(ws: Workspace) {
  for (const dir of [ws.inputDir, ws.outputDir, ws.cacheDir]) {
    mkdir(dir);
  }
  logger.debug(`Model cache: ${ws.cacheDir}`);
}

/** Output directory for one input file, named after its base name. */
export function resolveJobOutputDir(ws: Workspace, inputFile: string) {
  const stem = path.parse(inputFile).name;
  return path.join(ws.outputDir, stem);
}

export function prepareJobOutputDir(ws: Workspace, inputFile: string) {
  const dir = resolveJobOutputDir(ws, inputFile);
  mkdir(dir);
  return dir;
}

export function isMediaFile(file: string) {
  return MEDIA_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

/** Recursively lists media files under a directory, sorted by path. */
export function listMediaFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const found: string[] = [];
  const walk = (current: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile() && isMediaFile(entry.name)) found.push(full);
    }
  };
  walk(dir);
  return found.sort();
}

/** Lists the files a job produced, by name, sorted. */
export async function listOutputFiles(dir: string): Promise<string[]> {
  try {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return [];
    throw err;
  }
}
