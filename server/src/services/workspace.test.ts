import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createWorkspace,
  defaultCacheDir,
  ensureWorkspace,
  listMediaFiles,
  listOutputFiles,
  prepareJobOutputDir,
  resolveJobOutputDir,
} from './workspace.js';
import { toConfiguration } from './config.js';
import type { Workspace } from '../models/types.js';

let root: string;
let ws: Workspace;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'workspace-test-'));
  ws = {
    inputDir: path.join(root, 'audio'),
    outputDir: path.join(root, 'results'),
    cacheDir: path.join(root, 'cache'),
  };
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('ensureWorkspace', () => {
  it('creates the three directories', () => {
    ensureWorkspace(ws);
    expect(fs.statSync(ws.inputDir).isDirectory()).toBe(true);
    expect(fs.statSync(ws.outputDir).isDirectory()).toBe(true);
    expect(fs.statSync(ws.cacheDir).isDirectory()).toBe(true);
  });

  it('is idempotent and leaves existing contents alone', () => {
    ensureWorkspace(ws);
    fs.writeFileSync(path.join(ws.cacheDir, 'model.bin'), 'weights');
    fs.writeFileSync(path.join(ws.outputDir, 'keep.txt'), 'result');

    expect(() => ensureWorkspace(ws)).not.toThrow();
    expect(fs.readFileSync(path.join(ws.cacheDir, 'model.bin'), 'utf8')).toBe('weights');
    expect(fs.readdirSync(ws.outputDir)).toEqual(['keep.txt']);
  });
});

describe('createWorkspace', () => {
  it('uses the user-scoped cache unless one is configured', () => {
    expect(createWorkspace(toConfiguration({})).cacheDir).toBe(defaultCacheDir());
    expect(createWorkspace(toConfiguration({ CACHE_DIR: '/srv/models' })).cacheDir).toBe('/srv/models');
  });
});

describe('resolveJobOutputDir', () => {
  it('names the directory after the input base name', () => {
    expect(resolveJobOutputDir(ws, '/media/interviews/day one.mp3')).toBe(path.join(ws.outputDir, 'day one'));
    expect(resolveJobOutputDir(ws, 'clip.tar.wav')).toBe(path.join(ws.outputDir, 'clip.tar'));
  });

  it('keeps files already in an existing job directory', () => {
    const dir = prepareJobOutputDir(ws, '/media/a.wav');
    fs.writeFileSync(path.join(dir, 'a.txt'), 'old');
    expect(prepareJobOutputDir(ws, '/media/a.wav')).toBe(dir);
    expect(fs.readFileSync(path.join(dir, 'a.txt'), 'utf8')).toBe('old');
  });
});

describe('listMediaFiles', () => {
  it('finds media recursively, sorted, ignoring other files', () => {
    fs.mkdirSync(path.join(ws.inputDir, 'sub'), { recursive: true });
    fs.writeFileSync(path.join(ws.inputDir, 'b.MP3'), '');
    fs.writeFileSync(path.join(ws.inputDir, 'a.wav'), '');
    fs.writeFileSync(path.join(ws.inputDir, 'notes.txt'), '');
    fs.writeFileSync(path.join(ws.inputDir, 'sub', 'c.m4a'), '');

    expect(listMediaFiles(ws.inputDir)).toEqual([
      path.join(ws.inputDir, 'a.wav'),
      path.join(ws.inputDir, 'b.MP3'),
      path.join(ws.inputDir, 'sub', 'c.m4a'),
    ]);
  });

  it('returns nothing for a missing directory', () => {
    expect(listMediaFiles(path.join(root, 'missing'))).toEqual([]);
  });
});

describe('listOutputFiles', () => {
  it('lists files by name and skips directories', async () => {
    const dir = prepareJobOutputDir(ws, 'x.wav');
    fs.writeFileSync(path.join(dir, 'x.txt'), '');
    fs.writeFileSync(path.join(dir, 'x.json'), '{}');
    fs.mkdirSync(path.join(dir, 'nested'));
    expect(await listOutputFiles(dir)).toEqual(['x.json', 'x.txt']);
    expect(await listOutputFiles(path.join(root, 'none'))).toEqual([]);
  });
});
