import fs from 'fs';
import path from 'path';
import { isRecord, readJson, writeJson } from '../utils/fsutil.js';
import type { TranscriptionJob } from '../models/types.js';

function isJobRecord(value: unknown): value is TranscriptionJob {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.status === 'string' &&
    isRecord(value.file) &&
    isRecord(value.progress)
  );
}

/**
 * Upload-driven jobs keyed by id. Each record is persisted as `<id>.json`; updates
 * only touch the record they name.
 */
export class JobStore {
  private readonly jobs = new Map<string, TranscriptionJob>();

  constructor(private readonly dir: string) {
    fs.mkdirSync(dir, { recursive: true });
    for (const f of fs.readdirSync(dir).filter((name) => name.endsWith('.json'))) {
      const job = readJson(path.join(dir, f));
      if (isJobRecord(job)) this.jobs.set(job.id, job);
    }
  }

  private persist(job: TranscriptionJob) {
    writeJson(path.join(this.dir, `${job.id}.json`), job);
  }

  create(job: TranscriptionJob) {
    this.jobs.set(job.id, job);
    this.persist(job);
    return job;
  }

  get(id: string) {
    return this.jobs.get(id);
  }

  list() {
    return [...this.jobs.values()].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  update(id: string, mutator: (job: TranscriptionJob) => void) {
    const job = this.jobs.get(id);
    if (!job) return undefined;
    mutator(job);
    job.updatedAt = new Date().toISOString();
    this.persist(job);
    return job;
  }

  /** Jobs left queued or running by a previous process. */
  unfinished() {
    return this.list().filter((j) => j.status === 'queued' || j.status === 'running');
  }
}
