import type { ReadinessCheck } from '../models/types.js';

export class WorkspaceError extends Error {
  constructor(public readonly dir: string, cause: unknown) {
    super(`Cannot prepare directory ${dir}: ${errorMessage(cause)}`);
    this.name = 'WorkspaceError';
  }
}

/** Thrown before any job starts when a hard readiness check failed. */
export class ReadinessError extends Error {
  constructor(public readonly failures: ReadinessCheck[]) {
    super(`System not ready: ${failures.map((f) => f.message).join('; ')}`);
    this.name = 'ReadinessError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}
