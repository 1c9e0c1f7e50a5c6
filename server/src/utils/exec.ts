import { execFile } from 'child_process';
import { promisify } from 'util';
import { errorMessage } from './errors.js';

const execFileAsync = promisify(execFile);

export interface CommandOutcome {
  ok: boolean;
  stdout: string;
  stderr: string;
  error?: string;
}

export type CommandExecutor = (cmd: string, args: string[], timeoutMs: number) => Promise<CommandOutcome>;

/** Runs a short-lived command with a hard timeout; never rejects. */
export const runCommand: CommandExecutor = async (cmd, args, timeoutMs) => {
  try {
    const { stdout, stderr } = await execFileAsync(cmd, args, {
      timeout: timeoutMs,
      killSignal: 'SIGKILL',
      maxBuffer: 10 * 1024 * 1024,
      encoding: 'utf8',
    });
    return { ok: true, stdout: stdout.trim(), stderr: stderr.trim() };
  } catch (err) {
    const stderr = hasStream(err, 'stderr') ? err.stderr.trim() : '';
    return { ok: false, stdout: '', stderr, error: stderr || errorMessage(err) };
  }
};

function hasStream<K extends 'stdout' | 'stderr'>(err: unknown, key: K): err is Record<K, string> {
  return typeof err === 'object' && err !== null && key in err && typeof Reflect.get(err, key) === 'string';
}
