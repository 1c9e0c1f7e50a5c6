import { runCommand, type CommandExecutor } from '../utils/exec.js';

const PROBE_TIMEOUT_MS = 15_000;

export type DurationProbe = (file: string) => Promise<number | undefined>;

export async function isProbeAvailable(exec: CommandExecutor = runCommand) {
  const outcome = await exec('ffprobe', ['-version'], 3_000);
  return outcome.ok;
}

/** Media duration in seconds via ffprobe, or undefined when it cannot be determined. */
export function createDurationProbe(exec: CommandExecutor = runCommand): DurationProbe {
  return async (file) => {
    const outcome = await exec(
      'ffprobe',
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', file],
      PROBE_TIMEOUT_MS
    );
    if (!outcome.ok || !outcome.stdout) return undefined;
    const seconds = Number.parseFloat(outcome.stdout);
    return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
  };
}
