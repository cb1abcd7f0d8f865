/**
 * Transcoding tool boundary. Commands arrive as argv (no shell); the runner
 * reports exit status and stderr and never interprets them; the executor
 * classifies failures.
 */
import { execFile, execFileSync } from 'child_process';
import { logger } from '../utils/logger.js';

export interface ToolOutcome {
  /** null when the process was killed (signal or cancellation). */
  exitStatus: number | null;
  stderr: string;
}

export interface ToolRunner {
  run(argv: readonly string[], signal: AbortSignal): Promise<ToolOutcome>;
}

const MAX_BUFFER = 50 * 1024 * 1024;
const STDERR_TAIL = 2_000;

/** ffmpeg is chatty on stderr; keep the end, which carries the error. */
export function stderrTail(stderr: string): string {
  const trimmed = stderr.trim();
  return trimmed.length > STDERR_TAIL ? `…${trimmed.slice(-STDERR_TAIL)}` : trimmed;
}

export const ffmpegRunner: ToolRunner = {
  run(argv, signal) {
    const [cmd, ...args] = argv;
    if (!cmd) return Promise.reject(new Error('ffmpegRunner: empty command'));

    logger.debug('FFmpeg: spawning', { cmd, args });
    return new Promise<ToolOutcome>((resolve, reject) => {
      execFile(cmd, args, { signal, maxBuffer: MAX_BUFFER, encoding: 'utf-8' }, (error, _stdout, stderr) => {
        if (!error) return resolve({ exitStatus: 0, stderr });
        if (typeof error.code === 'number') return resolve({ exitStatus: error.code, stderr });
        if (signal.aborted || error.signal) return resolve({ exitStatus: null, stderr });
        // Spawn failure (binary missing, permissions), not an exit status
        reject(new Error(`Could not run ${cmd}: ${error.message}`));
      });
    });
  },
};

/** Returns the first line of `ffmpeg -version`, or null when the binary is unusable. */
export function ffmpegVersion(ffmpegPath: string): string | null {
  try {
    const out = execFileSync(ffmpegPath, ['-version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] });
    return out.split('\n')[0]?.trim() ?? null;
  } catch {
    return null;
  }
}
