import { spawn, spawnSync, type StdioOptions } from 'child_process';
import { BuildError, isWindows } from '@buildprof/shared';
import type { BuildRunOptions, BuildRunResult, BuildStdio } from './types';

function stdioFor(mode: BuildStdio): StdioOptions {
  // fd 2: process.stderr has no fd inside a worker thread.
  return mode === 'stderr' ? ['inherit', 2, 'inherit'] : mode;
}

function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM') {
  if (isWindows()) {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
  } else {
    // Negative pid signals the whole process group; the child was spawned detached.
    try {
      process.kill(-pid, signal);
    } catch {
      // Already exited.
    }
  }
}

/**
 * Runs the build command between the two scans of a profiling run.
 *
 * The command goes through a shell in the profiled directory, so pipes,
 * `&&` and quoting behave as typed. A non-zero exit is reported in the
 * result, not thrown; only a process that cannot be started throws.
 */
export class BuildRunner {
  constructor(private readonly spawnFn: typeof spawn = spawn) {}

  run(command: string, options: BuildRunOptions): Promise<BuildRunResult> {
    if (!command.trim()) {
      return Promise.reject(new BuildError('Build command is empty'));
    }
    if (options.signal?.aborted) {
      return Promise.reject(new BuildError(`Build was cancelled before it started: ${command}`));
    }

    // Own process group so a timeout can kill everything the build spawned.
    const detached = !isWindows() && (options.timeoutMs !== undefined || !!options.signal);
    const start = Date.now();

    return new Promise<BuildRunResult>((resolve, reject) => {
      let settled = false;
      let timedOut = false;
      let timeoutTimer: NodeJS.Timeout | undefined;

      const child = this.spawnFn(command, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: stdioFor(options.stdio ?? 'inherit'),
        shell: options.shell ?? true,
        detached,
      });

      const stop = () => {
        if (child.pid) {
          killProcessTree(child.pid, 'SIGTERM');
        }
      };

      const onAbort = () => stop();
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = () => {
        settled = true;
        if (timeoutTimer) clearTimeout(timeoutTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      if (options.timeoutMs !== undefined) {
        timeoutTimer = setTimeout(() => {
          if (!settled) {
            timedOut = true;
            stop();
          }
        }, options.timeoutMs);
      }

      child.on('error', (err) => {
        if (settled) return;
        cleanup();
        reject(new BuildError(`Failed to start build command: ${err.message}`, { cause: err }));
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        cleanup();
        resolve({
          command,
          exitCode: code,
          signal,
          timedOut,
          durationMs: Date.now() - start,
        });
      });
    });
  }
}
