/**
 * `'inherit'` streams build output to the terminal; `'stderr'` does too but
 * moves the build's stdout onto stderr, keeping stdout free for JSON output.
 */
export type BuildStdio = 'inherit' | 'stderr' | 'ignore';

export interface BuildRunOptions {
  /** Directory the command runs in; the profiled directory */
  cwd: string;
  /** Kill the build after this many milliseconds */
  timeoutMs?: number;
  /** Shell to run the command with; the platform default when unset */
  shell?: string;
  stdio?: BuildStdio;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export interface BuildRunResult {
  command: string;
  /** Null when the process was ended by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  durationMs: number;
}
