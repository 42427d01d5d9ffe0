import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { Command } from 'commander';
import { ConfigLoader } from '@buildprof/core';
import {
  Config,
  ConfigInput,
  ConsoleLogger,
  JsonlLogger,
  Logger,
  UsageError,
  normalizePath,
} from '@buildprof/shared';
import { GlobalOptions } from '../types';

export function getGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function loadConfig(globalOpts: GlobalOptions, cwd: string, flags?: ConfigInput): Config {
  return ConfigLoader.load({ configPath: globalOpts.config, cwd, flags });
}

/**
 * Console logging at the configured level (`--verbose` forces debug), teeing
 * events to a JSONL file when `logging.eventsPath` is set. Under `--json`
 * every message goes to stderr.
 */
export function createLogger(globalOpts: GlobalOptions, config: Config): Logger {
  const consoleLogger = new ConsoleLogger({
    level: globalOpts.verbose ? 'debug' : config.logging.level,
    stderr: !!globalOpts.json,
  });
  return config.logging.eventsPath
    ? new JsonlLogger(config.logging.eventsPath, consoleLogger)
    : consoleLogger;
}

/**
 * Resolves a directory argument against the working directory and checks it exists.
 */
export async function resolveDirectory(dir: string | undefined): Promise<string> {
  const resolved = normalizePath(path.resolve(dir ?? '.'));
  let stats: Stats;
  try {
    stats = await fs.stat(resolved);
  } catch {
    throw new UsageError(`Directory not found: ${resolved}`);
  }
  if (!stats.isDirectory()) {
    throw new UsageError(`Not a directory: ${resolved}`);
  }
  return resolved;
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parsePrecision(value: string | undefined): 'ms' | 's' | undefined {
  if (value === undefined || value === 'ms' || value === 's') {
    return value;
  }
  throw new UsageError(`--precision must be "ms" or "s", got "${value}"`);
}

/**
 * An AbortSignal tripped by Ctrl-C for the duration of `fn`.
 */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
