import * as fs from 'fs/promises';
import type { ProfilerEvent } from '../types/events';
import { ensureDir } from '../fs/io';
import type { Logger } from './types';

/**
 * Appends every event as one JSON line to `filePath` and forwards plain
 * messages to an inner logger.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly inner: Logger;
  private ready: Promise<void> | undefined;

  constructor(filePath: string, inner: Logger) {
    this.filePath = filePath;
    this.inner = inner;
  }

  async log(event: ProfilerEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      this.ready ??= ensureDir(this.filePath);
      await this.ready;
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A lost event must not fail the profiling run.
      await this.inner.error(
        error instanceof Error ? error : new Error(String(error)),
        `Failed to write to event log at ${this.filePath}`,
      );
    }
    await this.inner.log(event);
  }

  async trace(event: ProfilerEvent, message: string): Promise<void> {
    await this.log(event);
    await this.inner.debug(message);
  }

  debug(message: string) {
    return this.inner.debug(message);
  }

  info(message: string) {
    return this.inner.info(message);
  }

  warn(message: string) {
    return this.inner.warn(message);
  }

  error(error: Error, message?: string) {
    return this.inner.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.inner.child(bindings));
  }
}
