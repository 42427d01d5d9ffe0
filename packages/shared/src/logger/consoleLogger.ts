import type { ProfilerEvent } from '../types/events';
import { isLevelEnabled, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Print structured events as JSON lines. Off by default; events are for sinks. */
  printEvents?: boolean;
  /** Send debug and info messages to stderr so stdout carries only command output */
  stderr?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly printEvents: boolean;
  private readonly stderr: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.printEvents = options.printEvents ?? false;
    this.stderr = options.stderr ?? false;
  }

  log(event: ProfilerEvent): void {
    if (this.printEvents) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: ProfilerEvent, message: string): void {
    if (this.printEvents) {
      console.log(message, JSON.stringify(event));
    } else {
      this.debug(message);
    }
  }

  debug(message: string): void {
    if (!isLevelEnabled('debug', this.level)) return;
    if (this.stderr) {
      console.error(message);
    } else {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (!isLevelEnabled('info', this.level)) return;
    if (this.stderr) {
      console.error(message);
    } else {
      console.info(message);
    }
  }

  warn(message: string): void {
    if (isLevelEnabled('warn', this.level)) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (!isLevelEnabled('error', this.level)) return;
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: ProfilerEvent) {
    return this.base.log(event);
  }

  trace(event: ProfilerEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
