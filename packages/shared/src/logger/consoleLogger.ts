import type { EvaluatorEvent } from '../types/events';
import { isLevelEnabled, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Lowest level that is printed. Defaults to `info`. */
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
  }

  // Structured events are printed in verbose mode only.
  log(event: EvaluatorEvent): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(JSON.stringify(event));
    }
  }

  trace(event: EvaluatorEvent, message: string): void {
    this.info(message);
    this.log(event);
  }

  debug(message: string): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (isLevelEnabled(this.level, 'info')) {
      console.info(message);
    }
  }

  warn(message: string): void {
    if (isLevelEnabled(this.level, 'warn')) {
      console.warn(message);
    }
  }

  error(error: Error, message?: string): void {
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

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: EvaluatorEvent) {
    return this.base.log(event);
  }

  trace(event: EvaluatorEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string): void {
    this.base.debug(this.withPrefix(message));
  }

  info(message: string): void {
    this.base.info(this.withPrefix(message));
  }

  warn(message: string): void {
    this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    return prefixMessage(this.bindings, message);
  }
}

export function prefixMessage(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
