import * as fs from 'fs/promises';
import type { EvaluatorEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { prefixMessage } from './consoleLogger';
import { isLevelEnabled, type LogLevel, type Logger } from './types';

/**
 * Appends structured events to a JSONL file; human-readable lines still go
 * to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly level: LogLevel;

  constructor(filePath: string, bindings: Record<string, unknown> = {}, level: LogLevel = 'info') {
    this.filePath = filePath;
    this.bindings = bindings;
    this.level = level;
  }

  async log(event: EvaluatorEvent): Promise<void> {
    const redactedEvent = redactForLogs(event);
    const line = JSON.stringify(redactedEvent) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: EvaluatorEvent, message: string): Promise<void> {
    this.info(message);
    await this.log(event);
  }

  debug(message: string): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(prefixMessage(this.bindings, message));
    }
  }

  info(message: string): void {
    if (isLevelEnabled(this.level, 'info')) {
      console.info(prefixMessage(this.bindings, message));
    }
  }

  warn(message: string): void {
    if (isLevelEnabled(this.level, 'warn')) {
      console.warn(prefixMessage(this.bindings, message));
    }
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(prefixMessage(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.level);
  }
}
