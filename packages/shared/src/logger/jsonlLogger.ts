import * as fs from 'fs/promises';
import type { EvalEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import type { Logger } from './types';

export interface JsonlLoggerOptions {
  bindings?: Record<string, unknown>;
  /** Literal secret values scrubbed from every persisted event */
  secrets?: readonly string[];
}

/**
 * Appends structured events to a JSON Lines file; level logs go to the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly secrets: readonly string[];

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = filePath;
    this.bindings = options.bindings ?? {};
    this.secrets = options.secrets ?? [];
  }

  async log(event: EvalEvent): Promise<void> {
    const redactedEvent = redactForLogs(event, this.secrets);
    const line = JSON.stringify(redactedEvent) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Best-effort: a broken event log must not fail the evaluation.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, {
      bindings: { ...this.bindings, ...bindings },
      secrets: this.secrets,
    });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
