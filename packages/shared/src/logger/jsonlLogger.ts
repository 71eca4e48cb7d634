import * as fs from 'fs/promises';
import { ensureDir } from '../fs/io';
import type { CopyheadEvent } from '../types/events';
import { prefixBindings } from './consoleLogger';
import type { Logger } from './types';

interface LogQueue {
  pending: Promise<void>;
  /** Whether the log file's directory has been created */
  dirReady: boolean;
}

/**
 * Appends structured events to a JSON-lines file and writes human messages to
 * the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly verbose: boolean;
  // Shared with children; appends are chained so lines never interleave.
  private readonly queue: LogQueue;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    options: { verbose?: boolean; queue?: LogQueue } = {},
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.verbose = options.verbose ?? false;
    this.queue = options.queue ?? { pending: Promise.resolve(), dirReady: false };
  }

  log(event: CopyheadEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    this.queue.pending = this.queue.pending.then(async () => {
      try {
        if (!this.queue.dirReady) {
          await ensureDir(this.filePath);
          this.queue.dirReady = true;
        }
        await fs.appendFile(this.filePath, line, 'utf8');
      } catch (error) {
        console.error(`Failed to write to log file at ${this.filePath}`, error);
      }
    });
    return this.queue.pending;
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(this.withPrefix(message));
    }
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
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, {
      verbose: this.verbose,
      queue: this.queue,
    });
  }

  /** Resolves once every queued line has been appended. */
  flush(): Promise<void> {
    return this.queue.pending;
  }

  private withPrefix(message: string): string {
    return prefixBindings(this.bindings, message);
  }
}
