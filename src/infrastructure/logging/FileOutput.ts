import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LogLevel } from '../../shared/utils/Logger';
import type { LogEntry, LogOutput } from '../../shared/utils/Logger';

/**
 * Batches log lines and appends them to a file
 * - flushes every flushInterval ms, or once maxBuffer lines are pending
 * - creates the parent directory on first write
 */
export class FileOutput implements LogOutput {
  private readonly filePath: string;
  private readonly buffer: string[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly flushInterval: number;
  private readonly maxBuffer: number;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    filePath: string,
    options: { flushInterval?: number; maxBuffer?: number } = {}
  ) {
    this.filePath = filePath;
    this.flushInterval = options.flushInterval ?? 2000;
    this.maxBuffer = options.maxBuffer ?? 200;
    this.ensureTimer();
  }

  write(entry: LogEntry): void {
    const ts = new Date(entry.timestamp).toISOString();
    const level = LogLevel[entry.level];
    const line = `${ts}\t${level}\t${entry.component}\t${entry.message}`
      + (entry.data !== undefined ? `\t${safeString(entry.data)}` : '')
      + (entry.error ? `\t${entry.error.message}` : '');
    this.buffer.push(line);
    if (this.buffer.length >= this.maxBuffer) {
      void this.flush();
    }
  }

  /**
   * Append buffered lines. Writes are chained so lines keep their order.
   */
  flush(): Promise<void> {
    if (this.buffer.length === 0) return this.pending;
    const chunk = this.buffer.join('\n') + '\n';
    this.buffer.length = 0;

    this.pending = this.pending.then(async () => {
      try {
        await mkdir(dirname(this.filePath), { recursive: true });
        await appendFile(this.filePath, chunk, 'utf8');
      } catch (e) {
        // console output still carries the entries
        console.warn('FileOutput flush failed', e);
      }
    });
    return this.pending;
  }

  async close(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.flush();
  }

  private ensureTimer(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.flush();
    }, this.flushInterval);
    this.timer.unref();
  }
}

function safeString(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
