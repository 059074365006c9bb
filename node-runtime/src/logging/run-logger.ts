import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogSink {
  write(line: string): unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [field: string]: unknown;
}

/**
 * Appends JSON lines to `<logDir>/logs.jsonl` and mirrors each line to a sink
 * (stderr by default). Either side may be switched off with `null`. A file
 * that cannot be written is dropped after one warning; `log` never rejects.
 */
export class RunLogger {
  private logPath: string | null;
  private initialized = false;

  constructor(
    private logDir: string | null,
    private sink: LogSink | null = process.stderr,
  ) {
    this.logPath = logDir ? join(logDir, 'logs.jsonl') : null;
  }

  static silent(): RunLogger {
    return new RunLogger(null, null);
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized || !this.logDir) return;
    await mkdir(this.logDir, { recursive: true });
    this.initialized = true;
  }

  async log(level: LogLevel, message: string, fields: Record<string, unknown> = {}): Promise<void> {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...fields,
    };
    const line = JSON.stringify(entry) + '\n';
    this.sink?.write(line);
    if (!this.logPath) return;
    try {
      await this.ensureDir();
      await appendFile(this.logPath, line, 'utf-8');
    } catch (error) {
      // Drop the file and keep the sink.
      this.sink?.write(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level: 'warn',
          message: 'log file unavailable, logging to sink only',
          logPath: this.logPath,
          error: error instanceof Error ? error.message : String(error),
        }) + '\n',
      );
      this.logPath = null;
    }
  }

  async info(message: string, fields?: Record<string, unknown>): Promise<void> {
    await this.log('info', message, fields);
  }

  async warn(message: string, fields?: Record<string, unknown>): Promise<void> {
    await this.log('warn', message, fields);
  }

  async error(message: string, fields?: Record<string, unknown>): Promise<void> {
    await this.log('error', message, fields);
  }

  getLogPath(): string | null {
    return this.logPath;
  }
}
