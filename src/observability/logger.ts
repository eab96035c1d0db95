import { AsyncLocalStorage } from 'async_hooks';
import crypto from 'crypto';

export interface LogContext {
  runId: string;
  branch?: string;
  commit?: string;
}

type LogLevel = 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  branch?: string;
  commit?: string;
}

export type LogSink = (line: string) => void;

class Logger {
  // Each run logs under its own context, even when runs overlap.
  private readonly contexts = new AsyncLocalStorage<LogContext>();
  private sink: LogSink = (line) => console.log(line);

  withContext<T>(context: LogContext, fn: () => T): T {
    return this.contexts.run(context, fn);
  }

  setSink(sink: LogSink | null): void {
    this.sink = sink ?? ((line) => console.log(line));
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    const context = this.contexts.getStore();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId: context?.runId || 'unknown',
      phase,
      message,
      data,
    };

    if (context?.branch) entry.branch = context.branch;
    if (context?.commit) entry.commit = context.commit;

    this.sink(JSON.stringify(entry));
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateRunId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
