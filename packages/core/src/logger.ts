/**
 * Structured logger for worklog runs.
 *
 * When `logging.enabled` is set, writes a session log under
 * `.worklog/logs/` (configurable) so a failed scheduled run leaves a
 * trace behind. Console echo is left to the CLI,
 * which subscribes through `onLog` when `--verbose` is active.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ─── Types ──────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Directory for session log files; omit to keep entries in memory only */
  logDir?: string;
  /** Entries below this level are dropped. Defaults to `debug`. */
  level?: LogLevel;
  /** An optional callback invoked on every log entry (for testing / custom sinks) */
  onLog?: (entry: LogEntry) => void;
}

// ─── Log level ordering ─────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ─── Logger ─────────────────────────────────────────────────────────

export class Logger {
  private logFilePath: string | null = null;
  private minLevel: LogLevel;
  private onLog?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private fileStream: fs.WriteStream | null = null;

  constructor(opts: LoggerOptions = {}) {
    this.minLevel = opts.level ?? 'debug';
    this.onLog = opts.onLog;

    if (opts.logDir) {
      fs.mkdirSync(opts.logDir, { recursive: true });

      const timestamp = new Date()
        .toISOString()
        .replace(/[:.]/g, '-')
        .replace('T', '_')
        .slice(0, 19);
      this.logFilePath = path.join(opts.logDir, `worklog-${timestamp}.log`);
      this.fileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.info('logger', 'Log session started', { logFile: this.logFilePath });
    }
  }

  /** Path to the current log file, or null when logging to memory only */
  get filePath(): string | null {
    return this.logFilePath;
  }

  /** All entries captured this session (in-memory) */
  get allEntries(): readonly LogEntry[] {
    return this.entries;
  }

  // ── Public logging methods ────────────────────────────────────────

  debug(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', category, message, data);
  }

  warn(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', category, message, data);
  }

  error(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', category, message, data);
  }

  // ── Specialised helpers ───────────────────────────────────────────

  /** Log a git invocation */
  gitCommand(args: readonly string[]): void {
    this.debug('git', `git ${args[0] ?? ''}`, { args: [...args] });
  }

  /** Log a git failure with the tool's own output */
  gitError(args: readonly string[], errorMessage: string): void {
    this.error('git', errorMessage, {
      command: `git ${args.join(' ')}`,
    });
  }

  /** Flush and close the log file */
  close(): Promise<void> {
    this.info('logger', 'Log session ended', {
      totalEntries: this.entries.length,
    });
    const stream = this.fileStream;
    this.fileStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }

  // ── Core write ────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    category: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      ...(data ? { data } : {}),
    };

    this.entries.push(entry);
    this.onLog?.(entry);
    this.fileStream?.write(formatForFile(entry) + '\n');
  }
}

/** One line per entry: timestamp, padded level, category, message, JSON data */
export function formatForFile(entry: LogEntry): string {
  const lvl = entry.level.toUpperCase().padEnd(5);
  const cat = `[${entry.category}]`.padEnd(10);
  let line = `${entry.timestamp} ${lvl} ${cat} ${entry.message}`;
  if (entry.data) {
    line += ' ' + JSON.stringify(entry.data);
  }
  return line;
}

// ─── Global singleton (set once per CLI run) ────────────────────────

let globalLogger: Logger | null = null;

/** Initialise the global logger. Call once at CLI startup. */
export function initLogger(opts: LoggerOptions): Logger {
  const previous = globalLogger;
  const next = new Logger(opts);
  globalLogger = next;
  if (previous) {
    previous.close().catch((err: unknown) => {
      next.warn('logger', 'Previous log session did not close cleanly', {
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }
  return next;
}

/**
 * Get the current global logger. Library code called outside the CLI
 * gets an in-memory logger with no file sink.
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

/** Close and forget the global logger */
export async function shutdownLogger(): Promise<void> {
  const logger = globalLogger;
  globalLogger = null;
  await logger?.close();
}
