import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import type { LogEntry, LoggingConfig, LogLevel, LogMetadata, Unsubscribe } from './types.js';
import { LogChannel } from './events/logChannel.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.bgRed.white,
};

export interface BusLoggerOptions {
  level?: LogLevel;
  console?: boolean;
  file?: string;
  maxEntries?: number;
}

/**
 * Render one entry as a console line: `[HH:MM:SS] [LEVEL] scope: content {metadata}`.
 */
export function formatEntry(entry: LogEntry): string {
  const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const prefix = chalk.gray(`[${timeStr}]`);
  const levelStr = LEVEL_COLORS[entry.level](`[${entry.level.toUpperCase()}]`);
  const scope = chalk.hex('#FFA500')(entry.scope);
  const meta =
    entry.metadata && Object.keys(entry.metadata).length > 0
      ? ` ${chalk.gray(JSON.stringify(entry.metadata))}`
      : '';
  return `${prefix} ${levelStr} ${scope}: ${entry.content}${meta}`;
}

export class BusLogger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private consoleOutputEnabled: boolean;
  private logFile: string | undefined;
  private maxEntries: number;
  private readonly channel = new LogChannel<LogEntry>((error) => {
    // Sinks can't log through the logger they are attached to.
    console.error(chalk.red('[logger] log sink failed:'), error);
  });

  constructor(options: BusLoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.consoleOutputEnabled = options.console ?? true;
    this.maxEntries = options.maxEntries ?? 1000;
    this.setLogFile(options.file);
  }

  configure(config: LoggingConfig): void {
    this.setLevel(config.level);
    this.setConsoleOutputEnabled(config.console);
    this.setMaxEntries(config.max_entries);
    this.setLogFile(config.file);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setConsoleOutputEnabled(enabled: boolean): void {
    this.consoleOutputEnabled = enabled;
  }

  /**
   * Persist entries as a JSON array to `file`, rewritten after every entry.
   * Pass undefined to stop persisting.
   */
  setLogFile(file: string | undefined): void {
    if (file !== undefined) {
      fs.mkdirSync(path.dirname(file), { recursive: true });
    }
    this.logFile = file;
  }

  setMaxEntries(maxEntries: number): void {
    this.maxEntries = maxEntries;
    this.trim();
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  subscribe(cb: (entry: LogEntry) => void): Unsubscribe {
    return this.channel.subscribe(cb);
  }

  getEntries(): LogEntry[] {
    return this.entries.slice();
  }

  clear(): void {
    this.entries = [];
    this.flush();
  }

  /**
   * Record an entry if its level is enabled, returning the materialized entry
   * (or undefined when filtered out).
   */
  log(entry: Omit<LogEntry, 'timestamp'>): LogEntry | undefined {
    if (!this.isEnabled(entry.level)) return undefined;
    const fullEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    };
    this.handleEntry(fullEntry);
    return fullEntry;
  }

  debug(scope: string, content: string, metadata?: LogMetadata): void {
    this.log({ level: 'debug', scope, content, metadata });
  }

  info(scope: string, content: string, metadata?: LogMetadata): void {
    this.log({ level: 'info', scope, content, metadata });
  }

  warn(scope: string, content: string, metadata?: LogMetadata): void {
    this.log({ level: 'warn', scope, content, metadata });
  }

  error(scope: string, content: string, metadata?: LogMetadata): void {
    this.log({ level: 'error', scope, content, metadata });
  }

  private handleEntry(entry: LogEntry): void {
    this.entries.push(entry);
    this.trim();
    this.flush();

    this.channel.emit(entry);

    if (!this.consoleOutputEnabled) return;
    const line = formatEntry(entry);
    if (entry.level === 'error') console.error(line);
    else console.log(line);
  }

  private trim(): void {
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) this.entries.splice(0, overflow);
  }

  private flush(): void {
    if (this.logFile === undefined) return;
    fs.writeFileSync(this.logFile, JSON.stringify(this.entries, null, 2));
  }
}

export const logger = new BusLogger();
