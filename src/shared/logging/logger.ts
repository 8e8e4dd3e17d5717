import type { LogLevel } from '../config/records-config';

/**
 * ロガー
 *
 * アプリケーション層はこのインターフェースにのみ依存する。
 * 出力先はコンソール（本番・開発）とメモリ（テスト）を用意。
 */

export type LogContext = Readonly<Record<string, unknown>>;

export type LogMethodLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export const isLevelEnabled = (threshold: LogLevel, level: LogMethodLevel): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

/**
 * コンソール出力ロガー
 *
 * 設定された閾値未満のログは捨てる
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly scope = 'records'
  ) {}

  debug(message: string, context?: LogContext): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(this.format('debug', message), ...this.extra(context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (isLevelEnabled(this.level, 'info')) {
      console.info(this.format('info', message), ...this.extra(context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (isLevelEnabled(this.level, 'warn')) {
      console.warn(this.format('warn', message), ...this.extra(context));
    }
  }

  error(message: string, context?: LogContext): void {
    if (isLevelEnabled(this.level, 'error')) {
      console.error(this.format('error', message), ...this.extra(context));
    }
  }

  private format(level: LogMethodLevel, message: string): string {
    return `[${this.scope}] ${level.toUpperCase()} ${message}`;
  }

  private extra(context?: LogContext): LogContext[] {
    return context && Object.keys(context).length > 0 ? [context] : [];
  }
}

export interface LogEntry {
  readonly level: LogMethodLevel;
  readonly message: string;
  readonly context?: LogContext;
}

/**
 * メモリ記録ロガー（テスト用）
 */
export class MemoryLogger implements Logger {
  private entries: LogEntry[] = [];

  constructor(private readonly level: LogLevel = 'debug') {}

  debug(message: string, context?: LogContext): void {
    this.record('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.record('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.record('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.record('error', message, context);
  }

  // === テスト用ヘルパーメソッド ===

  getEntries(level?: LogMethodLevel): LogEntry[] {
    return level ? this.entries.filter(entry => entry.level === level) : [...this.entries];
  }

  getMessages(level?: LogMethodLevel): string[] {
    return this.getEntries(level).map(entry => entry.message);
  }

  clear(): void {
    this.entries = [];
  }

  private record(level: LogMethodLevel, message: string, context?: LogContext): void {
    if (!isLevelEnabled(this.level, level)) return;
    this.entries.push(context ? { level, message, context } : { level, message });
  }
}

/**
 * 何も出力しないロガー
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

export const createLogger = (level: LogLevel, scope?: string): Logger =>
  level === 'silent' ? silentLogger : new ConsoleLogger(level, scope);
