// src/logger.ts

import { CODES } from './constants/constants.js';
import type { LogContext, LoggerInstance, LogLevel, WatchData } from './types/ramses-types.js';

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private groupLevel: number = 0;
  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private watchCallback: ((data: WatchData) => void) | null = null;
  private logRateLimit: number = 100;
  private lastLogTime: number = 0;

  private static readonly CODE_NAMES = new Map<string, string>(
    Object.entries(CODES).map(([name, code]) => [code, name.toLowerCase()])
  );

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log line: a header built from the context fields, then the arguments.
   * @param level - Log level
   * @param args - Arguments to be logged
   * @param context - Frame context (verb, code, src, dst)
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [`[${this.getTimestamp()}]`, `[${level.toUpperCase()}]`];
    if (merged.logger) headerParts.push(`[${merged.logger}]`);
    if (merged.verb != null) headerParts.push(`[${merged.verb.trim()}]`);
    if (merged.code != null) {
      headerParts.push(`[${merged.code}/${Logger.CODE_NAMES.get(merged.code) ?? 'unknown'}]`);
    }
    if (merged.src != null) {
      headerParts.push(`[${merged.src}${merged.dst != null ? `->${merged.dst}` : ''}]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}(${arg.message})`;
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    for (const key of ['logger', 'verb', 'code', 'src', 'dst']) {
      delete contextToPrint[key];
    }
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}`, this.getIndent(), ...formattedArgs, reset];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;

    const category = context.logger;
    if (category !== undefined) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel !== undefined) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  /**
   * Writes a log line to the console. Warnings and errors are never rate limited.
   */
  private output(level: LogLevel, args: unknown[], context: LogContext, immediate: boolean = false): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (!immediate && now - this.lastLogTime < this.logRateLimit) return;
    this.lastLogTime = now;

    const formatted: string[] = this.format(level, args, context);
    if (this.useColors) {
      const head = formatted[0] ?? '';
      const indent = formatted[1] ?? '';
      console[level](head + indent, ...formatted.slice(2));
    } else {
      console[level](...formatted);
    }
  }

  /**
   * Splits the arguments into the message parts and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    const ctx: LogContext = category === undefined ? context : { ...context, logger: category };
    this.output(level, newArgs, ctx, level === 'warn' || level === 'error');
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  group(): void {
    this.groupLevel++;
  }

  groupEnd(): void {
    if (this.groupLevel > 0) this.groupLevel--;
  }

  setLevel(level: LogLevel): void {
    if (!this.LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${level}`);
    }
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${level}`);
    }
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setRateLimit(ms: number): void {
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  watch(callback: (data: WatchData) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Error) {
    return false;
  }
  return Object.values(value).every(
    v => v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

/** The logger shared by the codec modules */
export const codecLogger = new Logger();

export default Logger;
