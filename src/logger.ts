// src/logger.ts

import { LogContext, LoggerInstance, LogLevel } from './types/pulsegen-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'channel' | 'command' | 'frame';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

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

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'channel', 'command', 'frame'];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private watchCallback: WatchCallback | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  /**
   * Builds the header and argument list for one log line.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);

    const defaults: Record<Exclude<LogField, 'timestamp' | 'level'>, (v: unknown) => string> = {
      logger: v => `[${String(v)}]`,
      channel: v => `[CH:${String(v)}]`,
      command: v => `[CMD:${String(v)}]`,
      frame: v => `[FR:${String(v)}]`,
    };
    for (const field of ['logger', 'channel', 'command', 'frame'] as const) {
      const value = merged[field];
      if (!this.logFormat.includes(field) || value == null) continue;
      const formatter = this.customFormatters[field] ?? defaults[field];
      headerParts.push(formatter(value));
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // Remaining context fields are printed after the message
    const extra: LogContext = { ...context };
    for (const field of ['logger', 'channel', 'command', 'frame'] as const) delete extra[field];
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    return [`${color}${headerParts.join('')}`, ...formattedArgs, reset];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context['logger'];
    if (category) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] = (this.logCounts[level] || 0) + 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const formatted: string[] = this.format(level, args, context);
    const sink = level === 'trace' ? console.debug : console[level];
    sink(...formatted);
  }

  /**
   * Treats a trailing plain object as the log context.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (typeof lastArg === 'object' && lastArg !== null && !(lastArg instanceof Error)) {
        return { args: args.slice(0, -1), context: { ...lastArg } };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, category ? { ...context, logger: category } : context);
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

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
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

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    const validFields: LogField[] = ['timestamp', 'level', 'logger', 'channel', 'command', 'frame'];
    if (!fields.every(f => validFields.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${validFields.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    this.customFormatters[field] = formatter;
  }

  watch(callback: WatchCallback): void {
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
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

/** Shared instance all modules log through */
export const pulsegenLogger = new Logger();
pulsegenLogger.setLevel('error');

export default Logger;
