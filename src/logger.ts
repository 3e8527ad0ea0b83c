// src/logger.ts

import type {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/iec-types.js';

const VALID_FORMAT_FIELDS: LogField[] = [
  'timestamp',
  'level',
  'logger',
  'transport',
  'command',
  'address',
  'bytes',
  'responseTime',
];

const FORMATTER_FIELDS = ['logger', 'transport', 'command', 'address', 'bytes', 'responseTime'];

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const CONSOLE_METHOD: Record<LogLevel, ConsoleMethod> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'highlight' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    highlight: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private groupLevel: number = 0;
  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private byCommand: Record<string, number> = {};
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'command', 'address'];
  private customFormatters: Partial<Record<keyof LogContext, (value: unknown) => string>> = {};
  private mutedCommands: Set<string> = new Set();
  private highlightCommands: Set<string> = new Set();
  private watchCallback: ((data: LogRecord) => void) | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private formatField(field: keyof LogContext, value: unknown, fallback: (v: unknown) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns console arguments: header, indent, the message parts and the colour reset
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };
    const isHighlighted =
      merged.command !== undefined && this.highlightCommands.has(merged.command);

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) {
      headerParts.push(this.formatField('logger', merged.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('transport') && merged.transport) {
      headerParts.push(this.formatField('transport', merged.transport, v => `[T:${String(v)}]`));
    }
    if (this.logFormat.includes('command') && merged.command !== undefined) {
      const part = this.formatField('command', merged.command, v => `[C:${String(v)}]`);
      headerParts.push(
        this.useColors && isHighlighted ? `${this.COLORS.highlight}${part}${reset}${color}` : part
      );
    }
    if (this.logFormat.includes('address') && merged.address !== undefined) {
      headerParts.push(this.formatField('address', merged.address, v => `[A:${String(v)}]`));
    }
    if (this.logFormat.includes('bytes') && merged.bytes !== undefined) {
      headerParts.push(this.formatField('bytes', merged.bytes, v => `[B:${String(v)}]`));
    }
    if (this.logFormat.includes('responseTime') && merged.responseTime !== undefined) {
      headerParts.push(
        this.formatField('responseTime', merged.responseTime, v => `[RT:${String(v)}ms]`)
      );
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // Fields not shown in the header are appended as JSON
    const rest: LogContext = { ...context };
    for (const field of this.logFormat) delete rest[field];
    delete rest.logger;
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [`${color}${headerParts.join('')}`, this.getIndent(), ...formattedArgs, reset];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.command !== undefined && this.mutedCommands.has(context.command)) return false;
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

  private output(level: LogLevel, args: unknown[], context: LogContext, immediate = false): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;
    if (context.command !== undefined) {
      this.byCommand[context.command] = (this.byCommand[context.command] ?? 0) + 1;
    }

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (!immediate && this.logRateLimit > 0 && now - this.lastLogTime < this.logRateLimit) return;
    this.lastLogTime = now;

    const [head = '', indent = '', ...rest] = this.format(level, args, context);
    console[CONSOLE_METHOD[level]](head + indent, ...rest);
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

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra }, level === 'warn' || level === 'error');
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
    if (!this.LEVELS.includes(level)) throw new Error(`Unknown log level: ${level}`);
    this.currentLevel = level;
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

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setTransportType(type: string): void {
    this.globalContext.transport = type;
  }

  setRateLimit(ms: number): void {
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FORMAT_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FORMAT_FIELDS.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setCustomFormatter(field: keyof LogContext, formatter: (value: unknown) => string): void {
    if (!FORMATTER_FIELDS.includes(String(field))) {
      throw new Error(`Invalid formatter field: ${String(field)}`);
    }
    this.customFormatters[field] = formatter;
  }

  /** Drops every log line carrying this command letter pair (e.g. `R1`). */
  mute(command: string): void {
    this.mutedCommands.add(command);
  }

  unmute(command: string): void {
    this.mutedCommands.delete(command);
  }

  highlight(command: string): void {
    this.highlightCommands.add(command);
  }

  clearHighlights(): void {
    this.highlightCommands.clear();
  }

  watch(callback: (data: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  summary(): void {
    console.log('\x1b[1;36m=== Logger Summary ===\x1b[0m');
    console.log(`Trace Messages: ${this.logCounts.trace}`);
    console.log(`Debug Messages: ${this.logCounts.debug}`);
    console.log(`Info Messages: ${this.logCounts.info}`);
    console.log(`Warn Messages: ${this.logCounts.warn}`);
    console.log(`Error Messages: ${this.logCounts.error}`);
    console.log(
      `Total Messages: ${Object.values(this.logCounts).reduce((sum: number, count: number) => sum + count, 0)}`
    );
    console.log(`By Command: ${JSON.stringify(this.byCommand, null, 2)}`);
    console.log(`Rate Limit: ${this.logRateLimit}ms`);
    console.log(`Current Level: ${this.currentLevel}`);
    console.log(
      `Categories: ${Object.keys(this.categoryLevels).length ? JSON.stringify(this.categoryLevels, null, 2) : 'None'}`
    );
    console.log(`Muted: ${JSON.stringify([...this.mutedCommands])}`);
    console.log('\x1b[1;36m=====================\x1b[0m');
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error || value instanceof Uint8Array) return false;
  return Object.values(value).every(
    v => v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

/** Process-wide logger shared by the library's modules */
export const rootLogger = new Logger();
rootLogger.setLevel('error');

export default Logger;
