import type { Logger, LogLevel } from '../types/logger.js';
import colors from './colors.js';

export interface LoggerOptions {
  level?: LogLevel | 'none';
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  /** Environment used to detect the level, `process.env` by default */
  env?: NodeJS.ProcessEnv;
  /** Output sink, stderr by default so that results on stdout stay clean */
  write?: (line: string) => void;
}

const levels: Record<LogLevel | 'none', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Level from the DEBUG environment variable: `*` or anything mentioning
 * dnsq turns on debug output, otherwise the logger stays silent.
 */
export function detectLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | 'none' {
  const debug = env.DEBUG || '';
  if (debug === '*' || debug.includes('dnsq') || debug.includes('*')) {
    return 'debug';
  }
  return 'none';
}

export class DnsqLogger implements Logger {
  private level: LogLevel | 'none';
  private prefix: string;
  private useTimestamp: boolean;
  private useColors: boolean;
  private sink: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    const env = options.env ?? process.env;
    this.level = options.level || detectLogLevel(env);
    this.prefix = options.prefix || 'dnsq';
    this.useTimestamp = options.timestamp !== false;
    this.useColors = options.colors !== false && this.supportsColors(env);
    this.sink = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  private supportsColors(env: NodeJS.ProcessEnv): boolean {
    return Boolean(process.stderr.isTTY) && !env.NO_COLOR && env.TERM !== 'dumb';
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return `${this.paint(colors.gray, `[${time}]`)} `;
  }

  private paint(color: (s: string) => string, text: string): string {
    return this.useColors ? color(text) : text;
  }

  isEnabled(level: LogLevel): boolean {
    return levels[level] >= levels[this.level];
  }

  private log(level: LogLevel, message: string, args: unknown[]) {
    if (!this.isEnabled(level)) return;

    const prefix = this.paint(colors.cyan, `[${this.prefix}]`);
    const extra = args.length > 0 ? ` ${args.map((arg) => this.formatArg(arg)).join(' ')}` : '';
    this.sink(`${this.formatTimestamp()}${prefix} ${message}${extra}`);
  }

  private formatArg(arg: unknown): string {
    if (arg instanceof Error) return arg.message;
    if (typeof arg === 'string') return arg;
    return JSON.stringify(arg);
  }

  debug(message: string, ...args: unknown[]) {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log('warn', this.paint(colors.yellow, message), args);
  }

  error(message: string, ...args: unknown[]) {
    this.log('error', this.paint(colors.red, message), args);
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new DnsqLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger) {
  globalLogger = logger;
}
