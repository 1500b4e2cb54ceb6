/**
 * @mailroot/logger
 *
 * Structured logging for mailbox accounts.
 * Mailbox addresses and credential material never reach the output.
 */

import { createHash } from 'crypto';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LogContext {
  /** Component/module name */
  component?: string;
  /** Mailbox address the entry concerns (hashed before output) */
  account?: string;
  /** Additional context data */
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  /** Minimum log level to output (default: 'info') */
  minLevel?: LogLevel;
  /** Whether to include timestamps (default: true) */
  includeTimestamps?: boolean;
  /** Whether to output in JSON format (default: false in dev, true in prod) */
  jsonFormat?: boolean;
  /** Patterns redacted from messages, context strings and errors */
  redactPatterns?: RegExp[];
  /** Base context to include in all log entries */
  baseContext?: LogContext;
  /** Custom output function (default: console) */
  output?: (entry: LogEntry) => void;
}

export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | null, context?: LogContext): void;
  fatal(message: string, error?: Error | null, context?: LogContext): void;

  /** Create a child logger with additional context */
  child(context: LogContext): ILogger;

  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/**
 * Values that must not appear in log output
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // Mailbox addresses
  /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
  // Authorization headers
  /\b(bearer|basic|ntlm)\s+[a-zA-Z0-9._~+/=-]{8,}/gi,
  // key=value secrets
  /\b(password|secret|token)[=:\s]+\S+/gi,
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credentials', 'authorization'];

const REDACTION = '[REDACTED]';

// =============================================================================
// Redaction
// =============================================================================

/**
 * Replace every match of the redaction patterns in a string
 */
export function redact(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  if (!text) {
    return text;
  }

  let result = text;
  for (const pattern of patterns) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, REDACTION);
  }
  return result;
}

/**
 * Recursively redact an object. Keys naming credential material lose their
 * value entirely.
 */
export function redactObject(value: unknown, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return redact(value, patterns);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactObject(item, patterns));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      const lowered = key.toLowerCase();
      result[key] = SENSITIVE_KEYS.some((sensitive) => lowered.includes(sensitive))
        ? REDACTION
        : redactObject(nested, patterns);
    }
    return result;
  }

  return value;
}

/**
 * Stable short hash of a mailbox address, case-insensitive
 */
export function hashAddress(address: string): string {
  if (!address) {
    return '';
  }
  return createHash('sha256').update(address.trim().toLowerCase()).digest('hex').slice(0, 16);
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class Logger implements ILogger {
  private minLevel: LogLevel;
  private readonly includeTimestamps: boolean;
  private readonly jsonFormat: boolean;
  private readonly redactPatterns: RegExp[];
  private readonly baseContext: LogContext;
  private readonly output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.jsonFormat = options.jsonFormat ?? process.env['NODE_ENV'] === 'production';
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.baseContext = options.baseContext ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private sanitizeContext(context: LogContext): LogContext {
    const { account, ...rest } = context;
    const sanitized: LogContext = {};
    const redacted = redactObject(rest, this.redactPatterns);
    if (redacted && typeof redacted === 'object') {
      Object.assign(sanitized, redacted);
    }
    if (typeof account === 'string') {
      sanitized.account = hashAddress(account);
    }
    return sanitized;
  }

  private formatError(error: Error): NonNullable<LogEntry['error']> {
    const formatted: NonNullable<LogEntry['error']> = {
      name: error.name,
      message: redact(error.message, this.redactPatterns),
    };

    const code: unknown = Reflect.get(error, 'code');
    if (typeof code === 'string') {
      formatted.code = code;
    }

    if (error.stack) {
      formatted.stack = redact(error.stack, this.redactPatterns);
    }

    return formatted;
  }

  private createEntry(
    level: LogLevel,
    message: string,
    error?: Error | null,
    context?: LogContext
  ): LogEntry {
    const sanitizedContext = this.sanitizeContext({ ...this.baseContext, ...context });

    const entry: LogEntry = {
      level,
      message: redact(message, this.redactPatterns),
      timestamp: this.includeTimestamps ? new Date().toISOString() : '',
    };

    if (Object.keys(sanitizedContext).length > 0) {
      entry.context = sanitizedContext;
    }

    if (error) {
      entry.error = this.formatError(error);
    }

    return entry;
  }

  private defaultOutput(entry: LogEntry): void {
    if (this.jsonFormat) {
      this.writeToConsole(entry.level, JSON.stringify(entry));
      return;
    }

    const parts: string[] = [];
    if (entry.timestamp) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(`[${entry.level.toUpperCase().padEnd(5)}]`);

    const context: LogContext = entry.context ?? {};
    const { component, ...rest } = context;
    if (component) {
      parts.push(`[${component}]`);
    }
    parts.push(entry.message);
    if (Object.keys(rest).length > 0) {
      parts.push(JSON.stringify(rest));
    }
    if (entry.error?.code) {
      parts.push(`(${entry.error.code})`);
    }

    this.writeToConsole(entry.level, parts.join(' '));

    if (entry.error?.stack) {
      this.writeToConsole(entry.level, entry.error.stack);
    }
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case 'debug':
        console.debug(message);
        break;
      case 'info':
        console.info(message);
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'error':
      case 'fatal':
        console.error(message);
        break;
    }
  }

  private log(level: LogLevel, message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }
    this.output(this.createEntry(level, message, error, context));
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, null, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, null, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, null, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    this.log('error', message, error, context);
  }

  fatal(message: string, error?: Error | null, context?: LogContext): void {
    this.log('fatal', message, error, context);
  }

  child(context: LogContext): ILogger {
    return new Logger({
      minLevel: this.minLevel,
      includeTimestamps: this.includeTimestamps,
      jsonFormat: this.jsonFormat,
      redactPatterns: this.redactPatterns,
      baseContext: { ...this.baseContext, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createLogger(options?: LoggerOptions): ILogger {
  return new Logger(options);
}

let defaultLogger: ILogger | null = null;

/**
 * Get the process-wide logger, creating one with default options on first use
 */
export function getLogger(): ILogger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

/**
 * Replace the process-wide logger (at application startup)
 */
export function setDefaultLogger(logger: ILogger): void {
  defaultLogger = logger;
}

/**
 * Reset the process-wide logger (primarily for testing)
 */
export function resetDefaultLogger(): void {
  defaultLogger = null;
}
