/**
 * Logging Infrastructure
 *
 * Provides configurable logging using Winston with support for:
 * - Multiple log levels (error, warn, info, debug)
 * - Colored console output with structured key=value metadata
 * - JSON output for log shippers
 * - Optional file logging
 */

import winston from 'winston';
import chalk from 'chalk';
import { PlatformError } from '../errors/platform-error.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export const LOG_LEVEL_ENV = 'AGENTCORE_LOG_LEVEL';

/**
 * The logger surface SDK components depend on. A `winston.Logger` satisfies it.
 */
export interface StructuredLogger {
  error(message: string, meta?: Record<string, unknown>): unknown;
  warn(message: string, meta?: Record<string, unknown>): unknown;
  info(message: string, meta?: Record<string, unknown>): unknown;
  debug(message: string, meta?: Record<string, unknown>): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  noColor?: boolean;
  verbose?: boolean;
  /** Also write to this file */
  filePath?: string;
  /** Write to the console (default true) */
  consoleOutput?: boolean;
  /** Emit JSON lines instead of the human-readable format */
  json?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Render metadata as ` key=value` pairs in insertion order
 */
export function formatMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .filter(([key]) => key !== 'level' && key !== 'message' && key !== 'timestamp')
    .map(([key, value]) => ` ${key}=${formatValue(value)}`)
    .join('');
}

/**
 * Plain-object form of an error for structured output: name, message, platform
 * code, stack and the cause chain.
 */
export function serializeError(error: Error, seen: Set<unknown> = new Set()): Record<string, unknown> {
  seen.add(error);
  const json: Record<string, unknown> = { name: error.name, message: error.message };
  if (error instanceof PlatformError) {
    json.code = error.code;
  }
  if (error.stack) {
    json.stack = error.stack;
  }
  if (error.cause instanceof Error && !seen.has(error.cause)) {
    json.cause = serializeError(error.cause, seen);
  } else if (error.cause !== undefined && !(error.cause instanceof Error)) {
    json.cause = String(error.cause);
  }
  return json;
}

/**
 * Replaces Error values in log metadata with {@link serializeError} objects.
 * `format.json()` would otherwise render them as `{}`.
 */
export const errorMetadata = winston.format((info) => {
  for (const key of Object.keys(info)) {
    const value: unknown = info[key];
    if (value instanceof Error) {
      info[key] = serializeError(value);
    }
  }
  return info;
});

const jsonFormat = () => winston.format.combine(errorMetadata(), winston.format.json());

/**
 * Custom formatter for console output with chalk colors
 */
const consoleFormat = (noColor: boolean) =>
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const metaText = formatMeta(meta);

    if (noColor) {
      return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaText}`;
    }

    const colorMap: Record<string, (text: string) => string> = {
      error: chalk.red,
      warn: chalk.yellow,
      info: chalk.blue,
      debug: chalk.gray,
    };

    const colorFn = colorMap[level] || ((text: string) => text);
    const levelText = colorFn(level.toUpperCase());
    const timeText = chalk.gray(`[${timestamp}]`);

    return `${timeText} ${levelText}: ${message}${chalk.gray(metaText)}`;
  });

/**
 * Create a configured logger instance
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const envLevel = process.env[LOG_LEVEL_ENV];
  const {
    level = isLogLevel(envLevel) ? envLevel : 'info',
    noColor = false,
    verbose = false,
    filePath,
    consoleOutput = true,
    json = false,
  } = options;

  // Override level if verbose is enabled
  const effectiveLevel = verbose ? 'debug' : level;

  const transports: Array<
    winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
  > = [];
  if (consoleOutput) {
    transports.push(
      new winston.transports.Console({
        format: json ? jsonFormat() : consoleFormat(noColor),
      }),
    );
  }
  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        // Files always carry the full date, whatever the console shows
        format: winston.format.combine(winston.format.timestamp(), jsonFormat()),
      }),
    );
  }

  return winston.createLogger({
    level: effectiveLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: json ? undefined : 'HH:mm:ss' }),
      winston.format.errors({ stack: true }),
    ),
    transports,
    silent: transports.length === 0,
  });
}

// Process-wide default logger
let globalLogger: winston.Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(options: LoggerOptions = {}): winston.Logger {
  globalLogger = createLogger(options);
  return globalLogger;
}

/**
 * Get the global logger instance
 * Creates a default logger if not initialized
 */
export function getLogger(): winston.Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Convenience logging functions
 */
export const log = {
  error: (message: string, meta?: Record<string, unknown>) => getLogger().error(message, meta ?? {}),
  warn: (message: string, meta?: Record<string, unknown>) => getLogger().warn(message, meta ?? {}),
  info: (message: string, meta?: Record<string, unknown>) => getLogger().info(message, meta ?? {}),
  debug: (message: string, meta?: Record<string, unknown>) => getLogger().debug(message, meta ?? {}),
};
