/**
 * Logging configuration for Harbor Club Manager.
 *
 * Sets up a single pino root logger with a colorized console stream and an
 * optional file stream. Modules obtain named child loggers through createLogger().
 */

import pino, { Logger, LoggerOptions } from 'pino';
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { Settings } from '../config/settings.js';
import { formatDateForLogs } from './dateUtils.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

const LOG_LEVEL_MAP: Record<LogLevel, pino.Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

const LEVEL_COLORS = {
  DEBUG: chalk.cyan,
  INFO: chalk.green,
  WARNING: chalk.yellow,
  ERROR: chalk.red,
  CRITICAL: chalk.magenta,
} as const;

const COMPONENT_COLORS = {
  timestamp: chalk.gray,
  separator: chalk.gray,
  logger: chalk.white,
} as const;

const LEVEL_EMOJIS = {
  DEBUG: '🔧',
  INFO: 'ℹ️',
  WARNING: '⚠️',
  ERROR: '❌',
  CRITICAL: '🚨',
} as const;

export type LogContext = Record<string, unknown>;

/**
 * Logger surface used across the application.
 * The second argument may be an Error or a context object.
 */
export interface AppLogger {
  debug(message: string, context?: unknown): void;
  info(message: string, context?: unknown): void;
  warn(message: string, context?: unknown): void;
  error(message: string, context?: unknown): void;
  fatal(message: string, context?: unknown): void;
}

function shouldUseColors(): boolean {
  if (process.env.NO_COLOR === '1' || Settings.NO_COLOR === true) {
    return false;
  }
  if (process.env.FORCE_COLOR === '1' || Settings.FORCE_COLOR === true) {
    return true;
  }
  if (Settings.LOG_COLORS !== undefined) {
    return Settings.LOG_COLORS;
  }
  return Boolean(process.stdout.isTTY);
}

function errorSerializer(error: Error): Record<string, unknown> {
  return {
    type: error.constructor.name,
    message: error.message,
    stack: error.stack,
    ...(error.cause && typeof error.cause === 'object' ? { cause: error.cause } : {}),
  };
}

function levelFromNumber(level: unknown): LogLevel {
  const value = typeof level === 'number' ? level : 30;
  if (value >= 60) return 'CRITICAL';
  if (value >= 50) return 'ERROR';
  if (value >= 40) return 'WARNING';
  if (value >= 30) return 'INFO';
  return 'DEBUG';
}

function isErrorLike(value: unknown): value is { message: string; stack?: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string' &&
    'stack' in value
  );
}

function formatError(errorObj: unknown, useColors: boolean): string {
  if (errorObj === undefined || errorObj === null) {
    return '';
  }

  if (isErrorLike(errorObj)) {
    let errorMessage = `\n  Error: ${errorObj.message}`;
    if (useColors) {
      errorMessage = chalk.red(errorMessage);
    }
    if (typeof errorObj.stack === 'string') {
      for (const line of errorObj.stack.split('\n').slice(1)) {
        errorMessage += useColors ? chalk.dim(`\n    ${line}`) : `\n    ${line}`;
      }
    }
    return errorMessage;
  }

  const rendered = `\n  ${JSON.stringify(errorObj, null, 2).split('\n').join('\n  ')}`;
  return useColors ? chalk.yellow(rendered) : rendered;
}

/**
 * Render one pino JSON record as a console line
 */
export function formatLogRecord(record: Record<string, unknown>, useColors: boolean): string {
  const { level, time, name, msg, err, error, ...extra } = record;

  const logLevel = levelFromNumber(level);
  const timestamp = formatDateForLogs(new Date(typeof time === 'number' ? time : Date.now()));
  const loggerName = (typeof name === 'string' && name ? name : 'app').padEnd(20).slice(0, 20);
  const levelName = logLevel.padEnd(8);
  const message = typeof msg === 'string' ? msg : '';
  const emoji = LEVEL_EMOJIS[logLevel];
  const errorMessage = formatError(err ?? error, useColors);

  const extraEntries = Object.entries(extra);
  const extraStr = extraEntries.map(([key, value]) => `${key}=${JSON.stringify(value)}`).join(' ');

  if (useColors) {
    const levelColor = LEVEL_COLORS[logLevel];
    const separator = COMPONENT_COLORS.separator(' | ');
    let formatted =
      COMPONENT_COLORS.timestamp(timestamp) +
      separator +
      levelColor.bold(`${emoji} ${levelName}`) +
      separator +
      COMPONENT_COLORS.logger(loggerName) +
      separator +
      levelColor(message);
    formatted += errorMessage;
    if (extraEntries.length > 0) {
      formatted += ` ${chalk.dim(extraStr)}`;
    }
    return formatted;
  }

  let formatted = `${timestamp} | ${emoji} ${levelName} | ${loggerName} | ${message}`;
  formatted += errorMessage;
  if (extraEntries.length > 0) {
    formatted += ` ${extraStr}`;
  }
  return formatted;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// File destination kept for cleanup on shutdown
let fileDestination: ReturnType<typeof pino.destination> | null = null;

/**
 * Setup logging configuration
 */
export function setupLogging(
  options: {
    logLevel?: LogLevel;
    logToFile?: boolean;
    logFilePath?: string;
    useColors?: boolean;
  } = {},
): Logger {
  const {
    logLevel = Settings.LOG_LEVEL,
    logToFile = Settings.LOG_TO_FILE,
    logFilePath,
    useColors = shouldUseColors(),
  } = options;

  const pinoLevel = LOG_LEVEL_MAP[logLevel];

  const pinoOptions: LoggerOptions = {
    base: null,
    level: pinoLevel,
    name: Settings.APP_NAME,
    serializers: {
      err: errorSerializer,
      error: errorSerializer,
    },
  };

  const streams: pino.StreamEntry[] = [
    {
      level: pinoLevel,
      stream: {
        write: (chunk: string) => {
          let parsed: unknown;
          try {
            parsed = JSON.parse(chunk);
          } catch {
            process.stdout.write(chunk);
            return;
          }
          if (isRecord(parsed)) {
            process.stdout.write(formatLogRecord(parsed, useColors) + '\n');
          } else {
            process.stdout.write(chunk);
          }
        },
      },
    },
  ];

  if (logToFile) {
    const filePath = logFilePath ?? `logs/club_${new Date().toISOString().slice(0, 10)}.log`;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    const destination = pino.destination({
      dest: filePath,
      sync: false,
      mkdir: true,
      append: true,
      minLength: 0,
    });
    destination.on('error', (err: Error) => {
      process.stderr.write(`File logging error: ${err.message}\n`);
    });
    fileDestination = destination;
    streams.push({ level: pinoLevel, stream: destination });
  }

  const logger = pino(pinoOptions, pino.multistream(streams));

  logger.debug(
    `Logging initialized (level=${logLevel}, colors=${useColors ? 'on' : 'off'}, file=${logToFile ? 'on' : 'off'})`,
  );

  return logger;
}

/**
 * Gracefully close logging resources
 */
export function closeLogging(): Promise<void> {
  return new Promise(resolve => {
    const destination = fileDestination;
    if (!destination) {
      resolve();
      return;
    }
    fileDestination = null;
    destination.once('close', () => resolve());
    destination.end();
  });
}

export function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  switch (envLevel) {
    case 'DEBUG':
    case 'INFO':
    case 'WARNING':
    case 'ERROR':
    case 'CRITICAL':
      return envLevel;
    default:
      return Settings.LOG_LEVEL;
  }
}

let defaultLogger: Logger | null = null;

/**
 * Get the default configured logger instance
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = setupLogging({ logLevel: getLogLevelFromEnv() });
  }
  return defaultLogger;
}

type PinoMethod = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

function emit(target: Logger, method: PinoMethod, message: string, context: unknown): void {
  if (context === undefined) {
    target[method](message);
  } else if (context instanceof Error) {
    target[method]({ err: context }, message);
  } else if (isRecord(context)) {
    target[method](context, message);
  } else {
    target[method]({ detail: context }, message);
  }
}

/**
 * Create a named child logger. An Error passed as the second argument lands in `err`.
 */
export function createLogger(name: string): AppLogger {
  const child = getDefaultLogger().child({ name });
  return {
    debug: (message, context) => emit(child, 'debug', message, context),
    info: (message, context) => emit(child, 'info', message, context),
    warn: (message, context) => emit(child, 'warn', message, context),
    error: (message, context) => emit(child, 'error', message, context),
    fatal: (message, context) => emit(child, 'fatal', message, context),
  };
}

export default getDefaultLogger;
