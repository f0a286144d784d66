import pino, { type Logger, type TransportTargetOptions } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger } from 'pino';

export interface LoggingOptions {
  level: LogLevel;
  /** Optional log file. Receives everything from debug up, whatever the console level. */
  file?: string;
  /** Disable colors on the console (e.g. when output is piped). */
  colorize?: boolean;
}

/**
 * A logger plus the resources behind it. Create one per run and always
 * `close()` it, so the transport worker flushes the log file.
 */
export interface LoggingContext {
  logger: Logger;
  close(): Promise<void>;
}

const FILE_LEVEL: LogLevel = 'debug';

function lowestLevel(a: LogLevel, b: LogLevel): LogLevel {
  return pino.levels.values[a] <= pino.levels.values[b] ? a : b;
}

export function createLogging(options: LoggingOptions): LoggingContext {
  const targets: TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level: options.level,
      options: {
        colorize: options.colorize ?? process.stderr.isTTY,
        ignore: 'pid,hostname',
        translateTime: 'SYS:HH:MM:ss',
        destination: 2,
      },
    },
  ];

  if (options.file) {
    targets.push({
      target: 'pino/file',
      level: FILE_LEVEL,
      options: { destination: options.file, mkdir: true, append: true },
    });
  }

  const transport = pino.transport({ targets });
  const level = options.file ? lowestLevel(options.level, FILE_LEVEL) : options.level;
  const logger = pino({ level }, transport);

  let closed = false;
  return {
    logger,
    close: () =>
      new Promise<void>((resolve) => {
        if (closed) {
          resolve();
          return;
        }
        closed = true;
        transport.once('close', () => resolve());
        transport.end();
      }),
  };
}

/** Logger that discards everything. Used by tests and library callers. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
