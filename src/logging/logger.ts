import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LoggingConfig } from '../config/types.js';

export type { Logger } from 'winston';
export type LogTransport = winston.transport;

export interface CreateLoggerOptions {
  /** Base name of the rotated log files ("subtitles-monitor" -> subtitles-monitor-2024-01-01.log) */
  name: string;
  /** Extra transports, e.g. a stream captured by tests */
  transports?: winston.transport[];
}

/**
 * Build the logger for one run.
 *
 * The logger is created once at process start and handed to every component
 * through the run context; nothing imports a shared instance.
 */
export function createLogger(config: LoggingConfig, options: CreateLoggerOptions): winston.Logger {
  const transports: winston.transport[] = [...(options.transports ?? [])];

  if (config.file.enabled) {
    transports.push(
      new DailyRotateFile({
        filename: `${config.file.path}/${options.name}-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'debug', // the file keeps everything, the console follows LOG_LEVEL
        maxSize: config.file.maxSize,
        maxFiles: config.file.maxFiles,
        auditFile: `${config.file.path}/.audit-${options.name}.json`,
      })
    );
  }

  if (config.console.enabled) {
    transports.push(
      new winston.transports.Console({
        level: config.level,
        format: winston.format.combine(
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  return winston.createLogger({
    level: 'debug',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: options.name },
    silent: transports.length === 0,
    transports,
  });
}

/**
 * End the logger and wait until its transports have been handed every entry
 */
export function closeLogger(logger: winston.Logger): Promise<void> {
  return new Promise(resolve => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}
