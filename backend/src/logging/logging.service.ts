import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as winston from 'winston';
import 'winston-daily-rotate-file';

export type VisitorEvent = 'registered' | 'status_updated' | 'deleted';

export interface ChatQueryLogEntry {
  query: string;
  intent: string;
  parameter?: string;
  usedModel: boolean;
  failed?: boolean;
}

const LOG_DIR = 'logs';

type LogFormat = ReturnType<typeof winston.format.combine>;

@Injectable()
export class LoggingService implements LoggerService {
  private readonly chatLogger: winston.Logger;
  private readonly generalLogger: winston.Logger;
  private readonly useFileLogging: boolean;

  constructor(private readonly configService: ConfigService) {
    // Files in development, stdout/stderr elsewhere; nothing at all under test.
    const nodeEnv = this.configService.get<string>('NODE_ENV') || 'development';
    this.useFileLogging = nodeEnv === 'development';
    const silent = nodeEnv === 'test';

    // Create logs directories (only in development)
    if (this.useFileLogging) {
      [LOG_DIR, `${LOG_DIR}/chat`, `${LOG_DIR}/general`].forEach((dir) => {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      });
    }

    // Common format for all loggers
    const fileFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    );

    // Console format outside development (more readable)
    const consoleFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
      }),
    );

    // Chat logger - one entry per assistant query
    this.chatLogger = this.createLogger(
      'debug',
      `${LOG_DIR}/chat/chat-%DATE%.log`,
      '14d',
      fileFormat,
      consoleFormat,
      silent,
    );
    // General logger - visitor events and everything routed through LoggerService
    this.generalLogger = this.createLogger(
      'info',
      `${LOG_DIR}/general/app-%DATE%.log`,
      '7d',
      fileFormat,
      consoleFormat,
      silent,
    );
  }

  private createLogger(
    level: string,
    filename: string,
    maxFiles: string,
    fileFormat: LogFormat,
    consoleFormat: LogFormat,
    silent: boolean,
  ): winston.Logger {
    const transports: winston.transport[] = this.useFileLogging
      ? [
          new winston.transports.DailyRotateFile({
            filename,
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles,
            level,
          }),
        ]
      : [new winston.transports.Console({ format: consoleFormat, level })];

    return winston.createLogger({ level, format: fileFormat, transports, silent });
  }

  // Chat logging
  logChatQuery(entry: ChatQueryLogEntry) {
    this.chatLogger.info('Chat query', {
      ...entry,
      timestamp: new Date().toISOString(),
    });
  }

  // Visitor lifecycle logging
  logVisitorEvent(event: VisitorEvent, visitorId: string, data: Record<string, unknown> = {}) {
    this.generalLogger.info('Visitor event', {
      event,
      visitorId,
      data: JSON.stringify(data),
      timestamp: new Date().toISOString(),
    });
  }

  // General logging methods (implementing LoggerService interface)
  log(message: unknown, context?: string) {
    this.generalLogger.info(String(message), { context });
  }

  error(message: unknown, trace?: string, context?: string) {
    this.generalLogger.error(String(message), { trace, context });
  }

  warn(message: unknown, context?: string) {
    this.generalLogger.warn(String(message), { context });
  }

  debug(message: unknown, context?: string) {
    this.generalLogger.debug(String(message), { context });
  }

  verbose(message: unknown, context?: string) {
    this.generalLogger.verbose(String(message), { context });
  }
}
