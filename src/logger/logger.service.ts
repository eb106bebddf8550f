import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import * as winston from 'winston';

export interface LogContext {
  [key: string]: unknown;
}

@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private logger: winston.Logger;
  private context?: string;

  constructor() {
    const isDevelopment = process.env.NODE_ENV === 'development';

    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        isDevelopment ? winston.format.colorize() : winston.format.json(),
        winston.format.printf((info) => {
          const { timestamp, level, message, context, stack, ...metadata } = info;
          if (isDevelopment) {
            const ctx = context ? `[${String(context)}]` : '';
            const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
            return `${String(timestamp)} ${level} ${ctx} ${String(message)}${meta}${stack ? '\n' + String(stack) : ''}`;
          }
          // JSON lines in production
          return JSON.stringify({
            timestamp,
            level,
            context,
            message,
            ...metadata,
            ...(stack ? { stack } : {}),
          });
        }),
      ),
      transports: [
        new winston.transports.Console({
          handleExceptions: true,
          handleRejections: true,
        }),
      ],
    });
  }

  setContext(context: string) {
    this.context = context;
  }

  log(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('info', message, context, metadata);
  }

  error(message: string, trace?: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('error', message, context, { ...metadata, ...(trace ? { stack: trace } : {}) });
  }

  warn(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('warn', message, context, metadata);
  }

  debug(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('debug', message, context, metadata);
  }

  verbose(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('verbose', message, context, metadata);
  }

  // Nest passes the context as a string; our services pass metadata objects
  private write(
    level: 'info' | 'error' | 'warn' | 'debug' | 'verbose',
    message: string,
    context: string | LogContext | undefined,
    metadata: LogContext | undefined,
  ) {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? { ...context, ...metadata } : metadata;
    this.logger.log(level, message, { context: ctx, ...meta });
  }
}
