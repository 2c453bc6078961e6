import { createLogger, format, transports, Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

export interface LogContext {
  sessionId?: string;
  agentName?: string;
  toolName?: string;
  ticketId?: string;
  source?: string;
  operation?: string;
}

export type LogMeta = Record<string, unknown>;

class SupportAgentLogger {
  private logger: Logger;

  constructor(level: string = 'info') {
    const isProduction = process.env.NODE_ENV === 'production';

    this.logger = createLogger({
      level,
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        format.json(),
        format.printf(({ timestamp, level, message, event, sessionId, data, ...meta }) => {
          const messageStr = typeof message === 'string' ? message : String(message);
          return JSON.stringify({
            timestamp,
            level,
            event: event || messageStr.toLowerCase().replace(/\s+/g, '_'),
            sessionId,
            data: data || meta,
            message: messageStr
          });
        })
      ),
      transports: [
        new transports.Console({
          format: format.combine(
            format.colorize(),
            format.simple()
          )
        }),
        ...(isProduction ? [
          new DailyRotateFile({
            filename: 'logs/support-agent-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles: '14d',
            format: format.json()
          }),
          new DailyRotateFile({
            filename: 'logs/error-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            level: 'error',
            maxSize: '20m',
            maxFiles: '30d',
            format: format.json()
          })
        ] : [
          new transports.File({
            filename: 'logs/support-agent.log',
            format: format.json()
          }),
          new transports.File({
            filename: 'logs/error.log',
            level: 'error',
            format: format.json()
          })
        ])
      ]
    });
  }

  setLevel(level: string): void {
    this.logger.level = level;
  }

  log(level: LogLevel, message: string, context?: LogContext, meta?: LogMeta) {
    const logData = {
      ...context,
      ...meta,
      sessionId: context?.sessionId
    };
    this.logger.log(level, message, logData);
  }

  /**
   * Log with an explicit event name so records can be grouped downstream
   */
  event(eventName: string, context?: LogContext, meta?: LogMeta) {
    const logData = {
      event: eventName,
      sessionId: context?.sessionId,
      data: meta,
      ...context
    };
    this.logger.info(eventName, logData);
  }

  info(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.INFO, message, context, meta);
  }

  error(message: string, error?: Error, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.ERROR, message, context, {
      error: error?.message,
      stack: error?.stack,
      ...meta
    });
  }

  warn(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.WARN, message, context, meta);
  }

  debug(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.DEBUG, message, context, meta);
  }

  logToolCall(toolName: string, params: unknown, context: LogContext) {
    this.event('tool_call', { ...context, toolName }, { params });
  }

  logToolResult(toolName: string, resultSnippet: string, context: LogContext) {
    this.event('tool_result', { ...context, toolName }, { resultSnippet });
  }

  logTicketCreated(ticketId: string, context: LogContext) {
    this.event('ticket_created', { ...context, ticketId });
  }

  logError(error: Error, context: LogContext) {
    this.event('error', context, {
      message: error.message,
      stack: error.stack
    });
  }
}

export const logger = new SupportAgentLogger(process.env.LOG_LEVEL || 'info');

/**
 * Normalize an unknown thrown value into an Error for logging.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
