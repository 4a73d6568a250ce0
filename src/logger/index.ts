/**
 * Structured Logging System
 *
 * Provides structured logging with:
 * - Configurable log levels (TRACE, DEBUG, INFO, WARN, ERROR)
 * - Automatic context propagation (correlationId, chatId, destinationId)
 * - Redaction of secrets, including webhook URLs which embed their token
 * - JSON output for production
 */

import { getContext } from '../context/execution-context.js';

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  SILENT = 5,
}

export interface LogContext {
  [key: string]: unknown;
}

export interface StructuredLogger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | unknown, context?: LogContext): void;
}

export type LoggerEnvironment = 'development' | 'production' | 'test';

const SENSITIVE_FIELDS = [
  'masterKey',
  'password',
  'token',
  'secret',
  'apiKey',
  'privateKey',
  'webhookUrl',
  'targetUrl',
];

const WEBHOOK_TOKEN_PATTERN = /(\/api\/webhooks\/\d+\/)[\w-]+/g;

/**
 * Masks the token segment of any webhook URL inside a string.
 */
export function redactWebhookTokens(value: string): string {
  return value.replace(WEBHOOK_TOKEN_PATTERN, '$1[REDACTED]');
}

export class ConsoleStructuredLogger implements StructuredLogger {
  private level: LogLevel;

  constructor(
    private environment: LoggerEnvironment,
    options?: { level?: LogLevel },
  ) {
    this.level = options?.level ?? this.getDefaultLevel();
  }

  private getDefaultLevel(): LogLevel {
    switch (this.environment) {
      case 'development':
        return LogLevel.DEBUG;
      case 'production':
        return LogLevel.WARN;
      case 'test':
        return LogLevel.SILENT;
    }
  }

  trace(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.TRACE) {
      this.log('TRACE', message, context);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('DEBUG', message, context);
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.INFO) {
      this.log('INFO', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.WARN) {
      this.log('WARN', message, context);
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (this.level <= LogLevel.ERROR) {
      this.log('ERROR', message, { ...context, error: this.serializeError(error) });
    }
  }

  private log(level: string, message: string, context?: LogContext): void {
    const execContext = getContext();
    const logEntry = {
      level,
      timestamp: new Date().toISOString(),
      message,
      correlationId: execContext?.correlationId,
      requestId: execContext?.requestId,
      chatId: execContext?.chatId,
      destinationId: execContext?.destinationId,
      duration: execContext ? Date.now() - execContext.startTime : undefined,
      environment: this.environment,
      ...sanitizeLogContext(context),
    };

    const output =
      this.environment === 'production' ? JSON.stringify(logEntry) : this.formatPretty(logEntry);

    switch (level) {
      case 'ERROR':
        console.error(output);
        break;
      case 'WARN':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  private formatPretty(entry: Record<string, unknown>): string {
    const lines = [`${String(entry.timestamp)} [${String(entry.level)}] ${String(entry.message)}`];

    if (entry.correlationId) {
      lines.push(`  correlationId: ${String(entry.correlationId)}`);
    }

    const metaKeys = [
      'correlationId',
      'requestId',
      'timestamp',
      'level',
      'message',
      'environment',
      'duration',
    ];
    const contextFields: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(entry)) {
      if (!metaKeys.includes(key) && value !== undefined) {
        contextFields[key] = value;
      }
    }

    if (Object.keys(contextFields).length > 0) {
      lines.push(`  context: ${JSON.stringify(contextFields, null, 2)}`);
    }

    return lines.join('\n');
  }

  private serializeError(error: unknown): unknown {
    if (error instanceof Error) {
      const serialized: Record<string, unknown> = {
        message: redactWebhookTokens(error.message),
        name: error.name,
        stack: error.stack,
      };

      if (error.cause) {
        serialized.cause = error.cause;
      }

      return serialized;
    }
    return error;
  }
}

/**
 * Replaces sensitive keys with a marker and masks webhook tokens found in string values.
 */
export function sanitizeLogContext(data: LogContext | undefined): Record<string, unknown> {
  if (!data) return {};

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_FIELDS.some((field) => key.toLowerCase().includes(field.toLowerCase()))) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      sanitized[key] = redactWebhookTokens(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

export class NullLogger implements StructuredLogger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
