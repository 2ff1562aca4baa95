import { Injectable, Logger } from '@nestjs/common';
import { Money } from '../money/money';

export type StructuredLogLevel = 'debug' | 'info' | 'warn' | 'error';
export type StructuredLogService = 'loan' | 'payment' | 'eligibility';

export interface StructuredLogPayload {
  timestamp?: string;
  level?: StructuredLogLevel;
  service: StructuredLogService;
  operation: string;
  transactionId: string;
  userId?: string;
  duration?: number;
  metadata?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

export type StructuredLogEntry = StructuredLogPayload &
  Required<Pick<StructuredLogPayload, 'timestamp' | 'level' | 'userId' | 'metadata'>>;

/** Where a log line belongs: the transaction currently being audited. */
export interface LogScope {
  service: StructuredLogService;
  operation: string;
  transactionId: string;
  userId?: string;
}

@Injectable()
export class StructuredLoggerService {
  private readonly logger = new Logger(StructuredLoggerService.name);

  // Money renders as "AED 10.00"; errors keep only their message.
  private serialize(entry: StructuredLogEntry) {
    const seen = new WeakSet<object>();
    return JSON.stringify(entry, function (this: Record<string, unknown>, key: string, value: unknown) {
      // toJSON has already run on `value`; the holder still has the Money itself
      const raw = this[key];
      if (raw instanceof Money) return raw.toString();
      if (value instanceof Error) return value.message;
      if (typeof value === 'bigint') return value.toString();
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      return value;
    });
  }

  buildEntry(payload: StructuredLogPayload): StructuredLogEntry {
    return {
      timestamp: payload.timestamp ?? new Date().toISOString(),
      level: payload.level ?? 'info',
      service: payload.service,
      operation: payload.operation,
      transactionId: payload.transactionId,
      userId: payload.userId ?? 'system',
      duration: payload.duration,
      metadata: payload.metadata ?? {},
      error: payload.error,
    };
  }

  log(payload: StructuredLogPayload) {
    const entry = this.buildEntry(payload);
    const line = this.serialize(entry);
    switch (entry.level) {
      case 'debug':
        this.logger.debug(line);
        break;
      case 'warn':
        this.logger.warn(line);
        break;
      case 'error':
        this.logger.error(line);
        break;
      default:
        this.logger.log(line);
    }
  }

  /** Logs under an audit scope; without one there is no transaction to attach to, so nothing is written. */
  logInScope(
    scope: LogScope | undefined,
    level: StructuredLogLevel,
    metadata: Record<string, unknown>,
    service?: StructuredLogService,
  ) {
    if (!scope) return;
    this.log({ ...scope, service: service ?? scope.service, level, metadata });
  }

  debug(p: Omit<StructuredLogPayload, 'level'>) {
    this.log({ ...p, level: 'debug' });
  }

  info(p: Omit<StructuredLogPayload, 'level'>) {
    this.log({ ...p, level: 'info' });
  }

  warn(p: Omit<StructuredLogPayload, 'level'>) {
    this.log({ ...p, level: 'warn' });
  }

  error(p: Omit<StructuredLogPayload, 'level'>) {
    this.log({ ...p, level: 'error' });
  }
}
