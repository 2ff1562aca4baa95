import { AsyncLocalStorage } from 'node:async_hooks';
import { Injectable } from '@nestjs/common';
import { StructuredLogService } from '../../common/logging/structured-logger.service';

export interface AuditContext {
  transactionId: string;
  operation: string;
  service: StructuredLogService;
  userId?: string;
  /** Set when the command was started from inside another audited command. */
  parentTransactionId?: string;
  startedAt: number;
}

export type AuditContextInput = Omit<AuditContext, 'parentTransactionId' | 'startedAt'>;

@Injectable()
export class AuditContextService {
  private readonly storage = new AsyncLocalStorage<AuditContext>();

  /** Binds `context` for everything `callback` calls, linking it to any enclosing transaction. */
  run<T>(context: AuditContextInput, callback: () => T, now: () => number = Date.now): T {
    const parent = this.storage.getStore();
    return this.storage.run(
      {
        ...context,
        ...(parent && parent.transactionId !== context.transactionId
          ? { parentTransactionId: parent.transactionId }
          : {}),
        startedAt: now(),
      },
      callback,
    );
  }

  getContext(): AuditContext | undefined {
    return this.storage.getStore();
  }

  /** Milliseconds since the current transaction started; undefined outside one. */
  elapsedMs(now: () => number = Date.now): number | undefined {
    const context = this.storage.getStore();
    return context ? now() - context.startedAt : undefined;
  }
}
