import { Injectable } from '@nestjs/common';
import { errorDetails } from '../../common/errors/domain-error.mapper';
import {
  StructuredLoggerService,
  StructuredLogService,
} from '../../common/logging/structured-logger.service';
import { AuditContextService } from './audit-context.service';
import { AuditEntry } from './interfaces/audit-entry.interface';

const MAX_TRAIL_ENTRIES = 10_000;

@Injectable()
export class AuditService {
  private readonly trail: AuditEntry[] = [];

  constructor(
    private readonly logger: StructuredLoggerService,
    private readonly auditContext: AuditContextService,
  ) {}

  /**
   * Runs a command with:
   * - the audit context bound for everything it calls
   * - START / SUCCESS / FAILED trail entries and log lines
   * - the enclosing transaction, when nested, on every trail entry
   * Failures are rethrown unchanged.
   */
  async run<T>(
    service: StructuredLogService,
    transactionId: string,
    operation: string,
    userId: string,
    metadata: Record<string, unknown>,
    executor: () => Promise<T> | T,
  ): Promise<T> {
    return this.auditContext.run({ transactionId, operation, service, userId }, async () => {
      const parentTransactionId = this.auditContext.getContext()?.parentTransactionId;
      const record = (suffix: string, entryMetadata: Record<string, unknown>) =>
        this.record({
          transactionId,
          parentTransactionId,
          operation: `${operation}_${suffix}`,
          userId,
          metadata: entryMetadata,
        });
      record('START', metadata);
      this.logger.debug({ service, operation: `${operation}_START`, transactionId, userId, metadata });

      try {
        const result = await executor();

        record('SUCCESS', metadata);
        this.logger.info({
          service,
          operation: `${operation}_SUCCESS`,
          transactionId,
          userId,
          duration: this.auditContext.elapsedMs(),
          metadata,
        });
        return result;
      } catch (error) {
        const details = errorDetails(error);
        record('FAILED', { ...metadata, error: details.message });
        this.logger.error({
          service,
          operation: `${operation}_FAILED`,
          transactionId,
          userId,
          duration: this.auditContext.elapsedMs(),
          metadata,
          error: details,
        });
        throw error;
      }
    });
  }

  /**
   * Returns the audit trail for a transaction, oldest first.
   */
  getAuditTrail(transactionId: string): AuditEntry[] {
    return this.trail.filter((entry) => entry.transactionId === transactionId);
  }

  private record(entry: Omit<AuditEntry, 'createdAt'>) {
    this.trail.push({ ...entry, createdAt: new Date() });
    if (this.trail.length > MAX_TRAIL_ENTRIES) {
      this.trail.shift();
    }
  }
}
