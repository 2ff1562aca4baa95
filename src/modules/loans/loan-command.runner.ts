import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { toHttpException } from '../../common/errors/domain-error.mapper';
import { StructuredLogService } from '../../common/logging/structured-logger.service';
import { AuditService } from '../audit/audit.service';
import { Loan } from './domain/loan';
import { LoanDomainEvent } from './domain/loan.events';
import { LoanEventOutbox } from './events/loan-event.outbox';
import { LOAN_REPOSITORY, LoanRepository } from './repositories/loan.repository';

export interface LoanCommand {
  operation: string;
  service?: StructuredLogService;
  userId?: string;
  metadata?: Record<string, unknown>;
}

export interface LoanCommandOutcome<T> {
  loan: Loan;
  result: T;
  events: LoanDomainEvent[];
}

/**
 * Load, mutate, save with the loaded version, then hand the events to the
 * outbox. Events of a command that fails to save are dropped, and so is its
 * `committed` callback, which runs inside the same audit transaction.
 */
@Injectable()
export class LoanCommandRunner {
  constructor(
    @Inject(LOAN_REPOSITORY) private readonly repository: LoanRepository,
    private readonly outbox: LoanEventOutbox,
    private readonly auditService: AuditService,
  ) {}

  async create(command: LoanCommand, factory: (events: LoanDomainEvent[]) => Loan): Promise<LoanCommandOutcome<Loan>> {
    return this.audited(command, async () => {
      const events: LoanDomainEvent[] = [];
      const loan = factory(events);
      await this.repository.save(loan, null);
      this.outbox.enqueue(events);
      return { loan, result: loan, events };
    });
  }

  async execute<T>(
    loanId: string,
    command: LoanCommand,
    mutate: (loan: Loan, events: LoanDomainEvent[]) => T,
    committed?: (outcome: LoanCommandOutcome<T>) => void,
  ): Promise<LoanCommandOutcome<T>> {
    return this.audited({ ...command, metadata: { loanId, ...command.metadata } }, async () => {
      const loan = await this.load(loanId);
      const expectedVersion = loan.version;
      const events: LoanDomainEvent[] = [];

      const result = mutate(loan, events);
      await this.repository.save(loan, expectedVersion);
      this.outbox.enqueue(events);
      const outcome = { loan, result, events };
      committed?.(outcome);
      return outcome;
    });
  }

  async load(loanId: string): Promise<Loan> {
    const loan = await this.repository.findById(loanId);
    if (!loan) throw new NotFoundException(`Loan ${loanId} not found`);
    return loan;
  }

  private async audited<T>(command: LoanCommand, executor: () => Promise<T>): Promise<T> {
    const transactionId = `txn_${uuidv4()}`;
    try {
      return await this.auditService.run(
        command.service ?? 'loan',
        transactionId,
        command.operation,
        command.userId ?? 'system',
        command.metadata ?? {},
        executor,
      );
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
