import { Module } from '@nestjs/common';
import { LoanEventOutbox } from './events/loan-event.outbox';
import { LoanCommandRunner } from './loan-command.runner';
import { LoanService } from './loans.service';
import { InMemoryLoanRepository } from './repositories/in-memory-loan.repository';
import { LOAN_REPOSITORY } from './repositories/loan.repository';

@Module({
  providers: [
    LoanService,
    LoanCommandRunner,
    LoanEventOutbox,
    { provide: LOAN_REPOSITORY, useClass: InMemoryLoanRepository },
  ],
  exports: [LoanService, LoanCommandRunner, LoanEventOutbox, LOAN_REPOSITORY],
})
export class LoansModule {}
