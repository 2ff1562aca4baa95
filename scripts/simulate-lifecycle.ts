import 'reflect-metadata';
import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env file before anything reads the product config
config({ path: resolve(process.cwd(), '.env') });

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { Money } from '../src/common/money/money';
import { EligibilityService } from '../src/modules/eligibility/eligibility.service';
import { InterestRate } from '../src/modules/loans/domain/interest-rate';
import { LoanTerm } from '../src/modules/loans/domain/loan-term';
import { LoanEventOutbox } from '../src/modules/loans/events/loan-event.outbox';
import { LoanService } from '../src/modules/loans/loans.service';
import { RepaymentsService } from '../src/modules/repayments/repayments.service';

const logger = new Logger('SimulateLifecycle');

async function main() {
  const app = await NestFactory.createApplicationContext(AppModule);

  const eligibility = app.get(EligibilityService);
  const loans = app.get(LoanService);
  const repayments = app.get(RepaymentsService);
  const outbox = app.get(LoanEventOutbox);

  const assessment = eligibility.assess(
    {
      customerId: 'CUST-001',
      active: true,
      creditScore: 720,
      dateOfBirth: new Date('1988-04-12'),
      monthlyIncome: Money.of(25000, 'AED'),
      existingMonthlyObligations: Money.of(2500, 'AED'),
      email: 'customer@example.com',
      phoneNumber: '+971500000000',
    },
    {
      principalAmount: Money.of(60000, 'AED'),
      interestRate: InterestRate.fromPercentage(6),
      loanTerm: LoanTerm.ofMonths(12),
    },
  );
  logger.log(`Eligibility: ${assessment.decision} (${assessment.primaryReason})`);

  if (!assessment.approved) {
    await app.close();
    return;
  }

  const loan = await loans.createLoan({
    customerId: 'CUST-001',
    principalAmount: 60000,
    annualInterestRate: 6,
    termMonths: 12,
    withSchedule: true,
  });
  await loans.approveLoan(loan.loanId);
  await loans.disburseLoan(loan.loanId);
  logger.log(`Monthly payment: ${(await loans.getMonthlyPayment(loan.loanId)).roundToCurrency()}`);

  for (const amount of [20000, 20000, 20000]) {
    const result = await repayments.processPayment({ loanId: loan.loanId, amount });
    logger.log(
      result.success
        ? `Paid ${amount}: balance ${result.newOutstandingBalance}, status ${result.loanStatus}`
        : `Payment rejected: ${result.errorMessage}`,
    );
  }

  logger.log(`Events emitted: ${outbox.drain().map((e) => e.eventType).join(', ')}`);
  await app.close();
}

main().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.stack : String(error));
  process.exitCode = 1;
});
