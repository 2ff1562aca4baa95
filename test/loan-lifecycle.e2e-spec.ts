import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from '../src/app.module';
import { Money } from '../src/common/money/money';
import { LoanStatus } from '../src/common/utils/constants/status.constants';
import { LOAN_PRODUCT_CONFIG, loadLoanProductConfig } from '../src/config/loan-product.config';
import { EligibilityService } from '../src/modules/eligibility/eligibility.service';
import { InterestRate } from '../src/modules/loans/domain/interest-rate';
import { LoanTerm } from '../src/modules/loans/domain/loan-term';
import { LoanEventOutbox } from '../src/modules/loans/events/loan-event.outbox';
import { LoanService } from '../src/modules/loans/loans.service';
import { LOAN_REPOSITORY, LoanRepository } from '../src/modules/loans/repositories/loan.repository';
import { RepaymentsService } from '../src/modules/repayments/repayments.service';

describe('Loan lifecycle (e2e)', () => {
  let moduleRef: TestingModule;

  beforeAll(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(LOAN_PRODUCT_CONFIG)
      .useValue(loadLoanProductConfig({}))
      .compile();
    moduleRef.useLogger(false);
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('should take an eligible customer from application to payoff', async () => {
    const eligibility = moduleRef.get(EligibilityService);
    const loans = moduleRef.get(LoanService);
    const repayments = moduleRef.get(RepaymentsService);
    const outbox = moduleRef.get(LoanEventOutbox);

    const assessment = eligibility.assess(
      {
        customerId: 'CUST-42',
        active: true,
        creditScore: 710,
        dateOfBirth: new Date(1985, 2, 3),
        monthlyIncome: Money.of(30000, 'AED'),
        existingMonthlyObligations: Money.of(2000, 'AED'),
        email: 'applicant@example.com',
        phoneNumber: '+971500000001',
      },
      {
        principalAmount: Money.of(10000, 'AED'),
        interestRate: InterestRate.fromPercentage(6),
        loanTerm: LoanTerm.ofMonths(12),
      },
      new Date(2024, 0, 10),
    );
    expect(assessment.isApproved()).toBe(true);

    const created = await loans.createLoan({
      customerId: 'CUST-42',
      principalAmount: 10000,
      annualInterestRate: 6,
      termMonths: 12,
      applicationDate: '2024-01-15T12:00:00',
      withSchedule: true,
    });
    await loans.approveLoan(created.loanId);
    await loans.disburseLoan(created.loanId, { effectiveDate: '2024-02-01T12:00:00' });

    const first = await repayments.processPayment({ loanId: created.loanId, amount: 5000 });
    const last = await repayments.processPayment({ loanId: created.loanId, amount: 5000 });

    expect(first.isLoanFullyPaid()).toBe(false);
    expect(last.isLoanFullyPaid()).toBe(true);

    const loan = await loans.getLoan(created.loanId);
    expect(loan.status).toBe(LoanStatus.FULLY_PAID);
    expect(loan.outstandingBalance.isZero()).toBe(true);
    expect(loan.installments).toHaveLength(12);
    expect(loan.version).toBe(5);

    expect(outbox.drain().map((e) => e.eventType)).toEqual([
      'LoanCreated',
      'LoanApproved',
      'LoanDisbursed',
      'LoanPaymentMade',
      'LoanPaymentMade',
      'LoanFullyPaid',
    ]);
  });

  it('should store loans in the shared repository', async () => {
    const loans = moduleRef.get(LoanService);
    const repository = moduleRef.get<LoanRepository>(LOAN_REPOSITORY);

    const created = await loans.createLoan({
      customerId: 'CUST-43',
      principalAmount: 2000,
      annualInterestRate: 0,
      termMonths: 6,
    });

    const stored = await repository.findByCustomer('CUST-43');
    expect(stored.map((l) => l.loanId)).toEqual([created.loanId]);
  });
});
