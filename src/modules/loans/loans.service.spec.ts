import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { startOfDay } from 'date-fns';
import { LoggingModule } from '../../common/logging/logging.module';
import { LoanStatus } from '../../common/utils/constants/status.constants';
import { LoanConfigModule } from '../../config/loan-config.module';
import { LOAN_PRODUCT_CONFIG, loadLoanProductConfig } from '../../config/loan-product.config';
import { CreateLoanDto } from './dto/create-loan.dto';
import { LoanEventOutbox } from './events/loan-event.outbox';
import { LoansModule } from './loans.module';
import { LoanService } from './loans.service';

describe('LoanService', () => {
  let service: LoanService;
  let outbox: LoanEventOutbox;

  const dto = (overrides: Partial<CreateLoanDto> = {}): CreateLoanDto => ({
    customerId: 'CUST-1',
    principalAmount: 100000,
    annualInterestRate: 6,
    termMonths: 60,
    applicationDate: '2024-01-15T12:00:00',
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [LoanConfigModule, LoggingModule, LoansModule],
    })
      .overrideProvider(LOAN_PRODUCT_CONFIG)
      .useValue(loadLoanProductConfig({}))
      .compile();
    module.useLogger(false);

    service = module.get(LoanService);
    outbox = module.get(LoanEventOutbox);
  });

  describe('createLoan', () => {
    it('should create and store a loan in the default currency', async () => {
      const loan = await service.createLoan(dto());
      const stored = await service.getLoan(loan.loanId);

      expect(stored.status).toBe(LoanStatus.CREATED);
      expect(stored.principalAmount.toString()).toBe('AED 100000.00');
      expect(stored.interestRate.annualRate.toString()).toBe('0.06');
      expect(stored.loanTerm.months).toBe(60);
      expect(outbox.peek().map((e) => e.eventType)).toEqual(['LoanCreated']);
    });

    it('should honour an explicit currency', async () => {
      const loan = await service.createLoan(dto({ currency: 'USD' }));
      expect(loan.principalAmount.currency).toBe('USD');
    });

    it('should generate the schedule on request', async () => {
      const loan = await service.createLoan(dto({ withSchedule: true }));

      expect(loan.installments).toHaveLength(60);
      expect(loan.installments[0].amount.toFixed()).toBe('1933.28');
    });

    it('should apply product limits to scheduled loans', async () => {
      await expect(service.createLoan(dto({ principalAmount: 600, withSchedule: true }))).rejects.toThrow(
        new BadRequestException('Loan amount AED 600.00 is outside product limits 1000 - 500000'),
      );
      expect(outbox.size).toBe(0);
    });

    it('should reject malformed commands', async () => {
      await expect(service.createLoan(dto({ termMonths: 0 }))).rejects.toThrow(BadRequestException);
      await expect(service.createLoan(dto({ annualInterestRate: 120 }))).rejects.toThrow(BadRequestException);
      await expect(service.createLoan(dto({ customerId: '' }))).rejects.toThrow(BadRequestException);
    });
  });

  describe('transitions', () => {
    it('should approve and disburse on the given dates', async () => {
      const { loanId } = await service.createLoan(dto());

      await service.approveLoan(loanId, { effectiveDate: '2024-01-20T09:00:00' });
      const loan = await service.disburseLoan(loanId, { effectiveDate: '2024-02-01T09:00:00' });

      expect(loan.status).toBe(LoanStatus.DISBURSED);
      expect(loan.approvalDate).toEqual(startOfDay(new Date('2024-01-20T09:00:00')));
      expect(loan.maturityDate).toEqual(new Date(2029, 1, 1));
      expect(loan.version).toBe(2);
    });

    it('should report illegal transitions as conflicts', async () => {
      const { loanId } = await service.createLoan(dto());
      await service.approveLoan(loanId);

      await expect(service.approveLoan(loanId)).rejects.toThrow(
        new ConflictException('Loan cannot be approved in current status: APPROVED'),
      );
    });

    it('should reject and cancel with a reason', async () => {
      const first = await service.createLoan(dto());
      const second = await service.createLoan(dto());

      expect((await service.rejectLoan(first.loanId, { reason: 'Income not verified' })).status).toBe(
        LoanStatus.REJECTED,
      );
      expect((await service.cancelLoan(second.loanId, { reason: 'Customer withdrew' })).status).toBe(
        LoanStatus.CANCELLED,
      );
      expect(outbox.drain().map((e) => e.eventType)).toEqual([
        'LoanCreated',
        'LoanCreated',
        'LoanRejected',
        'LoanCancelled',
      ]);
    });

    it('should require a reason', async () => {
      const { loanId } = await service.createLoan(dto());
      await expect(service.rejectLoan(loanId, { reason: '' })).rejects.toThrow(BadRequestException);
    });
  });

  describe('generateSchedule', () => {
    it('should generate once', async () => {
      const { loanId } = await service.createLoan(dto());

      const installments = await service.generateSchedule(loanId);
      expect(installments).toHaveLength(60);
      await expect(service.generateSchedule(loanId)).rejects.toThrow(ConflictException);
    });
  });

  describe('queries', () => {
    it('should compute the monthly payment', async () => {
      const { loanId } = await service.createLoan(dto());
      const payment = await service.getMonthlyPayment(loanId);

      expect(payment.roundToCurrency().toFixed()).toBe('1933.28');
    });

    it('should report unknown loans', async () => {
      await expect(service.getLoan('missing')).rejects.toThrow(new NotFoundException('Loan missing not found'));
    });
  });
});
