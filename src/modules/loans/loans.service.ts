import { Inject, Injectable } from '@nestjs/common';
import { LOAN_PRODUCT_CONFIG, LoanProductConfig } from '../../config/loan-product.config';
import { Money } from '../../common/money/money';
import { validateDto } from '../../common/validation/validate-dto';
import { InterestRate } from './domain/interest-rate';
import { CreateLoanProps, Loan } from './domain/loan';
import { ReadonlyLoanInstallment } from './domain/loan-installment';
import { LoanTerm } from './domain/loan-term';
import { CreateLoanDto } from './dto/create-loan.dto';
import { LoanReasonDto, LoanTransitionDto } from './dto/loan-decision.dto';
import { LoanCommandRunner } from './loan-command.runner';

const effectiveDate = (dto: LoanTransitionDto) =>
  dto.effectiveDate ? new Date(dto.effectiveDate) : undefined;

@Injectable()
export class LoanService {
  constructor(
    private readonly runner: LoanCommandRunner,
    @Inject(LOAN_PRODUCT_CONFIG) private readonly config: LoanProductConfig,
  ) {}

  async createLoan(input: CreateLoanDto, userId?: string): Promise<Loan> {
    const dto = validateDto(CreateLoanDto, input);

    const { loan } = await this.runner.create(
      {
        operation: 'LOAN_CREATE',
        userId,
        metadata: {
          customerId: dto.customerId,
          principalAmount: dto.principalAmount,
          termMonths: dto.termMonths,
        },
      },
      (events) => {
        const props: CreateLoanProps = {
          customerId: dto.customerId,
          principalAmount: Money.of(dto.principalAmount, dto.currency ?? this.config.defaultCurrency),
          interestRate: InterestRate.fromPercentage(dto.annualInterestRate),
          loanTerm: LoanTerm.ofMonths(dto.termMonths),
          applicationDate: dto.applicationDate ? new Date(dto.applicationDate) : undefined,
        };
        return dto.withSchedule
          ? Loan.createWithInstallments(props, events, this.config.productLimits)
          : Loan.create(props, events);
      },
    );
    return loan;
  }

  async approveLoan(loanId: string, input: LoanTransitionDto = {}, userId?: string): Promise<Loan> {
    const dto = validateDto(LoanTransitionDto, input);
    const { loan } = await this.runner.execute(loanId, { operation: 'LOAN_APPROVE', userId }, (l, events) =>
      l.approve(events, effectiveDate(dto)),
    );
    return loan;
  }

  async rejectLoan(loanId: string, input: LoanReasonDto, userId?: string): Promise<Loan> {
    const dto = validateDto(LoanReasonDto, input);
    const { loan } = await this.runner.execute(
      loanId,
      { operation: 'LOAN_REJECT', userId, metadata: { reason: dto.reason } },
      (l, events) => l.reject(dto.reason, events),
    );
    return loan;
  }

  async disburseLoan(loanId: string, input: LoanTransitionDto = {}, userId?: string): Promise<Loan> {
    const dto = validateDto(LoanTransitionDto, input);
    const { loan } = await this.runner.execute(loanId, { operation: 'LOAN_DISBURSE', userId }, (l, events) =>
      l.disburse(events, effectiveDate(dto)),
    );
    return loan;
  }

  async cancelLoan(loanId: string, input: LoanReasonDto, userId?: string): Promise<Loan> {
    const dto = validateDto(LoanReasonDto, input);
    const { loan } = await this.runner.execute(
      loanId,
      { operation: 'LOAN_CANCEL', userId, metadata: { reason: dto.reason } },
      (l, events) => l.cancel(dto.reason, events),
    );
    return loan;
  }

  async generateSchedule(loanId: string, userId?: string): Promise<readonly ReadonlyLoanInstallment[]> {
    const { result } = await this.runner.execute(loanId, { operation: 'SCHEDULE_GENERATE', userId }, (l) =>
      l.generateInstallments(this.config.productLimits),
    );
    return result;
  }

  async getLoan(loanId: string): Promise<Loan> {
    return this.runner.load(loanId);
  }

  async getMonthlyPayment(loanId: string): Promise<Money> {
    const loan = await this.runner.load(loanId);
    return loan.calculateMonthlyPayment();
  }
}
