import { HttpException, HttpStatus, Injectable } from '@nestjs/common';
import {
  StructuredLogLevel,
  StructuredLoggerService,
} from '../../common/logging/structured-logger.service';
import { Money } from '../../common/money/money';
import { InstallmentStatusType } from '../../common/utils/constants/status.constants';
import { validateDto } from '../../common/validation/validate-dto';
import { AuditContextService } from '../audit/audit-context.service';
import { Loan } from '../loans/domain/loan';
import { PaymentResult } from '../loans/domain/payment-result';
import { LoanCommandRunner } from '../loans/loan-command.runner';
import { InstallmentPaymentDto, MakePaymentDto } from './dto/make-payment.dto';

export interface InstallmentPaymentOutcome {
  loanId: string;
  installmentNumber: number;
  remainingAmount: Money;
  status: InstallmentStatusType;
}

const paymentMoney = (loan: Loan, dto: MakePaymentDto) =>
  Money.of(dto.amount, dto.currency ?? loan.principalAmount.currency);

const paymentDate = (dto: MakePaymentDto) => (dto.paymentDate ? new Date(dto.paymentDate) : undefined);

@Injectable()
export class RepaymentsService {
  constructor(
    private readonly runner: LoanCommandRunner,
    private readonly structuredLogger: StructuredLoggerService,
    private readonly context: AuditContextService,
  ) {}

  /**
   * Applies a payment to the loan balance. Rejected payments come back as a
   * failed PaymentResult; server-side faults still throw.
   */
  async processPayment(input: MakePaymentDto, userId?: string): Promise<PaymentResult> {
    const dto = validateDto(MakePaymentDto, input);

    try {
      const { result } = await this.runner.execute(
        dto.loanId,
        {
          operation: 'PAYMENT',
          service: 'payment',
          userId,
          metadata: { amount: dto.amount, paymentDate: dto.paymentDate },
        },
        (loan, events) => loan.makePayment(paymentMoney(loan, dto), events, paymentDate(dto)),
        ({ result: payment }) =>
          this.log('info', {
            event: 'payment_distribution',
            loanId: payment.loanId,
            distribution: payment.distribution.toJSON(),
            newOutstandingBalance: payment.newOutstandingBalance,
            loanStatus: payment.loanStatus,
          }),
      );
      return result;
    } catch (error) {
      if (error instanceof HttpException && error.getStatus() < HttpStatus.INTERNAL_SERVER_ERROR) {
        return PaymentResult.failure(error.message, dto.loanId);
      }
      throw error;
    }
  }

  /** Pays one scheduled installment; the loan balance is left as it is. */
  async payInstallment(input: InstallmentPaymentDto, userId?: string): Promise<InstallmentPaymentOutcome> {
    const dto = validateDto(InstallmentPaymentDto, input);

    const { result } = await this.runner.execute(
      dto.loanId,
      {
        operation: 'INSTALLMENT_PAYMENT',
        service: 'payment',
        userId,
        metadata: { installmentNumber: dto.installmentNumber, amount: dto.amount },
      },
      (loan) => {
        const installment = loan.payInstallment(
          dto.installmentNumber,
          paymentMoney(loan, dto),
          paymentDate(dto),
        );
        return {
          loanId: loan.loanId,
          installmentNumber: installment.installmentNumber,
          remainingAmount: installment.remainingAmount(),
          status: installment.status,
        };
      },
    );
    return result;
  }

  async markOverdueInstallments(loanId: string, asOf: Date = new Date(), userId?: string): Promise<number> {
    const { result } = await this.runner.execute(
      loanId,
      { operation: 'OVERDUE_REFRESH', service: 'payment', userId, metadata: { asOf: asOf.toISOString() } },
      (loan) => loan.markOverdueInstallments(asOf),
      ({ result: overdue }) => {
        if (overdue > 0) {
          this.log('warn', { event: 'installments_overdue', loanId, overdue });
        }
      },
    );
    return result;
  }

  private log(level: StructuredLogLevel, metadata: Record<string, unknown>) {
    this.structuredLogger.logInScope(this.context.getContext(), level, metadata, 'payment');
  }
}
