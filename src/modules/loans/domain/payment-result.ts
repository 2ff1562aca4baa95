import { DistributionInconsistencyError } from '../../../common/errors/domain.errors';
import { Money } from '../../../common/money/money';
import { LoanStatus, LoanStatusType } from '../../../common/utils/constants/status.constants';
import { PaymentDistribution } from './payment-distribution';

export interface SuccessfulPaymentProps {
  paymentId: string;
  loanId: string;
  distribution: PaymentDistribution;
  newOutstandingBalance: Money;
  loanStatus: LoanStatusType;
  processedAt: Date;
}

export class SuccessfulPayment {
  readonly success = true as const;
  readonly paymentId: string;
  readonly loanId: string;
  readonly distribution: PaymentDistribution;
  readonly newOutstandingBalance: Money;
  readonly loanStatus: LoanStatusType;
  readonly processedAt: Date;

  constructor(props: SuccessfulPaymentProps) {
    if (!props.distribution.balanceAfterPayment().equals(props.newOutstandingBalance)) {
      throw new DistributionInconsistencyError(
        `New balance (${props.newOutstandingBalance}) does not match distribution (${props.distribution.balanceAfterPayment()})`,
      );
    }
    this.paymentId = props.paymentId;
    this.loanId = props.loanId;
    this.distribution = props.distribution;
    this.newOutstandingBalance = props.newOutstandingBalance;
    this.loanStatus = props.loanStatus;
    this.processedAt = props.processedAt;
  }

  isSuccess(): this is SuccessfulPayment {
    return true;
  }

  isLoanFullyPaid(): boolean {
    return this.loanStatus === LoanStatus.FULLY_PAID;
  }
}

export class FailedPayment {
  readonly success = false as const;

  constructor(
    readonly errorMessage: string,
    readonly loanId?: string,
  ) {}

  isSuccess(): this is SuccessfulPayment {
    return false;
  }

  isLoanFullyPaid(): boolean {
    return false;
  }
}

export type PaymentResult = SuccessfulPayment | FailedPayment;

export const PaymentResult = {
  success: (props: SuccessfulPaymentProps): SuccessfulPayment => new SuccessfulPayment(props),
  failure: (errorMessage: string, loanId?: string): FailedPayment =>
    new FailedPayment(errorMessage, loanId),
};
