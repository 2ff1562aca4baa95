import { DistributionInconsistencyError } from '../../../common/errors/domain.errors';
import { Money, MoneyJson } from '../../../common/money/money';

export interface PaymentDistributionProps {
  totalPayment: Money;
  principalPayment: Money;
  interestPayment: Money;
  feePayment: Money;
  previousBalance: Money;
  paymentDate: Date;
}

export interface PaymentDistributionJson {
  totalPayment: MoneyJson;
  principalPayment: MoneyJson;
  interestPayment: MoneyJson;
  feePayment: MoneyJson;
  previousBalance: MoneyJson;
  paymentDate: string;
}

/**
 * How one payment splits across principal, interest and fees.
 * Invariant: totalPayment = principalPayment + interestPayment + feePayment.
 */
export class PaymentDistribution {
  readonly totalPayment: Money;
  readonly principalPayment: Money;
  readonly interestPayment: Money;
  readonly feePayment: Money;
  readonly previousBalance: Money;
  readonly paymentDate: Date;

  private constructor(props: PaymentDistributionProps) {
    this.totalPayment = props.totalPayment;
    this.principalPayment = props.principalPayment;
    this.interestPayment = props.interestPayment;
    this.feePayment = props.feePayment;
    this.previousBalance = props.previousBalance;
    this.paymentDate = props.paymentDate;
  }

  static create(props: PaymentDistributionProps): PaymentDistribution {
    const components = [props.principalPayment, props.interestPayment, props.feePayment];
    const currency = props.totalPayment.currency;

    if (
      !components.every((c) => c.currency === currency) ||
      props.previousBalance.currency !== currency
    ) {
      throw new DistributionInconsistencyError('Distribution components must share one currency');
    }
    if (components.some((c) => c.isNegative())) {
      throw new DistributionInconsistencyError('Distribution components cannot be negative');
    }

    const sum = props.principalPayment.add(props.interestPayment).add(props.feePayment);
    if (!sum.equals(props.totalPayment)) {
      throw new DistributionInconsistencyError(
        `Distribution components (${sum}) do not sum to total payment (${props.totalPayment})`,
      );
    }
    if (props.principalPayment.isGreaterThan(props.previousBalance)) {
      throw new DistributionInconsistencyError(
        `Principal payment (${props.principalPayment}) exceeds previous balance (${props.previousBalance})`,
      );
    }

    return new PaymentDistribution(props);
  }

  /**
   * Baseline waterfall: the whole payment reduces principal.
   */
  static principalOnly(payment: Money, previousBalance: Money, paymentDate: Date): PaymentDistribution {
    const zero = Money.zero(payment.currency);
    return PaymentDistribution.create({
      totalPayment: payment,
      principalPayment: payment,
      interestPayment: zero,
      feePayment: zero,
      previousBalance,
      paymentDate,
    });
  }

  balanceAfterPayment(): Money {
    return this.previousBalance.subtract(this.principalPayment);
  }

  isPrincipalOnly(): boolean {
    return this.interestPayment.isZero() && this.feePayment.isZero();
  }

  toJSON(): PaymentDistributionJson {
    return {
      totalPayment: this.totalPayment.toJSON(),
      principalPayment: this.principalPayment.toJSON(),
      interestPayment: this.interestPayment.toJSON(),
      feePayment: this.feePayment.toJSON(),
      previousBalance: this.previousBalance.toJSON(),
      paymentDate: this.paymentDate.toISOString(),
    };
  }
}
