import { Decimal } from 'decimal.js';
import { addMonths, startOfDay } from 'date-fns';
import { Money } from '../../../common/money/money';
import { InterestRate } from './interest-rate';
import { LoanTerm } from './loan-term';

const PAYMENT_FACTOR_SCALE = 10;

/**
 * Level monthly payment for a fixed-rate loan.
 *
 * - single-month term: the principal itself, no interest
 * - zero rate: principal / n
 * - otherwise P * [r(1+r)^n] / [(1+r)^n - 1], with the payment factor
 *   rounded half-up to 10 fractional digits
 *
 * The result is not rounded to the currency.
 */
export function calculateMonthlyPayment(
  principal: Money,
  rate: InterestRate,
  term: LoanTerm,
): Money {
  const n = term.months;
  if (n === 1) {
    return principal;
  }

  const monthlyRate = rate.getMonthlyRate();
  if (monthlyRate.isZero()) {
    return principal.divide(n);
  }

  return principal.multiply(paymentFactor(monthlyRate, n));
}

export function paymentFactor(monthlyRate: Decimal, months: number): Decimal {
  const growth = monthlyRate.plus(1).pow(months);
  const numerator = monthlyRate.times(growth);
  const denominator = growth.minus(1);
  return numerator
    .dividedBy(denominator)
    .toDecimalPlaces(PAYMENT_FACTOR_SCALE, Decimal.ROUND_HALF_UP);
}

export interface ScheduledInstallment {
  installmentNumber: number;
  dueDate: Date;
  amount: Money;
}

/**
 * Equal installments due one calendar month apart, starting one month
 * after `startDate`. Month ends are clamped (Jan 31 -> Feb 28/29).
 */
export function buildInstallmentPlan(
  monthlyPayment: Money,
  term: LoanTerm,
  startDate: Date,
): ScheduledInstallment[] {
  const amount = monthlyPayment.roundToCurrency();
  const anchor = startOfDay(startDate);

  return Array.from({ length: term.months }, (_, index) => ({
    installmentNumber: index + 1,
    dueDate: addMonths(anchor, index + 1),
    amount,
  }));
}
