import { Money } from '../../../common/money/money';
import { buildInstallmentPlan, calculateMonthlyPayment, paymentFactor } from './amortization';
import { InterestRate } from './interest-rate';
import { LoanTerm } from './loan-term';

const aed = (amount: string | number) => Money.of(amount, 'AED');

describe('calculateMonthlyPayment', () => {
  it('should amortize 100,000 at 6% over 60 months', () => {
    const payment = calculateMonthlyPayment(aed(100000), InterestRate.of('0.06'), LoanTerm.ofMonths(60));

    expect(payment.amount.toNumber()).toBeGreaterThan(1930);
    expect(payment.amount.toNumber()).toBeLessThan(1940);
    expect(payment.roundToCurrency().toFixed()).toBe('1933.28');
  });

  it('should split principal evenly at a zero rate', () => {
    const payment = calculateMonthlyPayment(aed(100000), InterestRate.zero(), LoanTerm.ofMonths(60));
    expect(payment.equals(aed(100000).divide(60))).toBe(true);
  });

  it('should return the principal for a single-month term', () => {
    const payment = calculateMonthlyPayment(aed('5000.55'), InterestRate.of('0.2'), LoanTerm.ofMonths(1));
    expect(payment.equals(aed('5000.55'))).toBe(true);
  });

  it('should round the payment factor to 10 decimals', () => {
    expect(paymentFactor(InterestRate.of('0.06').getMonthlyRate(), 60).decimalPlaces()).toBeLessThanOrEqual(10);
  });
});

describe('buildInstallmentPlan', () => {
  it('should produce one rounded installment per month', () => {
    const plan = buildInstallmentPlan(aed(100000).divide(60), LoanTerm.ofMonths(60), new Date(2024, 0, 15));

    expect(plan).toHaveLength(60);
    expect(plan.map((line) => line.installmentNumber).slice(0, 3)).toEqual([1, 2, 3]);
    expect(plan.every((line) => line.amount.toFixed() === '1666.67')).toBe(true);
    expect(plan[0].dueDate).toEqual(new Date(2024, 1, 15));
    expect(plan[59].dueDate).toEqual(new Date(2029, 0, 15));
  });

  it('should clamp month ends without drifting', () => {
    const plan = buildInstallmentPlan(aed(600), LoanTerm.ofMonths(3), new Date(2024, 0, 31));

    expect(plan.map((line) => line.dueDate)).toEqual([
      new Date(2024, 1, 29),
      new Date(2024, 2, 31),
      new Date(2024, 3, 30),
    ]);
  });
});
