import { Decimal } from 'decimal.js';
import { InvalidConstructionError } from '../errors/domain.errors';

/**
 * Arbitrary-precision arithmetic shared by every money and rate calculation.
 * 34 significant digits matches IEEE 754 decimal128.
 */
export const FinancialDecimal = Decimal.clone({
  precision: 34,
  rounding: Decimal.ROUND_HALF_UP,
});

export type DecimalInput = Decimal.Value;

export const CURRENCY_SCALE = 2;

export interface MoneyJson {
  amount: string;
  currency: string;
}

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export function toDecimal(value: DecimalInput): Decimal {
  let parsed: Decimal;
  try {
    parsed = new FinancialDecimal(value);
  } catch {
    throw new InvalidConstructionError(`Invalid decimal value: ${String(value)}`);
  }
  if (!parsed.isFinite()) {
    throw new InvalidConstructionError(`Decimal value must be finite: ${String(value)}`);
  }
  return parsed;
}

export class Money {
  private constructor(
    readonly amount: Decimal,
    readonly currency: string,
  ) {}

  static of(amount: DecimalInput, currency: string): Money {
    if (!CURRENCY_PATTERN.test(currency)) {
      throw new InvalidConstructionError(`Invalid currency code: ${currency}`);
    }
    return new Money(toDecimal(amount), currency);
  }

  static zero(currency: string): Money {
    return Money.of(0, currency);
  }

  static fromJSON(json: MoneyJson): Money {
    return Money.of(json.amount, json.currency);
  }

  add(other: Money): Money {
    this.assertSameCurrency(other);
    return new Money(this.amount.plus(other.amount), this.currency);
  }

  subtract(other: Money): Money {
    this.assertSameCurrency(other);
    return new Money(this.amount.minus(other.amount), this.currency);
  }

  multiply(factor: DecimalInput): Money {
    return new Money(this.amount.times(toDecimal(factor)), this.currency);
  }

  divide(divisor: DecimalInput): Money {
    const d = toDecimal(divisor);
    if (d.isZero()) {
      throw new InvalidConstructionError('Cannot divide money by zero');
    }
    return new Money(this.amount.dividedBy(d), this.currency);
  }

  /** Rounds half-up to the currency's minor unit. */
  roundToCurrency(): Money {
    return new Money(
      this.amount.toDecimalPlaces(CURRENCY_SCALE, Decimal.ROUND_HALF_UP),
      this.currency,
    );
  }

  compareTo(other: Money): number {
    this.assertSameCurrency(other);
    return this.amount.comparedTo(other.amount);
  }

  isGreaterThan(other: Money): boolean {
    return this.compareTo(other) > 0;
  }

  isLessThan(other: Money): boolean {
    return this.compareTo(other) < 0;
  }

  min(other: Money): Money {
    return this.compareTo(other) <= 0 ? this : other;
  }

  // decimal.js treats zero as positive, so compare explicitly
  isZero(): boolean {
    return this.amount.isZero();
  }

  isPositive(): boolean {
    return this.amount.greaterThan(0);
  }

  isNegative(): boolean {
    return this.amount.lessThan(0);
  }

  hasSameCurrency(other: Money): boolean {
    return this.currency === other.currency;
  }

  equals(other: Money): boolean {
    return this.currency === other.currency && this.amount.equals(other.amount);
  }

  toFixed(): string {
    return this.amount.toFixed(CURRENCY_SCALE, Decimal.ROUND_HALF_UP);
  }

  toString(): string {
    return `${this.currency} ${this.toFixed()}`;
  }

  toJSON(): MoneyJson {
    return { amount: this.amount.toString(), currency: this.currency };
  }

  private assertSameCurrency(other: Money) {
    if (this.currency !== other.currency) {
      throw new InvalidConstructionError(
        `Currency mismatch: ${this.currency} vs ${other.currency}`,
      );
    }
  }
}
