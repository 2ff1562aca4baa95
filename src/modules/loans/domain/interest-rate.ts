import { Decimal } from 'decimal.js';
import { InvalidConstructionError } from '../../../common/errors/domain.errors';
import { DecimalInput, toDecimal } from '../../../common/money/money';

const MONTHS_PER_YEAR = 12;
const DAYS_PER_YEAR = 365;

/**
 * Annual interest rate expressed as a fraction (0.06 = 6%).
 */
export class InterestRate {
  private constructor(readonly annualRate: Decimal) {}

  static of(annualRate: DecimalInput): InterestRate {
    const rate = toDecimal(annualRate);
    if (rate.lessThan(0)) {
      throw new InvalidConstructionError('Interest rate cannot be negative');
    }
    if (rate.greaterThan(1)) {
      throw new InvalidConstructionError('Interest rate cannot exceed 100%');
    }
    return new InterestRate(rate);
  }

  static fromPercentage(percentage: DecimalInput): InterestRate {
    return InterestRate.of(toDecimal(percentage).dividedBy(100));
  }

  static zero(): InterestRate {
    return InterestRate.of(0);
  }

  getMonthlyRate(): Decimal {
    return this.annualRate.dividedBy(MONTHS_PER_YEAR);
  }

  getDailyRate(): Decimal {
    return this.annualRate.dividedBy(DAYS_PER_YEAR);
  }

  toPercentage(): Decimal {
    return this.annualRate.times(100);
  }

  isZero(): boolean {
    return this.annualRate.isZero();
  }

  equals(other: InterestRate): boolean {
    return this.annualRate.equals(other.annualRate);
  }

  toString(): string {
    return `${this.toPercentage().toString()}%`;
  }

  toJSON(): string {
    return this.annualRate.toString();
  }
}
