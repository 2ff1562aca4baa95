import { InvalidConstructionError } from '../../../common/errors/domain.errors';

export const MAX_TERM_MONTHS = 600;

const SHORT_TERM_LIMIT = 12;
const MEDIUM_TERM_LIMIT = 60;

export type LoanTermCategory = 'SHORT' | 'MEDIUM' | 'LONG';

export class LoanTerm {
  private constructor(readonly months: number) {}

  static ofMonths(months: number): LoanTerm {
    if (!Number.isInteger(months)) {
      throw new InvalidConstructionError('Loan term must be a whole number of months');
    }
    if (months <= 0) {
      throw new InvalidConstructionError('Loan term must be positive');
    }
    if (months > MAX_TERM_MONTHS) {
      throw new InvalidConstructionError(`Loan term cannot exceed ${MAX_TERM_MONTHS} months`);
    }
    return new LoanTerm(months);
  }

  static ofYears(years: number): LoanTerm {
    return LoanTerm.ofMonths(years * 12);
  }

  getYears(): number {
    return this.months / 12;
  }

  category(): LoanTermCategory {
    if (this.months <= SHORT_TERM_LIMIT) return 'SHORT';
    if (this.months <= MEDIUM_TERM_LIMIT) return 'MEDIUM';
    return 'LONG';
  }

  isShortTerm(): boolean {
    return this.category() === 'SHORT';
  }

  isMediumTerm(): boolean {
    return this.category() === 'MEDIUM';
  }

  isLongTerm(): boolean {
    return this.category() === 'LONG';
  }

  equals(other: LoanTerm): boolean {
    return this.months === other.months;
  }

  toString(): string {
    return `${this.months} months`;
  }
}
