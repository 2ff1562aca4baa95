import { Loan } from '../domain/loan';

export const LOAN_REPOSITORY = Symbol('LOAN_REPOSITORY');

export interface LoanRepository {
  findById(loanId: string): Promise<Loan | null>;
  findByCustomer(customerId: string): Promise<Loan[]>;

  /**
   * Persists the loan if the stored version still equals `expectedVersion`
   * (`null` for a loan that must not exist yet). Throws ConflictException
   * otherwise.
   */
  save(loan: Loan, expectedVersion: number | null): Promise<void>;
}
