import { ConflictException, Injectable } from '@nestjs/common';
import { Loan, LoanSnapshot } from '../domain/loan';
import { LoanRepository } from './loan.repository';

/**
 * Keeps serialized snapshots, so callers never share live aggregates.
 */
@Injectable()
export class InMemoryLoanRepository implements LoanRepository {
  private readonly snapshots = new Map<string, LoanSnapshot>();

  async findById(loanId: string): Promise<Loan | null> {
    const snapshot = this.snapshots.get(loanId);
    return snapshot ? Loan.fromSnapshot(structuredClone(snapshot)) : null;
  }

  async findByCustomer(customerId: string): Promise<Loan[]> {
    return [...this.snapshots.values()]
      .filter((snapshot) => snapshot.customerId === customerId)
      .map((snapshot) => Loan.fromSnapshot(structuredClone(snapshot)));
  }

  async save(loan: Loan, expectedVersion: number | null): Promise<void> {
    const stored = this.snapshots.get(loan.loanId);

    if (expectedVersion === null && stored) {
      throw new ConflictException(`Loan ${loan.loanId} already exists`);
    }
    if (expectedVersion !== null && stored?.version !== expectedVersion) {
      throw new ConflictException(
        `Loan ${loan.loanId} was modified concurrently (expected version ${expectedVersion}, found ${stored?.version ?? 'none'})`,
      );
    }

    this.snapshots.set(loan.loanId, loan.toSnapshot());
  }
}
