import { Injectable } from '@nestjs/common';
import { LoanDomainEvent } from '../domain/loan.events';

/** Committed events waiting for an external publisher. */
@Injectable()
export class LoanEventOutbox {
  private pending: LoanDomainEvent[] = [];

  enqueue(events: readonly LoanDomainEvent[]): void {
    this.pending.push(...events);
  }

  peek(): readonly LoanDomainEvent[] {
    return [...this.pending];
  }

  drain(): LoanDomainEvent[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  get size(): number {
    return this.pending.length;
  }
}
