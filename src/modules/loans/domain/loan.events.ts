import { v4 as uuidv4 } from 'uuid';
import { Money } from '../../../common/money/money';

interface LoanEventBase {
  eventId: string;
  occurredOn: Date;
  loanId: string;
  customerId: string;
}

export interface LoanCreatedEvent extends LoanEventBase {
  eventType: 'LoanCreated';
  principalAmount: Money;
}

export interface LoanApprovedEvent extends LoanEventBase {
  eventType: 'LoanApproved';
  principalAmount: Money;
}

export interface LoanRejectedEvent extends LoanEventBase {
  eventType: 'LoanRejected';
  reason: string;
}

export interface LoanDisbursedEvent extends LoanEventBase {
  eventType: 'LoanDisbursed';
  principalAmount: Money;
  disbursementDate: Date;
}

export interface LoanCancelledEvent extends LoanEventBase {
  eventType: 'LoanCancelled';
  reason: string;
}

export interface LoanPaymentMadeEvent extends LoanEventBase {
  eventType: 'LoanPaymentMade';
  paymentAmount: Money;
  previousBalance: Money;
  newBalance: Money;
}

export interface LoanFullyPaidEvent extends LoanEventBase {
  eventType: 'LoanFullyPaid';
}

export type LoanDomainEvent =
  | LoanCreatedEvent
  | LoanApprovedEvent
  | LoanRejectedEvent
  | LoanDisbursedEvent
  | LoanCancelledEvent
  | LoanPaymentMadeEvent
  | LoanFullyPaidEvent;

export type LoanEventType = LoanDomainEvent['eventType'];

/** Anything events can be appended to; usually a plain array owned by the caller. */
export type LoanEventSink = Pick<LoanDomainEvent[], 'push'>;

export function eventMetadata(occurredOn: Date = new Date()): Pick<LoanEventBase, 'eventId' | 'occurredOn'> {
  return { eventId: uuidv4(), occurredOn };
}
