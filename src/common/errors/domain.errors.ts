import { LoanStatusType } from '../utils/constants/status.constants';

export type LoanDomainErrorKind =
  | 'INVALID_CONSTRUCTION'
  | 'INVALID_STATE_TRANSITION'
  | 'INVALID_PAYMENT'
  | 'DISTRIBUTION_INCONSISTENCY';

export abstract class LoanDomainError extends Error {
  abstract readonly kind: LoanDomainErrorKind;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range input to a value object or factory. */
export class InvalidConstructionError extends LoanDomainError {
  readonly kind = 'INVALID_CONSTRUCTION' as const;

  constructor(message: string) {
    super(message);
  }
}

export class InvalidStateTransitionError extends LoanDomainError {
  readonly kind = 'INVALID_STATE_TRANSITION' as const;

  constructor(
    readonly operation: string,
    readonly currentStatus: LoanStatusType | string,
    message?: string,
  ) {
    super(message ?? `Loan cannot ${operation} in current status: ${currentStatus}`);
  }
}

export class InvalidPaymentError extends LoanDomainError {
  readonly kind = 'INVALID_PAYMENT' as const;

  constructor(message: string) {
    super(message);
  }
}

/**
 * Allocation components do not add up to the payment total.
 * Always a defect in the allocation code, never a caller error.
 */
export class DistributionInconsistencyError extends LoanDomainError {
  readonly kind = 'DISTRIBUTION_INCONSISTENCY' as const;

  constructor(message: string) {
    super(message);
  }
}

export function isLoanDomainError(error: unknown): error is LoanDomainError {
  return error instanceof LoanDomainError;
}
