/**
 * Loan lifecycle status constants. Transition rules live in loan-status.ts.
 */
export const LoanStatus = {
  CREATED: 'CREATED',
  PENDING_APPROVAL: 'PENDING_APPROVAL',
  APPROVED: 'APPROVED',
  ACTIVE: 'ACTIVE',
  DISBURSED: 'DISBURSED',
  FULLY_PAID: 'FULLY_PAID',
  DEFAULTED: 'DEFAULTED',
  REJECTED: 'REJECTED',
  CANCELLED: 'CANCELLED',
  RESTRUCTURED: 'RESTRUCTURED',
  WRITTEN_OFF: 'WRITTEN_OFF',
} as const;

export type LoanStatusType = typeof LoanStatus[keyof typeof LoanStatus];

/**
 * Installment status constants
 */
export const InstallmentStatus = {
  PENDING: 'PENDING',
  PARTIALLY_PAID: 'PARTIALLY_PAID',
  PAID: 'PAID',
  OVERDUE: 'OVERDUE',
  CANCELLED: 'CANCELLED',
} as const;

export type InstallmentStatusType = typeof InstallmentStatus[keyof typeof InstallmentStatus];

/**
 * Eligibility decision constants
 */
export const EligibilityDecision = {
  APPROVED: 'APPROVED',
  REJECTED: 'REJECTED',
  CONDITIONAL: 'CONDITIONAL',
  REQUIRES_REVIEW: 'REQUIRES_REVIEW',
} as const;

export type EligibilityDecisionType = typeof EligibilityDecision[keyof typeof EligibilityDecision];

export function isLoanStatus(value: unknown): value is LoanStatusType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LoanStatus, value);
}

export function isInstallmentStatus(value: unknown): value is InstallmentStatusType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(InstallmentStatus, value);
}
