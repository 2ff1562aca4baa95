import { LoanStatus, LoanStatusType } from '../../../common/utils/constants/status.constants';

export interface LoanStatusRules {
  approve: boolean;
  reject: boolean;
  disburse: boolean;
  cancel: boolean;
  acceptPayments: boolean;
  terminal: boolean;
}

const NONE: LoanStatusRules = {
  approve: false,
  reject: false,
  disburse: false,
  cancel: false,
  acceptPayments: false,
  terminal: false,
};

function assertNever(value: never): never {
  throw new Error(`Unhandled loan status: ${String(value)}`);
}

/**
 * Transition legality for every status. Adding a status to LoanStatus
 * breaks compilation here until its rules are declared.
 */
export function rulesFor(status: LoanStatusType): LoanStatusRules {
  switch (status) {
    case LoanStatus.CREATED:
    case LoanStatus.PENDING_APPROVAL:
      return { ...NONE, approve: true, reject: true, cancel: true };
    case LoanStatus.APPROVED:
      return { ...NONE, disburse: true, cancel: true };
    case LoanStatus.ACTIVE:
    case LoanStatus.DISBURSED:
    case LoanStatus.RESTRUCTURED:
      return { ...NONE, acceptPayments: true };
    case LoanStatus.FULLY_PAID:
    case LoanStatus.DEFAULTED:
    case LoanStatus.REJECTED:
    case LoanStatus.CANCELLED:
    case LoanStatus.WRITTEN_OFF:
      return { ...NONE, terminal: true };
    default:
      return assertNever(status);
  }
}

export const canBeApproved = (status: LoanStatusType) => rulesFor(status).approve;
export const canBeRejected = (status: LoanStatusType) => rulesFor(status).reject;
export const canBeDisbursed = (status: LoanStatusType) => rulesFor(status).disburse;
export const canBeCancelled = (status: LoanStatusType) => rulesFor(status).cancel;
export const canAcceptPayments = (status: LoanStatusType) => rulesFor(status).acceptPayments;
export const isTerminal = (status: LoanStatusType) => rulesFor(status).terminal;
