import { LoanStatus, LoanStatusType } from '../../../common/utils/constants/status.constants';
import {
  canAcceptPayments,
  canBeApproved,
  canBeCancelled,
  canBeDisbursed,
  canBeRejected,
  isTerminal,
} from './loan-status';

const ALL = Object.values(LoanStatus);
const only = (allowed: LoanStatusType[]) => ALL.map((status) => [status, allowed.includes(status)] as const);

describe('loan status rules', () => {
  it.each(only(['CREATED', 'PENDING_APPROVAL']))('approve from %s: %p', (status, expected) => {
    expect(canBeApproved(status)).toBe(expected);
    expect(canBeRejected(status)).toBe(expected);
  });

  it.each(only(['APPROVED']))('disburse from %s: %p', (status, expected) => {
    expect(canBeDisbursed(status)).toBe(expected);
  });

  it.each(only(['CREATED', 'PENDING_APPROVAL', 'APPROVED']))('cancel from %s: %p', (status, expected) => {
    expect(canBeCancelled(status)).toBe(expected);
  });

  it.each(only(['ACTIVE', 'DISBURSED', 'RESTRUCTURED']))('accept payments in %s: %p', (status, expected) => {
    expect(canAcceptPayments(status)).toBe(expected);
  });

  it.each(only(['FULLY_PAID', 'DEFAULTED', 'REJECTED', 'CANCELLED', 'WRITTEN_OFF']))(
    'terminal %s: %p',
    (status, expected) => {
      expect(isTerminal(status)).toBe(expected);
    },
  );

  it('should allow nothing from a terminal status', () => {
    const terminal = ALL.filter(isTerminal);
    for (const status of terminal) {
      expect([
        canBeApproved(status),
        canBeRejected(status),
        canBeDisbursed(status),
        canBeCancelled(status),
        canAcceptPayments(status),
      ]).toEqual([false, false, false, false, false]);
    }
  });
});
