import {
  InvalidConstructionError,
  InvalidPaymentError,
  InvalidStateTransitionError,
} from '../../../common/errors/domain.errors';
import { Money } from '../../../common/money/money';
import { InstallmentStatus } from '../../../common/utils/constants/status.constants';
import { LoanInstallment, deriveInstallmentStatus } from './loan-installment';

const aed = (amount: string | number) => Money.of(amount, 'AED');
const DUE = new Date(2024, 2, 15);

describe('LoanInstallment', () => {
  let installment: LoanInstallment;

  beforeEach(() => {
    installment = LoanInstallment.create({
      loanId: 'loan-1',
      installmentNumber: 1,
      amount: aed(500),
      dueDate: DUE,
    });
  });

  it('should start pending with nothing paid', () => {
    expect(installment.status).toBe(InstallmentStatus.PENDING);
    expect(installment.paidAmount.isZero()).toBe(true);
    expect(installment.remainingAmount().equals(aed(500))).toBe(true);
    expect(installment.paidDate).toBeNull();
  });

  it('should reject invalid numbers and amounts', () => {
    expect(() =>
      LoanInstallment.create({ loanId: 'loan-1', installmentNumber: 0, amount: aed(1), dueDate: DUE }),
    ).toThrow(InvalidConstructionError);
    expect(() =>
      LoanInstallment.create({ loanId: 'loan-1', installmentNumber: 1, amount: aed(0), dueDate: DUE }),
    ).toThrow('Installment amount must be positive');
  });

  it('should track partial then full payment', () => {
    const remaining = installment.makePayment(aed(200), new Date(2024, 2, 1));
    expect(remaining.toFixed()).toBe('300.00');
    expect(installment.status).toBe(InstallmentStatus.PARTIALLY_PAID);

    installment.makePayment(aed(300), new Date(2024, 2, 10));
    expect(installment.isPaid()).toBe(true);
    expect(installment.paidDate).toEqual(new Date(2024, 2, 10));
    expect(installment.remainingAmount().isZero()).toBe(true);
  });

  it('should not accept more than the remaining amount', () => {
    installment.makePayment(aed(450));
    expect(() => installment.makePayment(aed('50.01'))).toThrow(InvalidPaymentError);
    expect(installment.paidAmount.toFixed()).toBe('450.00');
  });

  it('should reject non-positive and foreign-currency payments', () => {
    expect(() => installment.makePayment(aed(0))).toThrow('Payment amount must be positive');
    expect(() => installment.makePayment(Money.of(10, 'USD'))).toThrow(InvalidPaymentError);
  });

  it('should reject payments once paid or cancelled', () => {
    installment.makePayment(aed(500));
    expect(() => installment.makePayment(aed(1))).toThrow(InvalidStateTransitionError);

    const other = LoanInstallment.create({ loanId: 'loan-1', installmentNumber: 2, amount: aed(500), dueDate: DUE });
    other.cancel();
    expect(() => other.makePayment(aed(1))).toThrow(InvalidStateTransitionError);
  });

  it('should become overdue after the due date', () => {
    expect(installment.isOverdue(DUE)).toBe(false);
    expect(installment.isOverdue(new Date(2024, 2, 16))).toBe(true);
    expect(installment.refreshStatus(new Date(2024, 2, 16))).toBe(InstallmentStatus.OVERDUE);
  });

  it('should keep cancelled status on refresh', () => {
    installment.cancel();
    expect(installment.refreshStatus(new Date(2030, 0, 1))).toBe(InstallmentStatus.CANCELLED);
    expect(installment.isOverdue(new Date(2030, 0, 1))).toBe(false);
  });

  it('should not cancel a paid installment', () => {
    installment.makePayment(aed(500));
    expect(() => installment.cancel()).toThrow('Installment 1 is already paid');
  });

  it('should round-trip through a snapshot', () => {
    installment.makePayment(aed('123.45'), new Date(2024, 2, 1));
    const snapshot = installment.toSnapshot();

    expect(LoanInstallment.fromSnapshot(snapshot).toSnapshot()).toEqual(snapshot);
  });

  it('should reject snapshots paid beyond the amount', () => {
    const snapshot = { ...installment.toSnapshot(), paidAmount: { amount: '500.01', currency: 'AED' } };
    expect(() => LoanInstallment.fromSnapshot(snapshot)).toThrow(InvalidConstructionError);
  });
});

describe('deriveInstallmentStatus', () => {
  it('should prefer PAID, then OVERDUE, then PARTIALLY_PAID', () => {
    const late = new Date(2024, 3, 1);
    expect(deriveInstallmentStatus(aed(10), aed(10), DUE, late)).toBe(InstallmentStatus.PAID);
    expect(deriveInstallmentStatus(aed(10), aed(5), DUE, late)).toBe(InstallmentStatus.OVERDUE);
    expect(deriveInstallmentStatus(aed(10), aed(5), DUE, DUE)).toBe(InstallmentStatus.PARTIALLY_PAID);
    expect(deriveInstallmentStatus(aed(10), aed(0), DUE, DUE)).toBe(InstallmentStatus.PENDING);
  });
});
