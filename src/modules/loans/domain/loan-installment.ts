import { isAfter, startOfDay } from 'date-fns';
import {
  InvalidConstructionError,
  InvalidPaymentError,
  InvalidStateTransitionError,
} from '../../../common/errors/domain.errors';
import { Money, MoneyJson } from '../../../common/money/money';
import {
  InstallmentStatus,
  InstallmentStatusType,
  isInstallmentStatus,
} from '../../../common/utils/constants/status.constants';

export interface InstallmentSnapshot {
  loanId: string;
  installmentNumber: number;
  amount: MoneyJson;
  paidAmount: MoneyJson;
  dueDate: string;
  paidDate: string | null;
  status: InstallmentStatusType;
}

/** Read-only view handed out by the owning loan. */
export type ReadonlyLoanInstallment = Pick<
  LoanInstallment,
  | 'loanId'
  | 'installmentNumber'
  | 'amount'
  | 'paidAmount'
  | 'dueDate'
  | 'paidDate'
  | 'status'
  | 'remainingAmount'
  | 'isPaid'
  | 'isOverdue'
  | 'toSnapshot'
>;

export function deriveInstallmentStatus(
  amount: Money,
  paidAmount: Money,
  dueDate: Date,
  asOf: Date,
): InstallmentStatusType {
  if (paidAmount.compareTo(amount) >= 0) return InstallmentStatus.PAID;
  if (isAfter(startOfDay(asOf), dueDate)) return InstallmentStatus.OVERDUE;
  if (paidAmount.isPositive()) return InstallmentStatus.PARTIALLY_PAID;
  return InstallmentStatus.PENDING;
}

export class LoanInstallment {
  private constructor(
    readonly loanId: string,
    readonly installmentNumber: number,
    readonly amount: Money,
    private _paidAmount: Money,
    private readonly _dueDate: Date,
    private _paidDate: Date | null,
    private _status: InstallmentStatusType,
  ) {}

  static create(params: {
    loanId: string;
    installmentNumber: number;
    amount: Money;
    dueDate: Date;
  }): LoanInstallment {
    if (!Number.isInteger(params.installmentNumber) || params.installmentNumber < 1) {
      throw new InvalidConstructionError('Installment number must be a positive integer');
    }
    if (!params.amount.isPositive()) {
      throw new InvalidConstructionError('Installment amount must be positive');
    }
    return new LoanInstallment(
      params.loanId,
      params.installmentNumber,
      params.amount,
      Money.zero(params.amount.currency),
      startOfDay(params.dueDate),
      null,
      InstallmentStatus.PENDING,
    );
  }

  static fromSnapshot(snapshot: InstallmentSnapshot): LoanInstallment {
    const amount = Money.fromJSON(snapshot.amount);
    const paidAmount = Money.fromJSON(snapshot.paidAmount);

    if (!Number.isInteger(snapshot.installmentNumber) || snapshot.installmentNumber < 1) {
      throw new InvalidConstructionError('Installment number must be a positive integer');
    }
    if (!isInstallmentStatus(snapshot.status)) {
      throw new InvalidConstructionError(`Unknown installment status: ${String(snapshot.status)}`);
    }
    if (!amount.hasSameCurrency(paidAmount)) {
      throw new InvalidConstructionError('Installment amounts must share one currency');
    }
    if (paidAmount.isNegative() || paidAmount.isGreaterThan(amount)) {
      throw new InvalidConstructionError(
        `Installment ${snapshot.installmentNumber} paid amount must be between 0 and ${amount}`,
      );
    }

    return new LoanInstallment(
      snapshot.loanId,
      snapshot.installmentNumber,
      amount,
      paidAmount,
      new Date(snapshot.dueDate),
      snapshot.paidDate ? new Date(snapshot.paidDate) : null,
      snapshot.status,
    );
  }

  get paidAmount(): Money {
    return this._paidAmount;
  }

  get dueDate(): Date {
    return new Date(this._dueDate);
  }

  get paidDate(): Date | null {
    return this._paidDate ? new Date(this._paidDate) : null;
  }

  get status(): InstallmentStatusType {
    return this._status;
  }

  remainingAmount(): Money {
    return this.amount.subtract(this._paidAmount);
  }

  isPaid(): boolean {
    return this._status === InstallmentStatus.PAID;
  }

  isCancelled(): boolean {
    return this._status === InstallmentStatus.CANCELLED;
  }

  isOverdue(asOf: Date = new Date()): boolean {
    return !this.isPaid() && !this.isCancelled() && isAfter(startOfDay(asOf), this._dueDate);
  }

  /**
   * Applies a (possibly partial) payment. Returns the amount still owed.
   */
  makePayment(amount: Money, paidOn: Date = new Date()): Money {
    if (this.isPaid() || this.isCancelled()) {
      throw new InvalidStateTransitionError(
        'accept installment payments',
        this._status,
        `Installment ${this.installmentNumber} cannot accept payments in status: ${this._status}`,
      );
    }
    if (!amount.hasSameCurrency(this.amount)) {
      throw new InvalidPaymentError(
        `Payment currency ${amount.currency} does not match installment currency ${this.amount.currency}`,
      );
    }
    if (!amount.isPositive()) {
      throw new InvalidPaymentError('Payment amount must be positive');
    }
    const remaining = this.remainingAmount();
    if (amount.isGreaterThan(remaining)) {
      throw new InvalidPaymentError(
        `Payment amount (${amount}) cannot exceed remaining installment amount (${remaining})`,
      );
    }

    this._paidAmount = this._paidAmount.add(amount);
    this._status = deriveInstallmentStatus(this.amount, this._paidAmount, this._dueDate, paidOn);
    if (this._status === InstallmentStatus.PAID) {
      this._paidDate = startOfDay(paidOn);
    }
    return this.remainingAmount();
  }

  /** Re-derives PENDING / PARTIALLY_PAID / OVERDUE for the given day. */
  refreshStatus(asOf: Date = new Date()): InstallmentStatusType {
    if (!this.isCancelled()) {
      this._status = deriveInstallmentStatus(this.amount, this._paidAmount, this._dueDate, asOf);
    }
    return this._status;
  }

  cancel(): void {
    if (this.isPaid()) {
      throw new InvalidStateTransitionError(
        'cancel installment',
        this._status,
        `Installment ${this.installmentNumber} is already paid`,
      );
    }
    this._status = InstallmentStatus.CANCELLED;
  }

  toSnapshot(): InstallmentSnapshot {
    return {
      loanId: this.loanId,
      installmentNumber: this.installmentNumber,
      amount: this.amount.toJSON(),
      paidAmount: this._paidAmount.toJSON(),
      dueDate: this._dueDate.toISOString(),
      paidDate: this._paidDate ? this._paidDate.toISOString() : null,
      status: this._status,
    };
  }
}
