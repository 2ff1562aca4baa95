import { addMonths, isAfter, startOfDay } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import {
  InvalidConstructionError,
  InvalidPaymentError,
  InvalidStateTransitionError,
} from '../../../common/errors/domain.errors';
import { Money, MoneyJson } from '../../../common/money/money';
import {
  InstallmentStatus,
  LoanStatus,
  LoanStatusType,
  isLoanStatus,
} from '../../../common/utils/constants/status.constants';
import { buildInstallmentPlan, calculateMonthlyPayment } from './amortization';
import { InterestRate } from './interest-rate';
import { InstallmentSnapshot, LoanInstallment, ReadonlyLoanInstallment } from './loan-installment';
import {
  canAcceptPayments,
  canBeApproved,
  canBeCancelled,
  canBeDisbursed,
  canBeRejected,
  isTerminal,
} from './loan-status';
import { LoanTerm } from './loan-term';
import { LoanEventSink, eventMetadata } from './loan.events';
import { PaymentDistribution } from './payment-distribution';
import { PaymentResult, SuccessfulPayment } from './payment-result';

export interface ProductLimits {
  minPrincipal: number;
  maxPrincipal: number;
  minTermMonths: number;
  maxTermMonths: number;
}

export const DEFAULT_PRODUCT_LIMITS: Readonly<ProductLimits> = {
  minPrincipal: 1000,
  maxPrincipal: 500000,
  minTermMonths: 6,
  maxTermMonths: 60,
};

export interface CreateLoanProps {
  loanId?: string;
  customerId: string;
  principalAmount: Money;
  interestRate: InterestRate;
  loanTerm: LoanTerm;
  applicationDate?: Date;
}

export interface LoanSnapshot {
  loanId: string;
  customerId: string;
  principalAmount: MoneyJson;
  interestRate: string;
  termMonths: number;
  status: LoanStatusType;
  outstandingBalance: MoneyJson;
  applicationDate: string;
  approvalDate: string | null;
  disbursementDate: string | null;
  maturityDate: string | null;
  installments: InstallmentSnapshot[];
  version: number;
}

interface LoanState {
  status: LoanStatusType;
  outstandingBalance: Money;
  approvalDate: Date | null;
  disbursementDate: Date | null;
  maturityDate: Date | null;
  installments: LoanInstallment[];
  version: number;
}

const toIso = (date: Date | null) => (date ? date.toISOString() : null);
const fromIso = (value: string | null) => (value ? new Date(value) : null);
const copyDate = (date: Date | null) => (date ? new Date(date) : null);

export function assertWithinProductLimits(
  principal: Money,
  term: LoanTerm,
  limits: ProductLimits = DEFAULT_PRODUCT_LIMITS,
): void {
  if (principal.amount.lessThan(limits.minPrincipal) || principal.amount.greaterThan(limits.maxPrincipal)) {
    throw new InvalidConstructionError(
      `Loan amount ${principal} is outside product limits ${limits.minPrincipal} - ${limits.maxPrincipal}`,
    );
  }
  if (term.months < limits.minTermMonths || term.months > limits.maxTermMonths) {
    throw new InvalidConstructionError(
      `Loan term ${term.months} months is outside product limits ${limits.minTermMonths}-${limits.maxTermMonths}`,
    );
  }
}

/**
 * Aggregate root for one loan: owns the status machine, the outstanding
 * balance and the installment schedule.
 *
 * Every command validates first and mutates after, so a thrown error leaves
 * the loan untouched. Events are appended to the sink the caller passes in.
 */
export class Loan {
  private constructor(
    readonly loanId: string,
    readonly customerId: string,
    readonly principalAmount: Money,
    readonly interestRate: InterestRate,
    readonly loanTerm: LoanTerm,
    private readonly _applicationDate: Date,
    private state: LoanState,
  ) {}

  static create(props: CreateLoanProps, events: LoanEventSink): Loan {
    if (!props.customerId || props.customerId.trim().length === 0) {
      throw new InvalidConstructionError('Customer id is required');
    }
    if (!props.principalAmount.isPositive()) {
      throw new InvalidConstructionError('Principal amount must be positive');
    }

    const loan = new Loan(
      props.loanId ?? uuidv4(),
      props.customerId,
      props.principalAmount,
      props.interestRate,
      props.loanTerm,
      startOfDay(props.applicationDate ?? new Date()),
      {
        status: LoanStatus.CREATED,
        outstandingBalance: props.principalAmount,
        approvalDate: null,
        disbursementDate: null,
        maturityDate: null,
        installments: [],
        version: 0,
      },
    );

    events.push({
      ...eventMetadata(),
      eventType: 'LoanCreated',
      loanId: loan.loanId,
      customerId: loan.customerId,
      principalAmount: loan.principalAmount,
    });
    return loan;
  }

  /** Product limits are checked before anything is created or emitted. */
  static createWithInstallments(
    props: CreateLoanProps,
    events: LoanEventSink,
    limits: ProductLimits = DEFAULT_PRODUCT_LIMITS,
  ): Loan {
    assertWithinProductLimits(props.principalAmount, props.loanTerm, limits);
    const loan = Loan.create(props, events);
    loan.generateInstallments(limits);
    return loan;
  }

  static fromSnapshot(snapshot: LoanSnapshot): Loan {
    if (!isLoanStatus(snapshot.status)) {
      throw new InvalidConstructionError(`Unknown loan status: ${String(snapshot.status)}`);
    }
    if (!Number.isInteger(snapshot.version) || snapshot.version < 0) {
      throw new InvalidConstructionError('Loan version must be a non-negative integer');
    }

    const principal = Money.fromJSON(snapshot.principalAmount);
    const balance = Money.fromJSON(snapshot.outstandingBalance);
    if (!principal.isPositive()) {
      throw new InvalidConstructionError('Principal amount must be positive');
    }
    if (balance.isNegative() || balance.isGreaterThan(principal)) {
      throw new InvalidConstructionError(
        `Outstanding balance ${balance} must be between 0 and principal ${principal}`,
      );
    }

    const installments = snapshot.installments.map((i) => {
      if (i.loanId !== snapshot.loanId) {
        throw new InvalidConstructionError(
          `Installment ${i.installmentNumber} belongs to loan ${i.loanId}, not ${snapshot.loanId}`,
        );
      }
      return LoanInstallment.fromSnapshot(i);
    });

    return new Loan(
      snapshot.loanId,
      snapshot.customerId,
      principal,
      InterestRate.of(snapshot.interestRate),
      LoanTerm.ofMonths(snapshot.termMonths),
      new Date(snapshot.applicationDate),
      {
        status: snapshot.status,
        outstandingBalance: balance,
        approvalDate: fromIso(snapshot.approvalDate),
        disbursementDate: fromIso(snapshot.disbursementDate),
        maturityDate: fromIso(snapshot.maturityDate),
        installments,
        version: snapshot.version,
      },
    );
  }

  get status(): LoanStatusType {
    return this.state.status;
  }

  get outstandingBalance(): Money {
    return this.state.outstandingBalance;
  }

  // Dates are handed out as copies so callers cannot rewrite them.
  get applicationDate(): Date {
    return new Date(this._applicationDate);
  }

  get approvalDate(): Date | null {
    return copyDate(this.state.approvalDate);
  }

  get disbursementDate(): Date | null {
    return copyDate(this.state.disbursementDate);
  }

  get maturityDate(): Date | null {
    return copyDate(this.state.maturityDate);
  }

  get version(): number {
    return this.state.version;
  }

  get installments(): readonly ReadonlyLoanInstallment[] {
    return this.state.installments;
  }

  approve(events: LoanEventSink, approvedOn: Date = new Date()): void {
    this.assertAllowed(canBeApproved(this.status), 'be approved');

    this.state.status = LoanStatus.APPROVED;
    this.state.approvalDate = startOfDay(approvedOn);
    this.touch();

    events.push({
      ...eventMetadata(),
      eventType: 'LoanApproved',
      loanId: this.loanId,
      customerId: this.customerId,
      principalAmount: this.principalAmount,
    });
  }

  reject(reason: string, events: LoanEventSink): void {
    this.assertAllowed(canBeRejected(this.status), 'be rejected');

    this.state.status = LoanStatus.REJECTED;
    this.touch();

    events.push({
      ...eventMetadata(),
      eventType: 'LoanRejected',
      loanId: this.loanId,
      customerId: this.customerId,
      reason,
    });
  }

  disburse(events: LoanEventSink, disbursedOn: Date = new Date()): void {
    this.assertAllowed(canBeDisbursed(this.status), 'be disbursed');

    const disbursementDate = startOfDay(disbursedOn);
    this.state.status = LoanStatus.DISBURSED;
    this.state.disbursementDate = disbursementDate;
    this.state.maturityDate = addMonths(disbursementDate, this.loanTerm.months);
    this.touch();

    events.push({
      ...eventMetadata(),
      eventType: 'LoanDisbursed',
      loanId: this.loanId,
      customerId: this.customerId,
      principalAmount: this.principalAmount,
      disbursementDate: new Date(disbursementDate),
    });
  }

  /** Cancels the loan and every installment not yet paid. */
  cancel(reason: string, events: LoanEventSink): void {
    this.assertAllowed(canBeCancelled(this.status), 'be cancelled');

    this.state.status = LoanStatus.CANCELLED;
    for (const installment of this.state.installments) {
      if (!installment.isPaid()) installment.cancel();
    }
    this.touch();

    events.push({
      ...eventMetadata(),
      eventType: 'LoanCancelled',
      loanId: this.loanId,
      customerId: this.customerId,
      reason,
    });
  }

  generateInstallments(limits: ProductLimits = DEFAULT_PRODUCT_LIMITS): readonly ReadonlyLoanInstallment[] {
    if (isTerminal(this.status)) {
      throw new InvalidStateTransitionError('generate installments', this.status);
    }
    if (this.state.installments.length > 0) {
      throw new InvalidStateTransitionError(
        'generate installments',
        this.status,
        `Installment schedule already generated for loan ${this.loanId}`,
      );
    }
    assertWithinProductLimits(this.principalAmount, this.loanTerm, limits);

    const plan = buildInstallmentPlan(this.calculateMonthlyPayment(), this.loanTerm, this._applicationDate);
    this.state.installments = plan.map((line) =>
      LoanInstallment.create({ loanId: this.loanId, ...line }),
    );
    this.touch();
    return this.installments;
  }

  makePayment(
    amount: Money,
    events: LoanEventSink,
    paymentDate: Date = new Date(),
  ): SuccessfulPayment {
    this.assertAllowed(canAcceptPayments(this.status), 'accept payments');
    if (!amount.hasSameCurrency(this.principalAmount)) {
      throw new InvalidPaymentError(
        `Payment currency ${amount.currency} does not match loan currency ${this.principalAmount.currency}`,
      );
    }
    if (!amount.isPositive()) {
      throw new InvalidPaymentError('Payment amount must be positive');
    }
    const previousBalance = this.state.outstandingBalance;
    if (amount.isGreaterThan(previousBalance)) {
      throw new InvalidPaymentError(
        `Payment amount (${amount}) cannot exceed outstanding balance (${previousBalance})`,
      );
    }

    const processedAt = startOfDay(paymentDate);
    const distribution = PaymentDistribution.principalOnly(amount, previousBalance, processedAt);
    const newBalance = distribution.balanceAfterPayment();
    const becameFullyPaid = newBalance.isZero();
    const newStatus = becameFullyPaid ? LoanStatus.FULLY_PAID : this.status;
    const result = PaymentResult.success({
      paymentId: uuidv4(),
      loanId: this.loanId,
      distribution,
      newOutstandingBalance: newBalance,
      loanStatus: newStatus,
      processedAt,
    });

    this.state.outstandingBalance = newBalance;
    this.state.status = newStatus;
    this.touch();

    events.push({
      ...eventMetadata(),
      eventType: 'LoanPaymentMade',
      loanId: this.loanId,
      customerId: this.customerId,
      paymentAmount: amount,
      previousBalance,
      newBalance,
    });
    if (becameFullyPaid) {
      events.push({
        ...eventMetadata(),
        eventType: 'LoanFullyPaid',
        loanId: this.loanId,
        customerId: this.customerId,
      });
    }
    return result;
  }

  /**
   * Pays against one installment. The aggregate balance is not touched;
   * balance reduction goes through makePayment.
   */
  payInstallment(
    installmentNumber: number,
    amount: Money,
    paidOn: Date = new Date(),
  ): ReadonlyLoanInstallment {
    this.assertAllowed(canAcceptPayments(this.status), 'accept installment payments');
    const installment = this.state.installments.find((i) => i.installmentNumber === installmentNumber);
    if (!installment) {
      throw new InvalidPaymentError(`Installment ${installmentNumber} not found on loan ${this.loanId}`);
    }

    installment.makePayment(amount, paidOn);
    this.touch();
    return installment;
  }

  /** Re-derives installment statuses for `asOf`; returns how many are overdue. */
  markOverdueInstallments(asOf: Date = new Date()): number {
    let overdue = 0;
    let changed = false;
    for (const installment of this.state.installments) {
      const previous = installment.status;
      const current = installment.refreshStatus(asOf);
      if (current !== previous) changed = true;
      if (current === InstallmentStatus.OVERDUE) overdue += 1;
    }
    if (changed) this.touch();
    return overdue;
  }

  calculateMonthlyPayment(): Money {
    return calculateMonthlyPayment(this.principalAmount, this.interestRate, this.loanTerm);
  }

  isOverdue(asOf: Date = new Date()): boolean {
    const maturity = this.state.maturityDate;
    return (
      maturity !== null &&
      isAfter(startOfDay(asOf), maturity) &&
      this.state.outstandingBalance.isPositive()
    );
  }

  getTotalInstallmentAmount(): Money {
    return this.sumInstallments((i) => i.amount);
  }

  /** Scheduled installments minus principal; zero before generation. */
  getTotalInterest(): Money {
    if (this.state.installments.length === 0) return Money.zero(this.principalAmount.currency);
    return this.getTotalInstallmentAmount().subtract(this.principalAmount);
  }

  getRemainingInstallmentAmount(): Money {
    return this.sumInstallments((i) => (i.isCancelled() ? Money.zero(i.amount.currency) : i.remainingAmount()));
  }

  getRemainingInstallmentCount(): number {
    return this.state.installments.filter((i) => !i.isPaid() && !i.isCancelled()).length;
  }

  isScheduleFullyPaid(): boolean {
    return this.state.installments.length > 0 && this.state.installments.every((i) => i.isPaid());
  }

  getOverdueInstallments(asOf: Date = new Date()): ReadonlyLoanInstallment[] {
    return this.state.installments.filter((i) => i.isOverdue(asOf));
  }

  toSnapshot(): LoanSnapshot {
    return {
      loanId: this.loanId,
      customerId: this.customerId,
      principalAmount: this.principalAmount.toJSON(),
      interestRate: this.interestRate.toJSON(),
      termMonths: this.loanTerm.months,
      status: this.state.status,
      outstandingBalance: this.state.outstandingBalance.toJSON(),
      applicationDate: this._applicationDate.toISOString(),
      approvalDate: toIso(this.state.approvalDate),
      disbursementDate: toIso(this.state.disbursementDate),
      maturityDate: toIso(this.state.maturityDate),
      installments: this.state.installments.map((i) => i.toSnapshot()),
      version: this.state.version,
    };
  }

  private sumInstallments(pick: (installment: LoanInstallment) => Money): Money {
    return this.state.installments.reduce(
      (total, installment) => total.add(pick(installment)),
      Money.zero(this.principalAmount.currency),
    );
  }

  private assertAllowed(allowed: boolean, operation: string) {
    if (!allowed) {
      throw new InvalidStateTransitionError(operation, this.status);
    }
  }

  private touch() {
    this.state.version += 1;
  }
}
