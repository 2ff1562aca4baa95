import { Inject, Injectable } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import { startOfDay } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { Money, toDecimal } from '../../common/money/money';
import { LOAN_PRODUCT_CONFIG, LoanProductConfig } from '../../config/loan-product.config';
import { calculateMonthlyPayment } from '../loans/domain/amortization';
import { InterestRate } from '../loans/domain/interest-rate';
import { LoanTerm } from '../loans/domain/loan-term';
import { Customer, ageOn, hasContactDetails } from './domain/customer';
import { LoanEligibilityChecks } from './domain/loan-eligibility-checks';
import { LoanEligibilityResult } from './domain/loan-eligibility-result';

export interface LoanApplication {
  principalAmount: Money;
  interestRate: InterestRate;
  loanTerm: LoanTerm;
}

/** A check decided outside this service, e.g. employment verification. */
export interface ExternalCheck {
  passed: boolean;
  description: string;
}

const RATIO_SCALE = 4;

const asPercentage = (ratio: Decimal.Value) => `${toDecimal(ratio).times(100).toFixed(2)}%`;

@Injectable()
export class EligibilityService {
  constructor(
    @Inject(LOAN_PRODUCT_CONFIG) private readonly config: LoanProductConfig,
    private readonly structuredLogger: StructuredLoggerService,
  ) {}

  /**
   * Runs the underwriting rules in a fixed order, appends any external
   * checks, then folds everything into a single decision.
   */
  assess(
    customer: Customer,
    application: LoanApplication,
    asOf: Date = new Date(),
    externalChecks: readonly ExternalCheck[] = [],
  ): LoanEligibilityResult {
    const checks = new LoanEligibilityChecks();
    const today = startOfDay(asOf);

    checks.record(
      customer.active,
      customer.active ? 'Customer account is active' : 'Customer account is not active',
    );
    this.checkAge(checks, customer, today);
    this.checkCreditScore(checks, customer);
    this.checkAffordability(checks, customer, application);
    this.checkProductLimits(checks, application);
    checks.record(
      hasContactDetails(customer),
      hasContactDetails(customer) ? 'Contact details on file' : 'Contact details incomplete',
    );
    for (const external of externalChecks) {
      checks.record(external.passed, external.description);
    }

    const result = checks.evaluate();
    this.structuredLogger.info({
      service: 'eligibility',
      operation: 'ELIGIBILITY_ASSESS',
      transactionId: `elig_${uuidv4()}`,
      metadata: {
        customerId: customer.customerId,
        decision: result.decision,
        primaryReason: result.primaryReason,
        failedChecks: result.failedChecks,
      },
    });
    return result;
  }

  private checkAge(checks: LoanEligibilityChecks, customer: Customer, today: Date) {
    const age = ageOn(customer.dateOfBirth, today);
    const minAge = this.config.minApplicantAge;
    if (age === null) {
      checks.addFailedCheck('Applicant age could not be determined');
    } else if (age >= minAge) {
      checks.addPassedCheck(`Applicant age ${age} meets minimum ${minAge}`);
    } else {
      checks.addFailedCheck(`Applicant age ${age} is below minimum ${minAge}`);
    }
  }

  private checkCreditScore(checks: LoanEligibilityChecks, customer: Customer) {
    const minScore = this.config.minCreditScore;
    if (customer.creditScore === null) {
      checks.addFailedCheck('Credit score unavailable');
    } else if (customer.creditScore >= minScore) {
      checks.addPassedCheck(`Credit score ${customer.creditScore} meets minimum ${minScore}`);
    } else {
      checks.addFailedCheck(`Credit score ${customer.creditScore} is below minimum ${minScore}`);
    }
  }

  /** Income first; the debt-to-income ratio needs a positive income in the loan's currency. */
  private checkAffordability(checks: LoanEligibilityChecks, customer: Customer, application: LoanApplication) {
    const income = customer.monthlyIncome;
    if (!income.isPositive()) {
      checks.addFailedCheck('Monthly income must be positive');
      return;
    }
    checks.addPassedCheck(`Monthly income ${income} verified`);

    const payment = calculateMonthlyPayment(
      application.principalAmount,
      application.interestRate,
      application.loanTerm,
    );
    const obligations = customer.existingMonthlyObligations;
    const foreign = [
      { label: 'income', money: income },
      { label: 'obligations', money: obligations },
    ].find(({ money }) => !money.hasSameCurrency(payment));
    if (foreign) {
      checks.addFailedCheck(
        `Debt-to-income ratio unavailable: ${foreign.label} currency ${foreign.money.currency} does not match loan currency ${payment.currency}`,
      );
      return;
    }

    const ratio = obligations
      .add(payment)
      .amount.dividedBy(income.amount)
      .toDecimalPlaces(RATIO_SCALE, Decimal.ROUND_HALF_UP);
    const max = this.config.maxDebtToIncome;

    checks.record(
      ratio.lessThanOrEqualTo(max),
      ratio.lessThanOrEqualTo(max)
        ? `Debt-to-income ratio ${asPercentage(ratio)} within maximum ${asPercentage(max)}`
        : `Debt-to-income ratio ${asPercentage(ratio)} exceeds maximum ${asPercentage(max)}`,
    );
  }

  private checkProductLimits(checks: LoanEligibilityChecks, application: LoanApplication) {
    const { minPrincipal, maxPrincipal, minTermMonths, maxTermMonths } = this.config;
    const amount = application.principalAmount;
    const amountOk = amount.amount.greaterThanOrEqualTo(minPrincipal) && amount.amount.lessThanOrEqualTo(maxPrincipal);
    checks.record(
      amountOk,
      amountOk
        ? `Requested amount ${amount} within product limits`
        : `Requested amount ${amount} is outside product limits ${minPrincipal} - ${maxPrincipal}`,
    );

    const months = application.loanTerm.months;
    const termOk = months >= minTermMonths && months <= maxTermMonths;
    checks.record(
      termOk,
      termOk
        ? `Loan term ${months} months within product limits`
        : `Loan term ${months} months outside product limits ${minTermMonths}-${maxTermMonths}`,
    );
  }
}
