import {
  EligibilityDecision,
  EligibilityDecisionType,
} from '../../../common/utils/constants/status.constants';

export const ALL_CRITERIA_MET = 'All eligibility criteria met';
export const NO_CHECKS_PERFORMED = 'No eligibility checks performed';

/**
 * Outcome of an underwriting assessment. `approved` is true exactly when the
 * decision is APPROVED or CONDITIONAL.
 */
export class LoanEligibilityResult {
  readonly approved: boolean;

  private constructor(
    readonly decision: EligibilityDecisionType,
    readonly primaryReason: string,
    readonly passedChecks: readonly string[],
    readonly failedChecks: readonly string[],
  ) {
    this.approved =
      decision === EligibilityDecision.APPROVED || decision === EligibilityDecision.CONDITIONAL;
  }

  static approve(passedChecks: readonly string[]): LoanEligibilityResult {
    return new LoanEligibilityResult(EligibilityDecision.APPROVED, ALL_CRITERIA_MET, [...passedChecks], []);
  }

  static reject(
    reason: string,
    passedChecks: readonly string[],
    failedChecks: readonly string[],
  ): LoanEligibilityResult {
    return new LoanEligibilityResult(EligibilityDecision.REJECTED, reason, [...passedChecks], [...failedChecks]);
  }

  static conditionallyApprove(
    condition: string,
    passedChecks: readonly string[],
    failedChecks: readonly string[],
  ): LoanEligibilityResult {
    return new LoanEligibilityResult(
      EligibilityDecision.CONDITIONAL,
      condition,
      [...passedChecks],
      [...failedChecks],
    );
  }

  static refer(
    reason: string,
    passedChecks: readonly string[],
    failedChecks: readonly string[],
  ): LoanEligibilityResult {
    return new LoanEligibilityResult(
      EligibilityDecision.REQUIRES_REVIEW,
      reason,
      [...passedChecks],
      [...failedChecks],
    );
  }

  isApproved(): boolean {
    return this.decision === EligibilityDecision.APPROVED;
  }

  isConditional(): boolean {
    return this.decision === EligibilityDecision.CONDITIONAL;
  }

  isRejected(): boolean {
    return this.decision === EligibilityDecision.REJECTED;
  }

  requiresReview(): boolean {
    return this.decision === EligibilityDecision.REQUIRES_REVIEW;
  }

  toJSON() {
    return {
      approved: this.approved,
      decision: this.decision,
      primaryReason: this.primaryReason,
      passedChecks: [...this.passedChecks],
      failedChecks: [...this.failedChecks],
    };
  }
}
