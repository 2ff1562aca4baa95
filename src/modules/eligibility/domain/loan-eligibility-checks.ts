import { LoanEligibilityResult, NO_CHECKS_PERFORMED } from './loan-eligibility-result';

/** Failures mentioning any of these reject the application outright. */
export const REJECTION_KEYWORDS = ['credit score', 'age', 'active', 'income', 'debt-to-income'] as const;

/** Failures mentioning any of these send the application to manual review. */
export const REVIEW_KEYWORDS = ['employment', 'loan', 'amount'] as const;

// Whole words only, plural allowed: 'age' must not match "mortgage" or "percentage".
const keywordPattern = (keywords: readonly string[]) => new RegExp(`\\b(?:${keywords.join('|')})s?\\b`, 'i');

const REJECTION_PATTERN = keywordPattern(REJECTION_KEYWORDS);
const REVIEW_PATTERN = keywordPattern(REVIEW_KEYWORDS);

const mentionsAny = (descriptions: readonly string[], pattern: RegExp) =>
  descriptions.some((description) => pattern.test(description));

/**
 * Collects pass/fail checks in the order they were made and folds them into
 * a decision: rejection keywords beat review keywords, which beat a
 * conditional approval.
 */
export class LoanEligibilityChecks {
  private readonly passed: string[] = [];
  private readonly failed: string[] = [];

  addPassedCheck(description: string): this {
    this.passed.push(description);
    return this;
  }

  addFailedCheck(description: string): this {
    this.failed.push(description);
    return this;
  }

  record(passed: boolean, description: string): this {
    return passed ? this.addPassedCheck(description) : this.addFailedCheck(description);
  }

  get passedChecks(): readonly string[] {
    return this.passed;
  }

  get failedChecks(): readonly string[] {
    return this.failed;
  }

  hasChecks(): boolean {
    return this.passed.length + this.failed.length > 0;
  }

  evaluate(): LoanEligibilityResult {
    if (!this.hasChecks()) {
      return LoanEligibilityResult.refer(NO_CHECKS_PERFORMED, [], []);
    }

    const [firstFailure] = this.failed;
    if (firstFailure === undefined) {
      return LoanEligibilityResult.approve(this.passed);
    }
    if (mentionsAny(this.failed, REJECTION_PATTERN)) {
      return LoanEligibilityResult.reject(firstFailure, this.passed, this.failed);
    }
    if (mentionsAny(this.failed, REVIEW_PATTERN)) {
      return LoanEligibilityResult.refer(firstFailure, this.passed, this.failed);
    }
    return LoanEligibilityResult.conditionallyApprove(firstFailure, this.passed, this.failed);
  }
}
