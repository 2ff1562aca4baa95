import { EligibilityDecision } from '../../../common/utils/constants/status.constants';
import { LoanEligibilityResult } from './loan-eligibility-result';

describe('LoanEligibilityResult', () => {
  it('should treat conditional approval as approved', () => {
    const result = LoanEligibilityResult.conditionallyApprove('Verify contact details', ['Account active'], [
      'Verify contact details',
    ]);

    expect(result.approved).toBe(true);
    expect(result.isConditional()).toBe(true);
    expect(result.isApproved()).toBe(false);
  });

  it('should not approve referred or rejected applications', () => {
    expect(LoanEligibilityResult.refer('Employment not verified', [], ['Employment not verified']).approved).toBe(
      false,
    );
    expect(LoanEligibilityResult.reject('Credit score too low', [], ['Credit score too low']).isRejected()).toBe(true);
  });

  it('should not share check lists with the caller', () => {
    const passed = ['Account active'];
    const result = LoanEligibilityResult.approve(passed);
    passed.push('Injected');

    expect(result.toJSON()).toEqual({
      approved: true,
      decision: EligibilityDecision.APPROVED,
      primaryReason: 'All eligibility criteria met',
      passedChecks: ['Account active'],
      failedChecks: [],
    });
  });
});
