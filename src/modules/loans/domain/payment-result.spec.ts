import { DistributionInconsistencyError } from '../../../common/errors/domain.errors';
import { Money } from '../../../common/money/money';
import { LoanStatus } from '../../../common/utils/constants/status.constants';
import { PaymentDistribution } from './payment-distribution';
import { PaymentResult } from './payment-result';

const aed = (amount: number) => Money.of(amount, 'AED');

describe('PaymentResult', () => {
  const distribution = PaymentDistribution.principalOnly(aed(400), aed(400), new Date(2024, 0, 1));

  it('should report a fully paid loan', () => {
    const result = PaymentResult.success({
      paymentId: 'pay-1',
      loanId: 'loan-1',
      distribution,
      newOutstandingBalance: aed(0),
      loanStatus: LoanStatus.FULLY_PAID,
      processedAt: new Date(2024, 0, 1),
    });

    expect(result.success).toBe(true);
    expect(result.isSuccess()).toBe(true);
    expect(result.isLoanFullyPaid()).toBe(true);
  });

  it('should reject a balance that disagrees with the distribution', () => {
    expect(() =>
      PaymentResult.success({
        paymentId: 'pay-1',
        loanId: 'loan-1',
        distribution,
        newOutstandingBalance: aed(1),
        loanStatus: LoanStatus.DISBURSED,
        processedAt: new Date(2024, 0, 1),
      }),
    ).toThrow(DistributionInconsistencyError);
  });

  it('should carry only the message on failure', () => {
    const result: PaymentResult = PaymentResult.failure('Loan is closed', 'loan-1');

    expect(result.isSuccess()).toBe(false);
    expect(result.isLoanFullyPaid()).toBe(false);
    if (!result.success) {
      expect(result.errorMessage).toBe('Loan is closed');
      expect(result.loanId).toBe('loan-1');
    }
  });
});
