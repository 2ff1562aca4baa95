import 'reflect-metadata';

export { AppModule } from './app.module';
export { LoanConfigModule } from './config/loan-config.module';
export { LOAN_PRODUCT_CONFIG, LoanProductConfig, loadLoanProductConfig } from './config/loan-product.config';
export * from './common/errors/domain.errors';
export { toHttpException } from './common/errors/domain-error.mapper';
export { Money, MoneyJson, FinancialDecimal } from './common/money/money';
export * from './common/utils/constants/status.constants';
export { InterestRate } from './modules/loans/domain/interest-rate';
export { LoanTerm, LoanTermCategory } from './modules/loans/domain/loan-term';
export * from './modules/loans/domain/loan-status';
export { calculateMonthlyPayment, buildInstallmentPlan } from './modules/loans/domain/amortization';
export { LoanInstallment, InstallmentSnapshot, ReadonlyLoanInstallment } from './modules/loans/domain/loan-installment';
export { PaymentDistribution } from './modules/loans/domain/payment-distribution';
export { PaymentResult, SuccessfulPayment, FailedPayment } from './modules/loans/domain/payment-result';
export * from './modules/loans/domain/loan.events';
export {
  Loan,
  LoanSnapshot,
  CreateLoanProps,
  ProductLimits,
  DEFAULT_PRODUCT_LIMITS,
} from './modules/loans/domain/loan';
export { LoansModule } from './modules/loans/loans.module';
export { LoanService } from './modules/loans/loans.service';
export { LoanCommandRunner } from './modules/loans/loan-command.runner';
export { LoanEventOutbox } from './modules/loans/events/loan-event.outbox';
export { LOAN_REPOSITORY, LoanRepository } from './modules/loans/repositories/loan.repository';
export { InMemoryLoanRepository } from './modules/loans/repositories/in-memory-loan.repository';
export { RepaymentsModule } from './modules/repayments/repayments.module';
export { RepaymentsService } from './modules/repayments/repayments.service';
export { EligibilityModule } from './modules/eligibility/eligibility.module';
export { EligibilityService, LoanApplication, ExternalCheck } from './modules/eligibility/eligibility.service';
export { Customer } from './modules/eligibility/domain/customer';
export { LoanEligibilityChecks } from './modules/eligibility/domain/loan-eligibility-checks';
export { LoanEligibilityResult } from './modules/eligibility/domain/loan-eligibility-result';
