import { Module } from '@nestjs/common';
import { LoggingModule } from './common/logging/logging.module';
import { LoanConfigModule } from './config/loan-config.module';
import { EligibilityModule } from './modules/eligibility/eligibility.module';
import { LoansModule } from './modules/loans/loans.module';
import { RepaymentsModule } from './modules/repayments/repayments.module';

@Module({
  imports: [LoanConfigModule, LoggingModule, EligibilityModule, LoansModule, RepaymentsModule],
})
export class AppModule {}
