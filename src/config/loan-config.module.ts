import { Global, Module } from '@nestjs/common';
import { LOAN_PRODUCT_CONFIG, loadLoanProductConfig } from './loan-product.config';

@Global()
@Module({
  providers: [{ provide: LOAN_PRODUCT_CONFIG, useFactory: () => loadLoanProductConfig() }],
  exports: [LOAN_PRODUCT_CONFIG],
})
export class LoanConfigModule {}
