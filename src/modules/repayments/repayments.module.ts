import { Module } from '@nestjs/common';
import { LoansModule } from '../loans/loans.module';
import { RepaymentsService } from './repayments.service';

@Module({
  imports: [LoansModule],
  providers: [RepaymentsService],
  exports: [RepaymentsService],
})
export class RepaymentsModule {}
