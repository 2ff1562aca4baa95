import { IsDateString, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class LoanTransitionDto {
  @IsOptional()
  @IsDateString()
  effectiveDate?: string;
}

export class LoanReasonDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  reason!: string;
}
