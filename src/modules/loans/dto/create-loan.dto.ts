import {
  IsBoolean,
  IsDateString,
  IsISO4217CurrencyCode,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class CreateLoanDto {
  @IsString()
  @IsNotEmpty()
  customerId!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  principalAmount!: number;

  /** Annual rate as a percentage, e.g. 6 for 6%. */
  @IsNumber({ maxDecimalPlaces: 4 })
  @Min(0)
  @Max(100)
  annualInterestRate!: number;

  @IsInt()
  @Min(1)
  @Max(600)
  termMonths!: number;

  @IsOptional()
  @IsISO4217CurrencyCode()
  currency?: string;

  @IsOptional()
  @IsDateString()
  applicationDate?: string;

  /** Generate the installment schedule at creation, enforcing product limits. */
  @IsOptional()
  @IsBoolean()
  withSchedule?: boolean;
}
