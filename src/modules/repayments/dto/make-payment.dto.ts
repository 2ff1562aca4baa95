import {
  IsDateString,
  IsISO4217CurrencyCode,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
} from 'class-validator';

export class MakePaymentDto {
  @IsString()
  @IsNotEmpty()
  loanId!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  /** Defaults to the loan's currency. */
  @IsOptional()
  @IsISO4217CurrencyCode()
  currency?: string;

  @IsOptional()
  @IsDateString()
  paymentDate?: string;
}

export class InstallmentPaymentDto extends MakePaymentDto {
  @IsInt()
  @Min(1)
  installmentNumber!: number;
}
