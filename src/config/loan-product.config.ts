import { plainToInstance, Type } from 'class-transformer';
import {
  IsISO4217CurrencyCode,
  IsInt,
  IsNumber,
  IsPositive,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ProductLimits } from '../modules/loans/domain/loan';

export const LOAN_PRODUCT_CONFIG = Symbol('LOAN_PRODUCT_CONFIG');

export class LoanProductConfig {
  @IsISO4217CurrencyCode()
  defaultCurrency: string = 'AED';

  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  minPrincipal: number = 1000;

  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  maxPrincipal: number = 500000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(600)
  minTermMonths: number = 6;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(600)
  maxTermMonths: number = 60;

  @Type(() => Number)
  @IsInt()
  @Min(300)
  @Max(900)
  minCreditScore: number = 600;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  minApplicantAge: number = 18;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  @Max(1)
  maxDebtToIncome: number = 0.43;

  get productLimits(): ProductLimits {
    return {
      minPrincipal: this.minPrincipal,
      maxPrincipal: this.maxPrincipal,
      minTermMonths: this.minTermMonths,
      maxTermMonths: this.maxTermMonths,
    };
  }
}

const ENV_KEYS: Record<string, keyof LoanProductConfig> = {
  LOAN_DEFAULT_CURRENCY: 'defaultCurrency',
  LOAN_MIN_PRINCIPAL: 'minPrincipal',
  LOAN_MAX_PRINCIPAL: 'maxPrincipal',
  LOAN_MIN_TERM_MONTHS: 'minTermMonths',
  LOAN_MAX_TERM_MONTHS: 'maxTermMonths',
  ELIGIBILITY_MIN_CREDIT_SCORE: 'minCreditScore',
  ELIGIBILITY_MIN_AGE: 'minApplicantAge',
  ELIGIBILITY_MAX_DEBT_TO_INCOME: 'maxDebtToIncome',
};

/**
 * Reads product settings from the environment. Unset variables keep their
 * defaults; invalid ones throw at startup.
 */
export function loadLoanProductConfig(env: NodeJS.ProcessEnv = process.env): LoanProductConfig {
  const raw: Record<string, string> = {};
  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  const config = plainToInstance(LoanProductConfig, raw);
  const errors = validateSync(config);
  if (errors.length > 0) {
    const messages = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new Error(`Invalid loan product configuration: ${messages.join('; ')}`);
  }
  if (config.minPrincipal > config.maxPrincipal) {
    throw new Error('Invalid loan product configuration: minPrincipal exceeds maxPrincipal');
  }
  if (config.minTermMonths > config.maxTermMonths) {
    throw new Error('Invalid loan product configuration: minTermMonths exceeds maxTermMonths');
  }
  return config;
}
