import { differenceInYears } from 'date-fns';
import { Money } from '../../../common/money/money';

/**
 * Read-only view of a customer, supplied by whichever customer store the
 * host application uses.
 */
export interface Customer {
  readonly customerId: string;
  readonly active: boolean;
  readonly creditScore: number | null;
  readonly dateOfBirth: Date | null;
  readonly monthlyIncome: Money;
  readonly existingMonthlyObligations: Money;
  readonly email: string | null;
  readonly phoneNumber: string | null;
}

export function ageOn(dateOfBirth: Date | null, asOf: Date): number | null {
  if (!dateOfBirth || dateOfBirth > asOf) return null;
  return differenceInYears(asOf, dateOfBirth);
}

export function hasContactDetails(customer: Customer): boolean {
  const filled = (value: string | null) => value !== null && value.trim().length > 0;
  return filled(customer.email) && filled(customer.phoneNumber);
}
