import { InvalidConstructionError } from '../errors/domain.errors';
import { Money } from './money';

describe('Money', () => {
  it('should add and subtract amounts in the same currency', () => {
    const total = Money.of('100.10', 'AED').add(Money.of('0.20', 'AED')).subtract(Money.of('50', 'AED'));
    expect(total.toFixed()).toBe('50.30');
    expect(total.toString()).toBe('AED 50.30');
  });

  it('should reject arithmetic across currencies', () => {
    expect(() => Money.of(1, 'AED').add(Money.of(1, 'USD'))).toThrow(InvalidConstructionError);
  });

  it('should reject malformed currencies and amounts', () => {
    expect(() => Money.of(1, 'aed')).toThrow('Invalid currency code: aed');
    expect(() => Money.of('abc', 'AED')).toThrow('Invalid decimal value: abc');
    expect(() => Money.of(Infinity, 'AED')).toThrow(InvalidConstructionError);
  });

  it('should round half-up to two decimals', () => {
    expect(Money.of('100.005', 'AED').roundToCurrency().toFixed()).toBe('100.01');
    expect(Money.of('100.004', 'AED').roundToCurrency().toFixed()).toBe('100.00');
  });

  it('should keep full precision until rounded', () => {
    const third = Money.of(100, 'AED').divide(3);
    expect(third.amount.toString()).toBe('33.33333333333333333333333333333333');
    expect(third.multiply(3).roundToCurrency().equals(Money.of(100, 'AED'))).toBe(true);
  });

  it('should not divide by zero', () => {
    expect(() => Money.of(1, 'AED').divide(0)).toThrow('Cannot divide money by zero');
  });

  it('should treat zero as neither positive nor negative', () => {
    const zero = Money.zero('AED');
    expect(zero.isZero()).toBe(true);
    expect(zero.isPositive()).toBe(false);
    expect(zero.isNegative()).toBe(false);
  });

  it('should compare amounts', () => {
    const small = Money.of(10, 'AED');
    const large = Money.of(20, 'AED');
    expect(small.isLessThan(large)).toBe(true);
    expect(large.isGreaterThan(small)).toBe(true);
    expect(large.min(small)).toBe(small);
    expect(small.compareTo(Money.of('10.00', 'AED'))).toBe(0);
  });

  it('should serialize amounts as decimal strings', () => {
    const money = Money.of('1234.5', 'AED');
    expect(money.toJSON()).toEqual({ amount: '1234.5', currency: 'AED' });
    expect(Money.fromJSON(money.toJSON()).equals(money)).toBe(true);
  });
});
