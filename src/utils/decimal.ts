import { Decimal as BaseDecimal } from 'decimal.js';

// All money math goes through this constructor: 50 significant digits, half-up.
export const Decimal = BaseDecimal.clone({
  precision: 50,
  rounding: BaseDecimal.ROUND_HALF_UP,
});
export type Decimal = BaseDecimal;

/** Fractional digits kept when scaling raw chain integers. */
export const SCALED_DP = 18;

export const ZERO: Decimal = new Decimal(0);

export function quantize(value: Decimal, decimals: number): Decimal {
  return value.toDecimalPlaces(decimals, BaseDecimal.ROUND_HALF_UP);
}

export function toPlainString(value: Decimal): string {
  return value.toFixed();
}

export function decimalOrNull(value: string | null | undefined): Decimal | null {
  return value === null || value === undefined ? null : new Decimal(value);
}
