/**
 * Currency Utilities
 *
 * Amounts are integers in minor units (cents for USD). Conversion and
 * display respect each currency's decimal exponent.
 */

/** ISO 4217 codes whose exponent is not 2 */
const NON_DEFAULT_EXPONENTS: Record<string, number> = {
  JPY: 0, KRW: 0, VND: 0, CLP: 0, ISK: 0,
  BHD: 3, KWD: 3, OMR: 3, JOD: 3, TND: 3,
};

/** Minor-unit exponent for a currency; 2 unless listed otherwise. */
export function getCurrencyExponent(currency: string): number {
  return NON_DEFAULT_EXPONENTS[currency.toUpperCase()] ?? 2;
}

/**
 * @example minorToMajor(2999, "USD") → 29.99
 * @example minorToMajor(1000, "JPY") → 1000
 */
export function minorToMajor(amount: number, currency: string): number {
  return amount / Math.pow(10, getCurrencyExponent(currency));
}

/**
 * Format a minor-unit amount for display.
 * @example formatCurrencyDisplay(2999, "USD") → "$29.99"
 * @example formatCurrencyDisplay(1000, "JPY") → "¥1,000"
 */
export function formatCurrencyDisplay(
  amount: number,
  currency: string,
  locale: string = "en-US"
): string {
  const exponent = getCurrencyExponent(currency);
  return new Intl.NumberFormat(locale, {
    style: "currency",
    currency: currency.toUpperCase(),
    minimumFractionDigits: exponent,
    maximumFractionDigits: exponent,
  }).format(minorToMajor(amount, currency));
}

/** Sum of `price × quantity`, the line-item subtotal in minor units. */
export function sumLineItems(
  lineItems: ReadonlyArray<{ price: number; quantity: number }>
): number {
  return lineItems.reduce((sum, item) => sum + item.price * item.quantity, 0);
}
