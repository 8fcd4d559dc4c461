import { Decimal } from "decimal.js";

/** Up to 8 decimals, trailing zeros trimmed, never exponent notation. */
export function formatBtc(amount: Decimal): string {
  return amount.toDecimalPlaces(8, Decimal.ROUND_DOWN).toFixed();
}

const FIAT_FORMAT = new Intl.NumberFormat("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });

/** Two decimals with thousands grouping, e.g. "1,234.50". */
export function formatFiat(amount: Decimal.Value): string {
  return FIAT_FORMAT.format(new Decimal(amount).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber());
}

/** First 8 and last 6 characters. */
export function truncateAddress(address: string): string {
  return address.length > 16 ? `${address.slice(0, 8)}…${address.slice(-6)}` : address;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/** Fills `{name}` placeholders; unknown names are left as written. */
export function render(template: string, values: Record<string, string | number>): string {
  return template.replace(PLACEHOLDER, (whole, name: string) => {
    const value = values[name];
    return value === undefined ? whole : String(value);
  });
}
