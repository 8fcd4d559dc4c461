import { Decimal } from "decimal.js";
import { isValidAddress } from "./address-validator.js";

export interface Bip21Payment {
  uri: string;
  address: string;
  /** Always denominated in BTC. */
  amount?: Decimal;
  label?: string;
  message?: string;
}

const BIP21_URI = /bitcoin:([A-Za-z0-9]+)(\?[^\s]*)?/i;
const BIP21_AMOUNT = /^\d+(?:\.\d{1,8})?$|^\.\d{1,8}$/;

export function parseBip21(text: string): Bip21Payment | undefined {
  const match = BIP21_URI.exec(text);
  if (!match) return undefined;

  const address = match[1] ?? "";
  if (!isValidAddress(address)) return undefined;

  const payment: Bip21Payment = { uri: match[0], address };
  const query = (match[2] ?? "").slice(1).replace(/[.,;:!?)]+$/, "");
  const params = new URLSearchParams(query);

  const amount = params.get("amount");
  if (amount !== null && BIP21_AMOUNT.test(amount)) {
    const value = new Decimal(amount);
    if (value.greaterThan(0)) payment.amount = value;
  }
  const label = params.get("label");
  if (label) payment.label = label;
  const message = params.get("message");
  if (message) payment.message = message;

  return payment;
}
