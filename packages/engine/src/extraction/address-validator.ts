export type AddressNetwork = "mainnet" | "testnet";

export type AddressKind = "p2pkh" | "p2sh" | "p2wpkh" | "p2wsh" | "p2tr";

export interface AddressInfo {
  address: string;
  network: AddressNetwork;
  kind: AddressKind;
}

const BASE58 = /^[1-9A-HJ-NP-Za-km-z]+$/;
const BECH32_CHARSET = "qpzry9x8gf2tvdw0s3jn54khce6mua7l";

/** Candidate envelope used to pull addresses out of free text. */
export const ADDRESS_CANDIDATE =
  /(?<![A-Za-z0-9])((?:bc1|tb1|BC1|TB1)[A-Za-z0-9]{39,59}|[13mn2][1-9A-HJ-NP-Za-km-z]{24,34})(?![A-Za-z0-9])/g;

function inspectBech32(candidate: string): AddressInfo | undefined {
  const lower = candidate.toLowerCase();
  if (candidate !== lower && candidate !== candidate.toUpperCase()) return undefined;

  const network: AddressNetwork = lower.startsWith("bc1") ? "mainnet" : "testnet";
  const data = lower.slice(3);
  for (const char of data) {
    if (!BECH32_CHARSET.includes(char)) return undefined;
  }

  const version = data[0];
  if (version === "q") {
    if (lower.length === 42) return { address: candidate, network, kind: "p2wpkh" };
    if (lower.length === 62) return { address: candidate, network, kind: "p2wsh" };
    return undefined;
  }
  if (version === "p" && lower.length === 62) {
    return { address: candidate, network, kind: "p2tr" };
  }
  return undefined;
}

function inspectBase58(candidate: string): AddressInfo | undefined {
  if (!BASE58.test(candidate)) return undefined;
  const prefix = candidate[0];
  const length = candidate.length;

  if (prefix === "1" || prefix === "3") {
    if (length < 25 || length > 34) return undefined;
    return { address: candidate, network: "mainnet", kind: prefix === "1" ? "p2pkh" : "p2sh" };
  }
  if (prefix === "m" || prefix === "n" || prefix === "2") {
    if (length < 26 || length > 35) return undefined;
    return { address: candidate, network: "testnet", kind: prefix === "2" ? "p2sh" : "p2pkh" };
  }
  return undefined;
}

/**
 * Structural check only: prefix, length and character set. Checksums are
 * verified by whoever signs the transaction.
 */
export function inspectAddress(candidate: string): AddressInfo | undefined {
  const prefix = candidate.slice(0, 3).toLowerCase();
  if (prefix === "bc1" || prefix === "tb1") return inspectBech32(candidate);
  return inspectBase58(candidate);
}

export function isValidAddress(candidate: string): boolean {
  return inspectAddress(candidate) !== undefined;
}

export function isTestnetAddress(candidate: string): boolean {
  return inspectAddress(candidate)?.network === "testnet";
}

/** Every structurally valid address in the text, in order of appearance. */
export function findAddresses(text: string): AddressInfo[] {
  const found: AddressInfo[] = [];
  for (const match of text.matchAll(ADDRESS_CANDIDATE)) {
    const info = inspectAddress(match[1] ?? "");
    if (info) found.push(info);
  }
  return found;
}
