/**
 * IPv4 helpers working on unsigned 32-bit integers
 */

const OCTET_PATTERN = /^(0|[1-9]\d{0,2})$/;

export const DEFAULT_PREFIX_LENGTH = 24;

export interface ParsedCidr {
  address: number;
  prefixLength: number;
  /** Canonical "a.b.c.d/n" text, with the default prefix applied */
  text: string;
}

export function parseIPv4(value: string): number | null {
  const parts = value.trim().split('.');
  if (parts.length !== 4) return null;

  let result = 0;
  for (const part of parts) {
    if (!OCTET_PATTERN.test(part)) return null;
    const octet = parseInt(part, 10);
    if (octet > 255) return null;
    result = result * 256 + octet;
  }
  return result >>> 0;
}

export function formatIPv4(address: number): string {
  return [24, 16, 8, 0].map((shift) => (address >>> shift) & 0xff).join('.');
}

/**
 * Parse "a.b.c.d/n". A missing prefix means /24.
 * Returns an error message instead of throwing.
 */
export function parseCidr(value: string): ParsedCidr | string {
  const trimmed = value.trim();
  const slash = trimmed.indexOf('/');
  const addressText = slash === -1 ? trimmed : trimmed.slice(0, slash);
  const prefixText = slash === -1 ? String(DEFAULT_PREFIX_LENGTH) : trimmed.slice(slash + 1);

  const address = parseIPv4(addressText);
  if (address === null) {
    return `Invalid IPv4 address in CIDR: ${addressText}`;
  }
  if (!/^\d{1,2}$/.test(prefixText)) {
    return `Invalid prefix length: ${prefixText}`;
  }
  const prefixLength = parseInt(prefixText, 10);
  if (prefixLength < 0 || prefixLength > 32) {
    return `Prefix length must be between 0 and 32: ${prefixLength}`;
  }

  return { address, prefixLength, text: `${addressText}/${prefixLength}` };
}

/**
 * ~0 << (32 - prefix) in 32-bit unsigned arithmetic. A /0 mask is 0.
 */
export function networkMask(prefixLength: number): number {
  if (prefixLength <= 0) return 0;
  return (~0 << (32 - prefixLength)) >>> 0;
}

export function inSameNetwork(network: number, host: number, prefixLength: number): boolean {
  const mask = networkMask(prefixLength);
  return ((network & mask) >>> 0) === ((host & mask) >>> 0);
}
