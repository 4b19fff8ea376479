import {
  DEFAULT_MAC_FILTER,
  NetworkConfig,
} from '../entities/InstallerConfig.js';
import type { FieldErrors } from '../errors.js';
import { parseCidr, parseIPv4, inSameNetwork } from './ipv4.js';

export type FieldCheck = { valid: true } | { valid: false; message: string };

const OK: FieldCheck = { valid: true };
const fail = (message: string): FieldCheck => ({ valid: false, message });

// ---------------------------------------------------------------------------
// FQDN
// ---------------------------------------------------------------------------

const LABEL_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/;
const TLD_PATTERN = /^[A-Za-z]{2,63}$/;

export const MAX_FQDN_LENGTH = 253;
export const MAX_LABEL_LENGTH = 63;

export function validateFqdn(value: string): FieldCheck {
  const fqdn = value.trim();
  if (fqdn.length === 0) return fail('FQDN cannot be empty');
  if (fqdn.length > MAX_FQDN_LENGTH) {
    return fail(`FQDN must be at most ${MAX_FQDN_LENGTH} characters`);
  }

  const labels = fqdn.split('.');
  if (labels.length < 2) return fail('FQDN must contain a host name and a domain');

  for (const label of labels) {
    if (label.length === 0) return fail('FQDN contains an empty label');
    if (label.length > MAX_LABEL_LENGTH) {
      return fail(`FQDN label "${label}" is longer than ${MAX_LABEL_LENGTH} characters`);
    }
    if (!LABEL_PATTERN.test(label)) return fail(`Invalid FQDN label: ${label}`);
  }

  const tld = labels[labels.length - 1];
  if (!TLD_PATTERN.test(tld)) return fail(`Invalid top-level domain: ${tld}`);

  return OK;
}

// ---------------------------------------------------------------------------
// Password strength
// ---------------------------------------------------------------------------

export const MIN_PASSWORD_LENGTH = 12;
export const MIN_PASSWORD_ENTROPY_BITS = 80;

/**
 * Character classes and the pool size each contributes when observed.
 * entropy = length * log2(sum of observed pool sizes).
 * A coarse estimate, kept exactly as the installer form has always computed it.
 */
const CHARACTER_CLASSES: ReadonlyArray<{ name: string; pattern: RegExp; poolSize: number }> = [
  { name: 'digits', pattern: /\d/, poolSize: 10 },
  { name: 'lowercase', pattern: /[a-z]/, poolSize: 26 },
  { name: 'uppercase', pattern: /[A-Z]/, poolSize: 26 },
  { name: 'special', pattern: /[!@#$%^&*(),.?":{}|<>]/, poolSize: 20 },
];

export function passwordPoolSize(password: string): number {
  return CHARACTER_CLASSES.reduce(
    (pool, charClass) => (charClass.pattern.test(password) ? pool + charClass.poolSize : pool),
    0
  );
}

export function passwordEntropy(password: string): number {
  const pool = passwordPoolSize(password);
  if (pool === 0) return 0;
  return password.length * Math.log2(pool);
}

export interface PasswordCheck {
  valid: boolean;
  entropy: number;
  message?: string;
}

export function validatePassword(password: string): PasswordCheck {
  if (password.length < MIN_PASSWORD_LENGTH) {
    return {
      valid: false,
      entropy: 0,
      message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters long.`,
    };
  }

  const entropy = passwordEntropy(password);
  if (entropy > MIN_PASSWORD_ENTROPY_BITS) {
    return { valid: true, entropy };
  }
  return { valid: false, entropy, message: 'Low entropy password detected!' };
}

// ---------------------------------------------------------------------------
// Email
// ---------------------------------------------------------------------------

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const LOCAL_MAILBOX_PATTERN = /^(root|admin|user)@localhost$/;

export function validateEmail(value: string): FieldCheck {
  const email = value.trim();
  if (email.length === 0) return fail('Email cannot be empty');
  if (EMAIL_PATTERN.test(email) || LOCAL_MAILBOX_PATTERN.test(email)) return OK;
  return fail('Please enter a valid email address!');
}

// ---------------------------------------------------------------------------
// Network
// ---------------------------------------------------------------------------

export interface NetworkInput {
  source: 'dhcp' | 'static';
  cidr?: string | null;
  gateway?: string | null;
  dns?: string | readonly string[] | null;
  macFilter?: string | null;
}

export type NetworkValidation =
  | { valid: true; value: NetworkConfig }
  | { valid: false; errors: FieldErrors };

const MAC_FILTER_PATTERN = /^\*(?:[0-9A-Fa-f]{12}|(?:[0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2})$/;

function splitDns(dns: string | readonly string[]): string[] {
  const entries = typeof dns === 'string' ? dns.split(',') : [...dns];
  return entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

function normalizeMacFilter(value: string): string {
  const trimmed = value.trim();
  return trimmed.startsWith('*') ? trimmed : `*${trimmed}`;
}

export function validateNetwork(input: NetworkInput): NetworkValidation {
  const errors: FieldErrors = {};

  const macFilter = normalizeMacFilter(input.macFilter || DEFAULT_MAC_FILTER);
  if (!MAC_FILTER_PATTERN.test(macFilter)) {
    errors.macFilter = `Invalid MAC address filter: ${macFilter}`;
  }

  if (input.source === 'dhcp') {
    if (errors.macFilter) return { valid: false, errors };
    return {
      valid: true,
      value: { source: 'dhcp', cidr: null, gateway: null, dns: null, macFilter },
    };
  }

  const cidrText = input.cidr?.trim() ?? '';
  const gatewayText = input.gateway?.trim() ?? '';
  const dnsList = input.dns ? splitDns(input.dns) : [];

  if (cidrText.length === 0) errors.cidr = 'CIDR cannot be empty!';
  if (gatewayText.length === 0) errors.gateway = 'Gateway cannot be empty!';
  if (dnsList.length === 0) errors.dns = 'DNS cannot be empty!';

  const cidr = cidrText.length > 0 ? parseCidr(cidrText) : null;
  if (typeof cidr === 'string') errors.cidr = cidr;

  const gateway = gatewayText.length > 0 ? parseIPv4(gatewayText) : null;
  if (gatewayText.length > 0 && gateway === null) {
    errors.gateway = `Invalid gateway IP address: ${gatewayText}`;
  }

  if (cidr !== null && typeof cidr !== 'string' && gateway !== null) {
    if (!inSameNetwork(cidr.address, gateway, cidr.prefixLength)) {
      errors.gateway = `Gateway ${gatewayText} is not inside network ${cidr.text}`;
    }
  }

  const seen = new Set<string>();
  for (const server of dnsList) {
    if (parseIPv4(server) === null) {
      errors.dns = `Invalid DNS server IP address: ${server}`;
      break;
    }
    if (seen.has(server)) {
      errors.dns = `Duplicate DNS server IP address: ${server}`;
      break;
    }
    seen.add(server);
  }

  if (Object.keys(errors).length > 0 || cidr === null || typeof cidr === 'string') {
    return { valid: false, errors };
  }

  return {
    valid: true,
    value: {
      source: 'static',
      cidr: cidr.text,
      gateway: gatewayText,
      dns: dnsList,
      macFilter,
    },
  };
}
