import { z } from 'zod';
import {
  DEFAULT_DISK_LIST,
  DiskSetup,
  Filesystem,
  InstallerConfig,
} from '../entities/InstallerConfig.js';
import type { FieldErrors } from '../errors.js';
import { validateEmail, validateFqdn, validateNetwork } from './validators.js';

/**
 * Reference lists a submission is checked against
 */
export interface InstallerOptions {
  countries: ReadonlySet<string>;
  keyboards: ReadonlySet<string>;
  timezones: ReadonlySet<string>;
}

export type ConfigValidation =
  | { valid: true; config: InstallerConfig }
  | { valid: false; errors: FieldErrors };

const FILESYSTEMS = ['ext4', 'xfs', 'zfs', 'btrfs'] as const;

const RAID_MIN_DISKS: Record<'zfs' | 'btrfs', Record<string, number>> = {
  zfs: { raid0: 1, raid1: 2, raid10: 2, 'raidz-1': 3, 'raidz-2': 4, 'raidz-3': 5 },
  btrfs: { raid0: 1, raid1: 2, raid10: 2 },
};

const DISK_PATH_PATTERN = /^\/dev\/[a-zA-Z0-9]+$/;
const SHA512_CRYPT_PATTERN = /^\$6\$(?:rounds=\d{4,9}\$)?[./A-Za-z0-9]{1,16}\$[./A-Za-z0-9]{86}$/;

// Shape only. The invariants are checked by the validators below.
const SubmissionSchema = z.object({
  fqdn: z.string({ required_error: 'FQDN is required' }),
  email: z.string({ required_error: 'Email is required' }),
  country: z.string({ required_error: 'Country is required' }),
  timezone: z.string({ required_error: 'Timezone is required' }),
  keyboardLayout: z.string({ required_error: 'Keyboard layout is required' }),
  rootPasswordHash: z.string({ required_error: 'Root password hash is required' }),
  network: z.object(
    {
      source: z
        .enum(['dhcp', 'static', 'from-dhcp', 'from-answer'])
        .transform((source) =>
          source === 'dhcp' || source === 'from-dhcp' ? ('dhcp' as const) : ('static' as const)
        ),
      cidr: z.string().nullish(),
      gateway: z.string().nullish(),
      dns: z.union([z.string(), z.array(z.string())]).nullish(),
      macFilter: z.string().nullish(),
    },
    { required_error: 'Network configuration is required' }
  ),
  disk: z
    .object({
      filesystem: z.enum(FILESYSTEMS).default('zfs'),
      raid: z.string().nullish(),
      diskList: z.array(z.string()).min(1).max(10).default([...DEFAULT_DISK_LIST]),
    })
    .default({}),
});

export type ConfigSubmission = z.input<typeof SubmissionSchema>;

function zodErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'root';
    if (!(path in errors)) {
      errors[path] = issue.message;
    }
  }
  return errors;
}

function validateDisk(
  filesystem: Filesystem,
  raid: string | null | undefined,
  diskList: readonly string[],
  errors: FieldErrors
): DiskSetup | null {
  for (const disk of diskList) {
    if (!DISK_PATH_PATTERN.test(disk)) {
      errors['disk.diskList'] = `Invalid disk path: ${disk}`;
      return null;
    }
  }
  if (new Set(diskList).size !== diskList.length) {
    errors['disk.diskList'] = 'Disk list contains duplicates';
    return null;
  }

  if (filesystem === 'ext4' || filesystem === 'xfs') {
    return { filesystem, diskList: [...diskList] };
  }

  const level = raid ?? (filesystem === 'zfs' ? 'raid0' : undefined);
  if (!level) {
    errors['disk.raid'] = `RAID level is required when filesystem is ${filesystem}`;
    return null;
  }
  const levels = RAID_MIN_DISKS[filesystem];
  if (!Object.hasOwn(levels, level)) {
    errors['disk.raid'] = `Invalid ${filesystem} RAID level: ${level}`;
    return null;
  }
  const minDisks = levels[level];
  if (diskList.length < minDisks) {
    errors['disk.diskList'] = `At least ${minDisks} disks are required for ${filesystem} ${level}`;
    return null;
  }
  return { filesystem, raid: level, diskList: [...diskList] };
}

/**
 * Turn an untrusted submission into a normalized InstallerConfig,
 * or a map of field -> error message. Pure.
 */
export function validateInstallerConfig(raw: unknown, options: InstallerOptions): ConfigValidation {
  const parsed = SubmissionSchema.safeParse(raw);
  if (!parsed.success) {
    return { valid: false, errors: zodErrors(parsed.error) };
  }

  const input = parsed.data;
  const errors: FieldErrors = {};

  const fqdn = input.fqdn.trim();
  const fqdnCheck = validateFqdn(fqdn);
  if (!fqdnCheck.valid) errors.fqdn = fqdnCheck.message;

  const email = input.email.trim();
  const emailCheck = validateEmail(email);
  if (!emailCheck.valid) errors.email = emailCheck.message;

  const country = input.country.trim().toUpperCase();
  if (!options.countries.has(country)) errors.country = `Invalid country code: ${input.country}`;

  const timezone = input.timezone.trim();
  if (!options.timezones.has(timezone)) errors.timezone = `Invalid timezone: ${input.timezone}`;

  const keyboardLayout = input.keyboardLayout.trim();
  if (!options.keyboards.has(keyboardLayout)) {
    errors.keyboardLayout = `Invalid keyboard layout: ${input.keyboardLayout}`;
  }

  if (!SHA512_CRYPT_PATTERN.test(input.rootPasswordHash)) {
    errors.rootPasswordHash = 'Root password must be a sha512-crypt hash';
  }

  const network = validateNetwork(input.network);
  if (!network.valid) {
    for (const [field, message] of Object.entries(network.errors)) {
      errors[`network.${field}`] = message;
    }
  }

  const disk = validateDisk(input.disk.filesystem, input.disk.raid, input.disk.diskList, errors);

  if (Object.keys(errors).length > 0 || !network.valid || disk === null) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    config: {
      identity: {
        fqdn,
        email,
        country,
        timezone,
        keyboardLayout,
        rootPasswordHash: input.rootPasswordHash,
      },
      network: network.value,
      disk,
    },
  };
}
