import type { BlockDevice } from '../entities/Hardware.js';

const EXCLUDED_PREFIXES = ['loop', 'ram', 'fd', 'sr'];

export const GIB = 1024 ** 3;
export const MIN_INSTALL_DISK_GIB = 20;

export function sizeInGiB(sizeBytes: number): number {
  return Math.floor(sizeBytes / GIB);
}

/**
 * Candidates for the installation disk, in enumeration order
 */
export function eligibleDisks(devices: readonly BlockDevice[]): BlockDevice[] {
  return devices.filter(
    (device) =>
      !EXCLUDED_PREFIXES.some((prefix) => device.name.startsWith(prefix)) &&
      !device.removable &&
      sizeInGiB(device.sizeBytes) >= MIN_INSTALL_DISK_GIB
  );
}

/**
 * Pick the installation disk: solid-state first, then rotational, then anything left.
 * Within the winning tier the smallest disk wins, compared in whole GiB;
 * equal sizes keep enumeration order.
 * Returns the device path, or null when nothing qualifies.
 */
export function selectInstallDisk(devices: readonly BlockDevice[]): string | null {
  const candidates = eligibleDisks(devices);

  const tiers: BlockDevice[][] = [
    candidates.filter((device) => !device.rotational),
    candidates.filter((device) => device.rotational),
    candidates,
  ];

  for (const tier of tiers) {
    if (tier.length === 0) continue;
    const chosen = tier.reduce((best, device) =>
      sizeInGiB(device.sizeBytes) < sizeInGiB(best.sizeBytes) ? device : best
    );
    return `/dev/${chosen.name}`;
  }
  return null;
}
