import type { NetInterface } from '../entities/Hardware.js';

const VIRTUAL_NET_SEGMENT = '/devices/virtual/net/';
const ROOT_BUS_PREFIX = '0000:00:';

export function isPhysicalInterface(nic: NetInterface): boolean {
  return nic.name !== 'lo' && !nic.sysPath.includes(VIRTUAL_NET_SEGMENT);
}

/**
 * Hangs off the root PCI bus, directly or behind a root port, and has no
 * physical slot: soldered to the board
 */
export function looksOnboard(nic: NetInterface): boolean {
  if (!nic.devicePath || nic.hasPhysicalSlot) return false;
  return nic.devicePath.includes(ROOT_BUS_PREFIX);
}

/**
 * Pick the management NIC. udev's onboard naming tag wins; the PCI
 * heuristic is only consulted when no interface carries the tag.
 */
export function selectManagementNic(interfaces: readonly NetInterface[]): NetInterface | null {
  const physical = interfaces.filter(isPhysicalInterface);

  const tagged = physical.filter((nic) => nic.onboardTag);
  if (tagged.length > 0) return tagged[0];

  return physical.find(looksOnboard) ?? null;
}
