/**
 * Structural view of the devices the discovery agent reasons about.
 * Produced by an enumerator (sysfs on a real boot, literals in tests).
 */
export interface BlockDevice {
  name: string;
  sizeBytes: number;
  rotational: boolean;
  removable: boolean;
}

export interface NetInterface {
  name: string;
  /** Resolved /sys/class/net/<name> path */
  sysPath: string;
  /** Resolved <sysPath>/device path, absent for bridges, bonds, etc. */
  devicePath?: string;
  /** Device has a non-empty physical_slot descriptor */
  hasPhysicalSlot: boolean;
  /** udev property database contains ID_NET_NAME_ONBOARD */
  onboardTag: boolean;
  mac?: string;
}

export interface DiscoveredHardware {
  diskPath: string;
  nicName: string;
  /** Only the patch strategy needs it */
  nicMac: string | null;
}

export interface DiscoveryReport {
  disk: string;
  mgmtNic: string;
  receivedAt: Date;
  remoteAddress?: string;
}
