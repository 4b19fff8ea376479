/**
 * Installer configuration domain entities.
 *
 * An InstallerConfig is only ever produced by the config validator and is
 * treated as an immutable value from then on.
 */

export interface IdentityConfig {
  readonly fqdn: string;
  readonly email: string;
  readonly country: string;
  readonly timezone: string;
  readonly keyboardLayout: string;
  readonly rootPasswordHash: string;
}

export interface DhcpNetworkConfig {
  readonly source: 'dhcp';
  readonly cidr: null;
  readonly gateway: null;
  readonly dns: null;
  /** udev ID_NET_NAME_MAC glob selecting the management NIC */
  readonly macFilter: string;
}

export interface StaticNetworkConfig {
  readonly source: 'static';
  readonly cidr: string;
  readonly gateway: string;
  readonly dns: readonly string[];
  /** udev ID_NET_NAME_MAC glob selecting the management NIC */
  readonly macFilter: string;
}

export type NetworkConfig = DhcpNetworkConfig | StaticNetworkConfig;

export type Filesystem = 'ext4' | 'xfs' | 'zfs' | 'btrfs';

export interface DiskSetup {
  readonly filesystem: Filesystem;
  /** RAID level; only set for zfs and btrfs */
  readonly raid?: string;
  readonly diskList: readonly string[];
}

export interface InstallerConfig {
  readonly identity: IdentityConfig;
  readonly network: NetworkConfig;
  readonly disk: DiskSetup;
}

export const DEFAULT_MAC_FILTER = '*00:11:22:33:44:55';
export const DEFAULT_DISK_LIST: readonly string[] = ['/dev/sda'];
