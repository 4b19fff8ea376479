import fs from "fs";
import os from "os";
import path from "path";
import type { InstallerConfig } from "../src/core/entities/InstallerConfig.js";
import type { InstallerOptions } from "../src/core/validation/ConfigValidator.js";

// Shape-valid sha512-crypt string; never checked against a password
export const TEST_HASH = "$6$saltsalt$" + "A".repeat(86);

export const TEST_OPTIONS: InstallerOptions = {
  countries: new Set(["US", "DE"]),
  keyboards: new Set(["en-us", "de"]),
  timezones: new Set(["UTC", "Europe/Berlin"]),
};

export function submission(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    fqdn: "pve1.example.com",
    email: "admin@example.com",
    country: "US",
    timezone: "UTC",
    keyboardLayout: "en-us",
    rootPasswordHash: TEST_HASH,
    network: { source: "dhcp" },
    ...overrides,
  };
}

export function dhcpConfig(fqdn: string = "pve1.example.com"): InstallerConfig {
  return {
    identity: {
      fqdn,
      email: "admin@example.com",
      country: "US",
      timezone: "UTC",
      keyboardLayout: "en-us",
      rootPasswordHash: TEST_HASH,
    },
    network: { source: "dhcp", cidr: null, gateway: null, dns: null, macFilter: "*00:11:22:33:44:55" },
    disk: { filesystem: "zfs", raid: "raid0", diskList: ["/dev/sda"] },
  };
}

export function tempDir(prefix: string = "iso-provisioner-"): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
