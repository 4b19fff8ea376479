import fsp from 'fs/promises';
import path from 'path';
import type { BlockDevice, NetInterface } from '../../core/entities/Hardware.js';
import type { ICommandRunner, IDeviceEnumerator } from '../../core/interfaces/ISystemProbe.js';

const SECTOR_SIZE = 512;

async function readAttribute(filePath: string): Promise<string | null> {
  try {
    return (await fsp.readFile(filePath, 'utf8')).trim();
  } catch {
    return null;
  }
}

async function resolvePath(filePath: string): Promise<string | null> {
  try {
    return await fsp.realpath(filePath);
  } catch {
    return null;
  }
}

/**
 * Reads devices from sysfs. Missing attributes read as absent/zero,
 * as they do on partially populated trees inside an installer initrd.
 */
export class SysfsDeviceEnumerator implements IDeviceEnumerator {
  constructor(
    private runner: ICommandRunner,
    private sysRoot: string = '/sys'
  ) {}

  async listBlockDevices(): Promise<BlockDevice[]> {
    const blockDir = path.join(this.sysRoot, 'block');
    const names = (await fsp.readdir(blockDir)).sort();

    const devices: BlockDevice[] = [];
    for (const name of names) {
      const dir = path.join(blockDir, name);
      const sectors = parseInt((await readAttribute(path.join(dir, 'size'))) ?? '0', 10);
      devices.push({
        name,
        sizeBytes: Number.isNaN(sectors) ? 0 : sectors * SECTOR_SIZE,
        rotational: (await readAttribute(path.join(dir, 'queue', 'rotational'))) === '1',
        removable: (await readAttribute(path.join(dir, 'removable'))) === '1',
      });
    }
    return devices;
  }

  async listNetInterfaces(): Promise<NetInterface[]> {
    const netDir = path.join(this.sysRoot, 'class', 'net');
    const names = (await fsp.readdir(netDir)).sort();

    const interfaces: NetInterface[] = [];
    for (const name of names) {
      const linkPath = path.join(netDir, name);
      const sysPath = (await resolvePath(linkPath)) ?? linkPath;
      const devicePath = (await resolvePath(path.join(linkPath, 'device'))) ?? undefined;
      const slot = devicePath ? await readAttribute(path.join(devicePath, 'physical_slot')) : null;
      const mac = await readAttribute(path.join(linkPath, 'address'));

      interfaces.push({
        name,
        sysPath,
        devicePath,
        hasPhysicalSlot: slot !== null && slot.length > 0,
        onboardTag: await this.hasOnboardName(sysPath),
        mac: mac || undefined,
      });
    }
    return interfaces;
  }

  /**
   * udev assigns ID_NET_NAME_ONBOARD to NICs the firmware reports as built in
   */
  private async hasOnboardName(sysPath: string): Promise<boolean> {
    try {
      const result = await this.runner.run('udevadm', ['info', '-q', 'property', '-p', sysPath]);
      if (result.exitCode !== 0) return false;
      return result.stdout.split('\n').some((line) => line.startsWith('ID_NET_NAME_ONBOARD='));
    } catch (error) {
      console.error(`[Discovery] udevadm unavailable for ${sysPath}:`, error);
      return false;
    }
  }
}
