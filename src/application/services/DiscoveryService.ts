import fsp from 'fs/promises';
import type { DiscoveredHardware } from '../../core/entities/Hardware.js';
import { isMacAddress, patchAnswerFile } from '../../core/discovery/answerPatch.js';
import { selectInstallDisk } from '../../core/discovery/diskSelection.js';
import { selectManagementNic } from '../../core/discovery/nicSelection.js';
import { DiscoveryError } from '../../core/errors.js';
import type { IDeviceEnumerator } from '../../core/interfaces/ISystemProbe.js';
import type { IDiscoveryReporter } from '../../infrastructure/http/DiscoveryReporter.js';
import type { BootstrapNetwork } from '../../infrastructure/system/NetworkBringUp.js';

export type DiscoveryStrategy = 'report' | 'patch';

export interface INetworkBringUp {
  bringUp(nic: string, network: BootstrapNetwork): Promise<void>;
}

export interface DiscoveryOptions {
  strategy: DiscoveryStrategy;
  answerFilePath: string;
  bootstrap: BootstrapNetwork;
}

export interface DiscoveryOutcome {
  hardware: DiscoveredHardware;
  strategy: DiscoveryStrategy;
  /** patch strategy only: false when there was no answer file to patch */
  patched?: boolean;
}

/**
 * Boot-time hardware discovery: choose the install disk and management NIC,
 * then either patch the local answer file or report to the configuration endpoint.
 * Strictly sequential; any failure aborts the run.
 */
export class DiscoveryService {
  constructor(
    private enumerator: IDeviceEnumerator,
    private network: INetworkBringUp,
    private reporter: IDiscoveryReporter,
    private options: DiscoveryOptions
  ) {}

  async discover(): Promise<DiscoveredHardware> {
    const diskPath = selectInstallDisk(await this.enumerator.listBlockDevices());
    if (!diskPath) {
      throw new DiscoveryError('disk-not-found', 'No suitable installation disk found');
    }

    const nic = selectManagementNic(await this.enumerator.listNetInterfaces());
    if (!nic) {
      throw new DiscoveryError('nic-not-found', 'No onboard network interface found');
    }
    const nicMac = nic.mac && isMacAddress(nic.mac) ? nic.mac : null;

    console.log(`[Discovery] Selected disk ${diskPath}, management NIC ${nic.name} (${nicMac ?? 'no MAC'})`);
    return { diskPath, nicName: nic.name, nicMac };
  }

  async run(): Promise<DiscoveryOutcome> {
    const hardware = await this.discover();

    if (this.options.strategy === 'report') {
      await this.network.bringUp(hardware.nicName, this.options.bootstrap);
      await this.reporter.report({ disk: hardware.diskPath, mgmt_nic: hardware.nicName });
      console.log('[Discovery] Reported hardware to configuration endpoint');
      return { hardware, strategy: 'report' };
    }

    if (hardware.nicMac === null) {
      throw new DiscoveryError('mac-not-found', `No MAC address for interface ${hardware.nicName}`);
    }
    const patched = await this.patchAnswerFile(hardware.diskPath, hardware.nicMac);
    return { hardware, strategy: 'patch', patched };
  }

  private async patchAnswerFile(diskPath: string, mac: string): Promise<boolean> {
    const filePath = this.options.answerFilePath;
    let original: string;
    try {
      original = await fsp.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        console.warn(`[Discovery] Answer file ${filePath} not found, nothing to patch`);
        return false;
      }
      throw error;
    }

    const result = patchAnswerFile(original, { mac, disk: diskPath });
    await fsp.writeFile(`${filePath}.bak`, original, 'utf8');
    await fsp.writeFile(filePath, result.contents, 'utf8');

    console.log(
      `[Discovery] Patched ${filePath} (mac filter: ${result.macPatched ? 'yes' : 'no'}, disk list: ${result.diskPatched ? 'yes' : 'no'})`
    );
    return true;
  }
}
