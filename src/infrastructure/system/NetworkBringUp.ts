import fsp from 'fs/promises';
import { DiscoveryError, errorMessage } from '../../core/errors.js';
import type { CommandResult, ICommandRunner } from '../../core/interfaces/ISystemProbe.js';

export interface BootstrapNetwork {
  /** address/prefix assigned to the management NIC */
  address: string;
  gateway: string;
  dns: string;
}

/**
 * Minimal network configuration inside the installer environment,
 * enough to reach the configuration endpoint.
 */
export class NetworkBringUp {
  constructor(
    private runner: ICommandRunner,
    private resolvConfPath: string = '/etc/resolv.conf'
  ) {}

  async bringUp(nic: string, network: BootstrapNetwork): Promise<void> {
    await this.ip(['link', 'set', 'dev', nic, 'up']);
    await this.ip(['addr', 'add', network.address, 'dev', nic]);
    await this.ip(['route', 'add', 'default', 'via', network.gateway]);

    try {
      await fsp.writeFile(this.resolvConfPath, `nameserver ${network.dns}\n`, 'utf8');
    } catch (error) {
      throw new DiscoveryError(
        'network-bring-up-failed',
        `Failed to write ${this.resolvConfPath}: ${errorMessage(error)}`
      );
    }
  }

  private async ip(args: string[]): Promise<void> {
    const command = `ip ${args.join(' ')}`;
    let result: CommandResult;
    try {
      result = await this.runner.run('ip', args);
    } catch (error) {
      throw new DiscoveryError(
        'network-bring-up-failed',
        `${command} could not be run: ${errorMessage(error)}`
      );
    }

    // Re-running against an already configured NIC is fine
    if (result.exitCode !== 0 && !result.stderr.includes('File exists')) {
      throw new DiscoveryError(
        'network-bring-up-failed',
        `${command} failed (exit ${result.exitCode}): ${result.stderr.trim()}`
      );
    }
  }
}
