import { BlockDevice, NetInterface } from '../entities/Hardware.js';

/**
 * OS device tree access for the discovery agent
 */
export interface IDeviceEnumerator {
  listBlockDevices(): Promise<BlockDevice[]>;
  listNetInterfaces(): Promise<NetInterface[]>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs external commands (ip, udevadm). Never goes through a shell.
 */
export interface ICommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}
