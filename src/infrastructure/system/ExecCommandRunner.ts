import { spawn } from 'child_process';
import type { CommandResult, ICommandRunner } from '../../core/interfaces/ISystemProbe.js';

/**
 * Runs commands directly (no shell). A non-zero exit is reported, not thrown;
 * only a command that cannot be started rejects.
 */
export class ExecCommandRunner implements ICommandRunner {
  constructor(private debugLog: (message: string) => void = () => {}) {}

  run(command: string, args: string[]): Promise<CommandResult> {
    this.debugLog(`[Exec] ${command} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', reject);
      child.on('close', (code) => {
        resolve({ exitCode: code ?? -1, stdout, stderr });
      });
    });
  }
}
