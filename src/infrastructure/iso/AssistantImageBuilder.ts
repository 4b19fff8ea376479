import { spawn } from 'child_process';
import type { IImageBuilder, ImageBuildRequest } from '../../core/interfaces/IImageBuilder.js';

const PERCENT_PATTERN = /(\d{1,3})\s*%/;
const STDERR_TAIL_LINES = 20;

export interface AssistantOptions {
  /** Executable, proxmox-auto-install-assistant unless overridden */
  command: string;
  /** Stock installer ISO the answer file is embedded into */
  baseIsoPath: string;
  extraArgs?: string[];
}

/**
 * Extract a 0-100 percentage from a line of tool output
 */
export function parsePercent(line: string): number | null {
  const match = PERCENT_PATTERN.exec(line);
  if (!match) return null;
  const value = parseInt(match[1], 10);
  return value <= 100 ? value : null;
}

/**
 * Runs the installer's own ISO preparation tool:
 *   <command> prepare-iso <baseIso> --fetch-from iso --answer-file <file> --output <iso>
 */
export class AssistantImageBuilder implements IImageBuilder {
  readonly name = 'assistant';

  constructor(private options: AssistantOptions) {}

  buildArgs(request: ImageBuildRequest): string[] {
    return [
      'prepare-iso',
      this.options.baseIsoPath,
      '--fetch-from',
      'iso',
      '--answer-file',
      request.answerFilePath,
      '--output',
      request.outputPath,
      ...(this.options.extraArgs ?? []),
    ];
  }

  build(request: ImageBuildRequest): Promise<void> {
    const args = this.buildArgs(request);

    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        signal: request.signal,
      });

      let lastPercent = 0;
      const stderrTail: string[] = [];

      const onLine = (line: string, isStderr: boolean) => {
        const text = line.trim();
        if (!text) return;
        if (isStderr) {
          stderrTail.push(text);
          if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
        }
        const percent = parsePercent(text);
        if (percent !== null) lastPercent = Math.max(lastPercent, percent);
        request.onProgress(lastPercent, text);
      };

      const lineReader = (isStderr: boolean) => {
        let buffered = '';
        return (data: Buffer) => {
          buffered += data.toString();
          const lines = buffered.split(/\r?\n|\r/);
          buffered = lines.pop() ?? '';
          lines.forEach((line) => onLine(line, isStderr));
        };
      };

      child.stdout?.on('data', lineReader(false));
      child.stderr?.on('data', lineReader(true));

      child.on('error', (error) => {
        reject(error);
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const reason = code !== null ? `exited with code ${code}` : `was killed by ${signal}`;
        const detail = stderrTail.length > 0 ? `: ${stderrTail[stderrTail.length - 1]}` : '';
        reject(new Error(`${this.options.command} ${reason}${detail}`));
      });
    });
  }
}
