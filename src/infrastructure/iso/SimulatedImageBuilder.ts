import fsp from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import type { IImageBuilder, ImageBuildRequest } from '../../core/interfaces/IImageBuilder.js';

export interface SimulatedBuilderOptions {
  /** Pause between 10% steps */
  stepMs: number;
}

/**
 * Development stand-in for the ISO tool. Walks through the build in
 * 10% steps and writes a small placeholder image containing the answer file.
 */
export class SimulatedImageBuilder implements IImageBuilder {
  readonly name = 'simulated';

  constructor(private options: SimulatedBuilderOptions = { stepMs: 1000 }) {}

  async build(request: ImageBuildRequest): Promise<void> {
    for (let percent = 10; percent <= 100; percent += 10) {
      await delay(this.options.stepMs, undefined, { signal: request.signal });
      request.onProgress(percent, `Building ISO image (${percent}%)`);
    }

    const answer = await fsp.readFile(request.answerFilePath, 'utf8');
    await fsp.writeFile(
      request.outputPath,
      `SIMULATED-ISO job=${request.jobId}\n${answer}`,
      'utf8'
    );
  }
}
