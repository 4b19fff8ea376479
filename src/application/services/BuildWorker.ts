import { BuildError, BuildStage, errorMessage } from '../../core/errors.js';
import type { IArtifactStore } from '../../core/interfaces/IArtifactStore.js';
import type { IImageBuilder } from '../../core/interfaces/IImageBuilder.js';
import { renderAnswerFile } from '../../core/templates/index.js';
import type { BuildContext } from '../../infrastructure/queue/JobQueue.js';

// Progress bands: render 0-10, image tool 10-95, finalize 95-100
const RENDER_DONE = 5;
const STORED = 10;
const IMAGE_BAND = 85;
const FINALIZING = 95;

const STAGE_LABELS: Record<BuildStage, string> = {
  render: 'Rendering answer file failed',
  store: 'Storing answer file failed',
  image: 'ISO build failed',
  finalize: 'Registering ISO failed',
  cancelled: 'Build cancelled',
  watchdog: 'Build stalled',
};

/**
 * Map the image tool's own 0-100 onto the job's 10-95 band
 */
export function imageProgress(toolPercent: number): number {
  const clamped = Math.min(100, Math.max(0, toolPercent));
  return STORED + Math.floor((clamped * IMAGE_BAND) / 100);
}

/**
 * Executes one build job: render, store, build image, register
 */
export class BuildWorker {
  constructor(
    private store: IArtifactStore,
    private builder: IImageBuilder,
    private debugLog: (message: string) => void = () => {}
  ) {}

  /**
   * Handler handed to the job queue
   */
  readonly handle = (context: BuildContext): Promise<string> => this.run(context);

  private async stage<T>(context: BuildContext, stage: BuildStage, work: () => Promise<T> | T): Promise<T> {
    if (context.signal.aborted) {
      throw new BuildError('cancelled', STAGE_LABELS.cancelled);
    }
    try {
      return await work();
    } catch (error) {
      if (error instanceof BuildError) throw error;
      if (context.signal.aborted) {
        throw new BuildError('cancelled', STAGE_LABELS.cancelled);
      }
      throw new BuildError(stage, `${STAGE_LABELS[stage]}: ${errorMessage(error)}`);
    }
  }

  async run(context: BuildContext): Promise<string> {
    const { jobId, config } = context;

    context.advance('rendering', 'Rendering answer file');
    const answer = await this.stage(context, 'render', () =>
      renderAnswerFile(config, { generatedAt: new Date() })
    );
    context.reportProgress(RENDER_DONE, 'Answer file rendered');

    const answerFilePath = await this.stage(context, 'store', () =>
      this.store.saveAnswerFile(jobId, answer)
    );
    context.reportProgress(STORED, 'Answer file stored');
    this.debugLog(`[BuildWorker] Job ${jobId} answer file at ${answerFilePath}`);

    context.advance('building', `Building ISO image (${this.builder.name})`);
    const outputPath = await this.stage(context, 'image', async () => {
      const outputPath = await this.store.imageOutputPath(jobId);
      await this.builder.build({
        jobId,
        answerFilePath,
        outputPath,
        signal: context.signal,
        onProgress: (percent, message) => context.reportProgress(imageProgress(percent), message),
      });
      return outputPath;
    });

    context.reportProgress(FINALIZING, 'Registering ISO image');
    const artifact = await this.stage(context, 'finalize', () =>
      this.store.registerImage(jobId, outputPath)
    );
    this.debugLog(`[BuildWorker] Job ${jobId} produced ${artifact.imagePath} (${artifact.sizeBytes} bytes)`);

    return artifact.imagePath;
  }
}
