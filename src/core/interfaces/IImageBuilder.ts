export interface ImageBuildRequest {
  jobId: string;
  answerFilePath: string;
  outputPath: string;
  signal: AbortSignal;
  /** percent is the tool's own 0-100 scale */
  onProgress: (percent: number, message: string) => void;
}

/**
 * Image-construction tooling invoked by the build worker
 */
export interface IImageBuilder {
  readonly name: string;
  build(request: ImageBuildRequest): Promise<void>;
}
