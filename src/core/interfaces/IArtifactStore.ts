/**
 * Registered build output
 */
export interface StoredArtifact {
  jobId: string;
  imagePath: string;
  sizeBytes: number;
  sha256: string;
  registeredAt: Date;
}

/**
 * Build outputs keyed by job id. Each job owns its own keyspace,
 * so concurrent jobs never contend.
 */
export interface IArtifactStore {
  saveAnswerFile(jobId: string, contents: string): Promise<string>;

  readAnswerFile(jobId: string): Promise<string | null>;

  /** Where the image tool should write the image for this job */
  imageOutputPath(jobId: string): Promise<string>;

  registerImage(jobId: string, imagePath: string): Promise<StoredArtifact>;

  getArtifact(jobId: string): Promise<StoredArtifact | null>;

  /** Removes the answer file and the image. Returns false if nothing was stored. */
  delete(jobId: string): Promise<boolean>;
}
