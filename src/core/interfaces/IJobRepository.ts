import { BuildJob } from '../entities/BuildJob.js';

/**
 * Interface for build job persistence
 */
export interface IJobRepository {
  saveJob(job: BuildJob): void;

  loadJob(jobId: string): BuildJob | null;

  getAllJobs(): BuildJob[];

  deleteJob(jobId: string): boolean;

  /** Terminal jobs completed before the cutoff */
  findRetiredBefore(cutoff: Date): string[];
}
