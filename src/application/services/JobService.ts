import { BuildJob, JobStatus } from '../../core/entities/BuildJob.js';
import { patchAnswerFile } from '../../core/discovery/answerPatch.js';
import { CapacityError, FieldErrors, ValidationError, errorMessage } from '../../core/errors.js';
import type { IArtifactStore, StoredArtifact } from '../../core/interfaces/IArtifactStore.js';
import { validateInstallerConfig } from '../../core/validation/ConfigValidator.js';
import { JobQueue, QueueStatistics } from '../../infrastructure/queue/JobQueue.js';
import { InstallerDataService } from './InstallerDataService.js';

export type CreateJobResult =
  | { status: true; jobId: string }
  | { status: false; reason: 'validation'; error: string; fieldErrors: FieldErrors }
  | { status: false; reason: 'capacity'; error: string };

/**
 * Service for managing build job operations
 */
export class JobService {
  constructor(
    private jobQueue: JobQueue,
    private store: IArtifactStore,
    private installerData: InstallerDataService
  ) {}

  /**
   * Validate a submission and queue a build for it. Never waits for the build.
   */
  createJob(raw: unknown): CreateJobResult {
    const validation = validateInstallerConfig(raw, this.installerData.getOptions());
    if (!validation.valid) {
      const error = new ValidationError(validation.errors);
      return { status: false, reason: 'validation', error: error.message, fieldErrors: error.fieldErrors };
    }

    try {
      const jobId = this.jobQueue.submitJob(validation.config);
      console.error(`[JobService] Job ${jobId} created for ${validation.config.identity.fqdn}`);
      return { status: true, jobId };
    } catch (error) {
      if (error instanceof CapacityError) {
        return { status: false, reason: 'capacity', error: error.message };
      }
      throw error;
    }
  }

  getJob(jobId: string): BuildJob | null {
    return this.jobQueue.getJob(jobId);
  }

  getAllJobs(): BuildJob[] {
    return this.jobQueue.getAllJobs();
  }

  getJobsByStatus(status: JobStatus): BuildJob[] {
    return this.jobQueue.getJobsByStatus(status);
  }

  getStatistics(): QueueStatistics {
    return this.jobQueue.getStatistics();
  }

  cancelJob(jobId: string): boolean {
    return this.jobQueue.cancelJob(jobId);
  }

  async getAnswerFile(jobId: string): Promise<string | null> {
    if (!this.jobQueue.getJob(jobId)) return null;
    return this.store.readAnswerFile(jobId);
  }

  /**
   * Answer file as fetched by a booting installer: the NIC filter is
   * pinned to the MAC the installer reported.
   */
  async getPatchedAnswerFile(jobId: string, mac: string | undefined): Promise<string | null> {
    const answer = await this.getAnswerFile(jobId);
    if (answer === null || mac === undefined) return answer;
    return patchAnswerFile(answer, { mac }).contents;
  }

  /**
   * Image of a completed job
   */
  async getImage(jobId: string): Promise<StoredArtifact | null> {
    const job = this.jobQueue.getJob(jobId);
    if (!job || job.status !== 'complete') return null;
    return this.store.getArtifact(jobId);
  }

  /**
   * Cancel if still running, remove artifacts and retire the job
   */
  async deleteJob(jobId: string): Promise<boolean> {
    if (!this.jobQueue.removeJob(jobId)) return false;
    // An aborted worker may still be writing into the job's directory
    await this.jobQueue.whenSettled(jobId);
    await this.store.delete(jobId);
    console.error(`[JobService] Job ${jobId} deleted`);
    return true;
  }

  /**
   * Retention sweep: retire terminal jobs older than the given age
   */
  async clearOldJobs(hoursOld: number): Promise<number> {
    const retired = this.jobQueue.clearOldJobs(hoursOld);
    for (const jobId of retired) {
      try {
        await this.store.delete(jobId);
      } catch (error) {
        console.error(`[JobService] ✗ Failed to remove artifacts of job ${jobId}: ${errorMessage(error)}`);
      }
    }
    if (retired.length > 0) {
      console.error(`[JobService] Retired ${retired.length} jobs older than ${hoursOld}h`);
    }
    return retired.length;
  }
}
