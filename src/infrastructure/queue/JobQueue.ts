import { v4 as uuidv4 } from 'uuid';
import {
  BuildJob,
  JobStatus,
  canTransition,
  isTerminal,
} from '../../core/entities/BuildJob.js';
import type { InstallerConfig } from '../../core/entities/InstallerConfig.js';
import type { ProgressEvent } from '../../core/entities/ProgressEvent.js';
import { BuildError, CapacityError, errorMessage } from '../../core/errors.js';
import type { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import type { ProgressChannel } from '../progress/ProgressChannel.js';

/**
 * Everything a build worker may do to the job it was handed
 */
export interface BuildContext {
  readonly jobId: string;
  readonly config: InstallerConfig;
  readonly signal: AbortSignal;
  /** Move the job to its next phase. Throws if the job is no longer running. */
  advance(status: 'rendering' | 'building', message: string): void;
  reportProgress(progress: number, message: string): void;
}

/**
 * Runs one build. Resolves with the artifact reference, rejects to fail the job.
 */
export type BuildHandler = (context: BuildContext) => Promise<string>;

export interface JobQueueOptions {
  maxConcurrentBuilds: number;
  /** Non-terminal jobs allowed at once; submissions beyond this are refused */
  maxActiveJobs: number;
  /** Fail a running job that reports nothing for this long. 0 disables. */
  stallTimeoutMs: number;
}

export const DEFAULT_QUEUE_OPTIONS: JobQueueOptions = {
  maxConcurrentBuilds: 2,
  maxActiveJobs: 5,
  stallTimeoutMs: 15 * 60 * 1000,
};

export interface QueueStatistics {
  total: number;
  pending: number;
  running: number;
  complete: number;
  failed: number;
  cancelled: number;
  maxConcurrentBuilds: number;
  maxActiveJobs: number;
}

interface RunningBuild {
  job: BuildJob;
  controller: AbortController;
  watchdog: NodeJS.Timeout | null;
}

export const INTERRUPTED_MESSAGE = 'Interrupted by server restart';

/**
 * Build job queue: owns every job record and its state machine,
 * bounds concurrency and feeds the progress channel.
 */
export class JobQueue {
  private pending: BuildJob[] = [];
  private running: Map<string, RunningBuild> = new Map();
  private completed: Map<string, BuildJob> = new Map();
  /** Handler runs still in progress, including aborted ones that have not unwound yet */
  private inFlight: Map<string, Promise<void>> = new Map();
  private options: JobQueueOptions;
  private stopped = false;

  constructor(
    private handler: BuildHandler,
    private channel: ProgressChannel,
    options: Partial<JobQueueOptions> = {},
    private jobRepo?: IJobRepository
  ) {
    this.options = { ...DEFAULT_QUEUE_OPTIONS, ...options };

    if (this.jobRepo) {
      this.loadJobsFromDatabase();
    }
  }

  /**
   * Load persisted jobs. Anything that was still live when the previous
   * process stopped is failed; it will not be retried.
   */
  private loadJobsFromDatabase(): void {
    if (!this.jobRepo) return;

    try {
      const dbJobs = this.jobRepo.getAllJobs();
      console.error(`[JobQueue] Loading ${dbJobs.length} jobs from database`);

      let interrupted = 0;
      for (const job of dbJobs) {
        if (!isTerminal(job.status)) {
          job.status = 'failed';
          job.errorDetail = INTERRUPTED_MESSAGE;
          job.statusMessage = INTERRUPTED_MESSAGE;
          job.completedAt = new Date();
          this.persist(job, 'interrupted');
          interrupted++;
        }
        this.completed.set(job.id, job);
        this.channel.close(job.id, this.closingEvent(job));
      }

      if (interrupted > 0) {
        console.error(`[JobQueue] Marked ${interrupted} interrupted jobs as failed`);
      }
    } catch (error) {
      console.error('[JobQueue] Error loading jobs from database:', error);
    }
  }

  /**
   * Submit a validated config. Returns the new job id without waiting for the build.
   */
  submitJob(config: InstallerConfig): string {
    const active = this.pending.length + this.running.size;
    if (active >= this.options.maxActiveJobs) {
      throw new CapacityError(this.options.maxActiveJobs);
    }

    const job: BuildJob = {
      id: uuidv4(),
      status: 'pending',
      progress: 0,
      statusMessage: 'Queued',
      createdAt: new Date(),
      config,
    };

    this.pending.push(job);
    this.persist(job, 'pending');
    this.publish(job, 'status', { status: job.status, message: job.statusMessage });

    this.processQueue();

    return job.id;
  }

  getJob(jobId: string): BuildJob | null {
    const running = this.running.get(jobId);
    if (running) return running.job;

    const completed = this.completed.get(jobId);
    if (completed) return completed;

    const pending = this.pending.find((j) => j.id === jobId);
    if (pending) return pending;

    if (this.jobRepo) {
      try {
        const jobFromDb = this.jobRepo.loadJob(jobId);
        if (jobFromDb && isTerminal(jobFromDb.status)) {
          this.completed.set(jobId, jobFromDb);
        }
        return jobFromDb;
      } catch (error) {
        console.error(`[JobQueue] ✗ Error loading job ${jobId} from database:`, error);
      }
    }

    return null;
  }

  /**
   * Phase change requested by the worker. False if the job is not running
   * or the transition is not allowed from its current state.
   */
  transition(jobId: string, status: JobStatus, message: string): boolean {
    const run = this.running.get(jobId);
    if (!run || !canTransition(run.job.status, status) || isTerminal(status)) {
      return false;
    }

    run.job.status = status;
    run.job.statusMessage = message;
    this.persist(run.job, status);
    this.publish(run.job, 'status', { status, message, progress: run.job.progress });
    this.touch(run);
    return true;
  }

  /**
   * Progress never goes backwards; stale or out-of-range values are clamped.
   */
  updateProgress(jobId: string, progress: number, message: string): void {
    const run = this.running.get(jobId);
    if (!run) return;

    const job = run.job;
    const clamped = Math.min(100, Math.max(0, Math.round(progress)));
    job.progress = Math.max(job.progress, clamped);
    job.statusMessage = message;

    this.persist(job);
    this.publish(job, 'progress', { progress: job.progress, status: job.status, message });
    this.touch(run);
  }

  completeJob(jobId: string, artifactRef: string): void {
    const run = this.running.get(jobId);
    if (!run) return;

    if (!canTransition(run.job.status, 'complete')) {
      this.failJob(jobId, `Build finished while still ${run.job.status}`);
      return;
    }

    run.job.progress = 100;
    run.job.artifactRef = artifactRef;
    this.finish(run.job, 'complete', 'ISO build complete');
  }

  failJob(jobId: string, error: string): void {
    const run = this.running.get(jobId);
    const job = run?.job ?? this.pending.find((j) => j.id === jobId);
    if (!job || isTerminal(job.status)) return;

    job.errorDetail = error;
    this.finish(job, 'failed', error);
  }

  /**
   * Cancel a pending or running job. A running build is aborted through its signal.
   */
  cancelJob(jobId: string): boolean {
    const pendingIndex = this.pending.findIndex((j) => j.id === jobId);
    if (pendingIndex !== -1) {
      this.finish(this.pending[pendingIndex], 'cancelled', 'Job cancelled');
      return true;
    }

    const run = this.running.get(jobId);
    if (run) {
      this.finish(run.job, 'cancelled', 'Job cancelled');
      return true;
    }

    return false;
  }

  /**
   * Forget a job entirely: cancels it if live, then drops its record and channel.
   */
  removeJob(jobId: string): boolean {
    const job = this.getJob(jobId);
    if (!job) return false;

    if (!isTerminal(job.status)) {
      this.cancelJob(jobId);
    }
    this.completed.delete(jobId);
    this.channel.forget(jobId);

    if (this.jobRepo) {
      try {
        this.jobRepo.deleteJob(jobId);
        console.error(`[JobQueue] ✓ Job ${jobId} removed from database`);
      } catch (error) {
        console.error(`[JobQueue] ✗ Failed to remove job ${jobId} from database:`, error);
      }
    }
    return true;
  }

  /**
   * Resolves once the job's handler has returned. A cancelled job is
   * terminal immediately, but its handler may still be unwinding.
   */
  whenSettled(jobId: string): Promise<void> {
    return this.inFlight.get(jobId) ?? Promise.resolve();
  }

  getJobsByStatus(status: JobStatus): BuildJob[] {
    return this.getAllJobs().filter((j) => j.status === status);
  }

  getAllJobs(): BuildJob[] {
    const jobs: BuildJob[] = [];
    jobs.push(...this.pending);
    jobs.push(...Array.from(this.running.values()).map((run) => run.job));
    jobs.push(...this.completed.values());
    return jobs;
  }

  getStatistics(): QueueStatistics {
    const finished = Array.from(this.completed.values());
    return {
      total: this.pending.length + this.running.size + finished.length,
      pending: this.pending.length,
      running: this.running.size,
      complete: finished.filter((j) => j.status === 'complete').length,
      failed: finished.filter((j) => j.status === 'failed').length,
      cancelled: finished.filter((j) => j.status === 'cancelled').length,
      maxConcurrentBuilds: this.options.maxConcurrentBuilds,
      maxActiveJobs: this.options.maxActiveJobs,
    };
  }

  /**
   * Retire terminal jobs that finished more than hoursOld ago.
   * Returns the ids removed so callers can drop their artifacts.
   */
  clearOldJobs(hoursOld: number = 24): string[] {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000);
    const expired = new Set<string>();

    for (const [jobId, job] of this.completed.entries()) {
      if (job.completedAt && job.completedAt < cutoffTime) {
        expired.add(jobId);
      }
    }

    if (this.jobRepo) {
      try {
        this.jobRepo.findRetiredBefore(cutoffTime).forEach((jobId) => expired.add(jobId));
      } catch (error) {
        console.error('[JobQueue] ✗ Failed to query expired jobs:', error);
      }
    }

    for (const jobId of expired) {
      this.removeJob(jobId);
    }
    return [...expired];
  }

  /**
   * Abort every running build and stop all timers
   */
  shutdown(): void {
    this.stopped = true;
    for (const run of Array.from(this.running.values())) {
      this.failJob(run.job.id, 'Server shutting down');
    }
    for (const job of [...this.pending]) {
      job.errorDetail = 'Server shutting down';
      this.finish(job, 'failed', 'Server shutting down');
    }
  }

  private processQueue(): void {
    if (this.stopped) return;
    while (this.pending.length > 0 && this.running.size < this.options.maxConcurrentBuilds) {
      const job = this.pending.shift();
      if (job) {
        job.startedAt = new Date();
        const run: RunningBuild = { job, controller: new AbortController(), watchdog: null };
        this.running.set(job.id, run);
        this.persist(job, 'started');
        this.touch(run);

        const settled = this.execute(run)
          .catch((error) => {
            console.error(`[JobQueue] ✗ Unexpected error running job ${job.id}:`, error);
          })
          .finally(() => this.inFlight.delete(job.id));
        this.inFlight.set(job.id, settled);
      }
    }
  }

  private async execute(run: RunningBuild): Promise<void> {
    const { job, controller } = run;
    const context: BuildContext = {
      jobId: job.id,
      config: job.config,
      signal: controller.signal,
      advance: (status, message) => {
        if (!this.transition(job.id, status, message)) {
          throw new BuildError('cancelled', `Job ${job.id} is no longer running`);
        }
      },
      reportProgress: (progress, message) => this.updateProgress(job.id, progress, message),
    };

    try {
      const artifactRef = await this.handler(context);
      if (controller.signal.aborted) return;
      this.completeJob(job.id, artifactRef);
    } catch (error) {
      if (controller.signal.aborted) return;
      this.failJob(job.id, errorMessage(error));
    }
  }

  /**
   * Move a job into a terminal state and close its channel
   */
  private finish(job: BuildJob, status: 'complete' | 'failed' | 'cancelled', message: string): void {
    const run = this.running.get(job.id);
    if (run) {
      if (run.watchdog) clearTimeout(run.watchdog);
      if (status !== 'complete') run.controller.abort();
    }

    this.running.delete(job.id);
    this.pending = this.pending.filter((j) => j.id !== job.id);

    job.status = status;
    job.statusMessage = message;
    job.completedAt = new Date();
    this.completed.set(job.id, job);

    this.persist(job, status);
    this.channel.close(job.id, this.closingEvent(job));

    this.processQueue();
  }

  /**
   * Reset the stall timer of a running build
   */
  private touch(run: RunningBuild): void {
    if (this.options.stallTimeoutMs <= 0) return;
    if (run.watchdog) clearTimeout(run.watchdog);

    run.watchdog = setTimeout(() => {
      const message = `Build stalled: no progress for ${this.options.stallTimeoutMs}ms`;
      console.error(`[JobQueue] ✗ Job ${run.job.id}: ${message}`);
      this.failJob(run.job.id, message);
    }, this.options.stallTimeoutMs);
    run.watchdog.unref();
  }

  private closingEvent(job: BuildJob): ProgressEvent {
    const base = { jobId: job.id, timestamp: new Date(), status: job.status };
    switch (job.status) {
      case 'complete':
        return { ...base, kind: 'progress', progress: 100, message: job.statusMessage };
      case 'failed':
        return { ...base, kind: 'error', progress: job.progress, message: job.errorDetail ?? job.statusMessage };
      default:
        return { ...base, kind: 'status', progress: job.progress, message: job.statusMessage };
    }
  }

  private publish(
    job: BuildJob,
    kind: ProgressEvent['kind'],
    fields: Pick<ProgressEvent, 'progress' | 'status' | 'message'>
  ): void {
    this.channel.publish({ jobId: job.id, kind, timestamp: new Date(), ...fields });
  }

  private persist(job: BuildJob, label?: string): void {
    if (!this.jobRepo) return;
    try {
      this.jobRepo.saveJob(job);
      if (label) {
        console.error(`[JobQueue] ✓ Job ${job.id} persisted to database (${label})`);
      }
    } catch (error) {
      console.error(`[JobQueue] ✗ Failed to persist job ${job.id} to database:`, error);
    }
  }
}
